import { Socket } from "node:net";
import { SSH_CONNECT_TIMEOUT_MS, SSH_POLL_INTERVAL_MS } from "../constants";
import { UnreachableError } from "../errors/driver-errors";
import { waitForState } from "../utils/provider-utils";

/**
 * Blocks until a remote shell answers, or fails with UnreachableError.
 */
export interface ShellProbe {
  waitForShell(host: string, port: number, timeoutMs: number): Promise<void>;
}

export interface TcpShellProbeOptions {
  pollIntervalMs?: number;
  connectTimeoutMs?: number;
}

/**
 * Considers the shell ready once the port returns an SSH identification
 * banner; an open port alone is not enough while sshd is still starting.
 */
export class TcpShellProbe implements ShellProbe {
  private readonly pollIntervalMs: number;
  private readonly connectTimeoutMs: number;

  constructor(
    options: TcpShellProbeOptions = {},
    private readonly log: (message: string) => void = () => undefined
  ) {
    this.pollIntervalMs = options.pollIntervalMs ?? SSH_POLL_INTERVAL_MS;
    this.connectTimeoutMs = options.connectTimeoutMs ?? SSH_CONNECT_TIMEOUT_MS;
  }

  async waitForShell(host: string, port: number, timeoutMs: number): Promise<void> {
    this.log(`Waiting for SSH on ${host}:${port}`);
    const ready = await waitForState(
      () => this.probeBanner(host, port, Math.min(this.connectTimeoutMs, timeoutMs)),
      (answered) => answered,
      { maxWaitMs: timeoutMs, pollIntervalMs: this.pollIntervalMs }
    );
    if (!ready) {
      throw new UnreachableError(host, port, timeoutMs);
    }
    this.log(`SSH is up on ${host}:${port}`);
  }

  probeBanner(host: string, port: number, timeoutMs: number): Promise<boolean> {
    return new Promise((resolve) => {
      const socket = new Socket();
      let settled = false;
      const finish = (answered: boolean) => {
        if (settled) return;
        settled = true;
        socket.destroy();
        resolve(answered);
      };

      socket.setTimeout(timeoutMs);
      socket.once("data", (chunk: Buffer) => finish(chunk.toString("utf8").startsWith("SSH-")));
      socket.once("timeout", () => finish(false));
      socket.once("error", () => finish(false));
      socket.once("close", () => finish(false));
      socket.connect(port, host);
    });
  }
}
