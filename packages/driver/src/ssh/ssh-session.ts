/**
 * SSH remote execution over ssh2.
 */

import { readFile } from "node:fs/promises";
import { Client, type ConnectConfig } from "ssh2";
import type { RemoteShell, ShellCredential } from "../interface/provider-client";

const SSH_READY_TIMEOUT_MS = 30_000;

class Ssh2RemoteShell implements RemoteShell {
  constructor(
    private readonly conn: Client,
    private readonly label: string,
    private readonly log: (message: string) => void
  ) {}

  run(command: string): Promise<string> {
    return new Promise((resolve, reject) => {
      // a dropped connection fails the command in flight
      const onConnectionError = (err: Error) => reject(err);
      this.conn.once("error", onConnectionError);
      const detach = () => {
        this.conn.removeListener("error", onConnectionError);
      };

      this.conn.exec(command, (err, stream) => {
        if (err) {
          detach();
          return reject(err);
        }

        let stdout = "";
        let stderr = "";

        stream.on("data", (data: Buffer) => {
          stdout += data.toString();
        });

        stream.stderr.on("data", (data: Buffer) => {
          stderr += data.toString();
          this.log(`[${this.label}] ${data.toString().trimEnd()}`);
        });

        stream.on("close", (code: number | null) => {
          detach();
          if (code !== 0) {
            reject(new Error(`Command "${command}" failed with code ${code}: ${stderr.trim()}`));
          } else {
            resolve(stdout);
          }
        });
      });
    });
  }

  close(): void {
    this.conn.end();
  }
}

/**
 * Open an SSH connection authenticated by password or private key file.
 */
export async function openSshSession(
  host: string,
  port: number,
  username: string,
  credential: ShellCredential,
  log: (message: string) => void = () => undefined
): Promise<RemoteShell> {
  const config: ConnectConfig = {
    host,
    port,
    username,
    readyTimeout: SSH_READY_TIMEOUT_MS,
  };
  if ("password" in credential) {
    config.password = credential.password;
  } else {
    config.privateKey = await readFile(credential.privateKeyPath);
  }

  const conn = new Client();
  await new Promise<void>((resolve, reject) => {
    conn.once("ready", () => resolve());
    conn.once("error", (err) => reject(err));
    conn.connect(config);
  });

  const label = `${username}@${host}`;
  conn.on("error", (err) => {
    log(`[${label}] SSH connection error: ${err.message}`);
  });

  return new Ssh2RemoteShell(conn, label, log);
}
