/**
 * Base Driver
 *
 * Common logging plumbing for the lifecycle orchestrator and its
 * collaborators.
 */

export type LogStream = "stdout" | "stderr";

export type LogCallback = (line: string, stream: LogStream) => void;

export abstract class BaseDriver {
  protected logCallback?: LogCallback;

  constructor(logCallback?: LogCallback) {
    this.logCallback = logCallback;
  }

  /**
   * Set a callback to receive log output during operations.
   */
  setLogCallback(cb: LogCallback): void {
    this.logCallback = cb;
  }

  protected log(message: string, stream: LogStream = "stdout"): void {
    if (this.logCallback) {
      this.logCallback(message, stream);
    }
  }
}
