import type { Writable } from "stream";
import type { LogOptions } from "./logger";
import type { NotificationLogger } from "./notification-logger";

/**
 * A logger that writes to a terminal stream, usually `process.stderr`.
 *
 * Log messages are only written in verbose mode. Messages shown to the user
 * are always written.
 */
export class ConsoleLogger implements NotificationLogger {
  constructor(
    private readonly stream: Writable,
    public verbose = false,
  ) {}

  async log(message: string, options: LogOptions = {}): Promise<void> {
    if (!this.verbose) {
      return;
    }

    const trailingNewline = options.trailingNewline ?? true;
    await this.write(message + (trailingNewline ? "\n" : ""));
  }

  async showErrorMessage(message: string): Promise<void> {
    await this.write(`${message}\n`);
  }

  async showWarningMessage(message: string): Promise<void> {
    await this.write(`Warning: ${message}\n`);
  }

  private write(text: string): Promise<void> {
    return new Promise((resolve, reject) => {
      this.stream.write(text, (err) => {
        if (err) {
          reject(err);
          return;
        }

        resolve();
      });
    });
  }
}
