import { ensureFile } from "fs-extra";
import { open } from "node:fs/promises";
import type { FileHandle } from "node:fs/promises";
import { isAbsolute } from "path";
import { getErrorMessage } from "../helpers-pure";
import type { LogOptions } from "./logger";
import type { NotificationLogger } from "./notification-logger";

/**
 * An implementation of {@link NotificationLogger} that sends the output both to another
 * {@link NotificationLogger} and to a file.
 *
 * The first time a message is written, an additional banner is written to the underlying logger
 * pointing the user to the "side log" file.
 */
export class TeeLogger implements NotificationLogger {
  private emittedRedirectMessage = false;
  private error = false;
  private fileHandle: FileHandle | undefined = undefined;

  public constructor(
    private readonly logger: NotificationLogger,
    private readonly location: string,
  ) {
    if (!isAbsolute(location)) {
      throw new Error(`Log file location must be an absolute path: ${location}`);
    }
  }

  async log(message: string, options: LogOptions = {}): Promise<void> {
    if (!this.emittedRedirectMessage) {
      this.emittedRedirectMessage = true;
      const msg = `| Log being saved to ${this.location} |`;
      const separator = new Array(msg.length).fill("-").join("");
      await this.logger.log(separator);
      await this.logger.log(msg);
      await this.logger.log(separator);
    }

    if (!this.error) {
      try {
        if (!this.fileHandle) {
          await ensureFile(this.location);

          this.fileHandle = await open(this.location, "a");
        }

        const trailingNewline = options.trailingNewline ?? true;

        await this.fileHandle.appendFile(
          message + (trailingNewline ? "\n" : ""),
          {
            encoding: "utf8",
          },
        );
      } catch (e) {
        // Write an error message to the primary log, and stop trying to write to the side log.
        this.error = true;
        await this.closeFileHandle();
        await this.logger.log(
          `Error writing to log file: ${getErrorMessage(e)}`,
        );
      }
    }

    await this.logger.log(message, options);
  }

  async showErrorMessage(message: string): Promise<void> {
    await this.logger.showErrorMessage(message);
  }

  async showWarningMessage(message: string): Promise<void> {
    await this.logger.showWarningMessage(message);
  }

  async dispose(): Promise<void> {
    await this.closeFileHandle();
  }

  private async closeFileHandle(): Promise<void> {
    const fileHandle = this.fileHandle;
    this.fileHandle = undefined;
    try {
      await fileHandle?.close();
    } catch (e) {
      await this.logger.log(
        `Failed to close file handle: ${getErrorMessage(e)}`,
      );
    }
  }
}
