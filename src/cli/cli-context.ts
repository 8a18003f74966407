import type { Writable } from "stream";
import type { LoggingOverrides } from "../config";
import { getLoggingConfig } from "../config";
import type { NotificationLogger } from "../common/logging";
import { ConsoleLogger, TeeLogger } from "../common/logging";

/** The process environment a command runs in. */
export interface CliIo {
  stdout: Writable;
  stderr: Writable;
  env: NodeJS.ProcessEnv;
  cwd: string;
}

/**
 * State shared by all commands of a single invocation.
 */
export class CliContext {
  private readonly consoleLogger: ConsoleLogger;
  private teeLogger: TeeLogger | undefined = undefined;

  constructor(public readonly io: CliIo) {
    this.consoleLogger = new ConsoleLogger(io.stderr);
  }

  public get logger(): NotificationLogger {
    return this.teeLogger ?? this.consoleLogger;
  }

  /**
   * Applies the logging settings from the environment and the command line.
   */
  public async configureLogging(overrides: LoggingOverrides): Promise<void> {
    const config = getLoggingConfig(overrides, this.io.env, this.io.cwd);
    this.consoleLogger.verbose = config.verbose;

    await this.teeLogger?.dispose();
    this.teeLogger =
      config.logFile === undefined
        ? undefined
        : new TeeLogger(this.consoleLogger, config.logFile);
  }

  /** Writes command output to stdout. */
  public write(text: string): Promise<void> {
    return new Promise((resolve, reject) => {
      this.io.stdout.write(text, (err) => {
        if (err) {
          reject(err);
          return;
        }

        resolve();
      });
    });
  }

  public async dispose(): Promise<void> {
    await this.teeLogger?.dispose();
    this.teeLogger = undefined;
  }
}
