export interface LogOptions {
  // If false, don't output a trailing newline for the log entry. Default true.
  trailingNewline?: boolean;
}

/** Minimal logger interface. */
export interface BaseLogger {
  /**
   * Writes the given log message, optionally followed by a newline.
   * This function is asynchronous and will only resolve once the message is written
   * to the side log (if required).
   *
   * @param message The message to log.
   * @param options Optional settings.
   */
  log(message: string, options?: LogOptions): Promise<void>;
}

/** A logger that drops every message. Used when the caller doesn't provide one. */
export const silentLogger: BaseLogger = {
  log: async () => {
    // Nothing to do.
  },
};
