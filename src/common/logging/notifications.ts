import type { NotificationLogger } from "./notification-logger";

interface ShowAndLogOptions {
  /**
   * An alternate message that is added to the log, but not shown to the user.
   * This is useful for adding extra detail to the logs that would be too noisy on the terminal.
   */
  fullMessage?: string;
}

/**
 * Show an error message and log it.
 *
 * Only the first two lines of `message` are shown; the log receives the
 * whole message (or `options.fullMessage`).
 */
export async function showAndLogErrorMessage(
  logger: NotificationLogger,
  message: string,
  options?: ShowAndLogOptions,
): Promise<void> {
  return internalShowAndLog(
    logger,
    dropLinesExceptInitial(message),
    logger.showErrorMessage,
    { fullMessage: message, ...options },
  );
}

function dropLinesExceptInitial(message: string, n = 2) {
  return message.toString().split(/\r?\n/).slice(0, n).join("\n");
}

/**
 * Show a warning message and log it.
 */
export async function showAndLogWarningMessage(
  logger: NotificationLogger,
  message: string,
  options?: ShowAndLogOptions,
): Promise<void> {
  return internalShowAndLog(
    logger,
    message,
    logger.showWarningMessage,
    options,
  );
}

async function internalShowAndLog(
  logger: NotificationLogger,
  message: string,
  fn: (message: string) => Promise<void>,
  { fullMessage }: ShowAndLogOptions = {},
): Promise<void> {
  await logger.log(fullMessage || message);
  await fn.bind(logger)(message);
}
