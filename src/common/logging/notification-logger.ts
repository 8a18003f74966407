import type { BaseLogger } from "./logger";

/** A logger that can also show messages to the user, not only record them. */
export interface NotificationLogger extends BaseLogger {
  showErrorMessage(message: string): Promise<void>;
  showWarningMessage(message: string): Promise<void>;
}
