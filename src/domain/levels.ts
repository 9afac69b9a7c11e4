/**
 * Core domain types for the run-notifier event model.
 *
 * These types carry no framework dependencies.
 */

/** Severity of a recorded event, as written in the log file. */
export type LogLevel = 'INFO' | 'WARNING' | 'ERROR' | 'CRITICAL';

/** When the end-of-run chat notification goes out. */
export type ChatPolicy = 'always' | 'error' | 'never';

/** Whether the end-of-run e-mail goes out. */
export type MailPolicy = 'send' | 'do-not-send';

/**
 * Anything events can be recorded against.
 *
 * Collaborators receive this narrow view of the aggregator so they can
 * report their own setup problems without reaching into its state.
 */
export interface EventRecorder {
  info(action: string, message?: string): void;
  warning(action: string, message?: string): void;
  error(action: string, message?: string): void;
  critical(action: string, message?: string): void;
}
