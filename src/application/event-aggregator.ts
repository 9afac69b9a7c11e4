import type { Logger } from 'pino';
import type { ChatPolicy, EventRecorder, LogLevel, MailPolicy } from '../domain/index.js';
import { FileLogSink, createLogger } from '../infrastructure/logging/log-sink.js';
import type { LogSink } from '../infrastructure/logging/log-sink.js';
import { formatClockTime } from '../infrastructure/logging/format.js';
import { resolveMattermostConfig } from '../infrastructure/notifications/config.js';
import type { MattermostConfig, RawEmailConfig } from '../infrastructure/notifications/config.js';
import { createLoggingTransport } from '../infrastructure/notifications/email-transport.js';
import type { MailTransport } from '../infrastructure/notifications/email-transport.js';
import { Mailer } from '../infrastructure/notifications/mailer.js';
import { MattermostNotifier } from '../infrastructure/notifications/mattermost.js';
import type { FetchFn } from '../infrastructure/notifications/mattermost.js';
import { SEND_EMAILS_KEY, parseChatPolicy, parseMailPolicy, shouldNotifyChat } from './policy.js';
import type { PolicyResult } from './policy.js';
import { buildSummary } from './summary.js';

export interface EventAggregatorOptions {
  /** E-mail settings; the mailer is only set up when present. */
  emailConfig?: RawEmailConfig;
  /** Chat policy keyword: always, error or never. Chat is only set up when present. */
  notification?: string;
  mattermost?: MattermostConfig;
  /** Defaults to a FileLogSink in `logDir`. */
  sink?: LogSink;
  logDir?: string;
  logger?: Logger;
  mailTransport?: MailTransport;
  fetch?: FetchFn;
  now?: () => Date;
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Collects the events of one batch-task run.
 *
 * Every event goes to the run's log file; info and error events are
 * forwarded to the chat notifier, and all but critical ones to the mailer.
 * `sendAll()` closes the run: it dispatches the chat and e-mail reports
 * according to their policies and writes the summary line.
 *
 * Recording never throws. Configuration problems are recorded as warnings,
 * collaborator failures as critical lines.
 */
export class EventAggregator implements EventRecorder {
  private errors = 0;
  private warnings = 0;

  private readonly sink: LogSink;
  private readonly logger: Logger;
  private readonly now: () => Date;

  private readonly chatPolicyValue: ChatPolicy | null = null;
  private readonly chatNotifier: MattermostNotifier | null = null;
  private readonly mailPolicyValue: MailPolicy = 'do-not-send';
  private readonly mailerValue: Mailer | null = null;

  constructor(options: EventAggregatorOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? createLogger();
    this.sink =
      options.sink ??
      new FileLogSink({ logDir: options.logDir, now: this.now, logger: this.logger });

    if (options.notification !== undefined) {
      this.chatPolicyValue = this.applyPolicy(parseChatPolicy(options.notification));
      this.chatNotifier = new MattermostNotifier(
        resolveMattermostConfig(options.mattermost),
        this,
        this.logger,
        options.fetch,
      );
    }

    if (options.emailConfig !== undefined) {
      const mailer = new Mailer(
        options.emailConfig,
        this,
        options.mailTransport ?? createLoggingTransport(this.logger),
      );
      if (mailer.criticalErrorCount === 0) {
        this.mailerValue = mailer;
        this.mailPolicyValue = this.applyPolicy(parseMailPolicy(options.emailConfig[SEND_EMAILS_KEY]));
      }
    }
  }

  get errorCount(): number {
    return this.errors;
  }

  get warningCount(): number {
    return this.warnings;
  }

  /** `null` when no notification keyword was configured. */
  get chatPolicy(): ChatPolicy | null {
    return this.chatPolicyValue;
  }

  get chat(): MattermostNotifier | null {
    return this.chatNotifier;
  }

  get mailPolicy(): MailPolicy {
    return this.mailPolicyValue;
  }

  get mailer(): Mailer | null {
    return this.mailerValue;
  }

  info(action: string, message?: string): void {
    this.sink.write(
      'INFO',
      message !== undefined ? `${action}: ${message}` : `Task: "${action}" went smoothly.`,
    );
    this.chatNotifier?.info(action);
    this.addMailContent(
      'INFO',
      message !== undefined ? `${action}: ${message}` : `"${action}" occured properly.`,
    );
  }

  warning(action: string, message?: string): void {
    this.warnings++;
    this.sink.write(
      'WARNING',
      message !== undefined ? `${action}: ${message}` : `Task: "${action}" raised a warning.`,
    );
    this.addMailContent(
      'WARNING',
      message !== undefined ? `${action}: ${message}` : `"${action}" raised a warning.`,
    );
  }

  error(action: string, message?: string): void {
    this.errors++;
    this.sink.write(
      'ERROR',
      message !== undefined ? `${action}: ${message}` : `Task: "${action}" did not occur properly.`,
    );
    this.chatNotifier?.error(action);
    this.addMailContent(
      'ERROR',
      message !== undefined ? `${action}: ${message}` : `"${action}" did not occured properly.`,
    );
  }

  /** Log-only: no counter, no forwarding. */
  critical(action: string, message?: string): void {
    this.sink.write(
      'CRITICAL',
      message !== undefined ? `${action}: ${message}` : `Task: "${action}" failed.`,
    );
  }

  getLogfile(): string {
    return this.sink.filename;
  }

  getLogPath(): string {
    return this.sink.path;
  }

  /**
   * Dispatches the end-of-run reports and writes the summary line.
   * Expected once, at the end of the run. Never rejects.
   */
  async sendAll(): Promise<void> {
    if (
      this.chatNotifier &&
      this.chatPolicyValue !== null &&
      shouldNotifyChat(this.chatPolicyValue, this.errors)
    ) {
      try {
        await this.chatNotifier.sendMattermostNotification();
      } catch (err: unknown) {
        this.logger.error({ err }, 'Mattermost dispatch failed');
        this.critical('Mattermost notification', describeError(err));
      }
    }

    if (this.mailPolicyValue === 'send' && this.mailerValue) {
      try {
        await this.mailerValue.sendEmail();
      } catch (err: unknown) {
        this.logger.error({ err }, 'Email dispatch failed');
        this.critical('Send email', describeError(err));
      }
    }

    const summary = buildSummary(this.errors, this.warnings);
    this.sink.write(summary.level, summary.message);
  }

  close(): void {
    this.sink.close();
  }

  private applyPolicy<T>(result: PolicyResult<T>): T {
    if (result.warning) this.warning(result.warning.action, result.warning.message);
    return result.value;
  }

  private addMailContent(level: LogLevel, text: string): void {
    this.mailerValue?.addContent(level, text, formatClockTime(this.now()));
  }
}
