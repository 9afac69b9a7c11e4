import type { EventRecorder, LogLevel } from '../../domain/index.js';
import { emailConfigSchema } from './config.js';
import type { EmailConfig, RawEmailConfig } from './config.js';
import type { MailMessage, MailTransport } from './email-transport.js';

/** What the mailer needs from the aggregator that owns it. */
export interface MailerHost extends EventRecorder {
  getLogfile(): string;
  getLogPath(): string;
}

const REQUIRED_KEYS = ['sender', 'receiver', 'password', 'smtp-server', 'port'] as const;

const DEFAULT_SUBJECT = 'Task report';

/**
 * E-mail collaborator.
 *
 * Accumulates content lines during the run and sends them, with the run's
 * log file attached, when `sendEmail()` is called. Configuration problems
 * are reported through the host's `critical()` and counted in
 * `criticalErrorCount`; the host drops a mailer whose count is non-zero.
 */
export class Mailer {
  readonly criticalErrorCount: number;

  private readonly config: EmailConfig | null;
  private readonly lines: string[] = [];
  private hasErrors = false;

  constructor(
    rawConfig: RawEmailConfig,
    private readonly host: MailerHost,
    private readonly transport: MailTransport,
  ) {
    let errors = 0;

    for (const key of REQUIRED_KEYS) {
      const value = rawConfig[key];
      if (value === undefined) {
        host.critical('Getting email config', `Missing keyword '${key}' in email config.`);
        errors++;
      } else if (!emailConfigSchema.shape[key].safeParse(value).success) {
        host.critical('Getting email config', `Keyword '${key}' is not valid.`);
        errors++;
      }
    }

    const parsed = emailConfigSchema.safeParse(rawConfig);
    if (errors === 0 && !parsed.success) {
      host.critical('Getting email config', 'Email config is not valid.');
      errors++;
    }

    this.config = errors === 0 && parsed.success ? parsed.data : null;
    this.criticalErrorCount = errors;
  }

  /** Content accumulated so far, one entry per recorded event. */
  get content(): readonly string[] {
    return this.lines;
  }

  /** Recipients from the comma-separated `receiver` key. */
  get recipients(): string[] {
    if (!this.config) return [];
    return this.config.receiver
      .split(',')
      .map((r) => r.trim())
      .filter((r) => r !== '');
  }

  addContent(level: LogLevel, text: string, time: string): void {
    if (level === 'ERROR') this.hasErrors = true;
    this.lines.push(`${time} - ${level} - ${text}`);
  }

  buildMessage(): MailMessage {
    if (!this.config) {
      throw new Error('Email config is not valid');
    }

    const baseSubject = this.config.subject ?? DEFAULT_SUBJECT;

    return {
      server: { host: this.config['smtp-server'], port: Number(this.config.port) },
      auth: { user: this.config.sender, pass: this.config.password },
      from: this.config.sender,
      to: this.recipients,
      subject: this.hasErrors ? `${baseSubject} - errors` : baseSubject,
      text: this.lines.join('\n'),
      attachments: [{ filename: this.host.getLogfile(), path: this.host.getLogPath() }],
    };
  }

  /** Rejects if the transport fails; the caller decides how to report it. */
  async sendEmail(): Promise<void> {
    const message = this.buildMessage();
    await this.transport.send(message);
    this.host.info('Send email', `Email sent to ${message.to.join(', ')}.`);
  }
}
