import type { Logger } from 'pino';

export interface MailAttachment {
  filename: string;
  path: string;
}

/** Fully assembled end-of-run e-mail. */
export interface MailMessage {
  server: { host: string; port: number };
  auth: { user: string; pass: string };
  from: string;
  to: string[];
  subject: string;
  text: string;
  attachments: MailAttachment[];
}

/** Physically delivers a message. Rejects on delivery failure. */
export interface MailTransport {
  send(message: MailMessage): Promise<void>;
}

/**
 * Stub transport.
 *
 * No actual SMTP integration: logs a structured entry describing the
 * message. Inject a real transport to deliver mail.
 */
export function createLoggingTransport(log: Logger): MailTransport {
  return {
    async send(message: MailMessage): Promise<void> {
      log.info(
        {
          smtp_host: message.server.host,
          smtp_port: message.server.port,
          from: message.from,
          recipients: message.to,
          subject: message.subject,
          lines: message.text === '' ? 0 : message.text.split('\n').length,
          attachments: message.attachments.map((a) => a.filename),
        },
        'Email notification (stub), SMTP not implemented',
      );
    },
  };
}
