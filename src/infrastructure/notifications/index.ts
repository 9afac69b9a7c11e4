export {
  loadRunConfig,
  resolveMattermostConfig,
  emailConfigSchema,
  mattermostConfigSchema,
  runConfigSchema,
} from './config.js';
export type { EmailConfig, RawEmailConfig, MattermostConfig, RunConfig } from './config.js';
export { createLoggingTransport } from './email-transport.js';
export type { MailTransport, MailMessage, MailAttachment } from './email-transport.js';
export { Mailer } from './mailer.js';
export type { MailerHost } from './mailer.js';
export { MattermostNotifier } from './mattermost.js';
export type { FetchFn } from './mattermost.js';
