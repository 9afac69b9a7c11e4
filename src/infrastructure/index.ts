export { FileLogSink, createLogger } from './logging/index.js';
export type { LogSink, FileLogSinkOptions } from './logging/index.js';
export {
  loadRunConfig,
  resolveMattermostConfig,
  createLoggingTransport,
  Mailer,
  MattermostNotifier,
} from './notifications/index.js';
export type {
  RawEmailConfig,
  MattermostConfig,
  RunConfig,
  MailTransport,
  MailMessage,
} from './notifications/index.js';
