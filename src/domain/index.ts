export type { LogLevel, ChatPolicy, MailPolicy, EventRecorder } from './levels.js';
