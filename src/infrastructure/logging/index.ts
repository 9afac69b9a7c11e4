export { FileLogSink, createLogger } from './log-sink.js';
export type { LogSink, FileLogSinkOptions } from './log-sink.js';
export { formatLogTimestamp, formatClockTime, formatFileStamp } from './format.js';
