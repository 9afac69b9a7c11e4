export { EventAggregator } from './event-aggregator.js';
export type { EventAggregatorOptions } from './event-aggregator.js';
export { runTask } from './run-task.js';
export type { RunResult } from './run-task.js';
export { parseChatPolicy, parseMailPolicy, shouldNotifyChat, SEND_EMAILS_KEY } from './policy.js';
export type { PolicyResult } from './policy.js';
export { buildSummary } from './summary.js';
export type { RunSummary } from './summary.js';
