import { EventAggregator } from './event-aggregator.js';
import type { EventAggregatorOptions } from './event-aggregator.js';

export interface RunResult {
  errorCount: number;
  warningCount: number;
  logfile: string;
}

/**
 * Runs one batch task against a fresh aggregator.
 *
 * A task that throws is recorded as an error under `name`; the reports
 * are dispatched and the log closed either way.
 */
export async function runTask(
  name: string,
  task: (events: EventAggregator) => Promise<void> | void,
  options: EventAggregatorOptions = {},
): Promise<RunResult> {
  const events = new EventAggregator(options);

  try {
    await task(events);
  } catch (err: unknown) {
    events.error(name, err instanceof Error ? err.message : String(err));
  } finally {
    await events.sendAll();
    events.close();
  }

  return {
    errorCount: events.errorCount,
    warningCount: events.warningCount,
    logfile: events.getLogfile(),
  };
}
