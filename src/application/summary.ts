import type { LogLevel } from '../domain/index.js';

export interface RunSummary {
  level: Extract<LogLevel, 'INFO' | 'ERROR'>;
  message: string;
}

/** Final line written once the run is over. */
export function buildSummary(errorCount: number, warningCount: number): RunSummary {
  const level = errorCount > 0 ? 'ERROR' : 'INFO';

  if (errorCount > 0 && warningCount > 0) {
    return { level, message: `Not done with ${errorCount} errors and ${warningCount} warnings.` };
  }
  if (errorCount > 0) {
    return { level, message: `Not done with ${errorCount} errors.` };
  }
  if (warningCount > 0) {
    return { level, message: `Done with ${warningCount} warnings.` };
  }
  return { level, message: 'Done' };
}
