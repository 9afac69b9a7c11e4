import { basename, join, resolve } from 'node:path';
import pino from 'pino';
import type { Logger } from 'pino';
import type { LogLevel } from '../../domain/index.js';
import { formatFileStamp, formatLogTimestamp } from './format.js';

/** Receives every recorded event as one leveled, timestamped line. */
export interface LogSink {
  /** Base name of the file being written, e.g. `run_2026-02-03_14-05-09-000_4242-1.log`. */
  readonly filename: string;
  /** Absolute path of the file being written. */
  readonly path: string;
  write(level: LogLevel, message: string): void;
  close(): void;
}

export interface FileLogSinkOptions {
  logDir?: string;
  prefix?: string;
  now?: () => Date;
  /** Structured mirror of every line. Defaults to a stdout pino logger. */
  logger?: Logger;
}

/** Where formatted lines go. */
interface LineDestination {
  write(line: string): unknown;
  end(): void;
}

/** Used when the log file cannot be opened; lines still reach the pino logger. */
const DISCARD: LineDestination = {
  write: () => true,
  end: () => undefined,
};

// Sinks created by this process; keeps same-millisecond runs apart.
let sinkSequence = 0;

const PINO_METHOD: Record<LogLevel, 'info' | 'warn' | 'error' | 'fatal'> = {
  INFO: 'info',
  WARNING: 'warn',
  ERROR: 'error',
  CRITICAL: 'fatal',
};

/**
 * Creates the default stdout logger used to mirror log-file lines.
 * Level comes from LOG_LEVEL.
 */
export function createLogger(): Logger {
  return pino({ level: process.env['LOG_LEVEL'] ?? 'info' });
}

/**
 * Line-oriented log file owned by a single run.
 *
 * Lines are written synchronously through a pino destination so that a
 * line is on disk as soon as `write()` returns:
 * `DD/MM/YYYY HH:MM:SS AM/PM - LEVEL - message`.
 */
export class FileLogSink implements LogSink {
  readonly filename: string;
  readonly path: string;

  private readonly destination: LineDestination;
  private readonly now: () => Date;
  private readonly logger: Logger;
  private closed = false;

  constructor(options: FileLogSinkOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? createLogger();

    const logDir = resolve(options.logDir ?? process.env['LOG_DIR'] ?? 'logs');
    const prefix = options.prefix ?? 'run';
    sinkSequence++;
    this.path = join(
      logDir,
      `${prefix}_${formatFileStamp(this.now())}_${process.pid}-${sinkSequence}.log`,
    );
    this.filename = basename(this.path);
    this.destination = this.open();
  }

  write(level: LogLevel, message: string): void {
    if (this.closed) return;
    this.destination.write(`${formatLogTimestamp(this.now())} - ${level} - ${message}\n`);
    this.logger[PINO_METHOD[level]]({ logfile: this.filename }, message);
  }

  private open(): LineDestination {
    try {
      return pino.destination({
        dest: this.path,
        sync: true,
        append: true,
        mkdir: true,
      });
    } catch (err: unknown) {
      this.logger.error({ err, logfile: this.path }, 'Cannot open log file, lines are not persisted');
      return DISCARD;
    }
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.destination.end();
  }
}
