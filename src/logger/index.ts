import pino from 'pino';
import type { Logger } from 'pino';
import { join } from 'node:path';
import { palette, formatLevel, LEVEL_LABELS } from '../output/colors.js';
import type { LogEntry, LogLevel } from '../types/index.js';

export const DEFAULT_LOG_PREFIX = 'resolve_slack_deliver';

const DISK_LABELS = new Map<string, string>(Object.entries(LEVEL_LABELS));

/** Minimal writable interface for testability. */
export interface WritableOutput {
  write(data: string): boolean;
}

export interface NotifierLoggerOptions {
  directory: string;
  prefix?: string;
  /** Lowest level written. Default: 'info'. */
  level?: LogLevel;
  /** Clock used for the file date and console timestamps. */
  now?: () => Date;
  /** Console echo target. Default: process.stdout; null disables the echo. */
  output?: WritableOutput | null;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** Daily log file name, e.g. resolve_slack_deliver_2026-10-19.log (local date). */
export function logFileName(prefix: string, date: Date): string {
  return `${prefix}_${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}.log`;
}

/**
 * Per-day file logger built on pino.
 *
 * - One NDJSON line per entry, appended to <directory>/<prefix>_YYYY-MM-DD.log
 * - The destination is synchronous and opened with O_APPEND, so every entry is
 *   a single write(2) and overlapping runs never interleave inside a line
 * - Entries are echoed to the host's script console with level colors
 * - Entries at or above the active level are kept in memory for the run
 */
export class NotifierLogger {
  private readonly logger: Logger;
  private readonly destination: ReturnType<typeof pino.destination>;
  private readonly entries: LogEntry[] = [];
  private readonly output: WritableOutput | null;
  private readonly now: () => Date;
  private readonly _filePath: string;
  private closed = false;

  constructor(options: NotifierLoggerOptions) {
    this.now = options.now ?? (() => new Date());
    this.output = options.output === undefined ? process.stdout : options.output;
    this._filePath = join(
      options.directory,
      logFileName(options.prefix ?? DEFAULT_LOG_PREFIX, this.now()),
    );

    // mkdir: pino.destination does not create missing directories on its own
    this.destination = pino.destination({
      dest: this._filePath,
      sync: true,
      append: true,
      mkdir: true,
    });

    this.logger = pino(
      {
        level: options.level ?? 'info',
        timestamp: pino.stdTimeFunctions.isoTime,
        formatters: {
          level: (label) => ({ level: DISK_LABELS.get(label) ?? label }),
        },
      },
      this.destination,
    );
  }

  /** Absolute path of today's log file. */
  get filePath(): string {
    return this._filePath;
  }

  /**
   * Log a message at the given level.
   *
   * Entries below the active level are dropped everywhere (file, console, memory).
   */
  log(
    level: LogLevel,
    component: string,
    message: string,
    meta?: Record<string, unknown>,
  ): void {
    if (!this.logger.isLevelEnabled(level)) return;

    const timestamp = this.now();
    const entry: LogEntry = {
      timestamp: timestamp.toISOString(),
      level,
      component,
      message,
      meta,
    };
    this.entries.push(entry);

    if (this.output) {
      const clock = `${pad(timestamp.getHours())}:${pad(timestamp.getMinutes())}:${pad(timestamp.getSeconds())}`;
      this.output.write(
        `${palette.dim(`[${clock}]`)} ${formatLevel(level)} ${palette.dim(`[${component}]`)} ${palette.text(message)}\n`,
      );
    }

    if (!this.closed) {
      this.logger[level]({ component, ...meta }, message);
    }
  }

  /** All entries logged so far in this run (oldest first). */
  getRecentEntries(): LogEntry[] {
    return [...this.entries];
  }

  /** Release the log file descriptor. Later entries only reach the console. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.destination.end();
  }
}
