/**
 * Color palette for console echo of log entries.
 *
 * Uses ansis for ANSI color support; ansis auto-detects whether the host's
 * script console understands color and emits plain text when it does not.
 */

import ansis from 'ansis';
import type { LogLevel } from '../types/index.js';

export const palette = {
  text: ansis.white,
  dim: ansis.dim,
} as const;

/** Label written for each level, both on disk and on the console. */
export const LEVEL_LABELS: Record<LogLevel, string> = {
  debug: 'DEBUG',
  info: 'INFO',
  warn: 'WARNING',
  error: 'ERROR',
  fatal: 'FATAL',
};

const levelColors: Record<LogLevel, typeof ansis.dim> = {
  debug: ansis.dim,
  info: ansis.cyan,
  warn: ansis.yellow,
  error: ansis.bold.red,
  fatal: ansis.bold.red,
};

/** Returns the colored level label, e.g. "WARNING" in yellow. */
export function formatLevel(level: LogLevel): string {
  return levelColors[level](LEVEL_LABELS[level]);
}
