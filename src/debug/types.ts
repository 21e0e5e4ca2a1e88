/**
 * Debug Types and Constants
 *
 * @module debug/types
 */

import type { LogLevelName } from '../config/schema/index.js';

/**
 * Numeric log levels; a message is emitted when its level >= the current one.
 */
export const LOG_LEVELS = {
  DEBUG: 0,
  VERBOSE: 1,
  INFO: 2,
  WARN: 3,
  ERROR: 4,
  SILENT: 5,
} as const;

export type LogLevel = keyof typeof LOG_LEVELS;
export type LogLevelValue = (typeof LOG_LEVELS)[LogLevel];

/** Level tag stored with each history entry; `log.always` records ALWAYS */
export type LogEntryLevel = Exclude<LogLevel, 'SILENT'> | 'ALWAYS';

/** Settings-file level names mapped to their numeric level */
export const LEVEL_BY_NAME: Readonly<Record<LogLevelName, LogLevelValue>> = {
  debug: LOG_LEVELS.DEBUG,
  verbose: LOG_LEVELS.VERBOSE,
  info: LOG_LEVELS.INFO,
  warn: LOG_LEVELS.WARN,
  error: LOG_LEVELS.ERROR,
  silent: LOG_LEVELS.SILENT,
};

export interface LogEntry {
  /** Wall-clock ms */
  time: number;
  /** performance.now() at emit time */
  perfTime: number;
  level: LogEntryLevel;
  module: string;
  message: string;
  data?: unknown;
}

export interface LogHistoryFilter {
  /** Level tag, case-insensitive */
  level?: string;
  /** Substring of the module tag, case-insensitive */
  module?: string;
  /** Keep only the newest N entries */
  last?: number;
}
