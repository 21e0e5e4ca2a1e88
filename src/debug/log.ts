/**
 * Core Logging Interface
 *
 * Provides structured logging with level filtering and history tracking.
 *
 * @module debug/log
 */

import { LOG_LEVELS, type LogEntryLevel, type LogLevelValue } from './types.js';
import { appendHistory, getDebugState } from './state.js';
import { getSettings } from '../config/settings.js';

type ConsoleMethod = 'debug' | 'log' | 'warn' | 'error';

// ============================================================================
// Internal Helpers
// ============================================================================

/**
 * Format a log message with timestamp and module tag.
 */
export function formatMessage(module: string, message: string): string {
  const timestamp = performance.now().toFixed(1);
  return `[${timestamp}ms][${module}] ${message}`;
}

/**
 * Store log in history for later retrieval.
 */
export function storeLog(level: LogEntryLevel, module: string, message: string, data?: unknown): void {
  appendHistory(
    { time: Date.now(), perfTime: performance.now(), level, module, message, data },
    getSettings().debug.logHistory.maxLogHistoryEntries
  );
}

/**
 * Check if logging is enabled for a module at a level.
 */
export function shouldLog(module: string, level: LogLevelValue): boolean {
  const { level: current, enabledModules, disabledModules } = getDebugState();
  if (level < current) return false;

  const moduleLower = module.toLowerCase();
  if (enabledModules.size > 0 && !enabledModules.has(moduleLower)) {
    return false;
  }
  return !disabledModules.has(moduleLower);
}

function emit(
  method: ConsoleMethod,
  level: LogEntryLevel,
  module: string,
  message: string,
  data?: unknown
): void {
  storeLog(level, module, message, data);
  if (!getSettings().debug.logOutput.stdout) return;

  const formatted = formatMessage(module, message);
  if (data !== undefined) {
    console[method](formatted, data);
  } else {
    console[method](formatted);
  }
}

// ============================================================================
// Logging Interface
// ============================================================================

/**
 * Main logging interface.
 */
export const log = {
  /**
   * Debug level logging (most verbose).
   */
  debug(module: string, message: string, data?: unknown): void {
    if (!shouldLog(module, LOG_LEVELS.DEBUG)) return;
    emit('debug', 'DEBUG', module, message, data);
  },

  verbose(module: string, message: string, data?: unknown): void {
    if (!shouldLog(module, LOG_LEVELS.VERBOSE)) return;
    emit('log', 'VERBOSE', module, message, data);
  },

  info(module: string, message: string, data?: unknown): void {
    if (!shouldLog(module, LOG_LEVELS.INFO)) return;
    emit('log', 'INFO', module, message, data);
  },

  warn(module: string, message: string, data?: unknown): void {
    if (!shouldLog(module, LOG_LEVELS.WARN)) return;
    emit('warn', 'WARN', module, message, data);
  },

  error(module: string, message: string, data?: unknown): void {
    if (!shouldLog(module, LOG_LEVELS.ERROR)) return;
    emit('error', 'ERROR', module, message, data);
  },

  /**
   * Always log regardless of level (for critical messages).
   */
  always(module: string, message: string, data?: unknown): void {
    emit('log', 'ALWAYS', module, message, data);
  },
};
