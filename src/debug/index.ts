/**
 * Debug Module
 *
 * Log level control, module filters and log history on top of the
 * module-tagged `log` interface.
 *
 * Usage:
 *   import { log, setLogLevel } from './debug/index.js';
 *   setLogLevel('debug');
 *   log.debug('Estimator', 'ffn_0 (ffn): 67174400 FLOPs, 0.0009ms');
 *
 * @module debug
 */

import { isLogLevelName, type DebugConfigSchema } from '../config/schema/index.js';
import {
  LEVEL_BY_NAME,
  LOG_LEVELS,
  type LogEntry,
  type LogHistoryFilter,
  type LogLevelValue,
} from './types.js';
import { clearHistory, getDebugState, setLevel, setModuleFilters } from './state.js';
import { log } from './log.js';
import { perf, type Timed } from './perf.js';

// ============================================================================
// Configuration Functions
// ============================================================================

/**
 * Set the global log level. Unknown names fall back to info.
 */
export function setLogLevel(level: string): void {
  const name = level.toLowerCase();
  setLevel(isLogLevelName(name) ? LEVEL_BY_NAME[name] : LOG_LEVELS.INFO);
}

export function getLogLevel(): string {
  const current = getDebugState().level;
  for (const [name, value] of Object.entries(LEVEL_BY_NAME)) {
    if (value === current) return name;
  }
  return 'info';
}

/**
 * Apply the debug section of the settings.
 */
export function applyDebugConfig(config: DebugConfigSchema): void {
  setLogLevel(config.logLevel.defaultLogLevel);
}

/**
 * Only log from the given modules (case-insensitive).
 */
export function enableModules(...modules: string[]): void {
  setModuleFilters({ enabled: [...getDebugState().enabledModules, ...modules] });
}

/**
 * Silence the given modules (case-insensitive).
 */
export function disableModules(...modules: string[]): void {
  setModuleFilters({ disabled: [...getDebugState().disabledModules, ...modules] });
}

export function resetModuleFilters(): void {
  setModuleFilters({ enabled: [], disabled: [] });
}

// ============================================================================
// History
// ============================================================================

export function getLogHistory(filter: LogHistoryFilter = {}): LogEntry[] {
  let history = [...getDebugState().history];

  if (filter.level) {
    const level = filter.level.toUpperCase();
    history = history.filter((entry) => entry.level === level);
  }

  if (filter.module) {
    const module = filter.module.toLowerCase();
    history = history.filter((entry) => entry.module.toLowerCase().includes(module));
  }

  if (filter.last) {
    history = history.slice(-filter.last);
  }

  return history;
}

export function clearLogHistory(): void {
  clearHistory();
}

export { log, perf, LOG_LEVELS };
export type { LogEntry, LogHistoryFilter, LogLevelValue, Timed };
