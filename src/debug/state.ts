/**
 * Debug Module State
 *
 * Process-wide logger state. Other modules mutate it only through the
 * functions below.
 *
 * @module debug/state
 */

import { LOG_LEVELS, type LogEntry, type LogLevelValue } from './types.js';

export interface DebugState {
  level: LogLevelValue;
  /** Lower-cased module tags; empty = all modules */
  enabledModules: ReadonlySet<string>;
  /** Lower-cased module tags that are never logged */
  disabledModules: ReadonlySet<string>;
  history: LogEntry[];
}

const state: DebugState = {
  level: LOG_LEVELS.INFO,
  enabledModules: new Set(),
  disabledModules: new Set(),
  history: [],
};

export function getDebugState(): Readonly<DebugState> {
  return state;
}

export function setLevel(level: LogLevelValue): void {
  state.level = level;
}

export function setModuleFilters(filters: {
  enabled?: Iterable<string>;
  disabled?: Iterable<string>;
}): void {
  if (filters.enabled) {
    state.enabledModules = new Set([...filters.enabled].map((m) => m.toLowerCase()));
  }
  if (filters.disabled) {
    state.disabledModules = new Set([...filters.disabled].map((m) => m.toLowerCase()));
  }
}

/**
 * Append an entry, dropping the oldest ones beyond `maxEntries`.
 */
export function appendHistory(entry: LogEntry, maxEntries: number): void {
  state.history.push(entry);
  const excess = state.history.length - maxEntries;
  if (excess > 0) {
    state.history.splice(0, excess);
  }
}

export function clearHistory(): void {
  state.history = [];
}
