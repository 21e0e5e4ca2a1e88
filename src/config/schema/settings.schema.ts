/**
 * Settings Schema
 *
 * Tool-level settings that are independent of any scenario: logging and
 * report rendering. Scenario data (hardware, layers) lives elsewhere.
 *
 * Naming Convention:
 * - *Schema: Type definitions (interface structure)
 * - DEFAULT_*: Default instances
 * - *Overrides: Partial input merged over defaults
 *
 * @module config/schema/settings
 */

import {
  DEFAULT_DEBUG_CONFIG,
  DEFAULT_LOG_HISTORY_CONFIG,
  DEFAULT_LOG_LEVEL_CONFIG,
  DEFAULT_LOG_OUTPUT_CONFIG,
  type DebugConfigSchema,
} from './debug.schema.js';
import { DEFAULT_REPORT_CONFIG, type ReportConfigSchema } from './report.schema.js';

/** Deep partial type for overrides */
export type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends object ? DeepPartial<T[P]> : T[P];
};

export interface SettingsSchema {
  debug: DebugConfigSchema;
  report: ReportConfigSchema;
}

export type SettingsOverrides = DeepPartial<SettingsSchema>;

export const DEFAULT_SETTINGS: SettingsSchema = {
  debug: DEFAULT_DEBUG_CONFIG,
  report: DEFAULT_REPORT_CONFIG,
};

/**
 * Build a complete settings object, overlaying overrides section by section.
 */
export function createSettings(overrides: SettingsOverrides = {}): SettingsSchema {
  return {
    debug: {
      logOutput: { ...DEFAULT_LOG_OUTPUT_CONFIG, ...overrides.debug?.logOutput },
      logHistory: { ...DEFAULT_LOG_HISTORY_CONFIG, ...overrides.debug?.logHistory },
      logLevel: { ...DEFAULT_LOG_LEVEL_CONFIG, ...overrides.debug?.logLevel },
    },
    report: { ...DEFAULT_REPORT_CONFIG, ...overrides.report },
  };
}
