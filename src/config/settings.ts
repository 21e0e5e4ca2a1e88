/**
 * Settings Registry
 *
 * Stores the active SettingsSchema for the current process.
 * Call setSettings() early (before running a simulation) to apply overrides.
 *
 * @module config/settings
 */

import type { SettingsOverrides, SettingsSchema } from './schema/index.js';
import { createSettings } from './schema/index.js';

let settings: SettingsSchema = createSettings();

/**
 * Get the active settings (merged with defaults).
 */
export function getSettings(): SettingsSchema {
  return settings;
}

/**
 * Set the active settings.
 * Accepts partial overrides and merges with defaults.
 */
export function setSettings(overrides?: SettingsOverrides): SettingsSchema {
  settings = createSettings(overrides);
  return settings;
}

/**
 * Reset settings to defaults.
 */
export function resetSettings(): SettingsSchema {
  settings = createSettings();
  return settings;
}
