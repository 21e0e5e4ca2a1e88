/**
 * CLI Config Module
 *
 * @module cli/config
 */

export { SettingsLoader, loadSettings, dumpSettings } from './settings-loader.js';
export type { LoadedSettings, SettingsLoaderOptions } from './settings-loader.js';
