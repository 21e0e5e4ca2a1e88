/**
 * Settings Loader
 *
 * Resolves a settings reference (inline JSON or a JSON file path), checks
 * every known field and merges the result with defaults.
 *
 * @module cli/config/settings-loader
 */

import { readFile } from 'fs/promises';
import { resolve } from 'path';

import {
  LOG_LEVEL_NAMES,
  createSettings,
  isLogLevelName,
  type SettingsOverrides,
  type SettingsSchema,
} from '../../src/config/schema/index.js';
import { ERROR_CODES, createEstimatorError } from '../../src/errors/estimator-error.js';
import { isJsonRecord, type JsonRecord } from '../../src/scenario/reader.js';

// =============================================================================
// Types
// =============================================================================

export interface LoadedSettings {
  /** Validated settings merged with defaults */
  settings: SettingsSchema;
  /** Where the settings came from: 'inline' or the resolved file path */
  source: string;
  /** Parsed input before merging */
  raw: JsonRecord;
}

export interface SettingsLoaderOptions {
  /** Base directory for relative paths (default: cwd) */
  cwd?: string;
}

const MAX_PRECISION = 12;

function invalid(field: string, message: string): Error {
  return createEstimatorError(ERROR_CODES.SETTINGS_INVALID, `${field} ${message}`, { field });
}

function section(parent: JsonRecord, key: string, path: string): JsonRecord | undefined {
  const value = parent[key];
  if (value === undefined) return undefined;
  if (!isJsonRecord(value)) {
    throw invalid(path, 'must be an object');
  }
  return value;
}

// =============================================================================
// Settings Loader
// =============================================================================

export class SettingsLoader {
  private cwd: string;

  constructor(options: SettingsLoaderOptions = {}) {
    this.cwd = options.cwd ?? process.cwd();
  }

  /**
   * Load, validate and merge a settings reference.
   *
   * @param ref - Inline JSON (starts with '{') or a path to a JSON file
   */
  async load(ref: string): Promise<LoadedSettings> {
    const { content, source } = await this.resolve(ref);

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (err) {
      throw createEstimatorError(
        ERROR_CODES.SETTINGS_INVALID,
        `Invalid JSON in settings "${source}": ${(err as Error).message}`
      );
    }
    if (!isJsonRecord(parsed)) {
      throw invalid('settings', 'must be a JSON object');
    }

    return {
      settings: createSettings(this.validate(parsed)),
      source,
      raw: parsed,
    };
  }

  private async resolve(ref: string): Promise<{ content: string; source: string }> {
    if (ref.trim().startsWith('{')) {
      return { content: ref, source: 'inline' };
    }
    const path = resolve(this.cwd, ref);
    try {
      return { content: await readFile(path, 'utf-8'), source: path };
    } catch (err) {
      throw createEstimatorError(
        ERROR_CODES.SETTINGS_INVALID,
        `Failed to read settings "${path}": ${(err as Error).message}`
      );
    }
  }

  /**
   * Check known fields and build typed overrides. Unknown keys are ignored.
   */
  private validate(raw: JsonRecord): SettingsOverrides {
    const overrides: SettingsOverrides = {};

    const debug = section(raw, 'debug', 'debug');
    if (debug) {
      overrides.debug = {};

      const logLevel = section(debug, 'logLevel', 'debug.logLevel');
      const level = logLevel?.defaultLogLevel;
      if (level !== undefined) {
        if (typeof level !== 'string' || !isLogLevelName(level)) {
          throw invalid(
            'debug.logLevel.defaultLogLevel',
            `must be one of: ${LOG_LEVEL_NAMES.join(', ')}`
          );
        }
        overrides.debug.logLevel = { defaultLogLevel: level };
      }

      const logHistory = section(debug, 'logHistory', 'debug.logHistory');
      const maxEntries = logHistory?.maxLogHistoryEntries;
      if (maxEntries !== undefined) {
        if (typeof maxEntries !== 'number' || !Number.isInteger(maxEntries) || maxEntries < 1) {
          throw invalid('debug.logHistory.maxLogHistoryEntries', 'must be an integer >= 1');
        }
        overrides.debug.logHistory = { maxLogHistoryEntries: maxEntries };
      }

      const logOutput = section(debug, 'logOutput', 'debug.logOutput');
      const stdout = logOutput?.stdout;
      if (stdout !== undefined) {
        if (typeof stdout !== 'boolean') {
          throw invalid('debug.logOutput.stdout', 'must be a boolean');
        }
        overrides.debug.logOutput = { stdout };
      }
    }

    const report = section(raw, 'report', 'report');
    if (report) {
      overrides.report = {};
      const { precision, cellWidth } = report;
      if (precision !== undefined) {
        if (
          typeof precision !== 'number' ||
          !Number.isInteger(precision) ||
          precision < 0 ||
          precision > MAX_PRECISION
        ) {
          throw invalid('report.precision', `must be an integer between 0 and ${MAX_PRECISION}`);
        }
        overrides.report.precision = precision;
      }
      if (cellWidth !== undefined) {
        if (typeof cellWidth !== 'number' || !Number.isInteger(cellWidth) || cellWidth < 1) {
          throw invalid('report.cellWidth', 'must be an integer >= 1');
        }
        overrides.report.cellWidth = cellWidth;
      }
    }

    return overrides;
  }
}

// =============================================================================
// Convenience Functions
// =============================================================================

const defaultLoader = new SettingsLoader();

export async function loadSettings(ref: string): Promise<LoadedSettings> {
  return defaultLoader.load(ref);
}

/**
 * Dump loaded settings for debugging.
 */
export function dumpSettings(loaded: LoadedSettings): string {
  return JSON.stringify({ source: loaded.source, settings: loaded.settings }, null, 2);
}
