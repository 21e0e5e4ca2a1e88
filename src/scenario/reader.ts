/**
 * Scenario File Reader
 *
 * Reads JSON mappings from disk and resolves "inline object or relative
 * path" references.
 *
 * @module scenario/reader
 */

import { readFile } from 'fs/promises';
import { resolve } from 'path';

import { ERROR_CODES, createEstimatorError } from '../errors/estimator-error.js';

export type JsonRecord = Record<string, unknown>;

export function isJsonRecord(value: unknown): value is JsonRecord {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Read a JSON file whose top-level value must be an object.
 */
export async function readJsonRecord(path: string): Promise<JsonRecord> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (err) {
    throw createEstimatorError(
      ERROR_CODES.SCENARIO_READ_FAILED,
      `Failed to read "${path}": ${(err as Error).message}`,
      { path }
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    throw createEstimatorError(
      ERROR_CODES.SCENARIO_READ_FAILED,
      `Invalid JSON in "${path}": ${(err as Error).message}`,
      { path }
    );
  }

  if (!isJsonRecord(parsed)) {
    throw createEstimatorError(
      ERROR_CODES.SCENARIO_INVALID,
      `JSON at ${path} must be an object`,
      { path }
    );
  }
  return parsed;
}

/**
 * Use an inline object as-is, or load a path relative to baseDir.
 */
export async function maybeLoadReference(baseDir: string, value: unknown): Promise<JsonRecord> {
  if (isJsonRecord(value)) {
    return value;
  }
  if (typeof value !== 'string') {
    throw createEstimatorError(
      ERROR_CODES.SCENARIO_INVALID,
      `Unsupported reference value: ${JSON.stringify(value)}`
    );
  }
  return readJsonRecord(resolve(baseDir, value));
}
