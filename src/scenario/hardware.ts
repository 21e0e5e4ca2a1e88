/**
 * Hardware Profile Parsing
 *
 * @module scenario/hardware
 */

import { createHardwareSpec, type HardwareSpec } from '../config/schema/index.js';
import { asInteger, asNumber, type FieldParser } from '../config/normalize.js';
import { ERROR_CODES, createEstimatorError } from '../errors/estimator-error.js';
import type { JsonRecord } from './reader.js';

export const REQUIRED_HARDWARE_KEYS = [
  'name',
  'peak_tflops',
  'memory_bandwidth_gbps',
  'hbm_gb',
  'interconnect_gbps',
] as const;

function requireNumber(data: JsonRecord, key: string): number {
  const value = asNumber(data[key]);
  if (value === undefined) {
    throw createEstimatorError(
      ERROR_CODES.SCENARIO_INVALID,
      `Hardware field "${key}" must be a number, got ${JSON.stringify(data[key])}`,
      { field: key }
    );
  }
  return value;
}

function optionalNumber(
  data: JsonRecord,
  key: string,
  parse: FieldParser<number> = asNumber
): number | undefined {
  if (data[key] === undefined || data[key] === null) return undefined;
  const value = parse(data[key]);
  if (value === undefined) {
    throw createEstimatorError(
      ERROR_CODES.SCENARIO_INVALID,
      `Hardware field "${key}" must be a number, got ${JSON.stringify(data[key])}`,
      { field: key }
    );
  }
  return value;
}

/**
 * Build a HardwareSpec from a scenario mapping.
 */
export function hardwareFromRecord(data: JsonRecord): HardwareSpec {
  const missing = REQUIRED_HARDWARE_KEYS.filter((key) => !(key in data));
  if (missing.length > 0) {
    throw createEstimatorError(
      ERROR_CODES.HARDWARE_KEYS_MISSING,
      `Hardware config missing keys: ${missing.join(', ')}`,
      { missing }
    );
  }

  return createHardwareSpec({
    name: String(data.name),
    peakTflops: requireNumber(data, 'peak_tflops'),
    memoryBandwidthGbps: requireNumber(data, 'memory_bandwidth_gbps'),
    hbmGb: requireNumber(data, 'hbm_gb'),
    interconnectGbps: requireNumber(data, 'interconnect_gbps'),
    maxConcurrency: optionalNumber(data, 'max_concurrency', asInteger),
    overlapEfficiency: optionalNumber(data, 'overlap_efficiency'),
  });
}
