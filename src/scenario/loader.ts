/**
 * Scenario Loader
 *
 * A scenario names a hardware profile and an ordered list of layers. Both
 * the hardware block and each layer's `config` may be inline objects or
 * paths relative to the scenario file; per-layer `overrides` are laid over
 * the referenced config.
 *
 * @module scenario/loader
 */

import { basename, dirname, extname, resolve } from 'path';

import type { HardwareSpec, LayerConfig } from '../config/schema/index.js';
import { log } from '../debug/log.js';
import { ERROR_CODES, createEstimatorError } from '../errors/estimator-error.js';
import { hardwareFromRecord } from './hardware.js';
import { layerConfigFromRecord } from './layers.js';
import { isJsonRecord, maybeLoadReference, readJsonRecord, type JsonRecord } from './reader.js';

export interface Scenario {
  readonly name: string;
  readonly hardware: HardwareSpec;
  readonly layers: readonly LayerConfig[];
}

async function mergedLayerRecord(baseDir: string, entry: JsonRecord, idx: number): Promise<JsonRecord> {
  const base = entry.config !== undefined ? await maybeLoadReference(baseDir, entry.config) : entry;
  const overrides = entry.overrides ?? {};
  if (!isJsonRecord(overrides)) {
    throw createEstimatorError(
      ERROR_CODES.SCENARIO_INVALID,
      `Layer entry #${idx} "overrides" must be an object`,
      { layerId: idx }
    );
  }

  const merged: JsonRecord = { ...base, ...overrides };
  if (!('name' in merged) && entry.name !== undefined) {
    merged.name = entry.name;
  }
  return merged;
}

/**
 * Load a scenario file and resolve its references.
 */
export async function loadScenario(path: string): Promise<Scenario> {
  const scenarioPath = resolve(path);
  const data = await readJsonRecord(scenarioPath);
  const baseDir = dirname(scenarioPath);

  if (data.hardware === undefined || data.hardware === null) {
    throw createEstimatorError(
      ERROR_CODES.SCENARIO_INVALID,
      "Scenario must specify a 'hardware' block or reference",
      { path: scenarioPath }
    );
  }
  const hardware = hardwareFromRecord(await maybeLoadReference(baseDir, data.hardware));

  if (!Array.isArray(data.layers) || data.layers.length === 0) {
    throw createEstimatorError(
      ERROR_CODES.SCENARIO_INVALID,
      'Scenario must include at least one layer entry',
      { path: scenarioPath }
    );
  }

  const entries: readonly unknown[] = data.layers;
  const layers: LayerConfig[] = [];
  for (const [idx, entry] of entries.entries()) {
    if (!isJsonRecord(entry)) {
      throw createEstimatorError(
        ERROR_CODES.SCENARIO_INVALID,
        `Layer entry #${idx} must be an object`,
        { layerId: idx }
      );
    }
    const merged = await mergedLayerRecord(baseDir, entry, idx);
    layers.push(layerConfigFromRecord(idx, entry.type, merged));
  }

  const name =
    typeof data.name === 'string' ? data.name : basename(scenarioPath, extname(scenarioPath));
  log.verbose('Scenario', `Loaded "${name}": ${layers.length} layer(s) on ${hardware.name}`);

  return Object.freeze({ name, hardware, layers: Object.freeze(layers) });
}
