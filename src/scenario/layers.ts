/**
 * Layer Config Construction
 *
 * Resolves scenario type tags to the closed LayerConfig union.
 *
 * @module scenario/layers
 */

import type { LayerConfig, LayerType, RawConfigMap } from '../config/schema/index.js';
import { ERROR_CODES, createEstimatorError } from '../errors/estimator-error.js';
import { isJsonRecord, type JsonRecord } from './reader.js';

/** Accepted type tags and their canonical layer kind */
export const SUPPORTED_LAYER_TYPES: Readonly<Record<string, LayerType>> = {
  attention: 'attention',
  attention_layer: 'attention',
  ffn_layer: 'ffn',
  ffn: 'ffn',
  moe_layer: 'moe',
  moe: 'moe',
  communication: 'communication',
};

export function canonicalLayerType(tag: unknown): LayerType | null {
  if (typeof tag !== 'string') return null;
  return Object.prototype.hasOwnProperty.call(SUPPORTED_LAYER_TYPES, tag)
    ? SUPPORTED_LAYER_TYPES[tag]
    : null;
}

function recordOr(value: unknown, fallback: RawConfigMap): RawConfigMap {
  return isJsonRecord(value) ? value : fallback;
}

function stringList(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value.filter((entry): entry is string => typeof entry === 'string');
}

/**
 * Build the LayerConfig for entry `idx` from its merged mapping.
 */
export function layerConfigFromRecord(idx: number, layerType: unknown, data: JsonRecord): LayerConfig {
  const canonical = canonicalLayerType(layerType);
  if (canonical === null) {
    throw createEstimatorError(
      ERROR_CODES.LAYER_TYPE_UNSUPPORTED,
      `Unsupported layer type: ${String(layerType)}`,
      { layerId: idx, layerType }
    );
  }

  const name = typeof data.name === 'string' && data.name !== '' ? data.name : `${canonical}_${idx}`;
  const attnConfig = recordOr(data.attn_config, {});
  const header = {
    name,
    layerId: idx,
    attnConfig,
    fusedOps: stringList(data.fused_ops),
  };

  switch (canonical) {
    case 'ffn':
      return { ...header, layerType: 'ffn', ffnConfig: recordOr(data.ffn_config, {}) };
    case 'moe':
      return { ...header, layerType: 'moe', moeConfig: recordOr(data.moe_config, {}) };
    case 'communication':
      return { ...header, layerType: 'communication', commConfig: recordOr(data.comm_config, data) };
    case 'attention':
      return {
        ...header,
        layerType: 'attention',
        attnConfig: Object.keys(attnConfig).length > 0 ? attnConfig : data,
      };
  }
}
