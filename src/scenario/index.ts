/**
 * Scenario Module
 *
 * @module scenario
 */

export { type Scenario, loadScenario } from './loader.js';
export { type JsonRecord, isJsonRecord, readJsonRecord, maybeLoadReference } from './reader.js';
export { REQUIRED_HARDWARE_KEYS, hardwareFromRecord } from './hardware.js';
export { SUPPORTED_LAYER_TYPES, canonicalLayerType, layerConfigFromRecord } from './layers.js';
