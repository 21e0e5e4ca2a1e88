/**
 * Config Module Index
 *
 * @module config
 */

// Schema types
export * from './schema/index.js';

export { getSettings, setSettings, resetSettings } from './settings.js';

export {
  computeThroughputTflops,
  memoryBandwidthBytes,
  interconnectBandwidthBytes,
  effectiveOverlap,
} from './hardware.js';

export {
  type FieldParser,
  type FieldCandidate,
  asInteger,
  asNumber,
  asString,
  resolveField,
  resolveOptionalField,
} from './normalize.js';
