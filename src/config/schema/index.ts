/**
 * Schema Index
 *
 * Re-exports all schema definitions for easy importing.
 *
 * @module config/schema
 */

// =============================================================================
// Units
// =============================================================================
export {
  BYTES_PER_MB,
  BYTES_PER_GB,
  FLOPS_PER_TFLOP,
  FLOPS_PER_GFLOP,
  MS_PER_SECOND,
  DEFAULT_DTYPE_BITS,
} from './units.schema.js';

// =============================================================================
// Hardware / Runtime
// =============================================================================
export {
  type HardwareSpec,
  type HardwareSpecInput,
  DEFAULT_MAX_CONCURRENCY,
  DEFAULT_OVERLAP_EFFICIENCY,
  MIN_OVERLAP_EFFICIENCY,
  createHardwareSpec,
} from './hardware.schema.js';

export { type RuntimeSpec, createRuntimeSpec } from './runtime.schema.js';

// =============================================================================
// Layers
// =============================================================================
export {
  LAYER_TYPES,
  type LayerType,
  type RawConfigMap,
  type LayerHeaderSchema,
  type AttentionLayerConfig,
  type FFNLayerConfig,
  type MoELayerConfig,
  type CommunicationLayerConfig,
  type LayerConfig,
} from './layer.schema.js';

// =============================================================================
// Results
// =============================================================================
export {
  type FusionMetrics,
  type MetricBreakdown,
  type LayerExecution,
  type LayerExecutionRecord,
  type SimulationResult,
  type SimulationResultRecord,
  fusionMetricsToRecord,
  layerExecutionToRecord,
  simulationResultToRecord,
} from './execution.schema.js';

// =============================================================================
// Settings
// =============================================================================
export {
  LOG_LEVEL_NAMES,
  type LogLevelName,
  type LogOutputConfigSchema,
  type LogHistoryConfigSchema,
  type LogLevelConfigSchema,
  type DebugConfigSchema,
  DEFAULT_LOG_OUTPUT_CONFIG,
  DEFAULT_LOG_HISTORY_CONFIG,
  DEFAULT_LOG_LEVEL_CONFIG,
  DEFAULT_DEBUG_CONFIG,
  isLogLevelName,
} from './debug.schema.js';

export { type ReportConfigSchema, DEFAULT_REPORT_CONFIG } from './report.schema.js';

export {
  type DeepPartial,
  type SettingsSchema,
  type SettingsOverrides,
  DEFAULT_SETTINGS,
  createSettings,
} from './settings.schema.js';
