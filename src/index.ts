/**
 * Layer roofline estimator: public API.
 *
 * @module layer-roofline
 */

export const VERSION = '0.1.0';

// Data model, settings and normalization
export * from './config/index.js';

// Metric primitives and fused-op catalog
export * from './ops/index.js';

// Per-kind estimators
export * from './modules/index.js';

// Dispatcher and aggregation
export * from './estimation/index.js';

// Scenario loading and simulation
export * from './scenario/index.js';
export * from './simulator/index.js';

// Errors and logging
export {
  ERROR_CODES,
  type ErrorCode,
  EstimatorError,
  createEstimatorError,
  isEstimatorError,
} from './errors/estimator-error.js';
export {
  log,
  setLogLevel,
  getLogLevel,
  applyDebugConfig,
  enableModules,
  disableModules,
  resetModuleFilters,
  getLogHistory,
  clearLogHistory,
} from './debug/index.js';
