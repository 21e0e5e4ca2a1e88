/**
 * Estimation Module
 *
 * @module estimation
 */

export {
  AnalyticEstimator,
  createLayerModule,
  type LayerModule,
  LAYER_TYPE_FEATURE_PLACEHOLDER,
} from './analytic.js';

export {
  totalFlops,
  totalLatencyMs,
  peakMemoryBytes,
  bottleneckLayer,
  summarizeExecutions,
} from './aggregate.js';
