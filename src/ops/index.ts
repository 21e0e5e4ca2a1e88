/**
 * Ops Module
 *
 * @module ops
 */

export {
  matmulFlops,
  tensorElements,
  tensorBytes,
  sumTensorBytes,
  computeTimeMs,
  memoryTimeMs,
  interconnectTimeMs,
  dominantLatencyMs,
} from './metrics.js';

export {
  type FusedOpOptions,
  attentionQkvProjections,
  attentionScores,
  attentionWeightedSum,
  attentionOutputProjection,
  ffnActivation,
  moeRouting,
  moeExpertForward,
  communicationAllToAll,
  communicationAllReduce,
} from './fused-ops.js';
