/**
 * Fused Operation Catalog
 *
 * Closed-form (FLOPs, bytes) formulas, one per architecturally meaningful
 * fused step. Each result carries a fixed name used as a breakdown key.
 *
 * Two terms are deliberate approximations and must stay as written:
 * softmax costs one op per score element, and the FFN activation costs one
 * op per hidden element.
 *
 * @module ops/fused-ops
 */

import { DEFAULT_DTYPE_BITS, type FusionMetrics } from '../config/schema/index.js';
import { matmulFlops, tensorBytes } from './metrics.js';

export interface FusedOpOptions {
  /** Element width in bits (default: 16) */
  dtypeBits?: number;
}

function metrics(name: string, flops: number, bytesAccessed: number): FusionMetrics {
  return Object.freeze({ name, flops, bytesAccessed });
}

// =============================================================================
// Attention
// =============================================================================

/**
 * Q, K and V projections as three independent matmuls.
 */
export function attentionQkvProjections(
  batch: number,
  seq: number,
  dModel: number,
  qkvDim: number,
  { dtypeBits = DEFAULT_DTYPE_BITS }: FusedOpOptions = {}
): FusionMetrics {
  const tokens = batch * seq;
  const flops = 3 * matmulFlops(tokens, qkvDim, dModel);
  const inputBytes = tensorBytes([batch, seq, dModel], dtypeBits);
  const weightBytes = tensorBytes([dModel, qkvDim], dtypeBits) * 3;
  const outputBytes = tensorBytes([batch, seq, qkvDim], dtypeBits) * 3;
  return metrics('attention_qkv_proj', flops, inputBytes + weightBytes + outputBytes);
}

/**
 * Q @ K^T per head plus a softmax costed at one op per score.
 */
export function attentionScores(
  batch: number,
  seq: number,
  numHeads: number,
  headDim: number,
  { dtypeBits = DEFAULT_DTYPE_BITS }: FusedOpOptions = {}
): FusionMetrics {
  const matmul = matmulFlops(seq, seq, headDim) * batch * numHeads;
  const softmax = batch * numHeads * seq * seq;
  const qBytes = tensorBytes([batch, numHeads, seq, headDim], dtypeBits);
  const kBytes = tensorBytes([batch, numHeads, seq, headDim], dtypeBits);
  const attnBytes = tensorBytes([batch, numHeads, seq, seq], dtypeBits);
  return metrics('attention_scores', matmul + softmax, qBytes + kBytes + attnBytes);
}

/**
 * Attention weights @ V per head.
 */
export function attentionWeightedSum(
  batch: number,
  seq: number,
  numHeads: number,
  headDim: number,
  { dtypeBits = DEFAULT_DTYPE_BITS }: FusedOpOptions = {}
): FusionMetrics {
  const flops = matmulFlops(seq, headDim, seq) * batch * numHeads;
  const attnBytes = tensorBytes([batch, numHeads, seq, seq], dtypeBits);
  const vBytes = tensorBytes([batch, numHeads, seq, headDim], dtypeBits);
  const outputBytes = tensorBytes([batch, seq, numHeads * headDim], dtypeBits);
  return metrics('attention_weighted_sum', flops, attnBytes + vBytes + outputBytes);
}

export function attentionOutputProjection(
  batch: number,
  seq: number,
  dModel: number,
  qkvDim: number,
  { dtypeBits = DEFAULT_DTYPE_BITS }: FusedOpOptions = {}
): FusionMetrics {
  const flops = matmulFlops(batch * seq, dModel, qkvDim);
  const inputBytes = tensorBytes([batch, seq, qkvDim], dtypeBits);
  const weightBytes = tensorBytes([qkvDim, dModel], dtypeBits);
  const outputBytes = tensorBytes([batch, seq, dModel], dtypeBits);
  return metrics('attention_output_proj', flops, inputBytes + weightBytes + outputBytes);
}

// =============================================================================
// Feed-forward
// =============================================================================

/**
 * Up and down projections plus one activation op per hidden element
 * (stands in for SiLU/SwiGLU).
 */
export function ffnActivation(
  batch: number,
  seq: number,
  dModel: number,
  hiddenDim: number,
  { dtypeBits = DEFAULT_DTYPE_BITS }: FusedOpOptions = {}
): FusionMetrics {
  const tokens = batch * seq;
  const up = matmulFlops(tokens, hiddenDim, dModel);
  const down = matmulFlops(tokens, dModel, hiddenDim);
  const activation = tokens * hiddenDim;
  const inputBytes = tensorBytes([batch, seq, dModel], dtypeBits);
  const hiddenBytes = tensorBytes([batch, seq, hiddenDim], dtypeBits) * 2;
  const weightBytes =
    tensorBytes([dModel, hiddenDim], dtypeBits) + tensorBytes([hiddenDim, dModel], dtypeBits);
  return metrics('ffn', up + down + activation, inputBytes + hiddenBytes + weightBytes);
}

// =============================================================================
// Mixture of experts
// =============================================================================

/**
 * Gate scores over all experts plus top-k selection. Router weights are
 * not costed.
 */
export function moeRouting(
  batch: number,
  seq: number,
  numExperts: number,
  topK: number,
  { dtypeBits = DEFAULT_DTYPE_BITS }: FusedOpOptions = {}
): FusionMetrics {
  const tokens = batch * seq;
  const gateFlops = tokens * numExperts;
  const selectFlops = tokens * topK;
  const gateBytes = tensorBytes([tokens, numExperts], dtypeBits);
  return metrics('moe_routing', gateFlops + selectFlops, gateBytes);
}

/**
 * Expert FFN over the routed token volume (tokens x experts per token).
 */
export function moeExpertForward(
  activeTokens: number,
  dModel: number,
  expertHidden: number,
  { dtypeBits = DEFAULT_DTYPE_BITS }: FusedOpOptions = {}
): FusionMetrics {
  const up = matmulFlops(activeTokens, expertHidden, dModel);
  const down = matmulFlops(activeTokens, dModel, expertHidden);
  const activation = activeTokens * expertHidden;
  const actBytes = tensorBytes([activeTokens, dModel], dtypeBits);
  const hiddenBytes = tensorBytes([activeTokens, expertHidden], dtypeBits);
  const weightBytes =
    tensorBytes([dModel, expertHidden], dtypeBits) + tensorBytes([expertHidden, dModel], dtypeBits);
  return metrics('moe_expert', up + down + activation, actBytes + hiddenBytes + weightBytes);
}

// =============================================================================
// Communication
// =============================================================================

export function communicationAllToAll(bytesPerDevice: number): FusionMetrics {
  return metrics('all_to_all', 0, bytesPerDevice);
}

export function communicationAllReduce(bytesPerDevice: number): FusionMetrics {
  return metrics('all_reduce', 0, bytesPerDevice);
}
