/**
 * Attention Estimator
 *
 * QKV projection -> scores -> weighted sum -> output projection.
 *
 * @module modules/attention
 */

import {
  DEFAULT_DTYPE_BITS,
  type FusionMetrics,
  type HardwareSpec,
  type LayerExecution,
  type RawConfigMap,
} from '../config/schema/index.js';
import {
  asInteger,
  resolveField,
  resolveOptionalField,
  type FieldCandidate,
} from '../config/normalize.js';
import {
  attentionOutputProjection,
  attentionQkvProjections,
  attentionScores,
  attentionWeightedSum,
} from '../ops/fused-ops.js';
import { tensorBytes } from '../ops/metrics.js';
import { AnalyticLayer, sumFlops } from './base.js';

// =============================================================================
// Config
// =============================================================================

export interface AttentionConfig {
  dModel: number;
  numHeads: number;
  headDim: number;
  qkvDim: number;
  dtypeBits: number;
}

export const DEFAULT_ATTENTION_D_MODEL = 768;
export const DEFAULT_ATTENTION_HEADS = 8;

const D_MODEL_KEYS: readonly FieldCandidate<number>[] = [['d_model', asInteger]];
const NUM_HEADS_KEYS: readonly FieldCandidate<number>[] = [
  ['num_attention_heads', asInteger],
  ['num_heads', asInteger],
];
const HEAD_DIM_KEYS: readonly FieldCandidate<number>[] = [['head_dim', asInteger]];
const DTYPE_BITS_KEYS: readonly FieldCandidate<number>[] = [['dtype_bits', asInteger]];

export function parseAttentionConfig(raw: RawConfigMap = {}): AttentionConfig {
  const dModel = resolveField(raw, D_MODEL_KEYS, DEFAULT_ATTENTION_D_MODEL);
  const numHeads = resolveField(raw, NUM_HEADS_KEYS, DEFAULT_ATTENTION_HEADS);
  const headDim =
    resolveOptionalField(raw, HEAD_DIM_KEYS) ?? Math.floor(dModel / Math.max(numHeads, 1));
  return {
    dModel,
    numHeads,
    headDim,
    qkvDim: numHeads * headDim,
    dtypeBits: resolveField(raw, DTYPE_BITS_KEYS, DEFAULT_DTYPE_BITS),
  };
}

// =============================================================================
// Estimator
// =============================================================================

export class Attention extends AnalyticLayer<AttentionConfig> {
  readonly kind = 'attention';

  constructor(attnConfig: RawConfigMap = {}) {
    super(parseAttentionConfig(attnConfig));
  }

  private metrics(batch: number, seq: number): FusionMetrics[] {
    const { dModel, numHeads, headDim, qkvDim, dtypeBits } = this.config;
    return [
      attentionQkvProjections(batch, seq, dModel, qkvDim, { dtypeBits }),
      attentionScores(batch, seq, numHeads, headDim, { dtypeBits }),
      attentionWeightedSum(batch, seq, numHeads, headDim, { dtypeBits }),
      attentionOutputProjection(batch, seq, dModel, qkvDim, { dtypeBits }),
    ];
  }

  analyticFlops(batch: number, seq: number): number {
    return sumFlops(this.metrics(batch, seq));
  }

  estimateExecutionTime(batch: number, seq: number, hardware: HardwareSpec): LayerExecution {
    const { dModel, numHeads, dtypeBits } = this.config;
    return this.rooflineExecution(hardware, {
      metrics: this.metrics(batch, seq),
      outputBytes: tensorBytes([batch, seq, dModel], dtypeBits),
      features: {
        d_model: dModel,
        num_heads: numHeads,
        batch,
        seq,
        dtype_bits: dtypeBits,
      },
    });
  }
}
