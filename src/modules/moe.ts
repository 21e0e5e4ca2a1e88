/**
 * Mixture-of-Experts Estimator
 *
 * Routing, expert FFN over the routed token volume, and the expert-parallel
 * all-to-all whose payload is shared across expert groups.
 *
 * @module modules/moe
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
  asNumber,
  resolveField,
  type FieldCandidate,
} from '../config/normalize.js';
import { communicationAllToAll, moeExpertForward, moeRouting } from '../ops/fused-ops.js';
import { tensorBytes } from '../ops/metrics.js';
import { AnalyticLayer, sumFlops } from './base.js';

// =============================================================================
// Config
// =============================================================================

export interface MoEConfig {
  dModel: number;
  expertHidden: number;
  /** >= 1 */
  numExperts: number;
  /** >= 1 */
  topK: number;
  /** Experts each token is routed to on average, >= 1 */
  avgExpertsPerToken: number;
  /** Expert groups sharing the all-to-all, >= 1 */
  numGroups: number;
  dtypeBits: number;
}

export const DEFAULT_MOE_D_MODEL = 768;
export const DEFAULT_MOE_EXPERT_HIDDEN = 3072;

const D_MODEL_KEYS: readonly FieldCandidate<number>[] = [
  ['d_model', asInteger],
  ['model_dim', asInteger],
];
const EXPERT_HIDDEN_KEYS: readonly FieldCandidate<number>[] = [
  ['moe_intermediate_size', asInteger],
  ['d_ff', asInteger],
];
const NUM_EXPERTS_KEYS: readonly FieldCandidate<number>[] = [
  ['n_routed_experts', asInteger],
  ['num_experts', asInteger],
];
const TOP_K_KEYS: readonly FieldCandidate<number>[] = [
  ['topk_group', asInteger],
  ['top_k', asInteger],
  ['num_experts_per_tok', asInteger],
];
const AVG_EXPERTS_KEYS: readonly FieldCandidate<number>[] = [['num_experts_per_tok', asNumber]];
const NUM_GROUPS_KEYS: readonly FieldCandidate<number>[] = [
  ['n_group', asInteger],
  ['num_groups', asInteger],
];
const DTYPE_BITS_KEYS: readonly FieldCandidate<number>[] = [['dtype_bits', asInteger]];

export function parseMoEConfig(raw: RawConfigMap = {}): MoEConfig {
  const topK = resolveField(raw, TOP_K_KEYS, 1);
  const avgExpertsPerToken = resolveField(raw, AVG_EXPERTS_KEYS, topK);
  return {
    dModel: resolveField(raw, D_MODEL_KEYS, DEFAULT_MOE_D_MODEL),
    expertHidden: resolveField(raw, EXPERT_HIDDEN_KEYS, DEFAULT_MOE_EXPERT_HIDDEN),
    numExperts: Math.max(resolveField(raw, NUM_EXPERTS_KEYS, 1), 1),
    topK: Math.max(topK, 1),
    avgExpertsPerToken: Math.max(avgExpertsPerToken, 1.0),
    numGroups: Math.max(resolveField(raw, NUM_GROUPS_KEYS, 1), 1),
    dtypeBits: resolveField(raw, DTYPE_BITS_KEYS, DEFAULT_DTYPE_BITS),
  };
}

// =============================================================================
// Estimator
// =============================================================================

export class MoE extends AnalyticLayer<MoEConfig> {
  readonly kind = 'moe';

  constructor(moeConfig: RawConfigMap = {}) {
    super(parseMoEConfig(moeConfig));
  }

  /**
   * Token volume processed by the expert FFNs.
   */
  activeTokens(batch: number, seq: number): number {
    return Math.trunc(batch * seq * this.config.avgExpertsPerToken);
  }

  private metrics(batch: number, seq: number): FusionMetrics[] {
    const { dModel, expertHidden, numExperts, topK, numGroups, dtypeBits } = this.config;
    const activeTokens = this.activeTokens(batch, seq);
    const bytesPerDevice = tensorBytes([activeTokens, dModel], dtypeBits) / numGroups;
    return [
      moeRouting(batch, seq, numExperts, topK, { dtypeBits }),
      moeExpertForward(activeTokens, dModel, expertHidden, { dtypeBits }),
      communicationAllToAll(bytesPerDevice),
    ];
  }

  analyticFlops(batch: number, seq: number): number {
    return sumFlops(this.metrics(batch, seq));
  }

  estimateExecutionTime(batch: number, seq: number, hardware: HardwareSpec): LayerExecution {
    const { dModel, expertHidden, numExperts, topK, avgExpertsPerToken, dtypeBits } = this.config;
    return this.rooflineExecution(hardware, {
      metrics: this.metrics(batch, seq),
      outputBytes: tensorBytes([batch, seq, dModel], dtypeBits),
      features: {
        d_model: dModel,
        expert_hidden: expertHidden,
        num_experts: numExperts,
        top_k: topK,
        avg_experts_per_token: avgExpertsPerToken,
        batch,
        seq,
      },
    });
  }
}
