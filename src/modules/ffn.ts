/**
 * Feed-forward Estimator
 *
 * @module modules/ffn
 */

import {
  DEFAULT_DTYPE_BITS,
  type FusionMetrics,
  type HardwareSpec,
  type LayerExecution,
  type RawConfigMap,
} from '../config/schema/index.js';
import { asInteger, resolveField, type FieldCandidate } from '../config/normalize.js';
import { ffnActivation } from '../ops/fused-ops.js';
import { tensorBytes } from '../ops/metrics.js';
import { AnalyticLayer } from './base.js';

export interface FFNConfig {
  dModel: number;
  dFf: number;
  dtypeBits: number;
}

export const DEFAULT_FFN_D_MODEL = 768;
export const DEFAULT_FFN_HIDDEN = 3072;

const D_MODEL_KEYS: readonly FieldCandidate<number>[] = [['d_model', asInteger]];
const D_FF_KEYS: readonly FieldCandidate<number>[] = [
  ['d_ff', asInteger],
  ['intermediate_size', asInteger],
];
const DTYPE_BITS_KEYS: readonly FieldCandidate<number>[] = [['dtype_bits', asInteger]];

export function parseFFNConfig(raw: RawConfigMap = {}): FFNConfig {
  return {
    dModel: resolveField(raw, D_MODEL_KEYS, DEFAULT_FFN_D_MODEL),
    dFf: resolveField(raw, D_FF_KEYS, DEFAULT_FFN_HIDDEN),
    dtypeBits: resolveField(raw, DTYPE_BITS_KEYS, DEFAULT_DTYPE_BITS),
  };
}

export class FFN extends AnalyticLayer<FFNConfig> {
  readonly kind = 'ffn';

  constructor(ffnConfig: RawConfigMap = {}) {
    super(parseFFNConfig(ffnConfig));
  }

  private metric(batch: number, seq: number): FusionMetrics {
    const { dModel, dFf, dtypeBits } = this.config;
    return ffnActivation(batch, seq, dModel, dFf, { dtypeBits });
  }

  analyticFlops(batch: number, seq: number): number {
    return this.metric(batch, seq).flops;
  }

  estimateExecutionTime(batch: number, seq: number, hardware: HardwareSpec): LayerExecution {
    const { dModel, dFf, dtypeBits } = this.config;
    return this.rooflineExecution(hardware, {
      metrics: [this.metric(batch, seq)],
      outputBytes: tensorBytes([batch, seq, dModel], dtypeBits),
      features: {
        d_model: dModel,
        d_ff: dFf,
        batch,
        seq,
        dtype_bits: dtypeBits,
      },
    });
  }
}
