/**
 * Communication Estimator
 *
 * Bandwidth-bound collectives. The payload is read and written once each;
 * the interconnect time stands in for the compute axis of the roofline.
 *
 * @module modules/communication
 */

import {
  BYTES_PER_MB,
  type FusionMetrics,
  type HardwareSpec,
  type LayerExecution,
  type RawConfigMap,
} from '../config/schema/index.js';
import { asNumber, asString, resolveField, type FieldCandidate } from '../config/normalize.js';
import { communicationAllReduce, communicationAllToAll } from '../ops/fused-ops.js';
import { dominantLatencyMs, interconnectTimeMs, memoryTimeMs } from '../ops/metrics.js';
import { AnalyticLayer, freezeExecution, toBreakdown } from './base.js';

// =============================================================================
// Config
// =============================================================================

export type CommunicationPattern = 'all_to_all' | 'all_reduce';

export interface CommunicationConfig {
  pattern: CommunicationPattern;
  payloadMb: number;
}

export const DEFAULT_PAYLOAD_MB = 1.0;

const PATTERN_KEYS: readonly FieldCandidate<string>[] = [['pattern', asString]];
const PAYLOAD_KEYS: readonly FieldCandidate<number>[] = [['payload_mb', asNumber]];

export function parseCommunicationConfig(raw: RawConfigMap = {}): CommunicationConfig {
  const pattern = resolveField(raw, PATTERN_KEYS, 'all_to_all');
  return {
    pattern: pattern === 'all_reduce' ? 'all_reduce' : 'all_to_all',
    payloadMb: resolveField(raw, PAYLOAD_KEYS, DEFAULT_PAYLOAD_MB),
  };
}

// =============================================================================
// Estimator
// =============================================================================

export class Communication extends AnalyticLayer<CommunicationConfig> {
  readonly kind = 'communication';

  constructor(commConfig: RawConfigMap = {}) {
    super(parseCommunicationConfig(commConfig));
  }

  private metric(): FusionMetrics {
    const payloadBytes = this.config.payloadMb * BYTES_PER_MB;
    return this.config.pattern === 'all_reduce'
      ? communicationAllReduce(payloadBytes)
      : communicationAllToAll(payloadBytes);
  }

  /** Collectives carry no meaningful FLOPs */
  analyticFlops(_batch: number, _seq: number): number {
    return 0;
  }

  estimateExecutionTime(batch: number, seq: number, hardware: HardwareSpec): LayerExecution {
    const metric = this.metric();
    const interconnectMs = interconnectTimeMs(metric.bytesAccessed, hardware);
    const memoryMs = memoryTimeMs(metric.bytesAccessed, hardware);
    const latencyMs = dominantLatencyMs(interconnectMs, memoryMs, hardware);

    return freezeExecution({
      layerName: this.kind,
      layerType: this.kind,
      flops: 0,
      bytesRead: metric.bytesAccessed,
      bytesWritten: metric.bytesAccessed,
      computeTimeMs: interconnectMs,
      memoryTimeMs: memoryMs,
      dominantLatencyMs: latencyMs,
      estimatedExecutionTimeMs: latencyMs,
      features: {
        pattern: this.config.pattern === 'all_reduce' ? 1 : 0,
        payload_mb: this.config.payloadMb,
        batch,
        seq,
      },
      breakdown: toBreakdown([metric]),
    });
  }
}
