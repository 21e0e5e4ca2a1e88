/**
 * Analytic Layer Base
 *
 * Shared plumbing for the per-kind estimators: breakdown construction, the
 * compute/memory roofline path and the unsupported numeric path.
 *
 * @module modules/base
 */

import type {
  FusionMetrics,
  HardwareSpec,
  LayerExecution,
  LayerType,
  MetricBreakdown,
} from '../config/schema/index.js';
import { ERROR_CODES, createEstimatorError } from '../errors/estimator-error.js';
import { computeTimeMs, dominantLatencyMs, memoryTimeMs } from '../ops/metrics.js';

export interface RooflineInput {
  metrics: readonly FusionMetrics[];
  /** Output activation bytes, reported as bytesWritten */
  outputBytes: number;
  features: Record<string, number>;
}

export function toBreakdown(metrics: readonly FusionMetrics[]): Record<string, MetricBreakdown> {
  const breakdown: Record<string, MetricBreakdown> = {};
  for (const metric of metrics) {
    breakdown[metric.name] = Object.freeze({ flops: metric.flops, bytes: metric.bytesAccessed });
  }
  return breakdown;
}

export function sumFlops(metrics: readonly FusionMetrics[]): number {
  return metrics.reduce((total, metric) => total + metric.flops, 0);
}

export function sumBytes(metrics: readonly FusionMetrics[]): number {
  return metrics.reduce((total, metric) => total + metric.bytesAccessed, 0);
}

export function freezeExecution(execution: LayerExecution): LayerExecution {
  return Object.freeze({
    ...execution,
    features: Object.freeze({ ...execution.features }),
    breakdown: Object.freeze({ ...execution.breakdown }),
  });
}

export abstract class AnalyticLayer<TConfig> {
  abstract readonly kind: LayerType;
  readonly config: Readonly<TConfig>;

  protected constructor(config: TConfig) {
    this.config = Object.freeze(config);
  }

  /**
   * Total FLOPs across the layer's catalog formulas.
   */
  abstract analyticFlops(batch: number, seq: number): number;

  abstract estimateExecutionTime(batch: number, seq: number, hardware: HardwareSpec): LayerExecution;

  /**
   * Numeric execution is never available; calling this is a usage error.
   */
  forward(..._args: unknown[]): never {
    throw createEstimatorError(
      ERROR_CODES.NUMERIC_PATH_UNSUPPORTED,
      `Numeric forward is not available for ${this.kind} layers; use estimateExecutionTime()`
    );
  }

  /**
   * Compute/memory roofline over the summed catalog metrics.
   */
  protected rooflineExecution(hardware: HardwareSpec, input: RooflineInput): LayerExecution {
    const flops = sumFlops(input.metrics);
    const bytesRead = sumBytes(input.metrics);

    const computeMs = computeTimeMs(flops, hardware);
    const memoryMs = memoryTimeMs(bytesRead + input.outputBytes, hardware);
    const latencyMs = dominantLatencyMs(computeMs, memoryMs, hardware);

    return freezeExecution({
      layerName: this.kind,
      layerType: this.kind,
      flops,
      bytesRead,
      bytesWritten: input.outputBytes,
      computeTimeMs: computeMs,
      memoryTimeMs: memoryMs,
      dominantLatencyMs: latencyMs,
      estimatedExecutionTimeMs: latencyMs,
      features: input.features,
      breakdown: toBreakdown(input.metrics),
    });
  }
}
