/**
 * Result Aggregation
 *
 * Folds per-layer results into run-level totals. Layers are modeled as
 * strictly sequential: no inter-layer overlap.
 *
 * @module estimation/aggregate
 */

import type { LayerExecution, SimulationResult } from '../config/schema/index.js';
import { ERROR_CODES, createEstimatorError } from '../errors/estimator-error.js';

export function totalFlops(executions: readonly LayerExecution[]): number {
  return executions.reduce((total, execution) => total + execution.flops, 0);
}

export function totalLatencyMs(executions: readonly LayerExecution[]): number {
  return executions.reduce((total, execution) => total + execution.dominantLatencyMs, 0);
}

/**
 * Largest single-layer read+write footprint. There is no peak over zero
 * layers, so an empty list throws.
 */
export function peakMemoryBytes(executions: readonly LayerExecution[]): number {
  if (executions.length === 0) {
    throw createEstimatorError(
      ERROR_CODES.EMPTY_AGGREGATION,
      'Cannot compute peak memory over zero layers'
    );
  }
  return Math.max(...executions.map((execution) => execution.bytesRead + execution.bytesWritten));
}

/**
 * Name of the layer with the largest dominant latency; the first one wins
 * ties. Null when there are no layers.
 */
export function bottleneckLayer(executions: readonly LayerExecution[]): string | null {
  let bottleneck: LayerExecution | null = null;
  for (const execution of executions) {
    if (bottleneck === null || execution.dominantLatencyMs > bottleneck.dominantLatencyMs) {
      bottleneck = execution;
    }
  }
  return bottleneck?.layerName ?? null;
}

export function summarizeExecutions(executions: readonly LayerExecution[]): SimulationResult {
  const peakMemory = peakMemoryBytes(executions);
  return Object.freeze({
    layers: Object.freeze([...executions]),
    totalFlops: totalFlops(executions),
    totalLatencyMs: totalLatencyMs(executions),
    peakMemoryBytes: peakMemory,
    bottleneckLayer: bottleneckLayer(executions),
  });
}
