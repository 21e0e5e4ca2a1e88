/**
 * Execution Result Schema
 *
 * Immutable outputs of the estimator: catalog metrics, per-layer results and
 * the run-level aggregate, plus their snake_case record forms used when a
 * result is dumped to disk.
 *
 * @module config/schema/execution
 */

// =============================================================================
// Fusion Metrics
// =============================================================================

/** One named (FLOPs, bytes) pair produced by a catalog formula */
export interface FusionMetrics {
  readonly name: string;
  readonly flops: number;
  readonly bytesAccessed: number;
}

export function fusionMetricsToRecord(metric: FusionMetrics): { flops: number; bytes_accessed: number } {
  return { flops: metric.flops, bytes_accessed: metric.bytesAccessed };
}

// =============================================================================
// Layer Execution
// =============================================================================

export interface MetricBreakdown {
  readonly flops: number;
  readonly bytes: number;
}

export interface LayerExecution {
  readonly layerName: string;
  readonly layerType: string;
  readonly flops: number;
  readonly bytesRead: number;
  readonly bytesWritten: number;
  readonly computeTimeMs: number;
  readonly memoryTimeMs: number;
  /** Roofline-combined latency */
  readonly dominantLatencyMs: number;
  /** Always equal to dominantLatencyMs */
  readonly estimatedExecutionTimeMs: number;
  readonly features: Readonly<Record<string, number>>;
  readonly breakdown: Readonly<Record<string, MetricBreakdown>>;
}

export interface LayerExecutionRecord {
  layer_name: string;
  layer_type: string;
  flops: number;
  bytes_read: number;
  bytes_written: number;
  compute_time_ms: number;
  memory_time_ms: number;
  dominant_latency_ms: number;
  estimated_execution_time_ms: number;
  features: Record<string, number>;
  breakdown: Record<string, { flops: number; bytes: number }>;
}

export function layerExecutionToRecord(execution: LayerExecution): LayerExecutionRecord {
  const breakdown: Record<string, { flops: number; bytes: number }> = {};
  for (const [name, entry] of Object.entries(execution.breakdown)) {
    breakdown[name] = { flops: entry.flops, bytes: entry.bytes };
  }
  return {
    layer_name: execution.layerName,
    layer_type: execution.layerType,
    flops: execution.flops,
    bytes_read: execution.bytesRead,
    bytes_written: execution.bytesWritten,
    compute_time_ms: execution.computeTimeMs,
    memory_time_ms: execution.memoryTimeMs,
    dominant_latency_ms: execution.dominantLatencyMs,
    estimated_execution_time_ms: execution.estimatedExecutionTimeMs,
    features: { ...execution.features },
    breakdown,
  };
}

// =============================================================================
// Simulation Result
// =============================================================================

export interface SimulationResult {
  readonly layers: readonly LayerExecution[];
  readonly totalFlops: number;
  /** Sum of per-layer dominant latencies */
  readonly totalLatencyMs: number;
  /** Largest single-layer read+write footprint */
  readonly peakMemoryBytes: number;
  /** Layer with the largest dominant latency, null when there are no layers */
  readonly bottleneckLayer: string | null;
}

export interface SimulationResultRecord {
  layers: LayerExecutionRecord[];
  total_flops: number;
  total_latency_ms: number;
  peak_memory_bytes: number;
  bottleneck_layer: string | null;
}

export function simulationResultToRecord(result: SimulationResult): SimulationResultRecord {
  return {
    layers: result.layers.map(layerExecutionToRecord),
    total_flops: result.totalFlops,
    total_latency_ms: result.totalLatencyMs,
    peak_memory_bytes: result.peakMemoryBytes,
    bottleneck_layer: result.bottleneckLayer,
  };
}
