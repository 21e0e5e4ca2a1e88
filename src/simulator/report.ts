/**
 * Report Rows
 *
 * Flat, unit-scaled views of a SimulationResult for tables and summaries.
 *
 * @module simulator/report
 */

import {
  BYTES_PER_GB,
  FLOPS_PER_GFLOP,
  type SimulationResult,
} from '../config/schema/index.js';

export interface LayerTableRow {
  layer: string;
  type: string;
  gflops: number;
  compute_ms: number;
  memory_ms: number;
  latency_ms: number;
  bytes_gb: number;
}

export interface SummaryRow {
  total_latency_ms: number;
  total_flops_g: number;
  peak_memory_gb: number;
  bottleneck_layer: string | null;
}

export function layerTable(result: SimulationResult): LayerTableRow[] {
  return result.layers.map((layer) => ({
    layer: layer.layerName,
    type: layer.layerType,
    gflops: layer.flops / FLOPS_PER_GFLOP,
    compute_ms: layer.computeTimeMs,
    memory_ms: layer.memoryTimeMs,
    latency_ms: layer.dominantLatencyMs,
    bytes_gb: (layer.bytesRead + layer.bytesWritten) / BYTES_PER_GB,
  }));
}

export function summaryRow(result: SimulationResult): SummaryRow {
  return {
    total_latency_ms: result.totalLatencyMs,
    total_flops_g: result.totalFlops / FLOPS_PER_GFLOP,
    peak_memory_gb: result.peakMemoryBytes / BYTES_PER_GB,
    bottleneck_layer: result.bottleneckLayer,
  };
}
