/**
 * Metric Primitives
 *
 * FLOP counting, tensor sizing and the compute / memory / interconnect
 * timing conversions, plus the roofline blend every layer estimator uses.
 *
 * @module ops/metrics
 */

import {
  DEFAULT_DTYPE_BITS,
  FLOPS_PER_TFLOP,
  MS_PER_SECOND,
  type HardwareSpec,
} from '../config/schema/index.js';
import {
  computeThroughputTflops,
  effectiveOverlap,
  interconnectBandwidthBytes,
  memoryBandwidthBytes,
} from '../config/hardware.js';

// =============================================================================
// Work
// =============================================================================

/**
 * FLOPs of a dense (m x k) @ (k x n) matmul, one multiply-add = 2 FLOPs.
 * Negative dimensions are not rejected.
 */
export function matmulFlops(m: number, n: number, k: number): number {
  return 2 * m * n * k;
}

/** Element count with every dimension floored at zero */
export function tensorElements(shape: readonly number[]): number {
  let total = 1;
  for (const dim of shape) {
    total *= Math.max(Math.trunc(dim), 0);
  }
  return total;
}

export function tensorBytes(shape: readonly number[], dtypeBits: number = DEFAULT_DTYPE_BITS): number {
  return (tensorElements(shape) * dtypeBits) / 8;
}

export function sumTensorBytes(
  shapes: Iterable<readonly number[]>,
  dtypeBits: number = DEFAULT_DTYPE_BITS
): number {
  let total = 0;
  for (const shape of shapes) {
    total += tensorBytes(shape, dtypeBits);
  }
  return total;
}

// =============================================================================
// Timing
// =============================================================================

/**
 * Compute-bound time. Infinity when the hardware has no compute throughput.
 */
export function computeTimeMs(flops: number, hardware: HardwareSpec): number {
  const throughput = computeThroughputTflops(hardware);
  if (throughput <= 0) {
    return Number.POSITIVE_INFINITY;
  }
  return (flops / (throughput * FLOPS_PER_TFLOP)) * MS_PER_SECOND;
}

/**
 * Memory-bound time. Infinity when the hardware has no memory bandwidth.
 */
export function memoryTimeMs(bytesMoved: number, hardware: HardwareSpec): number {
  const bandwidth = memoryBandwidthBytes(hardware);
  if (bandwidth <= 0) {
    return Number.POSITIVE_INFINITY;
  }
  return (bytesMoved / bandwidth) * MS_PER_SECOND;
}

/**
 * Interconnect-bound time. Zero (not Infinity) when there is no interconnect
 * bandwidth, so a missing link never dominates the roofline.
 */
export function interconnectTimeMs(bytesMoved: number, hardware: HardwareSpec): number {
  const bandwidth = interconnectBandwidthBytes(hardware);
  if (bandwidth <= 0) {
    return 0;
  }
  return (bytesMoved / bandwidth) * MS_PER_SECOND;
}

/**
 * Roofline blend: max of compute time and overlap-adjusted memory time.
 */
export function dominantLatencyMs(computeMs: number, memoryMs: number, hardware: HardwareSpec): number {
  const adjustedMemory = memoryMs / effectiveOverlap(hardware);
  return Math.max(computeMs, adjustedMemory);
}
