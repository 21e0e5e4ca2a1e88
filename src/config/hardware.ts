/**
 * Hardware Accessors
 *
 * Unit-converting views over a HardwareSpec. Negative rates clamp to zero
 * here, and overlap efficiency is floored so it can always divide.
 *
 * @module config/hardware
 */

import {
  BYTES_PER_GB,
  MIN_OVERLAP_EFFICIENCY,
  type HardwareSpec,
} from './schema/index.js';

export function computeThroughputTflops(hardware: HardwareSpec): number {
  return Math.max(hardware.peakTflops, 0);
}

export function memoryBandwidthBytes(hardware: HardwareSpec): number {
  return Math.max(hardware.memoryBandwidthGbps, 0) * BYTES_PER_GB;
}

export function interconnectBandwidthBytes(hardware: HardwareSpec): number {
  return Math.max(hardware.interconnectGbps, 0) * BYTES_PER_GB;
}

export function effectiveOverlap(hardware: HardwareSpec): number {
  return Math.max(hardware.overlapEfficiency, MIN_OVERLAP_EFFICIENCY);
}
