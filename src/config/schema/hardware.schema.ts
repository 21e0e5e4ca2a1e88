/**
 * Hardware Schema
 *
 * Accelerator profile used to convert analytic work into time. Rates are
 * stored exactly as given; negative values are clamped by the accessors in
 * config/hardware, never rejected here.
 *
 * @module config/schema/hardware
 */

export interface HardwareSpec {
  readonly name: string;
  /** Peak compute throughput (TFLOP/s) */
  readonly peakTflops: number;
  /** Memory bandwidth (GB/s) */
  readonly memoryBandwidthGbps: number;
  /** HBM capacity (GB) */
  readonly hbmGb: number;
  /** Interconnect bandwidth (GB/s) */
  readonly interconnectGbps: number;
  /** Informational only */
  readonly maxConcurrency: number;
  /**
   * Divisor applied to memory time before the roofline max.
   * 1.0 = no overlap benefit, >1 = compute/memory overlap.
   */
  readonly overlapEfficiency: number;
}

export type HardwareSpecInput = Omit<HardwareSpec, 'maxConcurrency' | 'overlapEfficiency'> &
  Partial<Pick<HardwareSpec, 'maxConcurrency' | 'overlapEfficiency'>>;

export const DEFAULT_MAX_CONCURRENCY = 1;
export const DEFAULT_OVERLAP_EFFICIENCY = 1.0;

/** Floor for overlap efficiency so the roofline never divides by zero */
export const MIN_OVERLAP_EFFICIENCY = 1e-3;

export function createHardwareSpec(input: HardwareSpecInput): HardwareSpec {
  return Object.freeze({
    name: input.name,
    peakTflops: input.peakTflops,
    memoryBandwidthGbps: input.memoryBandwidthGbps,
    hbmGb: input.hbmGb,
    interconnectGbps: input.interconnectGbps,
    maxConcurrency: input.maxConcurrency ?? DEFAULT_MAX_CONCURRENCY,
    overlapEfficiency: input.overlapEfficiency ?? DEFAULT_OVERLAP_EFFICIENCY,
  });
}
