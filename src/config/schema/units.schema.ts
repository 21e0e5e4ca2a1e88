/**
 * Unit Constants (Invariants)
 *
 * Decimal unit conversions used by every timing and reporting path.
 * These are mathematical constants, not tunables.
 *
 * @module config/schema/units
 */

/** 1 Megabyte = 1e6 bytes (communication payloads) */
export const BYTES_PER_MB = 1e6;

/** 1 Gigabyte = 1e9 bytes (bandwidths, capacities, reports) */
export const BYTES_PER_GB = 1e9;

/** 1 TFLOP = 1e12 FLOPs */
export const FLOPS_PER_TFLOP = 1e12;

/** 1 GFLOP = 1e9 FLOPs */
export const FLOPS_PER_GFLOP = 1e9;

export const MS_PER_SECOND = 1e3;

/** Default tensor element width (half precision) */
export const DEFAULT_DTYPE_BITS = 16;
