/**
 * Number formatting for CLI tables and totals.
 */

import {
  BYTES_PER_GB,
  FLOPS_PER_GFLOP,
  type ReportConfigSchema,
} from '../../src/config/schema/index.js';

/**
 * Fixed-point cell, right-aligned. Non-finite values render as inf/-inf/nan.
 */
export function formatCell(value: number, report: ReportConfigSchema): string {
  const text = nonFiniteToken(value) ?? value.toFixed(report.precision);
  return text.padStart(report.cellWidth);
}

/** inf, -inf or nan for a non-finite number; null otherwise */
export function nonFiniteToken(value: number): string | null {
  if (Number.isNaN(value)) return 'nan';
  if (!Number.isFinite(value)) return value > 0 ? 'inf' : '-inf';
  return null;
}

/**
 * JSON.stringify replacer that keeps non-finite numbers as their tokens
 * instead of null.
 */
export function nonFiniteReplacer(_key: string, value: unknown): unknown {
  if (typeof value === 'number') {
    return nonFiniteToken(value) ?? value;
  }
  return value;
}

export function formatMs(value: number, report: ReportConfigSchema): string {
  return formatCell(value, report);
}

export function formatGflops(flops: number, report: ReportConfigSchema): string {
  return formatCell(flops / FLOPS_PER_GFLOP, report);
}

export function formatGb(bytes: number, report: ReportConfigSchema): string {
  return formatCell(bytes / BYTES_PER_GB, report);
}
