/**
 * Runtime Schema
 *
 * Per-run shape parameters shared by every layer of a simulation.
 *
 * @module config/schema/runtime
 */

export interface RuntimeSpec {
  readonly batchSize: number;
  readonly seqLen: number;
  /** Reserved; not consumed by the analytic formulas */
  readonly microBatch?: number;
  /** Reserved; not consumed by the analytic formulas */
  readonly tokensPerExpert?: number;
}

export function createRuntimeSpec(input: RuntimeSpec): RuntimeSpec {
  return Object.freeze({ ...input });
}
