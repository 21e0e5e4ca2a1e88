/**
 * Performance Timing Utilities
 *
 * Wraps a phase, logs its duration at debug level under the caller's
 * module tag and hands back the result with the timing.
 *
 * @module debug/perf
 */

import { log } from './log.js';

export interface Timed<T> {
  result: T;
  durationMs: number;
}

function report(module: string, label: string, durationMs: number): void {
  log.debug(module, `${label}: ${durationMs.toFixed(2)}ms`);
}

export const perf = {
  /**
   * Time an async phase (file loading, output writes).
   */
  async time<T>(label: string, fn: () => Promise<T>, module = 'Perf'): Promise<Timed<T>> {
    const start = performance.now();
    const result = await fn();
    const durationMs = performance.now() - start;
    report(module, label, durationMs);
    return { result, durationMs };
  },

  /**
   * Time a synchronous phase (estimation passes).
   */
  timeSync<T>(label: string, fn: () => T, module = 'Perf'): Timed<T> {
    const start = performance.now();
    const result = fn();
    const durationMs = performance.now() - start;
    report(module, label, durationMs);
    return { result, durationMs };
  },
};
