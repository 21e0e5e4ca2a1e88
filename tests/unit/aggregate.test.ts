import { describe, expect, it } from 'vitest';

import { ERROR_CODES } from '../../src/errors/estimator-error.js';
import {
  bottleneckLayer,
  peakMemoryBytes,
  summarizeExecutions,
  totalFlops,
  totalLatencyMs,
} from '../../src/estimation/aggregate.js';
import { execution, thrownBy } from '../helpers/fixtures.js';

describe('estimation/aggregate', () => {
  const layers = [
    execution('attn', 1.5, 100, 20, 1000),
    execution('mlp', 4, 300, 20, 5000),
    execution('a2a', 4, 50, 50, 0),
  ];

  it('sums FLOPs and latency sequentially', () => {
    expect(totalFlops(layers)).toBe(6000);
    expect(totalLatencyMs(layers)).toBe(9.5);
  });

  it('takes the largest single-layer footprint', () => {
    expect(peakMemoryBytes(layers)).toBe(320);
  });

  it('picks the first layer on a latency tie', () => {
    expect(bottleneckLayer(layers)).toBe('mlp');
  });

  it('handles empty input', () => {
    expect(totalFlops([])).toBe(0);
    expect(totalLatencyMs([])).toBe(0);
    expect(bottleneckLayer([])).toBeNull();
    expect(() => peakMemoryBytes([])).toThrow('Cannot compute peak memory over zero layers');
  });

  it('refuses to summarize zero layers', () => {
    expect(thrownBy(() => summarizeExecutions([]))).toMatchObject({
      code: ERROR_CODES.EMPTY_AGGREGATION,
    });
  });

  it('summarizes into a frozen result', () => {
    const result = summarizeExecutions(layers);
    expect(result).toEqual({
      layers,
      totalFlops: 6000,
      totalLatencyMs: 9.5,
      peakMemoryBytes: 320,
      bottleneckLayer: 'mlp',
    });
    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.layers)).toBe(true);
  });
});
