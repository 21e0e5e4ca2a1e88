import { describe, expect, it } from 'vitest';

import {
  createRuntimeSpec,
  simulationResultToRecord,
} from '../../src/config/schema/index.js';
import { AnalyticEstimator } from '../../src/estimation/analytic.js';
import { hardwareFromRecord } from '../../src/scenario/hardware.js';
import type { Scenario } from '../../src/scenario/loader.js';
import { layerTable, summaryRow } from '../../src/simulator/report.js';
import { runSimulation } from '../../src/simulator/run.js';
import { TEST_GPU } from '../helpers/tmp.js';

const scenario: Scenario = {
  name: 'e2e',
  hardware: hardwareFromRecord(TEST_GPU),
  layers: [
    {
      name: 'mlp',
      layerId: 0,
      layerType: 'ffn',
      attnConfig: {},
      fusedOps: [],
      ffnConfig: { d_model: 256, d_ff: 1024 },
    },
  ],
};

describe('simulator', () => {
  const runtime = createRuntimeSpec({ batchSize: 2, seqLen: 32 });

  describe('runSimulation', () => {
    it('runs a single FFN layer end to end', () => {
      const result = runSimulation(scenario, runtime);

      expect(result.totalLatencyMs).toBeGreaterThan(0);
      expect(result.totalFlops).toBe(67174400);
      expect(result.peakMemoryBytes).toBe(1376256);
      expect(result.bottleneckLayer).toBe('mlp');
    });

    it('uses the estimator it is given', () => {
      const estimator = new AnalyticEstimator(
        scenario.hardware,
        createRuntimeSpec({ batchSize: 1, seqLen: 32 })
      );
      expect(runSimulation(scenario, runtime, { estimator }).totalFlops).toBe(33587200);
    });
  });

  describe('report rows', () => {
    const result = runSimulation(scenario, runtime);

    it('scales per-layer units', () => {
      const [row] = layerTable(result);
      expect(row.layer).toBe('mlp');
      expect(row.type).toBe('ffn');
      expect(row.gflops).toBeCloseTo(0.0671744, 12);
      expect(row.bytes_gb).toBeCloseTo(0.001376256, 12);
      expect(row.latency_ms).toBe(result.layers[0].dominantLatencyMs);
    });

    it('summarizes totals', () => {
      expect(summaryRow(result)).toMatchObject({
        total_latency_ms: result.totalLatencyMs,
        bottleneck_layer: 'mlp',
      });
      expect(summaryRow(result).total_flops_g).toBeCloseTo(0.0671744, 12);
    });

    it('converts to a snake_case record', () => {
      const record = simulationResultToRecord(result);
      expect(record.total_flops).toBe(67174400);
      expect(record.bottleneck_layer).toBe('mlp');
      expect(record.layers[0]).toMatchObject({
        layer_name: 'mlp',
        layer_type: 'ffn',
        bytes_read: 1343488,
        bytes_written: 32768,
        breakdown: { ffn: { flops: 67174400, bytes: 1343488 } },
      });
      expect(record.layers[0].features).toEqual({
        layer_id: 0,
        layer_type: 0,
        d_model: 256,
        d_ff: 1024,
        batch: 2,
        seq: 32,
        dtype_bits: 16,
      });
    });
  });
});
