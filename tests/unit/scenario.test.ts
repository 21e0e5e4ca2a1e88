import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { fileURLToPath } from 'url';

import { ERROR_CODES, isEstimatorError } from '../../src/errors/estimator-error.js';
import { hardwareFromRecord } from '../../src/scenario/hardware.js';
import { canonicalLayerType, layerConfigFromRecord } from '../../src/scenario/layers.js';
import { loadScenario } from '../../src/scenario/loader.js';
import { thrownBy } from '../helpers/fixtures.js';
import { TEST_GPU, createTempDir, type TempDir } from '../helpers/tmp.js';

describe('scenario', () => {
  describe('canonicalLayerType', () => {
    it('maps every accepted tag', () => {
      expect(canonicalLayerType('attention_layer')).toBe('attention');
      expect(canonicalLayerType('ffn_layer')).toBe('ffn');
      expect(canonicalLayerType('moe')).toBe('moe');
      expect(canonicalLayerType('communication')).toBe('communication');
    });

    it('rejects unknown and non-string tags', () => {
      expect(canonicalLayerType('conv')).toBeNull();
      expect(canonicalLayerType('toString')).toBeNull();
      expect(canonicalLayerType(5)).toBeNull();
    });
  });

  describe('layerConfigFromRecord', () => {
    it('names unnamed layers by kind and index', () => {
      const config = layerConfigFromRecord(3, 'ffn_layer', { ffn_config: { d_ff: 64 } });
      expect(config).toEqual({
        name: 'ffn_3',
        layerId: 3,
        layerType: 'ffn',
        attnConfig: {},
        fusedOps: [],
        ffnConfig: { d_ff: 64 },
      });
    });

    it('uses the whole entry when communication has no comm_config', () => {
      const data = { pattern: 'all_reduce', payload_mb: 8 };
      const config = layerConfigFromRecord(0, 'communication', data);
      expect(config.layerType === 'communication' && config.commConfig).toEqual(data);
    });

    it('uses attn_config for attention when present', () => {
      const config = layerConfigFromRecord(0, 'attention', {
        name: 'attn',
        attn_config: { d_model: 64 },
        fused_ops: ['qkv', 7],
      });
      expect(config.attnConfig).toEqual({ d_model: 64 });
      expect(config.fusedOps).toEqual(['qkv']);
    });

    it('fails on an unsupported tag', () => {
      expect(thrownBy(() => layerConfigFromRecord(1, 'conv', {}))).toMatchObject({
        code: ERROR_CODES.LAYER_TYPE_UNSUPPORTED,
        message: 'Unsupported layer type: conv',
      });
    });

    it('raises estimator errors only', () => {
      expect(isEstimatorError(thrownBy(() => layerConfigFromRecord(1, 'conv', {})))).toBe(true);
      expect(isEstimatorError(new Error('Unsupported layer type: conv'))).toBe(false);
    });
  });

  describe('hardwareFromRecord', () => {
    it('fills optional fields', () => {
      expect(hardwareFromRecord(TEST_GPU)).toEqual({
        name: 'TestGPU',
        peakTflops: 120,
        memoryBandwidthGbps: 1500,
        hbmGb: 80,
        interconnectGbps: 600,
        maxConcurrency: 1,
        overlapEfficiency: 1,
      });
    });

    it('reads optional fields when given', () => {
      const hardware = hardwareFromRecord({ ...TEST_GPU, max_concurrency: 4, overlap_efficiency: 1.5 });
      expect(hardware.maxConcurrency).toBe(4);
      expect(hardware.overlapEfficiency).toBe(1.5);
    });

    it('lists every missing key', () => {
      expect(thrownBy(() => hardwareFromRecord({ name: 'x', peak_tflops: 1 }))).toMatchObject({
        code: ERROR_CODES.HARDWARE_KEYS_MISSING,
        message: 'Hardware config missing keys: memory_bandwidth_gbps, hbm_gb, interconnect_gbps',
      });
    });

    it('names a non-numeric field', () => {
      expect(() => hardwareFromRecord({ ...TEST_GPU, peak_tflops: 'fast' })).toThrow(
        'Hardware field "peak_tflops" must be a number, got "fast"'
      );
    });
  });

  describe('loadScenario', () => {
    let tmp: TempDir;

    beforeEach(async () => {
      tmp = await createTempDir();
    });

    afterEach(async () => {
      await tmp.cleanup();
    });

    it('resolves hardware and layer references', async () => {
      await tmp.writeJson('hardware/gpu.json', TEST_GPU);
      await tmp.writeJson('layers/mlp.json', { ffn_config: { d_model: 256, d_ff: 1024 } });
      const path = await tmp.writeJson('dense.json', {
        name: 'dense',
        hardware: 'hardware/gpu.json',
        layers: [{ type: 'ffn_layer', name: 'mlp', config: 'layers/mlp.json' }],
      });

      const scenario = await loadScenario(path);
      expect(scenario.name).toBe('dense');
      expect(scenario.hardware.name).toBe('TestGPU');
      expect(scenario.layers).toHaveLength(1);
      expect(scenario.layers[0]).toMatchObject({
        name: 'mlp',
        layerId: 0,
        layerType: 'ffn',
        ffnConfig: { d_model: 256, d_ff: 1024 },
      });
    });

    it('lays overrides over the referenced config', async () => {
      await tmp.writeJson('layers/mlp.json', {
        name: 'from_file',
        ffn_config: { d_model: 64, d_ff: 128 },
      });
      const path = await tmp.writeJson('scenario.json', {
        hardware: TEST_GPU,
        layers: [
          {
            type: 'ffn',
            name: 'from_entry',
            config: 'layers/mlp.json',
            overrides: { ffn_config: { d_model: 32 } },
          },
        ],
      });

      const [layer] = (await loadScenario(path)).layers;
      expect(layer.name).toBe('from_file');
      expect(layer.layerType === 'ffn' && layer.ffnConfig).toEqual({ d_model: 32 });
    });

    it('defaults the scenario and layer names', async () => {
      const path = await tmp.writeJson('moe-sweep.json', {
        hardware: TEST_GPU,
        layers: [{ type: 'attention', d_model: 64 }, { type: 'moe_layer' }],
      });

      const scenario = await loadScenario(path);
      expect(scenario.name).toBe('moe-sweep');
      expect(scenario.layers.map((layer) => layer.name)).toEqual(['attention_0', 'moe_1']);
      expect(scenario.layers[0].attnConfig).toEqual({ type: 'attention', d_model: 64 });
    });

    it('rejects an unsupported layer type', async () => {
      const path = await tmp.writeJson('bad.json', { hardware: TEST_GPU, layers: [{ type: 'conv' }] });
      await expect(loadScenario(path)).rejects.toThrow('Unsupported layer type: conv');
    });

    it('requires at least one layer', async () => {
      const path = await tmp.writeJson('empty.json', { hardware: TEST_GPU, layers: [] });
      await expect(loadScenario(path)).rejects.toThrow(
        'Scenario must include at least one layer entry'
      );
    });

    it('requires a hardware block', async () => {
      const path = await tmp.writeJson('nohw.json', { layers: [{ type: 'ffn' }] });
      await expect(loadScenario(path)).rejects.toMatchObject({
        code: ERROR_CODES.SCENARIO_INVALID,
      });
    });

    it('loads the shipped top-2 expert variant with its full expert config', async () => {
      const scenario = await loadScenario(fileURLToPath(new URL('../../scenarios/moe.json', import.meta.url)));
      const top2 = scenario.layers.find((layer) => layer.name === 'moe_0_top2');
      expect(top2).toMatchObject({
        layerType: 'moe',
        moeConfig: {
          d_model: 4096,
          moe_intermediate_size: 1536,
          n_routed_experts: 64,
          num_experts_per_tok: 2,
          n_group: 8,
        },
      });
    });

    it('reports unreadable files', async () => {
      await expect(loadScenario(`${tmp.path}/missing.json`)).rejects.toMatchObject({
        code: ERROR_CODES.SCENARIO_READ_FAILED,
      });
    });

    it('rejects a top-level value that is not an object', async () => {
      const path = await tmp.writeJson('list.json', [1, 2]);
      await expect(loadScenario(path)).rejects.toMatchObject({
        code: ERROR_CODES.SCENARIO_INVALID,
      });
    });
  });
});
