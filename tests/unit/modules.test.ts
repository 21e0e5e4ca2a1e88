import { describe, expect, it } from 'vitest';

import { ERROR_CODES, EstimatorError } from '../../src/errors/estimator-error.js';
import { Attention, parseAttentionConfig } from '../../src/modules/attention.js';
import { Communication, parseCommunicationConfig } from '../../src/modules/communication.js';
import { FFN, parseFFNConfig } from '../../src/modules/ffn.js';
import { MoE, parseMoEConfig } from '../../src/modules/moe.js';
import { testHardware, thrownBy } from '../helpers/fixtures.js';

describe('modules', () => {
  const hardware = testHardware();

  describe('Attention', () => {
    it('fills defaults and derives head and qkv dims', () => {
      expect(parseAttentionConfig({})).toEqual({
        dModel: 768,
        numHeads: 8,
        headDim: 96,
        qkvDim: 768,
        dtypeBits: 16,
      });
    });

    it('prefers num_attention_heads over num_heads', () => {
      const config = parseAttentionConfig({ d_model: 64, num_attention_heads: 4, num_heads: 16 });
      expect(config.numHeads).toBe(4);
      expect(config.headDim).toBe(16);
    });

    it('honors an explicit head_dim', () => {
      const config = parseAttentionConfig({ d_model: 128, num_heads: 8, head_dim: 32 });
      expect(config.headDim).toBe(32);
      expect(config.qkvDim).toBe(256);
    });

    it('estimates a compute-positive roofline', () => {
      const layer = new Attention({ d_model: 128, num_heads: 8, head_dim: 16 });
      const execution = layer.estimateExecutionTime(4, 128, hardware);

      expect(execution.flops).toBeGreaterThan(0);
      expect(execution.computeTimeMs).toBeGreaterThan(0);
      expect(execution.dominantLatencyMs).toBeGreaterThanOrEqual(execution.computeTimeMs);
      expect(execution.estimatedExecutionTimeMs).toBe(execution.dominantLatencyMs);
      expect(execution.bytesWritten).toBe(131072);
      expect(execution.layerName).toBe('attention');
    });

    it('breaks down the four fused steps in order', () => {
      const layer = new Attention({ d_model: 128, num_heads: 8, head_dim: 16 });
      const execution = layer.estimateExecutionTime(4, 128, hardware);

      expect(Object.keys(execution.breakdown)).toEqual([
        'attention_qkv_proj',
        'attention_scores',
        'attention_weighted_sum',
        'attention_output_proj',
      ]);
      const breakdownFlops = Object.values(execution.breakdown).reduce((t, e) => t + e.flops, 0);
      expect(breakdownFlops).toBe(execution.flops);
      expect(layer.analyticFlops(4, 128)).toBe(execution.flops);
      expect(execution.features).toEqual({
        d_model: 128,
        num_heads: 8,
        batch: 4,
        seq: 128,
        dtype_bits: 16,
      });
    });
  });

  describe('FFN', () => {
    it('reads d_ff before intermediate_size', () => {
      expect(parseFFNConfig({ intermediate_size: 2048 }).dFf).toBe(2048);
      expect(parseFFNConfig({ d_ff: 1024, intermediate_size: 2048 }).dFf).toBe(1024);
      expect(parseFFNConfig({})).toEqual({ dModel: 768, dFf: 3072, dtypeBits: 16 });
    });

    it('adds the output activation to memory traffic', () => {
      const execution = new FFN({ d_model: 4, d_ff: 8 }).estimateExecutionTime(1, 2, hardware);

      expect(execution.flops).toBe(272);
      expect(execution.bytesRead).toBe(208);
      expect(execution.bytesWritten).toBe(16);
      expect(execution.memoryTimeMs).toBeCloseTo(2.24e-7, 15);
      expect(execution.computeTimeMs).toBeCloseTo(2.72e-9, 17);
      expect(execution.dominantLatencyMs).toBe(execution.memoryTimeMs);
      expect(execution.breakdown).toEqual({ ffn: { flops: 272, bytes: 208 } });
    });

    it('returns a frozen result', () => {
      const execution = new FFN().estimateExecutionTime(1, 1, hardware);
      expect(Object.isFrozen(execution)).toBe(true);
      expect(Object.isFrozen(execution.features)).toBe(true);
    });
  });

  describe('MoE', () => {
    it('resolves each field through its candidate keys', () => {
      expect(parseMoEConfig({ model_dim: 512, d_ff: 100 })).toMatchObject({
        dModel: 512,
        expertHidden: 100,
      });
      expect(parseMoEConfig({ top_k: 3, num_experts_per_tok: 5 })).toMatchObject({
        topK: 3,
        avgExpertsPerToken: 5,
      });
      expect(parseMoEConfig({ topk_group: 4, top_k: 3 }).topK).toBe(4);
    });

    it('floors counts at one', () => {
      expect(parseMoEConfig({ num_experts: 0, top_k: 0, n_group: -2 })).toMatchObject({
        numExperts: 1,
        topK: 1,
        avgExpertsPerToken: 1,
        numGroups: 1,
      });
    });

    it('truncates the active token count', () => {
      const layer = new MoE({ num_experts_per_tok: 1.5 });
      expect(layer.config.topK).toBe(1);
      expect(layer.activeTokens(1, 3)).toBe(4);
    });

    it('sums routing and expert FLOPs', () => {
      const layer = new MoE({ d_model: 4, d_ff: 8, num_experts: 4, top_k: 2 });
      expect(layer.analyticFlops(1, 3)).toBe(834);
    });

    it('estimates routing, experts and the shared all-to-all', () => {
      const layer = new MoE({
        d_model: 256,
        moe_intermediate_size: 512,
        num_experts: 16,
        top_k: 2,
        num_experts_per_tok: 2,
      });
      const execution = layer.estimateExecutionTime(2, 64, hardware);

      expect(execution.flops).toBeGreaterThan(0);
      expect(execution.dominantLatencyMs).toBeGreaterThanOrEqual(execution.computeTimeMs);
      expect(Object.keys(execution.breakdown)).toEqual(['moe_routing', 'moe_expert', 'all_to_all']);
      expect(execution.breakdown.all_to_all).toEqual({ flops: 0, bytes: 131072 });
      expect(execution.features).toEqual({
        d_model: 256,
        expert_hidden: 512,
        num_experts: 16,
        top_k: 2,
        avg_experts_per_token: 2,
        batch: 2,
        seq: 64,
      });
    });

    it('divides the all-to-all payload across groups', () => {
      const layer = new MoE({ d_model: 256, top_k: 2, num_groups: 4 });
      const execution = layer.estimateExecutionTime(2, 64, hardware);
      expect(execution.breakdown.all_to_all.bytes).toBe(32768);
    });
  });

  describe('Communication', () => {
    it('defaults to a 1 MB all-to-all', () => {
      expect(parseCommunicationConfig({})).toEqual({ pattern: 'all_to_all', payloadMb: 1 });
      expect(parseCommunicationConfig({ pattern: 'ring' }).pattern).toBe('all_to_all');
    });

    it('uses interconnect time on the compute axis', () => {
      const execution = new Communication().estimateExecutionTime(2, 16, hardware);

      expect(execution.flops).toBe(0);
      expect(execution.bytesRead).toBe(1e6);
      expect(execution.bytesWritten).toBe(1e6);
      expect(execution.computeTimeMs).toBeCloseTo(0.002, 12);
      expect(execution.memoryTimeMs).toBeCloseTo(0.001, 12);
      expect(execution.dominantLatencyMs).toBe(execution.computeTimeMs);
      expect(execution.features).toEqual({ pattern: 0, payload_mb: 1, batch: 2, seq: 16 });
    });

    it('flags all-reduce in features and breakdown', () => {
      const execution = new Communication({ pattern: 'all_reduce', payload_mb: 2 })
        .estimateExecutionTime(1, 1, hardware);
      expect(execution.features.pattern).toBe(1);
      expect(execution.breakdown).toEqual({ all_reduce: { flops: 0, bytes: 2e6 } });
    });

    it('falls back to memory time without interconnect bandwidth', () => {
      const execution = new Communication().estimateExecutionTime(
        1,
        1,
        testHardware({ interconnectGbps: 0 })
      );
      expect(execution.computeTimeMs).toBe(0);
      expect(execution.dominantLatencyMs).toBe(execution.memoryTimeMs);
    });

    it('reports no analytic FLOPs', () => {
      expect(new Communication({ payload_mb: 64 }).analyticFlops(8, 1024)).toBe(0);
    });
  });

  describe('forward', () => {
    it('throws for every layer kind', () => {
      for (const layer of [new Attention(), new FFN(), new MoE(), new Communication()]) {
        expect(() => layer.forward()).toThrow(EstimatorError);
      }
    });

    it('carries the numeric-path code', () => {
      expect(thrownBy(() => new FFN().forward({}))).toMatchObject({
        code: ERROR_CODES.NUMERIC_PATH_UNSUPPORTED,
        message: 'Numeric forward is not available for ffn layers; use estimateExecutionTime()',
      });
    });
  });
});
