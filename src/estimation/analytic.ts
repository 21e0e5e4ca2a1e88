/**
 * Analytic Estimator
 *
 * Routes each layer config to its estimator module and stamps the caller's
 * naming onto the result. Stateless apart from the hardware/runtime pair it
 * was built with.
 *
 * @module estimation/analytic
 */

import type {
  HardwareSpec,
  LayerConfig,
  LayerExecution,
  RuntimeSpec,
} from '../config/schema/index.js';
import { log } from '../debug/log.js';
import { Attention } from '../modules/attention.js';
import type { AnalyticLayer } from '../modules/base.js';
import { freezeExecution } from '../modules/base.js';
import { Communication } from '../modules/communication.js';
import { FFN } from '../modules/ffn.js';
import { MoE } from '../modules/moe.js';

/** Placeholder value of the `layer_type` feature */
export const LAYER_TYPE_FEATURE_PLACEHOLDER = 0;

export type LayerModule = AnalyticLayer<unknown>;

/**
 * Build the estimator module matching a layer config variant.
 */
export function createLayerModule(config: LayerConfig): LayerModule {
  switch (config.layerType) {
    case 'ffn':
      return new FFN(config.ffnConfig);
    case 'moe':
      return new MoE(config.moeConfig);
    case 'communication':
      return new Communication(config.commConfig);
    case 'attention':
      return new Attention(config.attnConfig);
    default: {
      const exhaustive: never = config;
      return exhaustive;
    }
  }
}

export class AnalyticEstimator {
  readonly hardware: HardwareSpec;
  readonly runtime: RuntimeSpec;

  constructor(hardware: HardwareSpec, runtime: RuntimeSpec) {
    this.hardware = hardware;
    this.runtime = runtime;
  }

  /**
   * Estimate one layer. The module's own result is copied, never mutated:
   * name and type come from the config, and the default feature keys sit
   * beneath whatever the module reported.
   */
  estimateLayer(config: LayerConfig): LayerExecution {
    const { batchSize, seqLen } = this.runtime;
    const module = createLayerModule(config);
    const execution = module.estimateExecutionTime(batchSize, seqLen, this.hardware);

    log.debug(
      'Estimator',
      `${config.name} (${config.layerType}): ${execution.flops} FLOPs, ` +
        `${execution.dominantLatencyMs.toFixed(4)}ms`
    );

    return freezeExecution({
      ...execution,
      layerName: config.name,
      layerType: config.layerType,
      features: {
        layer_id: config.layerId,
        layer_type: LAYER_TYPE_FEATURE_PLACEHOLDER,
        ...execution.features,
      },
    });
  }

  /**
   * Estimate every layer, preserving input order.
   */
  estimateLayers(configs: readonly LayerConfig[]): LayerExecution[] {
    return configs.map((config) => this.estimateLayer(config));
  }
}
