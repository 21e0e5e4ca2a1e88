/**
 * Layer Config Schema
 *
 * Closed tagged union over the four layer kinds. Every variant shares a
 * header; sub-configurations stay loosely typed and are normalized by the
 * estimator module that consumes them.
 *
 * @module config/schema/layer
 */

/** Canonical layer kinds */
export const LAYER_TYPES = ['attention', 'ffn', 'moe', 'communication'] as const;

export type LayerType = (typeof LAYER_TYPES)[number];

/** Loosely-typed mapping parsed from a scenario file */
export type RawConfigMap = Readonly<Record<string, unknown>>;

export interface LayerHeaderSchema {
  readonly name: string;
  readonly layerId: number;
  readonly attnConfig: RawConfigMap;
  /** Names of fused ops applied; informational */
  readonly fusedOps: readonly string[];
}

export interface AttentionLayerConfig extends LayerHeaderSchema {
  readonly layerType: 'attention';
}

export interface FFNLayerConfig extends LayerHeaderSchema {
  readonly layerType: 'ffn';
  readonly ffnConfig: RawConfigMap;
}

export interface MoELayerConfig extends LayerHeaderSchema {
  readonly layerType: 'moe';
  readonly moeConfig: RawConfigMap;
}

export interface CommunicationLayerConfig extends LayerHeaderSchema {
  readonly layerType: 'communication';
  readonly commConfig: RawConfigMap;
}

export type LayerConfig =
  | AttentionLayerConfig
  | FFNLayerConfig
  | MoELayerConfig
  | CommunicationLayerConfig;
