/**
 * Layer Estimator Modules
 *
 * @module modules
 */

export { AnalyticLayer, type RooflineInput } from './base.js';
export { Attention, type AttentionConfig, parseAttentionConfig } from './attention.js';
export { FFN, type FFNConfig, parseFFNConfig } from './ffn.js';
export { MoE, type MoEConfig, parseMoEConfig } from './moe.js';
export {
  Communication,
  type CommunicationConfig,
  type CommunicationPattern,
  parseCommunicationConfig,
} from './communication.js';
