/**
 * Tablepaste Engine - Config Module Exports
 */

export {
  DEFAULT_THRESHOLDS,
  DEFAULT_VOCABULARY,
  DEFAULT_RECONSTRUCTION_CONFIG,
  resolveConfig,
} from './ReconstructionConfig.js';

export type {
  ReconstructionThresholds,
  ReconstructionVocabulary,
  ReconstructionConfig,
  ReconstructionConfigOverrides,
} from './ReconstructionConfig.js';
