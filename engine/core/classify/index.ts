/**
 * Tablepaste Engine - Classifier Module Exports
 */

export {
  detectSplitRow,
  detectSpanningHeader,
  detectMultilineHeader,
  detectGenericWikipedia,
  detectComplexHeader,
  classify,
  selectReconstruction,
  RECONSTRUCTION_PRIORITY,
} from './StructuralClassifiers.js';
