/**
 * Tablepaste Engine - Header Module Exports
 */

export {
  countHeaderWordCells,
  looksLikeHeaderRow,
  isLessNumericThanNext,
  detectHeader,
} from './HeaderDetector.js';
export type { HeaderDetectionOptions } from './HeaderDetector.js';
