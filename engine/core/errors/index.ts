/**
 * Tablepaste Engine - Error Exports
 */

export { StrategyError, HtmlTableError } from './ReconstructionError.js';
export type { HtmlTableErrorReason } from './ReconstructionError.js';
