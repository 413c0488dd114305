/**
 * Tablepaste Engine - Cell Module Exports
 */

export {
  isBlank,
  nonEmptyCount,
  distinctNonEmptyCounts,
  isShortNumericToken,
  isNumericLike,
  isNumericCell,
  containsFootnoteMarker,
  containsUnitToken,
  isCoordinate,
  containsBracket,
  isDateLike,
  escapeRegExp,
} from './CellPatterns.js';

export { cleanCell, cleanRow, padRow, fitRow, widestRow } from './RowCleaner.js';
