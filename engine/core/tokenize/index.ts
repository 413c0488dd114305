/**
 * Tablepaste Engine - Tokenize Module Exports
 */

export {
  splitLines,
  countDelimiters,
  chooseFilterDelimiter,
  filterTitleLines,
  filterLines,
} from './LineFilter.js';

export { detectSeparator } from './SeparatorDetector.js';

export { splitCommaLine, splitLine, tokenizeRows } from './RowTokenizer.js';
