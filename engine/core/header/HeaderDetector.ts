/**
 * Tablepaste Engine - Header Detector
 *
 * Decides, after reconstruction, whether row 0 is a header or just the
 * first data row. Only runs when the strategy left the question open.
 */

import type { RawRow } from '../types/index.js';
import type { ReconstructionConfig } from '../config/ReconstructionConfig.js';
import { DEFAULT_RECONSTRUCTION_CONFIG } from '../config/ReconstructionConfig.js';
import { isBlank, isNumericCell } from '../cells/CellPatterns.js';

export interface HeaderDetectionOptions {
  /** Allow the extra row 0 / row 1 numeric comparison (plain fallback only) */
  compareWithNextRow?: boolean;
  config?: ReconstructionConfig;
}

/**
 * Cells containing one of the header words (case-insensitive substring).
 */
export function countHeaderWordCells(row: RawRow, headerWords: readonly string[]): number {
  const words = headerWords.map(word => word.toLowerCase());
  return row.filter(cell => {
    const lower = cell.toLowerCase();
    return words.some(word => lower.includes(word));
  }).length;
}

/**
 * Rules 1 and 2: header vocabulary, then text-vs-number balance.
 */
export function looksLikeHeaderRow(
  row: RawRow,
  config: ReconstructionConfig = DEFAULT_RECONSTRUCTION_CONFIG
): boolean {
  const t = config.thresholds;

  if (countHeaderWordCells(row, config.vocabulary.headerWords) >= t.headerMinWordMatches) {
    return true;
  }

  const filled = row.filter(cell => !isBlank(cell));
  const numericCells = filled.filter(isNumericCell).length;
  const textCells = filled.length - numericCells;

  return (
    filled.length > 0 &&
    textCells > numericCells &&
    textCells >= t.headerTextRatio * filled.length
  );
}

/**
 * Row 0 is a header when it is less numeric than row 1 and less than
 * half numeric overall.
 */
export function isLessNumericThanNext(
  first: RawRow,
  second: RawRow,
  config: ReconstructionConfig = DEFAULT_RECONSTRUCTION_CONFIG
): boolean {
  if (first.length === 0 || second.length === 0) return false;

  const firstNumeric = first.filter(isNumericCell).length;
  const secondNumeric = second.filter(isNumericCell).length;

  return (
    firstNumeric / first.length < secondNumeric / second.length &&
    firstNumeric < config.thresholds.headerPlainNumericRatio * first.length
  );
}

/**
 * Is the first row of the final table a header?
 */
export function detectHeader(rows: RawRow[], options: HeaderDetectionOptions = {}): boolean {
  const config = options.config ?? DEFAULT_RECONSTRUCTION_CONFIG;
  if (rows.length === 0) return false;

  if (looksLikeHeaderRow(rows[0], config)) return true;

  if (options.compareWithNextRow && rows.length > 1) {
    return isLessNumericThanNext(rows[0], rows[1], config);
  }
  return false;
}
