/**
 * Tablepaste Engine - Split-Row Merger
 *
 * Some sources render each record as two physical lines: the rank alone,
 * then everything else. This folds each pair back into one row.
 *
 *   Rank | City     | Province | ...        Rank | City    | Province | ...
 *   1                                  ->   1    | Toronto | Ontario  | ...
 *   Toronto | Ontario | ...                 2    | Ottawa  | Ontario  | ...
 *   2
 *   Ottawa  | Ontario | ...
 */

import type { RawRow, StrategyResult, TokenizedTable } from '../types/index.js';
import type { ReconstructionConfig } from '../config/ReconstructionConfig.js';
import { DEFAULT_RECONSTRUCTION_CONFIG } from '../config/ReconstructionConfig.js';
import { isBlank, isShortNumericToken, nonEmptyCount } from '../cells/CellPatterns.js';
import { cleanRow, fitRow } from '../cells/RowCleaner.js';

/**
 * The rank value when the row holds exactly one non-empty cell and it is a
 * short number; otherwise null.
 */
export function pendingRank(row: RawRow): string | null {
  const filled = row.filter(cell => !isBlank(cell));
  if (filled.length !== 1) return null;
  return isShortNumericToken(filled[0]) ? filled[0].trim() : null;
}

export function mergeSplitRows(
  table: TokenizedTable,
  config: ReconstructionConfig = DEFAULT_RECONSTRUCTION_CONFIG
): StrategyResult {
  const { rows, maxCols } = table;
  const notes = config.vocabulary.editorialNotes;
  const merged: RawRow[] = [];

  if (rows.length === 0) {
    return { rows: merged, hasHeaders: null };
  }

  merged.push(fitRow(cleanRow(rows[0], 'header', notes), maxCols));

  let i = 1;
  while (i < rows.length) {
    const rank = pendingRank(rows[i]);
    const next = i + 1 < rows.length ? rows[i + 1] : null;

    if (rank !== null && next !== null && nonEmptyCount(next) >= config.thresholds.splitRowMinMergeCells) {
      merged.push(fitRow(cleanRow([rank, ...next], 'data', notes), maxCols));
      i += 2;
    } else {
      merged.push(fitRow(cleanRow(rows[i], 'data', notes), maxCols));
      i += 1;
    }
  }

  return { rows: merged, hasHeaders: null };
}
