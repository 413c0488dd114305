/**
 * Tablepaste Engine - Wikipedia Header Builder
 *
 * Two strategies for pastes with Wikipedia fingerprints (footnotes, units,
 * coordinates, ragged leading rows):
 * - buildWikipediaHeader: the leading rows are too irregular to trust, so
 *   the most text-heavy early row becomes a sanitized header and the data
 *   block is located separately.
 * - cleanWikipediaRows: the layout is fine, only footnotes need stripping.
 */

import type { RawRow, StrategyResult, TokenizedTable } from '../types/index.js';
import type { ReconstructionConfig } from '../config/ReconstructionConfig.js';
import { DEFAULT_RECONSTRUCTION_CONFIG } from '../config/ReconstructionConfig.js';
import { isBlank, isNumericLike, nonEmptyCount } from '../cells/CellPatterns.js';
import { cleanCell, cleanRow, padRow } from '../cells/RowCleaner.js';

const UNSAFE_HEADER_CHARS = /[^\p{L}\p{N}_\s()-]/gu;

// =============================================================================
// Header
// =============================================================================

function textCellCount(row: RawRow): number {
  return row.filter(cell => !isBlank(cell) && !isNumericLike(cell)).length;
}

/**
 * Index of the early row with the most non-numeric cells. Ties go to the
 * earlier row.
 */
export function chooseHeaderRow(
  rows: RawRow[],
  config: ReconstructionConfig = DEFAULT_RECONSTRUCTION_CONFIG
): number {
  let best = 0;
  let bestCount = -1;

  rows.slice(0, config.thresholds.wikipediaHeaderSearchRows).forEach((row, index) => {
    const count = textCellCount(row);
    if (count > bestCount) {
      best = index;
      bestCount = count;
    }
  });

  return best;
}

/**
 * Strip footnotes and replace characters that don't belong in a column
 * name with `_`. Blank names become `Column_{n}`.
 */
export function sanitizeHeaderCell(
  cell: string,
  index: number,
  editorialNotes: readonly string[] = DEFAULT_RECONSTRUCTION_CONFIG.vocabulary.editorialNotes
): string {
  const name = cleanCell(cell, 'data', editorialNotes).replace(UNSAFE_HEADER_CHARS, '_').trim();
  return name === '' ? `Column_${index + 1}` : name;
}

/**
 * First data row at or after `from`: mostly filled and opening with a
 * number, a long first cell, or a substantial first three cells.
 */
export function findWikipediaDataStart(
  rows: RawRow[],
  maxCols: number,
  from: number,
  config: ReconstructionConfig = DEFAULT_RECONSTRUCTION_CONFIG
): number {
  const t = config.thresholds;

  for (let i = from; i < rows.length; i++) {
    const row = rows[i];
    if (nonEmptyCount(row) < t.wikipediaDataFillRatio * maxCols) continue;

    const first = (row[0] ?? '').trim();
    const prefixLength = row.slice(0, 3).reduce((sum, cell) => sum + cell.trim().length, 0);

    if (
      isNumericLike(first) ||
      first.length > t.wikipediaLeadingCellLength ||
      prefixLength >= t.wikipediaSubstantialPrefixLength
    ) {
      return i;
    }
  }

  return rows.length > 2 ? Math.max(2, from) : Math.min(1, rows.length);
}

export function buildWikipediaHeader(
  table: TokenizedTable,
  config: ReconstructionConfig = DEFAULT_RECONSTRUCTION_CONFIG
): StrategyResult {
  const { rows, maxCols } = table;
  const notes = config.vocabulary.editorialNotes;

  const source = chooseHeaderRow(rows, config);
  const sourceRow = rows[source] ?? [];
  const header: RawRow = [];
  for (let i = 0; i < maxCols; i++) {
    header.push(sanitizeHeaderCell(sourceRow[i] ?? '', i, notes));
  }

  const dataStart = findWikipediaDataStart(rows, maxCols, Math.max(2, source + 1), config);
  const data = rows
    .slice(dataStart)
    .map(row => cleanRow(row, 'data', notes))
    .filter(row => nonEmptyCount(row) > 0)
    .map(row => padRow(row, maxCols));

  return { rows: [header, ...data], hasHeaders: true };
}

// =============================================================================
// Row cleaning
// =============================================================================

export function cleanWikipediaRows(
  table: TokenizedTable,
  config: ReconstructionConfig = DEFAULT_RECONSTRUCTION_CONFIG
): StrategyResult {
  const notes = config.vocabulary.editorialNotes;
  const rows = table.rows.map((row, index) =>
    padRow(cleanRow(row, index === 0 ? 'header' : 'data', notes), table.maxCols)
  );
  return { rows, hasHeaders: null };
}
