/**
 * Tablepaste Engine - Multiline-Header Merger
 *
 * A header whose cells wrapped over several physical lines:
 *
 *   Rank | Animal | Average mass
 *   [tonnes] | Maximum mass
 *   [tonnes] | Average total length
 *   [m (ft)]
 *   1 | Blue whale | 110 | 190 | 24 (79)
 *
 * Each wrapped line's first cell is the tail of the previous line's last
 * cell, so the block is stitched back together before anything else is
 * tried. A column-wise merge covers blocks whose stitched width doesn't
 * line up with the data.
 */

import type { RawRow, StrategyResult, TokenizedTable } from '../types/index.js';
import type { ReconstructionConfig } from '../config/ReconstructionConfig.js';
import { DEFAULT_RECONSTRUCTION_CONFIG } from '../config/ReconstructionConfig.js';
import { containsBracket, isBlank, isNumericLike, nonEmptyCount } from '../cells/CellPatterns.js';
import { cleanRow, padRow } from '../cells/RowCleaner.js';

/**
 * First row (after row 0) that opens with a number and is mostly filled.
 */
export function findDataStart(
  table: TokenizedTable,
  config: ReconstructionConfig = DEFAULT_RECONSTRUCTION_CONFIG
): number {
  const t = config.thresholds;
  const { rows, maxCols } = table;

  for (let i = 1; i < rows.length; i++) {
    const row = rows[i];
    if (isNumericLike(row[0] ?? '') && nonEmptyCount(row) >= t.multilineDataFillRatio * maxCols) {
      return i;
    }
  }

  return Math.min(Math.max(t.multilineDataStartMin, Math.floor(rows.length / 2)), rows.length);
}

/**
 * Rejoin header cells split by embedded newlines.
 */
export function stitchHeaderLines(block: RawRow[]): RawRow {
  const stitched: RawRow = [];

  for (const row of block) {
    if (stitched.length === 0) {
      stitched.push(...row);
      continue;
    }

    const [head, ...rest] = row;
    const last = stitched.length - 1;
    if (head !== undefined && !isBlank(head)) {
      stitched[last] = isBlank(stitched[last]) ? head : `${stitched[last]} ${head}`;
    }
    stitched.push(...rest);
  }

  return stitched;
}

/**
 * Merge the header block column by column.
 *
 * A short row-0 label takes the first short bracketed unit found below it.
 * An empty row-0 label is replaced by the first non-empty cell below.
 */
export function mergeHeaderColumns(
  block: RawRow[],
  maxCols: number,
  config: ReconstructionConfig = DEFAULT_RECONSTRUCTION_CONFIG
): RawRow {
  const t = config.thresholds;
  const [first = [], ...below] = block;
  const header: RawRow = [];

  for (let col = 0; col < maxCols; col++) {
    const base = (first[col] ?? '').trim();
    const candidates = below.map(row => (row[col] ?? '').trim()).filter(cell => cell !== '');

    if (base === '') {
      header.push(candidates[0] ?? '');
      continue;
    }

    const unit = base.length <= t.multilineShortHeaderLength
      ? candidates.find(cell => cell.length <= t.multilineUnitTokenLength && containsBracket(cell))
      : undefined;
    header.push(unit === undefined ? base : `${base} ${unit}`);
  }

  return header;
}

export function mergeMultilineHeader(
  table: TokenizedTable,
  config: ReconstructionConfig = DEFAULT_RECONSTRUCTION_CONFIG
): StrategyResult {
  const notes = config.vocabulary.editorialNotes;
  const dataStart = findDataStart(table, config);
  const block = table.rows.slice(0, dataStart);

  const stitched = stitchHeaderLines(block);
  const rawHeader = stitched.length === table.maxCols
    ? stitched
    : mergeHeaderColumns(block, table.maxCols, config);
  const header = cleanRow(rawHeader, 'header', notes);

  const data = table.rows
    .slice(dataStart)
    .map(row => cleanRow(row, 'data', notes))
    .filter(row => nonEmptyCount(row) > 0);

  const width = Math.max(header.length, table.maxCols);
  return {
    rows: [header, ...data].map(row => padRow(row, width)),
    hasHeaders: true,
  };
}
