/**
 * Tablepaste Engine - Spanning-Header Merger
 *
 * Handles a main header row whose role-like cell ("Writer(s)") covers
 * several sub-columns listed on the next line ("Story", "Screenplay").
 *
 * The header cell is expanded into one column per sub-label. Because the
 * source cells often contained line breaks, the data lines below no longer
 * map one-to-one onto records; they are stitched back into logical records
 * before being emitted.
 */

import type { RawRow, StrategyResult, TokenizedTable } from '../types/index.js';
import type { ReconstructionConfig } from '../config/ReconstructionConfig.js';
import { DEFAULT_RECONSTRUCTION_CONFIG } from '../config/ReconstructionConfig.js';
import { isBlank, isDateLike, nonEmptyCount } from '../cells/CellPatterns.js';
import { cleanRow, padRow } from '../cells/RowCleaner.js';

// =============================================================================
// Header
// =============================================================================

/**
 * Sub-header labels with leading and trailing blank cells dropped.
 */
export function subHeaderLabels(row: RawRow): string[] {
  let start = 0;
  let end = row.length;
  while (start < end && isBlank(row[start])) start++;
  while (end > start && isBlank(row[end - 1])) end--;
  return row.slice(start, end);
}

/**
 * Index of the first header cell naming a spanning role, or -1.
 */
export function findSpanningColumn(header: RawRow, roles: readonly string[]): number {
  const lowered = roles.map(role => role.toLowerCase());
  return header.findIndex(cell => {
    const lower = cell.toLowerCase();
    return lowered.some(role => lower.includes(role));
  });
}

/**
 * Expand the main header with the sub-header labels.
 *
 * With a role-like column, that one cell becomes `"{main} - {sub}"` per
 * label (`"{main}_{n}"` for blank labels). Without one, the labels are
 * inserted at the configured fallback position.
 */
export function buildSpanningHeader(
  main: RawRow,
  sub: string[],
  config: ReconstructionConfig = DEFAULT_RECONSTRUCTION_CONFIG
): RawRow {
  const column = findSpanningColumn(main, config.vocabulary.spanningRoles);

  if (column === -1) {
    const insertAt = Math.min(config.thresholds.spanningFallbackInsertIndex, main.length);
    return [...main.slice(0, insertAt), ...sub, ...main.slice(insertAt)];
  }

  const parent = main[column];
  const expanded = sub.map((label, n) =>
    isBlank(label) ? `${parent}_${n + 1}` : `${parent} - ${label}`
  );
  return [...main.slice(0, column), ...expanded, ...main.slice(column + 1)];
}

// =============================================================================
// Records
// =============================================================================

/**
 * Write into a record slot, appending with "; " when it is already filled.
 * Slots past the end collapse into the last column.
 */
function writeSlot(record: RawRow, index: number, value: string): void {
  if (value === '' || record.length === 0) return;
  const slot = Math.min(index, record.length - 1);
  record[slot] = record[slot] === '' ? value : `${record[slot]}; ${value}`;
}

/**
 * Does this physical line open a new logical record?
 */
export function startsRecord(
  cells: RawRow,
  mainHeaderWidth: number,
  config: ReconstructionConfig = DEFAULT_RECONSTRUCTION_CONFIG
): boolean {
  const filled = nonEmptyCount(cells);
  if (filled >= config.thresholds.spanningMinRecordCells &&
      isDateLike(cells[1] ?? '', config.vocabulary.monthNames)) {
    return true;
  }
  return filled >= mainHeaderWidth - 1;
}

/**
 * Rebuild logical records from the physical data lines.
 *
 * A continuation line's first cell continues whichever slot the record
 * last wrote; its later cells fill the slots after that.
 */
export function reconstructRecords(
  lines: RawRow[],
  width: number,
  mainHeaderWidth: number,
  config: ReconstructionConfig = DEFAULT_RECONSTRUCTION_CONFIG
): RawRow[] {
  const records: RawRow[] = [];
  let current: RawRow | null = null;
  let cursor = 0;

  for (const cells of lines) {
    if (current === null || startsRecord(cells, mainHeaderWidth, config)) {
      const record = new Array<string>(width).fill('');
      cells.forEach((cell, col) => writeSlot(record, col, cell));
      records.push(record);
      current = record;
      cursor = Math.min(Math.max(cells.length - 1, 0), width - 1);
      continue;
    }

    const record = current;
    const start = cursor;
    cells.forEach((cell, offset) => writeSlot(record, start + offset, cell));
    cursor = Math.min(start + Math.max(cells.length - 1, 0), width - 1);
  }

  return records;
}

// =============================================================================
// Strategy
// =============================================================================

export function mergeSpanningHeader(
  table: TokenizedTable,
  config: ReconstructionConfig = DEFAULT_RECONSTRUCTION_CONFIG
): StrategyResult {
  const { rows } = table;
  if (rows.length < 2) {
    throw new Error('Spanning header needs a main header row and a sub-header row');
  }

  const notes = config.vocabulary.editorialNotes;
  const main = cleanRow(rows[0], 'header', notes);
  const sub = subHeaderLabels(cleanRow(rows[1], 'header', notes));
  const header = buildSpanningHeader(main, sub, config);

  const lines = rows.slice(2).map(row => cleanRow(row, 'data', notes));
  const records = reconstructRecords(lines, header.length, rows[0].length, config);

  return {
    rows: [header, ...records.map(record => padRow(record, header.length))],
    hasHeaders: true,
  };
}
