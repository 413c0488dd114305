/**
 * Tablepaste Engine - Row Cleaner
 *
 * Per-cell cleanup applied by the reconstruction strategies:
 * - footnote markers removed (which ones depends on the FootnoteScope)
 * - bracketed editorial notes removed (`[citation needed]`)
 * - U+2212 minus sign normalized to ASCII hyphen
 * - surrounding whitespace stripped
 */

import type { FootnoteScope, RawRow } from '../types/index.js';
import { DEFAULT_VOCABULARY } from '../config/ReconstructionConfig.js';
import { escapeRegExp } from './CellPatterns.js';

const SCOPE_PATTERNS: Record<FootnoteScope, RegExp> = {
  letter: /\[[a-z]\]/g,
  header: /\[(?:\d+|[a-z])\]/g,
  data: /\[[a-zA-Z0-9]+\]/g,
};

const UNICODE_MINUS = /−/g;

function editorialPattern(notes: readonly string[]): RegExp | null {
  if (notes.length === 0) return null;
  return new RegExp(`\\[(?:${notes.map(escapeRegExp).join('|')})\\]`, 'gi');
}

/**
 * Clean a single cell.
 */
export function cleanCell(
  cell: string,
  scope: FootnoteScope,
  editorialNotes: readonly string[] = DEFAULT_VOCABULARY.editorialNotes
): string {
  let text = cell.replace(SCOPE_PATTERNS[scope], '');
  const notes = editorialPattern(editorialNotes);
  if (notes) text = text.replace(notes, '');
  return text.replace(UNICODE_MINUS, '-').trim();
}

/**
 * Clean every cell of a row, returning a new row.
 */
export function cleanRow(
  row: RawRow,
  scope: FootnoteScope,
  editorialNotes: readonly string[] = DEFAULT_VOCABULARY.editorialNotes
): RawRow {
  return row.map(cell => cleanCell(cell, scope, editorialNotes));
}

// =============================================================================
// Width helpers
// =============================================================================

/**
 * Pad with trailing empty strings up to `width`. Longer rows are kept whole.
 */
export function padRow(row: RawRow, width: number): RawRow {
  if (row.length >= width) return [...row];
  return [...row, ...new Array<string>(width - row.length).fill('')];
}

/**
 * Pad or truncate to exactly `width` cells.
 */
export function fitRow(row: RawRow, width: number): RawRow {
  return padRow(row, width).slice(0, width);
}

/**
 * Widest row length, or 0 for no rows.
 */
export function widestRow(rows: RawRow[]): number {
  return rows.reduce((max, row) => Math.max(max, row.length), 0);
}
