/**
 * Tablepaste Engine - Cell Patterns
 *
 * Small predicates over single cell strings. Everything structural
 * (classifiers, strategies, header detection) is built from these.
 */

import type { RawRow } from '../types/index.js';

/** Any bracketed alphanumeric marker: `[a]`, `[12]`, `[tonnes]` */
const FOOTNOTE_MARKER = /\[[a-zA-Z0-9]+\]/;
const FOOTNOTE_MARKERS = /\[[a-zA-Z0-9]+\]/g;

/** Rank-like token: `7`, `12`, `3.25` */
const SHORT_NUMERIC_TOKEN = /^\d{1,4}(?:\.\d{1,3})?$/;

/** Degree value next to a compass letter: `40.66°N` */
const COORDINATE = /\d+(?:\.\d+)?°\s*[NSEW]/;

const BRACKET = /[[\]()]/;
const DIGIT = /\d/;

// =============================================================================
// Emptiness
// =============================================================================

export function isBlank(cell: string | undefined): boolean {
  return cell === undefined || cell.trim() === '';
}

/**
 * Number of cells that are not blank.
 */
export function nonEmptyCount(row: RawRow): number {
  let count = 0;
  for (const cell of row) {
    if (!isBlank(cell)) count++;
  }
  return count;
}

/**
 * Distinct non-empty counts over the first `limit` rows.
 */
export function distinctNonEmptyCounts(rows: RawRow[], limit: number): Set<number> {
  return new Set(rows.slice(0, limit).map(nonEmptyCount));
}

// =============================================================================
// Numbers
// =============================================================================

/**
 * Short bare number such as a rank (`3`, `10`, `2.5`).
 */
export function isShortNumericToken(cell: string): boolean {
  return SHORT_NUMERIC_TOKEN.test(cell.trim());
}

/**
 * Number-shaped once footnotes, separators, signs and percent are removed
 * (`2,794,356`, `+2.3%`, `−0.51%`, `110[16]`).
 */
export function isNumericLike(cell: string): boolean {
  const stripped = cell
    .replace(FOOTNOTE_MARKERS, '')
    .replace(/[,.%+\-−\s]/g, '');
  return /^\d+$/.test(stripped);
}

/**
 * Parses as an int/float once `.`, `,` and `-` are stripped.
 * Used by header detection, which is deliberately stricter than isNumericLike.
 */
export function isNumericCell(cell: string): boolean {
  const stripped = cell.trim().replace(/[.,-]/g, '');
  return /^\d+$/.test(stripped);
}

// =============================================================================
// Annotations
// =============================================================================

export function containsFootnoteMarker(cell: string): boolean {
  return FOOTNOTE_MARKER.test(cell);
}

export function containsUnitToken(cell: string, unitTokens: readonly string[]): boolean {
  const lower = cell.toLowerCase();
  return unitTokens.some(token => lower.includes(token.toLowerCase()));
}

export function isCoordinate(cell: string): boolean {
  return COORDINATE.test(cell);
}

export function containsBracket(cell: string): boolean {
  return BRACKET.test(cell);
}

/**
 * Date-ish cell: mentions a month or carries any digit.
 */
export function isDateLike(cell: string, monthNames: readonly string[]): boolean {
  if (DIGIT.test(cell)) return true;
  if (monthNames.length === 0) return false;
  const pattern = new RegExp(`\\b(?:${monthNames.map(escapeRegExp).join('|')})\\b`, 'i');
  return pattern.test(cell);
}

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
