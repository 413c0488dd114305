/**
 * Tablepaste Engine - Structural Classifiers
 *
 * Independent boolean detectors run over the tokenized (unpadded) rows.
 * Each one looks for the fingerprint of a known paste layout; a fixed
 * priority list then picks exactly one reconstruction strategy.
 *
 * Priority: split-row > spanning-header > multiline-header >
 *           generic-Wikipedia (complex header / row cleaning) > plain
 */

import type {
  ClassificationResult,
  RawRow,
  ReconstructionKind,
  TokenizedTable,
} from '../types/index.js';
import type { ReconstructionConfig } from '../config/ReconstructionConfig.js';
import { DEFAULT_RECONSTRUCTION_CONFIG } from '../config/ReconstructionConfig.js';
import {
  isBlank,
  nonEmptyCount,
  distinctNonEmptyCounts,
  isShortNumericToken,
  isNumericLike,
  containsFootnoteMarker,
  containsUnitToken,
  isCoordinate,
} from '../cells/CellPatterns.js';

// =============================================================================
// Helpers
// =============================================================================

function filledCells(row: RawRow): string[] {
  return row.filter(cell => !isBlank(cell));
}

function anyCell(rows: RawRow[], predicate: (cell: string) => boolean): boolean {
  return rows.some(row => row.some(predicate));
}

/**
 * Row of short cells carrying a unit, e.g. `mi2 | km2 | / mi2 | / km2`.
 */
function isShortUnitRow(row: RawRow, config: ReconstructionConfig): boolean {
  const filled = filledCells(row);
  if (filled.length === 0) return false;
  const { unitRowMaxCellLength } = config.thresholds;
  return (
    filled.every(cell => cell.length <= unitRowMaxCellLength) &&
    filled.some(cell => containsUnitToken(cell, config.vocabulary.unitTokens))
  );
}

// =============================================================================
// Detectors
// =============================================================================

/**
 * Rank numbers alone on a line, the rest of the record on the next.
 * Needs enough rank-only rows and enough near-full rows, in similar numbers.
 */
export function detectSplitRow(
  table: TokenizedTable,
  config: ReconstructionConfig = DEFAULT_RECONSTRUCTION_CONFIG
): boolean {
  const t = config.thresholds;
  if (table.maxCols < t.splitRowMinMergeCells) return false;

  let rankRows = 0;
  let fullRows = 0;

  for (const row of table.rows.slice(1)) {
    const filled = filledCells(row);
    if (filled.length === 1 && isShortNumericToken(filled[0])) {
      rankRows++;
    } else if (filled.length >= table.maxCols - t.splitRowFullSlack) {
      fullRows++;
    }
  }

  return (
    rankRows >= t.splitRowMinRows &&
    fullRows >= t.splitRowMinRows &&
    Math.abs(rankRows - fullRows) <= t.splitRowMaxCountDiff
  );
}

/**
 * A wide main header followed by a short row of text sub-labels.
 */
export function detectSpanningHeader(
  table: TokenizedTable,
  config: ReconstructionConfig = DEFAULT_RECONSTRUCTION_CONFIG
): boolean {
  const t = config.thresholds;
  if (table.rows.length < 2) return false;

  const mainCount = nonEmptyCount(table.rows[0]);
  if (mainCount < t.spanningMinHeaderCells) return false;

  const sub = filledCells(table.rows[1]);
  if (sub.length < 2 || sub.length > Math.floor(mainCount / 2)) return false;

  return sub.every(cell => cell.length <= t.spanningMaxSubHeaderLength && !isNumericLike(cell));
}

/**
 * Header text wrapped over several lines: ragged early rows, a unit token
 * somewhere in them, and a row a few lines down that opens with a rank.
 */
export function detectMultilineHeader(
  table: TokenizedTable,
  config: ReconstructionConfig = DEFAULT_RECONSTRUCTION_CONFIG
): boolean {
  const t = config.thresholds;
  const { rows } = table;

  if (distinctNonEmptyCounts(rows, t.sampleRows).size <= 1) return false;

  const sample = rows.slice(0, t.sampleRows);
  if (!anyCell(sample, cell => containsUnitToken(cell, config.vocabulary.unitTokens))) {
    return false;
  }

  const last = Math.min(t.multilineDataStartMax, rows.length - 1);
  for (let i = t.multilineDataStartMin; i <= last; i++) {
    if (isShortNumericToken(rows[i][0] ?? '')) return true;
  }
  return false;
}

/**
 * Footnote markers, ragged early rows, or unit/coordinate tokens.
 */
export function detectGenericWikipedia(
  table: TokenizedTable,
  config: ReconstructionConfig = DEFAULT_RECONSTRUCTION_CONFIG
): boolean {
  const t = config.thresholds;
  const { rows } = table;

  if (anyCell(rows.slice(0, t.footnoteSampleRows), containsFootnoteMarker)) return true;
  if (distinctNonEmptyCounts(rows, t.sampleRows).size > 1) return true;

  return anyCell(
    rows.slice(0, t.sampleRows),
    cell => containsUnitToken(cell, config.vocabulary.unitTokens) || isCoordinate(cell)
  );
}

/**
 * Secondary check for Wikipedia-style pastes: is the header worth rebuilding?
 */
export function detectComplexHeader(
  table: TokenizedTable,
  config: ReconstructionConfig = DEFAULT_RECONSTRUCTION_CONFIG
): boolean {
  const t = config.thresholds;
  const sample = table.rows.slice(0, t.sampleRows);

  if (distinctNonEmptyCounts(sample, t.sampleRows).size < t.complexMinDistinctCounts) {
    return false;
  }

  return anyCell(sample, isCoordinate) || sample.some(row => isShortUnitRow(row, config));
}

// =============================================================================
// Classification
// =============================================================================

/**
 * Run every detector once. The complex-header check only matters when the
 * generic Wikipedia detector is the winner, so it only runs then.
 */
export function classify(
  table: TokenizedTable,
  config: ReconstructionConfig = DEFAULT_RECONSTRUCTION_CONFIG
): ClassificationResult {
  const splitRow = detectSplitRow(table, config);
  const spanningHeader = detectSpanningHeader(table, config);
  const multilineHeader = detectMultilineHeader(table, config);
  const genericWikipedia = detectGenericWikipedia(table, config);

  const complexHeader =
    genericWikipedia && !splitRow && !spanningHeader && !multilineHeader
      ? detectComplexHeader(table, config)
      : false;

  return { splitRow, spanningHeader, multilineHeader, genericWikipedia, complexHeader };
}

/** Fixed priority: the first matching entry wins. */
export const RECONSTRUCTION_PRIORITY: ReadonlyArray<
  readonly [ReconstructionKind, (result: ClassificationResult) => boolean]
> = [
  ['splitRow', r => r.splitRow],
  ['spanningHeader', r => r.spanningHeader],
  ['multilineHeader', r => r.multilineHeader],
  ['wikipediaHeader', r => r.genericWikipedia && r.complexHeader],
  ['wikipediaRows', r => r.genericWikipedia],
];

export function selectReconstruction(result: ClassificationResult): ReconstructionKind {
  for (const [kind, matches] of RECONSTRUCTION_PRIORITY) {
    if (matches(result)) return kind;
  }
  return 'plain';
}
