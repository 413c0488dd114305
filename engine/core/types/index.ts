/**
 * Tablepaste Engine - Core Type Definitions
 * Request-scoped values produced while rebuilding a pasted table
 */

// ============================================================================
// Rows & Separators
// ============================================================================

/** One physical line split into raw cell strings (may be ragged). */
export type RawRow = string[];

/** Delimiter used for every row of a paste. `null` means single-column. */
export type Separator = '\t' | ',' | null;

/**
 * Outcome of separator detection.
 * `not-tabular` is reserved for a single line with no delimiter at all.
 */
export type SeparatorDetection =
  | { kind: 'delimited'; separator: '\t' | ',' }
  | { kind: 'single-column'; separator: null }
  | { kind: 'not-tabular' };

/** Tokenizer output: unpadded rows plus the widest row seen. */
export interface TokenizedTable {
  rows: RawRow[];
  maxCols: number;
}

// ============================================================================
// Classification
// ============================================================================

/**
 * Independent structural signals computed once per paste.
 * Several may be true at once; priority picks the strategy.
 */
export interface ClassificationResult {
  /** Rank numbers on their own line, data on the next */
  splitRow: boolean;
  /** A main header row followed by a narrower sub-header row */
  spanningHeader: boolean;
  /** Header text wrapped over several physical lines */
  multilineHeader: boolean;
  /** Footnotes, units, coordinates or ragged early rows */
  genericWikipedia: boolean;
  /** Irregular early rows plus coordinates or unit rows */
  complexHeader: boolean;
}

export type ReconstructionKind =
  | 'splitRow'
  | 'spanningHeader'
  | 'multilineHeader'
  | 'wikipediaHeader'
  | 'wikipediaRows'
  | 'plain';

/**
 * What a strategy hands back to the orchestrator.
 * `hasHeaders: null` defers the decision to the header detector.
 */
export interface StrategyResult {
  rows: RawRow[];
  hasHeaders: boolean | null;
}

// ============================================================================
// Output
// ============================================================================

/**
 * Normalized rectangular table.
 * Every row has exactly `numCols` cells and `numRows === rows.length`.
 */
export interface ParsedTable {
  rows: RawRow[];
  hasHeaders: boolean;
  separator: Separator;
  numRows: number;
  numCols: number;
  isWikipediaStyle: boolean;
  /** Strategy that produced the rows */
  kind: ReconstructionKind;
}

/** Column names plus data records, ready for a dataframe loader. */
export interface TableData {
  columns: string[];
  records: RawRow[];
}

// ============================================================================
// Cleaning
// ============================================================================

/**
 * Which bracketed annotations count as footnotes.
 * - letter: `[a]` only
 * - header: `[12]` or `[a]`; unit brackets like `[tonnes]` survive
 * - data:   any `[alnum]` marker
 */
export type FootnoteScope = 'letter' | 'header' | 'data';
