/**
 * Tablepaste Engine - Reconstruction Configuration
 *
 * Every heuristic threshold and vocabulary the classifiers and strategies
 * read. Values are tuned against real pasted tables; treat them as knobs,
 * not as architecture.
 */

// =============================================================================
// Types
// =============================================================================

export interface ReconstructionThresholds {
  /** Lines after a delimiter-free line checked for delimiters (title filter) */
  titleLookahead: number;

  // --- split-row ---
  /** Minimum rank-only rows and full rows */
  splitRowMinRows: number;
  /** Allowed difference between rank-row and full-row counts */
  splitRowMaxCountDiff: number;
  /** Full rows have at least maxCols minus this many non-empty cells */
  splitRowFullSlack: number;
  /** Non-empty cells the row after a rank needs before merging */
  splitRowMinMergeCells: number;

  // --- spanning header ---
  /** Non-empty cells required in the main header row */
  spanningMinHeaderCells: number;
  /** Longest sub-header label accepted */
  spanningMaxSubHeaderLength: number;
  /** Where sub-headers go when no role-like header is found */
  spanningFallbackInsertIndex: number;
  /** Non-empty cells a line needs to open a new record */
  spanningMinRecordCells: number;

  // --- multiline header ---
  /** Leading rows sampled by the multiline and Wikipedia detectors */
  sampleRows: number;
  /** First row index where data may start in a multiline header */
  multilineDataStartMin: number;
  /** Last row index where data may start in a multiline header */
  multilineDataStartMax: number;
  /** Fill ratio of maxCols for the first multiline data row */
  multilineDataFillRatio: number;
  /** Header cells up to this length may take a unit suffix */
  multilineShortHeaderLength: number;
  /** Unit suffixes up to this length are appended */
  multilineUnitTokenLength: number;

  // --- generic Wikipedia ---
  /** Leading rows searched for footnote markers */
  footnoteSampleRows: number;
  /** Leading rows considered as header source */
  wikipediaHeaderSearchRows: number;
  /** Fill ratio of maxCols for the first Wikipedia data row */
  wikipediaDataFillRatio: number;
  /** First cell longer than this marks a data row */
  wikipediaLeadingCellLength: number;
  /** Combined length of the first three cells that counts as substantial */
  wikipediaSubstantialPrefixLength: number;
  /** Distinct early non-empty counts that make a header complex */
  complexMinDistinctCounts: number;
  /** Longest cell in a short unit-like row */
  unitRowMaxCellLength: number;

  // --- header detection ---
  /** Header-word matches that settle the question */
  headerMinWordMatches: number;
  /** Text share of non-empty cells required for a header */
  headerTextRatio: number;
  /** Numeric share of the row width a plain header must stay below */
  headerPlainNumericRatio: number;
}

export interface ReconstructionVocabulary {
  /** Substrings typical of column headers */
  headerWords: readonly string[];
  /** Substrings that mark units of measure */
  unitTokens: readonly string[];
  /** Header roles that usually hide sub-columns */
  spanningRoles: readonly string[];
  /** Month names and abbreviations for date-like cells */
  monthNames: readonly string[];
  /** Bracketed editorial notes removed along with footnotes */
  editorialNotes: readonly string[];
}

export interface ReconstructionConfig {
  thresholds: ReconstructionThresholds;
  vocabulary: ReconstructionVocabulary;
  /** Run the row cleaner over plain-fallback rows too */
  cleanFallbackRows: boolean;
}

export interface ReconstructionConfigOverrides {
  thresholds?: Partial<ReconstructionThresholds>;
  vocabulary?: Partial<ReconstructionVocabulary>;
  cleanFallbackRows?: boolean;
}

// =============================================================================
// Defaults
// =============================================================================

export const DEFAULT_THRESHOLDS: ReconstructionThresholds = {
  titleLookahead: 2,

  splitRowMinRows: 2,
  splitRowMaxCountDiff: 2,
  splitRowFullSlack: 2,
  splitRowMinMergeCells: 3,

  spanningMinHeaderCells: 6,
  spanningMaxSubHeaderLength: 50,
  spanningFallbackInsertIndex: 3,
  spanningMinRecordCells: 3,

  sampleRows: 5,
  multilineDataStartMin: 3,
  multilineDataStartMax: 6,
  multilineDataFillRatio: 0.6,
  multilineShortHeaderLength: 15,
  multilineUnitTokenLength: 10,

  footnoteSampleRows: 10,
  wikipediaHeaderSearchRows: 4,
  wikipediaDataFillRatio: 0.5,
  wikipediaLeadingCellLength: 3,
  wikipediaSubstantialPrefixLength: 6,
  complexMinDistinctCounts: 3,
  unitRowMaxCellLength: 10,

  headerMinWordMatches: 3,
  headerTextRatio: 0.6,
  headerPlainNumericRatio: 0.5,
};

export const DEFAULT_VOCABULARY: ReconstructionVocabulary = {
  headerWords: [
    'name', 'rank', 'title', 'height', 'floor', 'city',
    'country', 'year', 'comment', 'animal', 'mass', 'length',
  ],
  unitTokens: [
    '[tonnes]', '[kg', '[lb', '[m', '(kg)', '(lb)', '(ft)', '(m)', '(km)', '(mi)',
    'mi2', 'km2', 'mi²', 'km²', '/km2', '/mi2', '%',
  ],
  spanningRoles: ['writer', 'author', 'creator'],
  monthNames: [
    'january', 'february', 'march', 'april', 'may', 'june', 'july',
    'august', 'september', 'october', 'november', 'december',
    'jan', 'feb', 'mar', 'apr', 'jun', 'jul', 'aug', 'sep', 'sept', 'oct', 'nov', 'dec',
  ],
  editorialNotes: [
    'citation needed', 'needs update', 'clarification needed', 'when?', 'who?',
  ],
};

export const DEFAULT_RECONSTRUCTION_CONFIG: ReconstructionConfig = {
  thresholds: DEFAULT_THRESHOLDS,
  vocabulary: DEFAULT_VOCABULARY,
  cleanFallbackRows: false,
};

/**
 * Merge caller overrides over the defaults, one sub-object at a time.
 */
export function resolveConfig(overrides: ReconstructionConfigOverrides = {}): ReconstructionConfig {
  return {
    thresholds: { ...DEFAULT_THRESHOLDS, ...overrides.thresholds },
    vocabulary: { ...DEFAULT_VOCABULARY, ...overrides.vocabulary },
    cleanFallbackRows: overrides.cleanFallbackRows ?? DEFAULT_RECONSTRUCTION_CONFIG.cleanFallbackRows,
  };
}
