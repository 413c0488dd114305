/**
 * Tablepaste Engine - Table Reconstructor
 *
 * Entry point of the engine. Turns raw clipboard text into a normalized
 * rectangular table:
 *
 *   text -> Line Filter -> Separator Detector -> Row Tokenizer
 *        -> Structural Classifiers -> one strategy -> Header Detector
 *        -> padding -> ParsedTable
 *
 * Never throws for string input. A strategy that fails is replaced by the
 * plain fallback for the whole paste and reported via `onStrategyError`.
 * Not-tabular input yields null.
 */

import type {
  ClassificationResult,
  ParsedTable,
  ReconstructionKind,
  StrategyResult,
  TokenizedTable,
} from '../types/index.js';
import type {
  ReconstructionConfig,
  ReconstructionConfigOverrides,
} from '../config/ReconstructionConfig.js';
import { resolveConfig } from '../config/ReconstructionConfig.js';
import { StrategyError, HtmlTableError } from '../errors/ReconstructionError.js';
import { filterLines } from '../tokenize/LineFilter.js';
import { detectSeparator } from '../tokenize/SeparatorDetector.js';
import { tokenizeRows } from '../tokenize/RowTokenizer.js';
import { classify, selectReconstruction } from '../classify/StructuralClassifiers.js';
import { getStrategy } from '../reconstruct/StrategyRegistry.js';
import { padPlainRows } from '../reconstruct/PlainPadder.js';
import { detectHeader } from '../header/HeaderDetector.js';
import { padRow, widestRow } from '../cells/RowCleaner.js';
import { extractHtmlTable } from '../html/HtmlTableExtractor.js';

// =============================================================================
// Types
// =============================================================================

export interface TableReconstructorEvents {
  /** Called once per paste with the detector flags and the chosen strategy */
  onClassified?: (result: ClassificationResult, kind: ReconstructionKind) => void;
  /** Called when a strategy fails and the plain fallback is used instead */
  onStrategyError?: (error: StrategyError) => void;
  /** Called when the HTML flavour could not be used */
  onHtmlError?: (error: HtmlTableError) => void;
}

export interface ParseOptions {
  /** Threshold and vocabulary overrides */
  config?: ReconstructionConfigOverrides;
  /** Caller's header decision; wins over detection */
  hasHeaders?: boolean;
  events?: TableReconstructorEvents;
}

export interface HtmlParseOptions extends ParseOptions {
  /** Plain-text flavour parsed when the HTML holds no usable table */
  fallbackText?: string;
}

// =============================================================================
// Reconstructor
// =============================================================================

export class TableReconstructor {
  private config: ReconstructionConfig;
  private events: TableReconstructorEvents = {};

  constructor(config: ReconstructionConfigOverrides = {}) {
    this.config = resolveConfig(config);
  }

  // ===========================================================================
  // Event Handling
  // ===========================================================================

  setEventHandlers(events: TableReconstructorEvents): void {
    this.events = { ...this.events, ...events };
  }

  getConfig(): ReconstructionConfig {
    return this.config;
  }

  // ===========================================================================
  // Parsing
  // ===========================================================================

  /**
   * Rebuild a table from plain clipboard text.
   */
  parse(text: string, hasHeaders?: boolean): ParsedTable | null {
    const lines = filterLines(text, this.config.thresholds.titleLookahead);
    const detection = detectSeparator(lines);
    if (detection.kind === 'not-tabular') return null;

    const table = tokenizeRows(lines, detection.separator);
    if (table.rows.length === 0 || table.maxCols === 0) return null;

    const classification = classify(table, this.config);
    const chosen = selectReconstruction(classification);
    this.events.onClassified?.(classification, chosen);

    const { kind, result } = this.reconstruct(table, chosen);
    const width = Math.max(widestRow(result.rows), 1);
    const rows = result.rows.map(row => padRow(row, width));

    const detected = result.hasHeaders ?? detectHeader(rows, {
      compareWithNextRow: kind === 'plain',
      config: this.config,
    });

    return {
      rows,
      hasHeaders: hasHeaders ?? detected,
      separator: detection.separator,
      numRows: rows.length,
      numCols: width,
      isWikipediaStyle: classification.genericWikipedia || kind !== 'plain',
      kind,
    };
  }

  /**
   * Rebuild a table from the HTML clipboard flavour, falling back to the
   * plain-text flavour when the HTML has no usable table.
   */
  parseHtml(html: string, fallbackText?: string, hasHeaders?: boolean): ParsedTable | null {
    let extracted: string | null = null;
    try {
      extracted = extractHtmlTable(html);
      if (extracted === null) {
        this.events.onHtmlError?.(new HtmlTableError('No <table> element found', 'no-table'));
      }
    } catch (error) {
      if (!(error instanceof HtmlTableError)) throw error;
      this.events.onHtmlError?.(error);
    }

    if (extracted !== null) {
      const parsed = this.parse(extracted, hasHeaders);
      if (parsed !== null) return parsed;
    }

    return fallbackText === undefined ? null : this.parse(fallbackText, hasHeaders);
  }

  /**
   * Run the chosen strategy, replacing it with plain padding when it throws
   * or returns no rows.
   */
  private reconstruct(
    table: TokenizedTable,
    kind: ReconstructionKind
  ): { kind: ReconstructionKind; result: StrategyResult } {
    if (kind === 'plain') {
      return { kind, result: padPlainRows(table, this.config) };
    }

    let failure: unknown;
    try {
      const result = getStrategy(kind)(table, this.config);
      if (result.rows.length > 0) return { kind, result };
      failure = new Error('Strategy returned no rows');
    } catch (error) {
      failure = error;
    }

    this.events.onStrategyError?.(new StrategyError(kind, failure));
    return { kind: 'plain', result: padPlainRows(table, this.config) };
  }
}

/**
 * Create a reconstructor with optional config overrides.
 */
export function createTableReconstructor(
  config: ReconstructionConfigOverrides = {}
): TableReconstructor {
  return new TableReconstructor(config);
}

// =============================================================================
// Functional API
// =============================================================================

function reconstructorFor(options: ParseOptions): TableReconstructor {
  const reconstructor = new TableReconstructor(options.config);
  if (options.events) reconstructor.setEventHandlers(options.events);
  return reconstructor;
}

/**
 * Parse raw clipboard text into a normalized table, or null when the text
 * is not tabular.
 *
 * @example
 * const table = parseClipboardText('Name\tAge\nAda\t36\nAlan\t41');
 * // table.rows => [['Name', 'Age'], ['Ada', '36'], ['Alan', '41']]
 * // table.hasHeaders => true
 */
export function parseClipboardText(text: string, options: ParseOptions = {}): ParsedTable | null {
  return reconstructorFor(options).parse(text, options.hasHeaders);
}

/**
 * Parse the HTML clipboard flavour, using `fallbackText` when the HTML
 * holds no usable table.
 */
export function parseClipboardHtml(html: string, options: HtmlParseOptions = {}): ParsedTable | null {
  return reconstructorFor(options).parseHtml(html, options.fallbackText, options.hasHeaders);
}
