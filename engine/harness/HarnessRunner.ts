/**
 * Tablepaste Harness - Harness Runner
 *
 * Runs one paste through the engine and turns the result into Output
 * objects. Shared by the CLI and the regression runner.
 */

import { TableReconstructor } from '../core/parser/TableReconstructor.js';
import type { ParsedTable } from '../core/types/index.js';
import { buildTableData } from '../core/loader/TableLoader.js';
import type {
  ErrorKind,
  HarnessConfig,
  InputFormat,
  Output,
  TableOutput,
} from './types.js';
import { DEFAULT_CONFIG } from './types.js';

const HTML_EXTENSION = /\.html?$/i;
const HTML_SNIFF = /^\s*(?:<!doctype html|<html|<table|version:\d)/i;

// =============================================================================
// Harness Runner
// =============================================================================

export class HarnessRunner {
  private config: HarnessConfig;
  private reconstructor: TableReconstructor;
  private currentSource: string | undefined;

  // Output handler
  private readonly outputHandler: (output: Output) => void;

  constructor(
    config: Partial<HarnessConfig> = {},
    outputHandler?: (output: Output) => void
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.outputHandler = outputHandler ?? this.defaultOutputHandler.bind(this);

    this.reconstructor = new TableReconstructor();
    this.reconstructor.setEventHandlers({
      onClassified: (result, kind) => {
        if (!this.config.verbose) return;
        const flags = Object.entries(result)
          .map(([name, value]) => `${name}=${String(value)}`)
          .join(' ');
        this.info(`Classified as ${kind} (${flags})`);
      },
      onStrategyError: (error) => {
        if (this.config.verbose) this.info(`${error.message}; using plain fallback`);
      },
      onHtmlError: (error) => {
        if (this.config.verbose) this.info(`HTML flavour unusable: ${error.message}`);
      },
    });
  }

  // ===========================================================================
  // Execution
  // ===========================================================================

  /**
   * Parse one paste and emit its table (or an error).
   */
  runInput(content: string, source?: string): ParsedTable | null {
    this.currentSource = source;
    const hasHeaders = this.config.hasHeaders ?? undefined;

    const table = this.resolveFormat(content, source) === 'html'
      ? this.reconstructor.parseHtml(content, undefined, hasHeaders)
      : this.reconstructor.parse(content, hasHeaders);

    if (table === null) {
      this.error('No tabular data found', 'NotTabular');
    } else {
      this.emit(toTableOutput(table, this.stamp()));
    }

    this.currentSource = undefined;
    return table;
  }

  /**
   * Emit an error for a failure outside the engine (unreadable file, bad input).
   */
  reportError(error: unknown, errorType: ErrorKind = 'Runtime', source?: string): void {
    this.currentSource = source;
    this.error(error instanceof Error ? error.message : String(error), errorType);
    this.currentSource = undefined;
  }

  getConfig(): HarnessConfig {
    return { ...this.config };
  }

  private resolveFormat(content: string, source?: string): 'text' | 'html' {
    const format: InputFormat = this.config.inputFormat;
    if (format !== 'auto') return format;
    if (source !== undefined && HTML_EXTENSION.test(source)) return 'html';
    return HTML_SNIFF.test(content) ? 'html' : 'text';
  }

  // ===========================================================================
  // Output
  // ===========================================================================

  private stamp(): { timestamp: number; source?: string } {
    return this.currentSource === undefined
      ? { timestamp: Date.now() }
      : { timestamp: Date.now(), source: this.currentSource };
  }

  private info(message: string): void {
    this.emit({ type: 'info', ...this.stamp(), message });
  }

  private error(message: string, errorType: ErrorKind): void {
    this.emit({ type: 'error', ...this.stamp(), message, errorType });
  }

  private emit(output: Output): void {
    this.outputHandler(output);
  }

  private defaultOutputHandler(output: Output): void {
    const line = formatOutput(output, this.config);
    if (output.type === 'table') {
      console.log(line);
    } else {
      console.error(line);
    }
  }
}

// =============================================================================
// Conversion & Formatting
// =============================================================================

export function toTableOutput(
  table: ParsedTable,
  base: { timestamp: number; source?: string }
): TableOutput {
  const { columns, records } = buildTableData(table);
  return {
    type: 'table',
    ...base,
    kind: table.kind,
    separator: table.separator,
    hasHeaders: table.hasHeaders,
    isWikipediaStyle: table.isWikipediaStyle,
    numRows: table.numRows,
    numCols: table.numCols,
    columns,
    records,
  };
}

function separatorName(table: TableOutput): string {
  if (table.separator === '\t') return 'tab';
  if (table.separator === ',') return 'comma';
  return 'none';
}

export function formatOutput(output: Output, config: HarnessConfig): string {
  if (config.outputFormat === 'json') {
    return JSON.stringify(config.includeTimestamps ? output : { ...output, timestamp: undefined });
  }

  // Pretty format
  const prefix = config.includeTimestamps
    ? `[${new Date(output.timestamp).toISOString().slice(11, 23)}] `
    : '';

  switch (output.type) {
    case 'table':
      return [
        `${prefix}TABLE: ${output.numRows} rows x ${output.numCols} cols, ` +
          `kind=${output.kind}, separator=${separatorName(output)}, ` +
          `headers=${output.hasHeaders ? 'yes' : 'no'}`,
        formatTable(output.columns, output.records),
      ].join('\n');

    case 'error':
      return `${prefix}ERROR: ${output.message}`;

    case 'info':
      return `${prefix}INFO: ${output.message}`;
  }
}

export function formatTable(headers: string[], rows: string[][]): string {
  const allRows = [headers, ...rows];
  const colWidths = headers.map((_, i) =>
    Math.max(...allRows.map((row) => (row[i] ?? '').length))
  );

  const separator = colWidths.map((w) => '-'.repeat(w + 2)).join('+');
  const formatRow = (row: string[]) =>
    colWidths.map((width, i) => ` ${(row[i] ?? '').padEnd(width)} `).join('|');

  return [
    formatRow(headers),
    separator,
    ...rows.map(formatRow),
  ].join('\n');
}

// =============================================================================
// Factory
// =============================================================================

export function createHarnessRunner(
  config?: Partial<HarnessConfig>,
  outputHandler?: (output: Output) => void
): HarnessRunner {
  return new HarnessRunner(config, outputHandler);
}
