/**
 * Tablepaste Harness - Types
 *
 * Output and configuration types shared by the CLI and the regression runner.
 */

import type { ReconstructionKind, Separator } from '../core/types/index.js';

// =============================================================================
// Output Types
// =============================================================================

export type OutputType =
  | 'table'     // Reconstructed table
  | 'error'     // Error message
  | 'info';     // Diagnostic message (verbose mode)

export interface OutputBase {
  type: OutputType;
  timestamp: number;
  /** Input the output belongs to (file name or "stdin") */
  source?: string;
}

export interface TableOutput extends OutputBase {
  type: 'table';
  kind: ReconstructionKind;
  separator: Separator;
  hasHeaders: boolean;
  isWikipediaStyle: boolean;
  numRows: number;
  numCols: number;
  columns: string[];
  records: string[][];
}

export type ErrorKind = 'NotTabular' | 'Input' | 'Runtime';

export interface ErrorOutput extends OutputBase {
  type: 'error';
  message: string;
  errorType: ErrorKind;
}

export interface InfoOutput extends OutputBase {
  type: 'info';
  message: string;
}

export type Output = TableOutput | ErrorOutput | InfoOutput;

// =============================================================================
// Harness Configuration
// =============================================================================

export type InputFormat = 'auto' | 'text' | 'html';

export interface HarnessConfig {
  /** Output format: 'json' (one JSON object per line) or 'pretty' (boxed table) */
  outputFormat: 'json' | 'pretty';
  /** Include timestamps in output */
  includeTimestamps: boolean;
  /** Verbose mode (classification and fallback diagnostics) */
  verbose: boolean;
  /** How to read the paste; 'auto' goes by file extension */
  inputFormat: InputFormat;
  /** Header override; null leaves it to detection */
  hasHeaders: boolean | null;
}

export const DEFAULT_CONFIG: HarnessConfig = {
  outputFormat: 'json',
  includeTimestamps: false,
  verbose: false,
  inputFormat: 'auto',
  hasHeaders: null,
};
