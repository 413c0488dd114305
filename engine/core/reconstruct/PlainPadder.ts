/**
 * Tablepaste Engine - Plain Padder
 *
 * Fallback for pastes with no recognized structure, and the recovery path
 * when another strategy fails.
 */

import type { StrategyResult, TokenizedTable } from '../types/index.js';
import type { ReconstructionConfig } from '../config/ReconstructionConfig.js';
import { DEFAULT_RECONSTRUCTION_CONFIG } from '../config/ReconstructionConfig.js';
import { cleanRow, padRow } from '../cells/RowCleaner.js';

export function padPlainRows(
  table: TokenizedTable,
  config: ReconstructionConfig = DEFAULT_RECONSTRUCTION_CONFIG
): StrategyResult {
  const notes = config.vocabulary.editorialNotes;
  const rows = table.rows.map(row =>
    padRow(config.cleanFallbackRows ? cleanRow(row, 'letter', notes) : row, table.maxCols)
  );
  return { rows, hasHeaders: null };
}
