/**
 * Tablepaste Engine - Row Tokenizer
 *
 * Splits filtered lines into trimmed cells. Rows are left ragged; padding
 * waits until a reconstruction strategy has merged or split them.
 */

import type { RawRow, Separator, TokenizedTable } from '../types/index.js';

/**
 * Split one comma-separated line. Double-quoted fields may contain commas,
 * and `""` inside quotes is a literal quote.
 */
export function splitCommaLine(line: string): RawRow {
  const cells: RawRow = [];
  let current = '';
  let inQuotes = false;

  for (let i = 0; i < line.length; i++) {
    const ch = line[i];

    if (inQuotes) {
      if (ch === '"') {
        if (line[i + 1] === '"') {
          current += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        current += ch;
      }
    } else if (ch === '"' && current.trim() === '') {
      inQuotes = true;
      current = '';
    } else if (ch === ',') {
      cells.push(current);
      current = '';
    } else {
      current += ch;
    }
  }

  cells.push(current);
  return cells;
}

export function splitLine(line: string, separator: Separator): RawRow {
  let cells: RawRow;
  if (separator === '\t') {
    cells = line.split('\t');
  } else if (separator === ',') {
    cells = splitCommaLine(line);
  } else {
    cells = [line];
  }
  return cells.map(cell => cell.trim());
}

/**
 * Tokenize every line with the same separator and track the widest row.
 */
export function tokenizeRows(lines: string[], separator: Separator): TokenizedTable {
  const rows: RawRow[] = [];
  let maxCols = 0;

  for (const line of lines) {
    const row = splitLine(line, separator);
    rows.push(row);
    if (row.length > maxCols) maxCols = row.length;
  }

  return { rows, maxCols };
}
