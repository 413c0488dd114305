/**
 * Tablepaste Engine - Table Loader
 *
 * Splits a ParsedTable into column names and data records, the shape a
 * dataframe or grid loader takes.
 */

import type { ParsedTable, RawRow, TableData } from '../types/index.js';

export interface BuildTableOptions {
  /** Override the table's own header flag */
  useHeaders?: boolean;
}

export function defaultColumnName(index: number): string {
  return `Column_${index + 1}`;
}

/**
 * Fill blank names and suffix repeats with `_2`, `_3`, ... in order.
 */
export function uniqueColumnNames(names: RawRow): string[] {
  const seen = new Map<string, number>();
  const taken = new Set<string>();
  const result: string[] = [];

  names.forEach((raw, index) => {
    const base = raw.trim() === '' ? defaultColumnName(index) : raw.trim();
    let name = base;
    let count = seen.get(base) ?? 1;
    while (taken.has(name)) {
      count++;
      name = `${base}_${count}`;
    }
    seen.set(base, count);
    taken.add(name);
    result.push(name);
  });

  return result;
}

export function buildTableData(parsed: ParsedTable, options: BuildTableOptions = {}): TableData {
  const useHeaders = options.useHeaders ?? parsed.hasHeaders;

  if (useHeaders && parsed.rows.length > 0) {
    const [header, ...records] = parsed.rows;
    return { columns: uniqueColumnNames(header), records: records.map(row => [...row]) };
  }

  const columns = Array.from({ length: parsed.numCols }, (_, i) => defaultColumnName(i));
  return { columns, records: parsed.rows.map(row => [...row]) };
}
