/**
 * Tablepaste Engine - Line Filter
 *
 * Splits a paste into usable lines and drops leading caption lines
 * ("Highest-grossing films of 2025[12]") that sit above the real table.
 */

import { DEFAULT_THRESHOLDS } from '../config/ReconstructionConfig.js';

const LINE_BREAK = /\r\n|\r|\n/;

/**
 * Split on any line break and drop lines that are blank after trimming.
 * Kept lines are returned untouched: a leading tab is an empty first cell.
 */
export function splitLines(text: string): string[] {
  return text.split(LINE_BREAK).filter(line => line.trim() !== '');
}

export function countDelimiters(line: string, delimiter: string): number {
  let count = 0;
  for (const ch of line) {
    if (ch === delimiter) count++;
  }
  return count;
}

/**
 * Tabs win whenever any line carries one; otherwise commas are the signal.
 */
export function chooseFilterDelimiter(lines: string[]): '\t' | ',' {
  return lines.some(line => line.includes('\t')) ? '\t' : ',';
}

/**
 * Remove leading title lines.
 *
 * A line is a title when it has no delimiter but one of the next
 * `lookahead` lines does. Removal stops at the first line that isn't one,
 * so delimiter-free lines inside the table (rank lines, wrapped cells) stay.
 */
export function filterTitleLines(
  lines: string[],
  lookahead: number = DEFAULT_THRESHOLDS.titleLookahead
): string[] {
  const delimiter = chooseFilterDelimiter(lines);
  let start = 0;

  while (start < lines.length) {
    if (countDelimiters(lines[start], delimiter) > 0) break;

    const upcoming = lines.slice(start + 1, start + 1 + lookahead);
    if (!upcoming.some(line => countDelimiters(line, delimiter) > 0)) break;

    start++;
  }

  return lines.slice(start);
}

/**
 * Raw clipboard text to filtered lines.
 */
export function filterLines(
  text: string,
  lookahead: number = DEFAULT_THRESHOLDS.titleLookahead
): string[] {
  return filterTitleLines(splitLines(text), lookahead);
}
