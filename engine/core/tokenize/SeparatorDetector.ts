/**
 * Tablepaste Engine - Separator Detector
 */

import type { SeparatorDetection } from '../types/index.js';
import { countDelimiters } from './LineFilter.js';

/**
 * Decide the separator from the first line only.
 *
 * Tabs take priority over commas, which also turn up inside numbers and
 * prose. With neither, several lines are a single-column paste and a lone
 * line is not a table at all.
 */
export function detectSeparator(lines: string[]): SeparatorDetection {
  if (lines.length === 0) {
    return { kind: 'not-tabular' };
  }

  const first = lines[0];
  if (countDelimiters(first, '\t') > 0) {
    return { kind: 'delimited', separator: '\t' };
  }
  if (countDelimiters(first, ',') > 0) {
    return { kind: 'delimited', separator: ',' };
  }
  if (lines.length > 1) {
    return { kind: 'single-column', separator: null };
  }
  return { kind: 'not-tabular' };
}
