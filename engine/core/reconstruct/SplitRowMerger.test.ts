/**
 * Tablepaste Engine - Split-Row Merger Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { pendingRank, mergeSplitRows } from './SplitRowMerger.js';

const HEADER = ['Rank', 'City[a]', 'Region', 'Population'];

describe('SplitRowMerger', () => {
  describe('pendingRank', () => {
    it('should return the lone short number of a row', () => {
      expect(pendingRank(['', ' 3 ', ''])).toBe('3');
    });

    it('should return null for anything else', () => {
      expect(pendingRank(['3', 'x'])).toBeNull();
      expect(pendingRank(['abc'])).toBeNull();
      expect(pendingRank(['12345'])).toBeNull();
      expect(pendingRank([])).toBeNull();
    });
  });

  describe('mergeSplitRows', () => {
    it('should fold each rank into the following data line', () => {
      const result = mergeSplitRows({
        rows: [HEADER, ['1'], ['Oslo[b]', 'Viken', '709,037'], ['2'], ['Bergen', 'Vestland', '289,330']],
        maxCols: 4,
      });

      expect(result).toEqual({
        rows: [
          ['Rank', 'City', 'Region', 'Population'],
          ['1', 'Oslo', 'Viken', '709,037'],
          ['2', 'Bergen', 'Vestland', '289,330'],
        ],
        hasHeaders: null,
      });
    });

    it('should emit a trailing rank on its own', () => {
      const result = mergeSplitRows({ rows: [HEADER, ['3']], maxCols: 4 });
      expect(result.rows[1]).toEqual(['3', '', '', '']);
    });

    it('should not merge a rank into a sparse line', () => {
      const result = mergeSplitRows({ rows: [HEADER, ['5'], ['x', 'y']], maxCols: 4 });
      expect(result.rows.slice(1)).toEqual([
        ['5', '', '', ''],
        ['x', 'y', '', ''],
      ]);
    });

    it('should drop cells past the table width', () => {
      const result = mergeSplitRows({ rows: [['A', 'B', 'C'], ['1'], ['p', 'q', 'r']], maxCols: 3 });
      expect(result.rows[1]).toEqual(['1', 'p', 'q']);
    });

    it('should return no rows for an empty table', () => {
      expect(mergeSplitRows({ rows: [], maxCols: 0 })).toEqual({ rows: [], hasHeaders: null });
    });
  });
});
