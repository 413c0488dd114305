/**
 * Tablepaste Engine - Spanning-Header Merger Unit Tests
 */

import { readFileSync } from 'fs';
import { describe, it, expect } from 'vitest';
import type { TokenizedTable } from '../types/index.js';
import { DEFAULT_VOCABULARY } from '../config/ReconstructionConfig.js';
import { filterLines } from '../tokenize/LineFilter.js';
import { tokenizeRows } from '../tokenize/RowTokenizer.js';
import {
  subHeaderLabels,
  findSpanningColumn,
  buildSpanningHeader,
  startsRecord,
  reconstructRecords,
  mergeSpanningHeader,
} from './SpanningHeaderMerger.js';

function fixture(name: string): TokenizedTable {
  const text = readFileSync(new URL(`../../fixtures/${name}`, import.meta.url), 'utf-8');
  return tokenizeRows(filterLines(text), '\t');
}

describe('SpanningHeaderMerger', () => {
  describe('header', () => {
    it('should trim blank cells around the sub-header labels', () => {
      expect(subHeaderLabels(['', 'Story', '', 'Screenplay', ''])).toEqual(['Story', '', 'Screenplay']);
    });

    it('should find the role-like column', () => {
      expect(findSpanningColumn(['Title', 'Authors', 'Year'], DEFAULT_VOCABULARY.spanningRoles)).toBe(1);
      expect(findSpanningColumn(['Title', 'Year'], DEFAULT_VOCABULARY.spanningRoles)).toBe(-1);
    });

    it('should expand the role column once per label', () => {
      expect(buildSpanningHeader(['Title', 'Writer(s)', 'Year'], ['Story', '', 'Screenplay'])).toEqual([
        'Title',
        'Writer(s) - Story',
        'Writer(s)_2',
        'Writer(s) - Screenplay',
        'Year',
      ]);
    });

    it('should insert the labels at the fallback position without a role column', () => {
      expect(buildSpanningHeader(['', 'Name', 'Height', 'Floors', 'Year'], ['m', 'ft'])).toEqual([
        '', 'Name', 'Height', 'm', 'ft', 'Floors', 'Year',
      ]);
    });

    it('should append the labels to a header shorter than the fallback position', () => {
      expect(buildSpanningHeader(['A', 'B'], ['x', 'y'])).toEqual(['A', 'B', 'x', 'y']);
    });
  });

  describe('records', () => {
    it('should start a record on a date-like second cell', () => {
      expect(startsRecord(['Film', 'May 2, 2030', 'X'], 9)).toBe(true);
    });

    it('should start a record on a near-complete line', () => {
      expect(startsRecord(['a', 'b', 'c', 'd', 'e', 'f', 'g', 'h'], 9)).toBe(true);
    });

    it('should count any digit in the second cell as a date', () => {
      expect(startsRecord(['Tomas Reyes', 'Part 2', 'Sequel'], 9)).toBe(true);
      expect(startsRecord(['Tomas Reyes', 'Part two', 'Sequel'], 9)).toBe(false);
      expect(startsRecord(['Tomas Reyes', 'Part 2'], 9)).toBe(false);
    });

    it('should open a record for a continuation-like line with a numbered second cell', () => {
      const records = reconstructRecords([['A', '2020', 'x'], ['Note', 'Part 2', 'y']], 3, 9);
      expect(records).toEqual([
        ['A', '2020', 'x'],
        ['Note', 'Part 2', 'y'],
      ]);
    });

    it('should treat short text lines as continuations', () => {
      expect(startsRecord(['Dana Holt', 'Lee Park'], 9)).toBe(false);
    });

    it('should continue the last written slot', () => {
      const records = reconstructRecords([['A', '2020', 'x'], ['y'], ['z', 'w']], 4, 9);
      expect(records).toEqual([['A', '2020', 'x; y; z', 'w']]);
    });

    it('should fold overflowing cells into the last column', () => {
      expect(reconstructRecords([['A', '2020', 'x', 'y']], 3, 9)).toEqual([['A', '2020', 'x; y']]);
    });

    it('should open one record per qualifying line', () => {
      const records = reconstructRecords([['A', '2020', 'x'], ['B', 'June', 'y']], 3, 9);
      expect(records).toEqual([
        ['A', '2020', 'x'],
        ['B', 'June', 'y'],
      ]);
    });
  });

  describe('mergeSpanningHeader', () => {
    it('should rebuild records split across physical lines', () => {
      const result = mergeSpanningHeader(fixture('spanning.paste.txt'));

      expect(result.hasHeaders).toBe(true);
      expect(result.rows).toEqual([
        ['Title', 'Release date', 'Director(s)', 'Writer(s) - Story', 'Writer(s) - Screenplay',
          'Producer(s)', 'Composer', 'Studio', 'Rating', 'Notes'],
        ['Moonlit Harbor', 'March 3, 2028', 'Ina Calder', 'Rory Vance', 'Rory Vance',
          'Pell Morrow', 'Asa Lind', 'Brightkite Studio', '91%', 'None'],
        ['Copper Kites', 'June 9, 2029', 'Tomas Reyes; Dana Holt', 'Lee Park; Mina Ose', 'Jo Arden',
          'Fenn Obi', 'Silas Grey', 'Tallwater Animation', '88%', 'Sequel to Moonlit Harbor'],
        ['Glass Orchard', 'October 21, 2030', 'Pell Morrow', 'Asa Lind', 'Ina Calder',
          'Rory Vance', 'Dana Holt', 'Brightkite Studio', '79%', 'First release on the platform; Limited theatrical run'],
      ]);
    });

    it('should insert unit sub-headers when no role column exists', () => {
      const result = mergeSpanningHeader(fixture('towers.paste.txt'));

      expect(result.rows[0]).toEqual([
        '', 'Name', 'Height', 'm', 'ft', 'Floors', 'Image', 'City', 'Country', 'Year', 'Comments', 'Ref',
      ]);
      expect(result.rows).toHaveLength(4);
      expect(result.rows[1]).toEqual([
        '1', 'Lumen Spire', '702', '2,303', '150 (+ 4 below ground)', '', 'Port Aldren', 'Eldoria', '2029',
        'Tallest tower on the northern coast', '', '',
      ]);
    });

    it('should refuse a table without a sub-header row', () => {
      expect(() => mergeSpanningHeader({ rows: [['Title', 'Writer(s)']], maxCols: 2 })).toThrow(
        'Spanning header needs a main header row and a sub-header row'
      );
    });
  });
});
