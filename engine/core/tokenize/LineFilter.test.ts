/**
 * Tablepaste Engine - Line Filter Unit Tests
 */

import { describe, it, expect } from 'vitest';
import {
  splitLines,
  countDelimiters,
  chooseFilterDelimiter,
  filterTitleLines,
  filterLines,
} from './LineFilter.js';

describe('LineFilter', () => {
  describe('splitLines', () => {
    it('should split on every line break style and drop blank lines', () => {
      expect(splitLines('a\r\nb\rc\n\n  \nd')).toEqual(['a', 'b', 'c', 'd']);
    });

    it('should keep leading tabs on kept lines', () => {
      expect(splitLines('\tx\ty\n')).toEqual(['\tx\ty']);
    });

    it('should return nothing for blank input', () => {
      expect(splitLines('')).toEqual([]);
      expect(splitLines(' \n\t\n')).toEqual([]);
    });
  });

  it('should count delimiter occurrences', () => {
    expect(countDelimiters('a\tb\tc', '\t')).toBe(2);
    expect(countDelimiters('abc', ',')).toBe(0);
  });

  it('should prefer tabs over commas when choosing the filter delimiter', () => {
    expect(chooseFilterDelimiter(['a,b', 'c\td'])).toBe('\t');
    expect(chooseFilterDelimiter(['a,b'])).toBe(',');
  });

  describe('filterTitleLines', () => {
    it('should drop a caption above the table', () => {
      expect(filterTitleLines(['Title', 'a\tb', '1\t2'])).toEqual(['a\tb', '1\t2']);
    });

    it('should drop several stacked captions', () => {
      expect(filterTitleLines(['Caption', 'Subtitle', 'a\tb', '1\t2'])).toEqual(['a\tb', '1\t2']);
    });

    it('should keep delimiter-free lines inside the table', () => {
      const lines = ['a\tb', '1', 'x\ty'];
      expect(filterTitleLines(lines)).toEqual(lines);
    });

    it('should stop when no delimiter appears within the lookahead', () => {
      const lines = ['Title', 'Sub', 'Other', 'a\tb'];
      expect(filterTitleLines(lines)).toEqual(lines);
      expect(filterTitleLines(lines, 3)).toEqual(['a\tb']);
    });

    it('should leave delimiter-free pastes alone', () => {
      expect(filterTitleLines(['x', 'y'])).toEqual(['x', 'y']);
    });
  });

  it('should filter raw comma-separated text', () => {
    expect(filterLines('Caption\nName,Age\nAda,36')).toEqual(['Name,Age', 'Ada,36']);
  });
});
