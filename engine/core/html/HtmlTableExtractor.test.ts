/**
 * Tablepaste Engine - HTML Table Extractor Unit Tests
 */

import { readFileSync } from 'fs';
import { describe, it, expect } from 'vitest';
import { HtmlTableError } from '../errors/ReconstructionError.js';
import { isolateTableMarkup, extractHtmlTable, repairTableMarkup } from './HtmlTableExtractor.js';

function fixture(name: string): string {
  return readFileSync(new URL(`../../fixtures/${name}`, import.meta.url), 'utf-8');
}

describe('HtmlTableExtractor', () => {
  describe('isolateTableMarkup', () => {
    it('should cut clipboard headers and fragment comments away', () => {
      const markup = isolateTableMarkup(fixture('populations.html'));
      expect(markup?.startsWith('<table class="wikitable sortable">')).toBe(true);
      expect(markup?.endsWith('</table>')).toBe(true);
    });

    it('should return null without a table', () => {
      expect(isolateTableMarkup('<p>hi</p>')).toBeNull();
    });
  });

  describe('repairTableMarkup', () => {
    it('should quote bare attribute values and close cells left open', () => {
      expect(repairTableMarkup("<table><tr><td nowrap colspan=2 title='x y'>a<td>b</table>")).toBe(
        "<table><tr><td nowrap colspan=\"2\" title='x y'>a</td><td>b</td></tr></table>"
      );
    });

    it('should close elements still open inside a cell', () => {
      expect(repairTableMarkup('<table><tr><td><b>bold<td>x</tr></table>')).toBe(
        '<table><tr><td><b>bold</b></td><td>x</td></tr></table>'
      );
    });

    it('should drop stray end tags', () => {
      expect(repairTableMarkup('<table><tr><td>a</td></td></tr></tr></table>')).toBe(
        '<table><tr><td>a</td></tr></table>'
      );
    });

    it('should leave well-formed markup as it is', () => {
      const html = '<table><thead><tr><th>A</th></tr></thead><tbody><tr><td>1<br>2</td></tr></tbody></table>';
      expect(repairTableMarkup(html)).toBe(html);
    });
  });

  describe('extractHtmlTable', () => {
    it('should flatten spans, hidden cells, captions and line breaks', () => {
      expect(extractHtmlTable(fixture('populations.html'))).toBe(
        'City\tPopulation\t\tRegion\n' +
          'Velmora[a]\t1,204,330\t2031\tNorth\n' +
          'Kestrel Bay\t845,012\t2031\tNorth\n' +
          'Orrin Falls\t402,977\t2030\tSouth; Coast'
      );
    });

    it('should decode entities and collapse whitespace', () => {
      expect(extractHtmlTable('<table><tr><td>R&amp;D&nbsp;Lab</td><td>  x\n y </td></tr></table>')).toBe(
        'R&D Lab\tx y'
      );
    });

    it('should accept upper-case tags', () => {
      expect(extractHtmlTable('<TABLE><TR><TD>a</TD><TD>b</TD></TR></TABLE>')).toBe('a\tb');
    });

    it('should repeat a rowspan cell down its column', () => {
      const html =
        '<table><tr><td rowspan="3">A</td><td>1</td></tr><tr><td>2</td></tr><tr><td>3</td></tr></table>';
      expect(extractHtmlTable(html)).toBe('A\t1\nA\t2\nA\t3');
    });

    it('should pad a colspan cell with empty cells', () => {
      expect(extractHtmlTable('<table><tr><td colspan="3">wide</td></tr><tr><td>a</td><td>b</td><td>c</td></tr></table>')).toBe(
        'wide\t\t\na\tb\tc'
      );
    });

    it('should join block elements inside a cell', () => {
      expect(extractHtmlTable('<table><tr><td><p>One</p><p>Two</p></td></tr></table>')).toBe('One; Two');
    });

    it('should ignore tables nested inside cells', () => {
      const html = '<table><tr><td>Outer<table><tr><td>inner</td></tr></table></td><td>x</td></tr></table>';
      expect(extractHtmlTable(html)).toBe('Outer\tx');
    });

    it('should keep the span of a bare colspan value', () => {
      expect(extractHtmlTable('<table><tr><td colspan=2>a</td></tr><tr><td>b</td><td>c</td></tr></table>')).toBe(
        'a\t\nb\tc'
      );
    });

    it('should split cells and rows that were never closed', () => {
      expect(extractHtmlTable('<table><tr><td>a<td>b</table>')).toBe('a\tb');
      expect(extractHtmlTable('<table><tr><td>1<td>2<tr><td>3<td>4</table>')).toBe('1\t2\n3\t4');
    });

    it('should honour bare rowspan and hidden-style values', () => {
      expect(extractHtmlTable('<table><tr><td rowspan=2>A</td><td>1</td></tr><tr><td>2</td></tr></table>')).toBe(
        'A\t1\nA\t2'
      );
      expect(extractHtmlTable('<table><tr><td style=display:none>0001</td><td>x</td></tr></table>')).toBe('x');
    });

    it('should return null when there is no table or no rows', () => {
      expect(extractHtmlTable('<div>no table here</div>')).toBeNull();
      expect(extractHtmlTable('<table></table>')).toBeNull();
    });

    it('should report markup it cannot parse', () => {
      const html = '<table><tr><td><!-- open comment</td></tr></table>';
      let caught: unknown;
      try {
        extractHtmlTable(html);
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(HtmlTableError);
      expect(caught instanceof HtmlTableError ? caught.reason : null).toBe('malformed');
    });
  });
});
