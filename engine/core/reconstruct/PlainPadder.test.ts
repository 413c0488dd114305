/**
 * Tablepaste Engine - Plain Padder Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { resolveConfig } from '../config/ReconstructionConfig.js';
import { padPlainRows } from './PlainPadder.js';

describe('padPlainRows', () => {
  const table = { rows: [['a[b]', 'x'], ['n[12]']], maxCols: 2 };

  it('should pad rows without touching their text', () => {
    expect(padPlainRows(table)).toEqual({
      rows: [['a[b]', 'x'], ['n[12]', '']],
      hasHeaders: null,
    });
  });

  it('should strip letter footnotes when fallback cleaning is on', () => {
    const result = padPlainRows(table, resolveConfig({ cleanFallbackRows: true }));
    expect(result.rows).toEqual([['a', 'x'], ['n[12]', '']]);
  });
});
