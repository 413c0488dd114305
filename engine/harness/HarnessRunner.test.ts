/**
 * Tablepaste Harness - Harness Runner Unit Tests
 */

import { readFileSync } from 'fs';
import { describe, it, expect, vi } from 'vitest';
import type { HarnessConfig, Output, TableOutput } from './types.js';
import { DEFAULT_CONFIG } from './types.js';
import { createHarnessRunner, formatOutput, formatTable } from './HarnessRunner.js';

function collect(config: Partial<HarnessConfig> = {}) {
  const outputs: Output[] = [];
  const runner = createHarnessRunner(config, output => {
    outputs.push(output);
  });
  return { runner, outputs };
}

const PEOPLE = 'Name\tAge\nAda\t36\nAlan\t41';

describe('HarnessRunner', () => {
  describe('runInput', () => {
    it('should emit the reconstructed table', () => {
      const { runner, outputs } = collect();
      const table = runner.runInput(PEOPLE);

      expect(table?.numRows).toBe(3);
      expect(outputs).toHaveLength(1);
      expect(outputs[0]).toMatchObject({
        type: 'table',
        kind: 'plain',
        separator: '\t',
        hasHeaders: true,
        isWikipediaStyle: false,
        numRows: 3,
        numCols: 2,
        columns: ['Name', 'Age'],
        records: [['Ada', '36'], ['Alan', '41']],
      });
      expect(outputs[0].source).toBeUndefined();
    });

    it('should emit an error for text that is not a table', () => {
      const { runner, outputs } = collect();

      expect(runner.runInput('just a sentence', 'note.paste.txt')).toBeNull();
      expect(outputs).toEqual([
        {
          type: 'error',
          timestamp: expect.any(Number),
          source: 'note.paste.txt',
          message: 'No tabular data found',
          errorType: 'NotTabular',
        },
      ]);
    });

    it('should apply the header override', () => {
      const { runner, outputs } = collect({ hasHeaders: false });
      runner.runInput(PEOPLE);

      expect(outputs[0]).toMatchObject({
        hasHeaders: false,
        columns: ['Column_1', 'Column_2'],
        records: [['Name', 'Age'], ['Ada', '36'], ['Alan', '41']],
      });
    });

    it('should read .html sources as the HTML flavour', () => {
      const html = readFileSync(new URL('../fixtures/populations.html', import.meta.url), 'utf-8');
      const { runner, outputs } = collect();
      runner.runInput(html, 'populations.html');

      expect(outputs[0]).toMatchObject({
        type: 'table',
        source: 'populations.html',
        kind: 'wikipediaRows',
        columns: ['City', 'Population', 'Column_3', 'Region'],
      });
    });

    it('should sniff HTML content without a file name', () => {
      const { runner } = collect();
      const table = runner.runInput('<table><tr><td>a</td><td>b</td></tr><tr><td>c</td><td>d</td></tr></table>');

      expect(table?.rows).toEqual([['a', 'b'], ['c', 'd']]);
    });

    it('should read markup as text when told to', () => {
      const { runner, outputs } = collect({ inputFormat: 'text' });
      runner.runInput('<table><tr><td>a</td></tr></table>');

      expect(outputs[0]).toMatchObject({ type: 'error', errorType: 'NotTabular' });
    });

    it('should report diagnostics in verbose mode', () => {
      const { runner, outputs } = collect({ verbose: true });
      runner.runInput(PEOPLE);

      expect(outputs.map(output => output.type)).toEqual(['info', 'table']);
      expect(outputs[0]).toMatchObject({
        message:
          'Classified as plain (splitRow=false spanningHeader=false multilineHeader=false ' +
          'genericWikipedia=false complexHeader=false)',
      });
    });

    it('should report an unusable HTML flavour in verbose mode', () => {
      const { runner, outputs } = collect({ verbose: true, inputFormat: 'html' });
      runner.runInput('A\tB\n1\t2');

      expect(outputs).toMatchObject([
        { type: 'info', message: 'HTML flavour unusable: No <table> element found' },
        { type: 'error', errorType: 'NotTabular' },
      ]);
    });
  });

  it('should report errors raised outside the engine', () => {
    const { runner, outputs } = collect();
    runner.reportError(new Error('ENOENT: missing'), 'Input', 'paste.txt');

    expect(outputs[0]).toMatchObject({
      type: 'error',
      source: 'paste.txt',
      message: 'ENOENT: missing',
      errorType: 'Input',
    });
  });

  it('should expose a copy of its config', () => {
    const { runner } = collect({ verbose: true });
    expect(runner.getConfig()).toEqual({ ...DEFAULT_CONFIG, verbose: true });
  });

  it('should print to the console when no output handler is given', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    const runner = createHarnessRunner();
    runner.runInput(PEOPLE);
    runner.runInput('just a sentence');

    expect(log).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(log.mock.calls[0][0]))).toMatchObject({ type: 'table', numRows: 3 });
    expect(error).toHaveBeenCalledWith('{"type":"error","message":"No tabular data found","errorType":"NotTabular"}');

    log.mockRestore();
    error.mockRestore();
  });
});

describe('formatOutput', () => {
  const info: Output = { type: 'info', timestamp: 5, message: 'hi' };
  const table: TableOutput = {
    type: 'table',
    timestamp: 0,
    kind: 'plain',
    separator: '\t',
    hasHeaders: true,
    isWikipediaStyle: false,
    numRows: 2,
    numCols: 2,
    columns: ['Name', 'Age'],
    records: [['Ada', '36']],
  };

  it('should drop timestamps from JSON unless asked', () => {
    expect(formatOutput(info, DEFAULT_CONFIG)).toBe('{"type":"info","message":"hi"}');
    expect(formatOutput(info, { ...DEFAULT_CONFIG, includeTimestamps: true })).toBe(
      '{"type":"info","timestamp":5,"message":"hi"}'
    );
  });

  it('should format errors and info in pretty mode', () => {
    const pretty = { ...DEFAULT_CONFIG, outputFormat: 'pretty' as const };
    expect(formatOutput({ type: 'error', timestamp: 0, message: 'boom', errorType: 'Runtime' }, pretty)).toBe(
      'ERROR: boom'
    );
    expect(formatOutput(info, pretty)).toBe('INFO: hi');
    expect(formatOutput({ ...info, timestamp: 0 }, { ...pretty, includeTimestamps: true })).toBe(
      '[00:00:00.000] INFO: hi'
    );
  });

  it('should draw a table in pretty mode', () => {
    expect(formatOutput(table, { ...DEFAULT_CONFIG, outputFormat: 'pretty' })).toBe(
      'TABLE: 2 rows x 2 cols, kind=plain, separator=tab, headers=yes\n' +
        ' Name | Age \n' +
        '------+-----\n' +
        ' Ada  | 36  '
    );
  });
});

describe('formatTable', () => {
  it('should pad every column to its widest cell', () => {
    expect(formatTable(['A', 'Long'], [['wide cell', 'x']])).toBe(
      ' A         | Long \n' +
        '-----------+------\n' +
        ' wide cell | x    '
    );
  });
});
