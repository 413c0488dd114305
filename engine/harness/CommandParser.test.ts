/**
 * Tablepaste Harness - Command Parser Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { ArgumentError, parseArgs } from './CommandParser.js';

function argumentError(args: string[]): ArgumentError | null {
  try {
    parseArgs(args);
  } catch (error) {
    if (error instanceof ArgumentError) return error;
    throw error;
  }
  return null;
}

describe('parseArgs', () => {
  it('should default to stdin with no options', () => {
    expect(parseArgs([])).toEqual({
      config: {},
      help: false,
      subcommandArgs: [],
      runOptions: {},
    });
  });

  it('should parse single-paste options', () => {
    const args = parseArgs(['paste.txt', '--pretty', '--html', '--no-headers', '-v', '--timestamps']);

    expect(args.inputPath).toBe('paste.txt');
    expect(args.subcommand).toBeUndefined();
    expect(args.config).toEqual({
      outputFormat: 'pretty',
      inputFormat: 'html',
      hasHeaders: false,
      verbose: true,
      includeTimestamps: true,
    });
  });

  it('should accept a dash for stdin', () => {
    expect(parseArgs(['-', '--headers'])).toMatchObject({ inputPath: '-', config: { hasHeaders: true } });
  });

  it('should recognize help', () => {
    expect(parseArgs(['-h']).help).toBe(true);
    expect(parseArgs(['--help']).help).toBe(true);
  });

  it('should parse the run command', () => {
    const args = parseArgs(['run', 'fixtures', '--golden', '--filter', 'cities', '--fail-fast', '--json', '--text']);

    expect(args.subcommand).toBe('run');
    expect(args.subcommandArgs).toEqual(['fixtures']);
    expect(args.runOptions).toEqual({
      outputFormat: 'json',
      golden: true,
      filter: 'cities',
      failFast: true,
    });
    expect(args.config).toEqual({ outputFormat: 'json', inputFormat: 'text' });
  });

  it('should default the run command to pretty output', () => {
    expect(parseArgs(['run', 'a', 'b']).runOptions).toEqual({ outputFormat: 'pretty' });
    expect(parseArgs(['run', 'a', 'b']).subcommandArgs).toEqual(['a', 'b']);
  });

  it('should make --update-golden imply --golden', () => {
    expect(parseArgs(['run', 'x', '--update-golden']).runOptions).toMatchObject({
      golden: true,
      updateGolden: true,
    });
  });

  describe('errors', () => {
    it('should reject unknown options', () => {
      const error = argumentError(['--bogus']);
      expect(error?.message).toBe('Unknown option: --bogus');
      expect(error?.arg).toBe('--bogus');
    });

    it('should require a value for --filter', () => {
      expect(argumentError(['run', 'x', '--filter'])?.message).toBe('--filter requires a value');
    });

    it('should reject run options outside the run command', () => {
      expect(argumentError(['--golden'])?.message).toBe('--golden is only valid with the run command');
    });

    it('should reject a second input file', () => {
      expect(argumentError(['a.txt', 'b.txt'])?.message).toBe('Unexpected argument: b.txt');
    });
  });
});
