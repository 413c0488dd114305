/**
 * Tablepaste Harness - Regression Runner
 *
 * Replays fixture pastes (*.paste.txt, *.html) through the harness and
 * checks each rebuilt table against a `<name>.golden.json` snapshot kept
 * beside the fixture. A missing snapshot is written on the first run.
 */

import * as fs from 'fs';
import * as path from 'path';
import { createHarnessRunner } from './HarnessRunner.js';
import type { HarnessConfig } from './types.js';
import type { ParsedTable, ReconstructionKind, Separator } from '../core/types/index.js';
import { widestRow } from '../core/cells/RowCleaner.js';

// =============================================================================
// Types
// =============================================================================

/** What a golden file records for a fixture that rebuilt into a table */
export interface TableSnapshot {
  tabular: true;
  kind: ReconstructionKind;
  separator: Separator;
  hasHeaders: boolean;
  isWikipediaStyle: boolean;
  rows: string[][];
}

export type GoldenSnapshot = TableSnapshot | { tabular: false };

export type GoldenStatus = 'created' | 'updated' | 'matched' | 'mismatched';

export interface FixtureResult {
  filePath: string;
  fileName: string;
  passed: boolean;
  /** null when the fixture could not be read */
  snapshot: GoldenSnapshot | null;
  failure?: string;
  golden?: GoldenStatus;
  /** Golden mismatches, one line each */
  differences: string[];
  /** Verbose diagnostics from the harness */
  notes: string[];
}

export interface RegressionSummary {
  results: FixtureResult[];
  passed: number;
  failed: number;
  allPassed: boolean;
}

export interface RegressionRunnerOptions {
  /** Compare against golden files */
  golden: boolean;
  /** Rewrite golden files instead of comparing */
  updateGolden: boolean;
  /** Harness configuration overrides */
  config: Partial<HarnessConfig>;
  verbose: boolean;
  outputFormat: 'pretty' | 'json';
  /** Case-insensitive substring of the fixture file name */
  filter?: string;
  /** Stop on first failure */
  failFast: boolean;
}

export const DEFAULT_REGRESSION_OPTIONS: RegressionRunnerOptions = {
  golden: false,
  updateGolden: false,
  config: {},
  verbose: false,
  outputFormat: 'pretty',
  failFast: false,
};

/** Fixture file name suffixes, longest first */
export const FIXTURE_SUFFIXES = ['.paste.txt', '.html', '.htm'];

const GOLDEN_SUFFIX = '.golden.json';
const MAX_CELL_DIFFERENCES = 10;

const RECONSTRUCTION_KINDS: readonly ReconstructionKind[] = [
  'splitRow', 'spanningHeader', 'multilineHeader', 'wikipediaHeader', 'wikipediaRows', 'plain',
];
const SEPARATORS: readonly Separator[] = ['\t', ',', null];

// =============================================================================
// Fixture Discovery
// =============================================================================

export function isFixtureFile(fileName: string): boolean {
  const lower = fileName.toLowerCase();
  return FIXTURE_SUFFIXES.some(suffix => lower.endsWith(suffix));
}

function toPosix(filePath: string): string {
  return filePath.split(path.sep).join('/');
}

function listFixtures(dir: string, recursive: boolean): string[] {
  return fs.readdirSync(dir, { withFileTypes: true }).flatMap(entry => {
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) return recursive ? listFixtures(fullPath, true) : [];
    return entry.isFile() && isFixtureFile(entry.name) ? [fullPath] : [];
  });
}

/**
 * Glob over a whole posix path: `**` spans directories, `*` and `?` stay
 * inside one path segment.
 */
export function globToRegExp(glob: string): RegExp {
  let source = '';
  for (let i = 0; i < glob.length; i++) {
    const ch = glob[i];
    if (ch === '*' && glob[i + 1] === '*') {
      const crossesSlash = glob[i + 2] === '/';
      source += crossesSlash ? '(?:[^/]*/)*' : '.*';
      i += crossesSlash ? 2 : 1;
    } else if (ch === '*') {
      source += '[^/]*';
    } else if (ch === '?') {
      source += '[^/]';
    } else {
      source += ch.replace(/[.+^${}()|[\]\\]/g, '\\$&');
    }
  }
  return new RegExp(`^${source}$`, 'i');
}

/**
 * Resolve a target to fixture paths. A file is taken as is, a directory
 * yields the fixtures directly inside it, anything else is a glob.
 */
export function discoverFixtures(target: string, basePath: string = process.cwd()): string[] {
  const resolved = path.resolve(basePath, target);

  if (fs.existsSync(resolved)) {
    const stat = fs.statSync(resolved);
    if (stat.isFile()) return [resolved];
    if (stat.isDirectory()) return listFixtures(resolved, false).sort();
  }
  if (!/[*?]/.test(target)) return [];

  const pattern = toPosix(resolved);
  const segments = pattern.split('/');
  const firstWildcard = segments.findIndex(segment => /[*?]/.test(segment));
  const root = segments.slice(0, firstWildcard).join('/') || '/';
  if (!fs.existsSync(root) || !fs.statSync(root).isDirectory()) return [];

  const matcher = globToRegExp(pattern);
  return listFixtures(root, true)
    .filter(file => matcher.test(toPosix(file)))
    .sort();
}

// =============================================================================
// Golden Snapshots
// =============================================================================

/**
 * `cities.paste.txt` -> `cities.golden.json`, in the same directory.
 */
export function getGoldenPath(fixturePath: string): string {
  const fileName = path.basename(fixturePath);
  const lower = fileName.toLowerCase();
  const suffix = FIXTURE_SUFFIXES.find(s => lower.endsWith(s)) ?? path.extname(fileName);
  return path.join(path.dirname(fixturePath), `${fileName.slice(0, fileName.length - suffix.length)}${GOLDEN_SUFFIX}`);
}

export function toSnapshot(table: ParsedTable | null): GoldenSnapshot {
  if (table === null) return { tabular: false };
  return {
    tabular: true,
    kind: table.kind,
    separator: table.separator,
    hasHeaders: table.hasHeaders,
    isWikipediaStyle: table.isWikipediaStyle,
    rows: table.rows,
  };
}

export function serializeSnapshot(snapshot: GoldenSnapshot): string {
  return JSON.stringify(snapshot, null, 2) + '\n';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isRowGrid(value: unknown): value is string[][] {
  return Array.isArray(value) &&
    value.every(row => Array.isArray(row) && row.every(cell => typeof cell === 'string'));
}

/**
 * Read golden file content back. Returns null for anything that is not a
 * snapshot.
 */
export function parseSnapshot(content: string): GoldenSnapshot | null {
  let value: unknown;
  try {
    value = JSON.parse(content);
  } catch {
    return null;
  }
  if (!isRecord(value)) return null;

  const { tabular, kind: rawKind, separator: rawSeparator, hasHeaders, isWikipediaStyle, rows } = value;
  if (tabular === false) return { tabular: false };

  const kind = RECONSTRUCTION_KINDS.find(k => k === rawKind);
  const separator = SEPARATORS.find(s => s === rawSeparator);
  if (
    tabular !== true ||
    kind === undefined ||
    separator === undefined ||
    typeof hasHeaders !== 'boolean' ||
    typeof isWikipediaStyle !== 'boolean' ||
    !isRowGrid(rows)
  ) {
    return null;
  }

  return { tabular: true, kind, separator, hasHeaders, isWikipediaStyle, rows };
}

function describeShape(snapshot: GoldenSnapshot): string {
  return snapshot.tabular
    ? `${snapshot.rows.length}x${widestRow(snapshot.rows)} table`
    : 'no table';
}

function quoteCell(cell: string | undefined): string {
  return cell === undefined ? 'nothing' : JSON.stringify(cell);
}

/**
 * List how `actual` departs from `expected`: table fields first, then the
 * shape, then differing cells by [row,col] (the first few only).
 */
export function compareSnapshots(expected: GoldenSnapshot, actual: GoldenSnapshot): string[] {
  if (expected.tabular === false || actual.tabular === false) {
    return expected.tabular === actual.tabular
      ? []
      : [`expected ${describeShape(expected)}, got ${describeShape(actual)}`];
  }

  const differences: string[] = [];
  for (const field of ['kind', 'separator', 'hasHeaders', 'isWikipediaStyle'] as const) {
    if (expected[field] !== actual[field]) {
      differences.push(`${field}: expected ${JSON.stringify(expected[field])}, got ${JSON.stringify(actual[field])}`);
    }
  }

  const expectedShape = `${expected.rows.length}x${widestRow(expected.rows)}`;
  const actualShape = `${actual.rows.length}x${widestRow(actual.rows)}`;
  if (expectedShape !== actualShape) {
    differences.push(`shape: expected ${expectedShape}, got ${actualShape}`);
  }

  const cells: string[] = [];
  const rowCount = Math.max(expected.rows.length, actual.rows.length);
  for (let r = 0; r < rowCount; r++) {
    const expectedRow = expected.rows[r] ?? [];
    const actualRow = actual.rows[r] ?? [];
    const width = Math.max(expectedRow.length, actualRow.length);
    for (let c = 0; c < width; c++) {
      const want = expectedRow[c];
      const got = actualRow[c];
      if (want !== got) {
        cells.push(`cell [${r},${c}]: expected ${quoteCell(want)}, got ${quoteCell(got)}`);
      }
    }
  }

  differences.push(...cells.slice(0, MAX_CELL_DIFFERENCES));
  if (cells.length > MAX_CELL_DIFFERENCES) {
    differences.push(`${cells.length - MAX_CELL_DIFFERENCES} more cell(s) differ`);
  }
  return differences;
}

// =============================================================================
// Execution
// =============================================================================

function checkGolden(result: FixtureResult, snapshot: GoldenSnapshot, updateGolden: boolean): void {
  const goldenPath = getGoldenPath(result.filePath);
  const exists = fs.existsSync(goldenPath);

  if (!exists || updateGolden) {
    fs.writeFileSync(goldenPath, serializeSnapshot(snapshot), 'utf-8');
    result.golden = exists ? 'updated' : 'created';
    return;
  }

  const expected = parseSnapshot(fs.readFileSync(goldenPath, 'utf-8'));
  const differences = expected === null
    ? ['golden file is not a table snapshot']
    : compareSnapshots(expected, snapshot);

  if (differences.length === 0) {
    result.golden = 'matched';
    return;
  }
  result.golden = 'mismatched';
  result.passed = false;
  result.differences = differences;
  if (result.failure === undefined) result.failure = 'Golden file mismatch';
}

/**
 * Rebuild one fixture with a fresh harness runner. A fixture fails when it
 * is unreadable, not tabular, or off its golden snapshot.
 */
export function runFixture(filePath: string, options: RegressionRunnerOptions): FixtureResult {
  const fileName = path.basename(filePath);
  const notes: string[] = [];
  const runner = createHarnessRunner({ ...options.config, verbose: options.verbose }, (output) => {
    if (output.type === 'info') notes.push(output.message);
  });

  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return {
      filePath,
      fileName,
      passed: false,
      snapshot: null,
      failure: `Cannot read fixture: ${message}`,
      differences: [],
      notes,
    };
  }

  const snapshot = toSnapshot(runner.runInput(content, fileName));
  const result: FixtureResult = {
    filePath,
    fileName,
    passed: snapshot.tabular,
    snapshot,
    differences: [],
    notes,
  };
  if (!snapshot.tabular) result.failure = 'No tabular data found';

  if (options.golden) checkGolden(result, snapshot, options.updateGolden);
  return result;
}

export function runFixtures(
  files: string[],
  options: RegressionRunnerOptions,
  onResult?: (result: FixtureResult) => void
): RegressionSummary {
  const needle = options.filter?.toLowerCase();
  const selected = needle === undefined
    ? files
    : files.filter(file => path.basename(file).toLowerCase().includes(needle));

  const results: FixtureResult[] = [];
  for (const file of selected) {
    const result = runFixture(file, options);
    results.push(result);
    onResult?.(result);
    if (options.failFast && !result.passed) break;
  }

  const passed = results.filter(result => result.passed).length;
  return {
    results,
    passed,
    failed: results.length - passed,
    allPassed: passed === results.length,
  };
}

// =============================================================================
// Reporting
// =============================================================================

function paint(code: number, text: string): string {
  return `\x1b[${code}m${text}\x1b[0m`;
}

export function formatFixtureResult(result: FixtureResult, verbose: boolean = false): string {
  const { snapshot } = result;
  let head = `${result.passed ? paint(32, 'PASS') : paint(31, 'FAIL')} ${result.fileName}`;
  if (snapshot !== null && snapshot.tabular) {
    head += `  ${snapshot.kind} ${snapshot.rows.length}x${widestRow(snapshot.rows)}`;
  }
  if (result.golden === 'created' || result.golden === 'updated') {
    head += ` ${paint(33, `[golden ${result.golden}]`)}`;
  }

  const lines = [head];
  if (result.failure !== undefined) lines.push(`  ${paint(31, result.failure)}`);
  lines.push(...result.differences.map(difference => `    ${difference}`));
  if (verbose) lines.push(...result.notes.map(note => `  ${paint(90, note)}`));
  return lines.join('\n');
}

export function formatSummary(summary: RegressionSummary): string {
  return paint(summary.allPassed ? 32 : 31, `${summary.passed} passed, ${summary.failed} failed`);
}

export function formatSummaryAsJson(summary: RegressionSummary): string {
  return JSON.stringify({
    passed: summary.passed,
    failed: summary.failed,
    allPassed: summary.allPassed,
    results: summary.results.map(result => ({
      file: result.fileName,
      passed: result.passed,
      golden: result.golden,
      failure: result.failure,
      differences: result.differences,
    })),
  }, null, 2);
}

// =============================================================================
// Runner
// =============================================================================

export class RegressionRunner {
  private options: RegressionRunnerOptions;
  private write: (line: string) => void;

  constructor(
    options: Partial<RegressionRunnerOptions> = {},
    write: (line: string) => void = line => console.log(line)
  ) {
    this.options = { ...DEFAULT_REGRESSION_OPTIONS, ...options };
    this.write = write;
  }

  /**
   * Run every fixture the targets resolve to. Finding no fixture at all
   * counts as a failed run.
   */
  run(targets: string[], basePath?: string): RegressionSummary {
    const files = [...new Set(targets.flatMap(target => discoverFixtures(target, basePath)))].sort();
    if (files.length === 0) {
      this.write(`No fixtures found matching: ${targets.join(', ')}`);
      return { results: [], passed: 0, failed: 0, allPassed: false };
    }

    const pretty = this.options.outputFormat === 'pretty';
    const summary = runFixtures(files, this.options, (result) => {
      if (pretty) this.write(formatFixtureResult(result, this.options.verbose));
    });
    this.write(pretty ? formatSummary(summary) : formatSummaryAsJson(summary));
    return summary;
  }
}

export function createRegressionRunner(
  options?: Partial<RegressionRunnerOptions>,
  write?: (line: string) => void
): RegressionRunner {
  return new RegressionRunner(options, write);
}
