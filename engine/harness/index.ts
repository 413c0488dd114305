/**
 * Tablepaste Harness - Module Exports
 *
 * Command-line front end and golden-file regression runner for the
 * reconstruction engine.
 */

export { parseArgs, ArgumentError } from './CommandParser.js';
export type { CLIArgs } from './CommandParser.js';

export {
  HarnessRunner,
  createHarnessRunner,
  toTableOutput,
  formatOutput,
  formatTable,
} from './HarnessRunner.js';

export {
  RegressionRunner,
  createRegressionRunner,
  isFixtureFile,
  globToRegExp,
  discoverFixtures,
  getGoldenPath,
  toSnapshot,
  serializeSnapshot,
  parseSnapshot,
  compareSnapshots,
  runFixture,
  runFixtures,
  formatFixtureResult,
  formatSummary,
  formatSummaryAsJson,
} from './RegressionRunner.js';

export type {
  OutputType,
  Output,
  OutputBase,
  TableOutput,
  ErrorKind,
  ErrorOutput,
  InfoOutput,
  InputFormat,
  HarnessConfig,
} from './types.js';

export type {
  TableSnapshot,
  GoldenSnapshot,
  GoldenStatus,
  FixtureResult,
  RegressionSummary,
  RegressionRunnerOptions,
} from './RegressionRunner.js';

export { DEFAULT_CONFIG } from './types.js';
export { DEFAULT_REGRESSION_OPTIONS, FIXTURE_SUFFIXES } from './RegressionRunner.js';
