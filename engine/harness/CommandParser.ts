/**
 * Tablepaste Harness - Command Parser
 *
 * Parses command-line arguments.
 *
 *   tablepaste [file] [--html] [--headers|--no-headers] [--pretty|--json] [--verbose]
 *   tablepaste run <glob-or-path...> [--golden] [--update-golden] [--filter <str>] [--fail-fast]
 */

import type { HarnessConfig } from './types.js';
import type { RegressionRunnerOptions } from './RegressionRunner.js';

// =============================================================================
// Types
// =============================================================================

export interface CLIArgs {
  config: Partial<HarnessConfig>;
  help: boolean;
  /** Subcommand: 'run' for regression testing, undefined for a single paste */
  subcommand?: 'run';
  /** Paste file for single-paste mode; stdin when absent */
  inputPath?: string;
  /** Arguments for subcommand */
  subcommandArgs: string[];
  /** Options for run subcommand */
  runOptions: Partial<RegressionRunnerOptions>;
}

// =============================================================================
// Errors
// =============================================================================

export class ArgumentError extends Error {
  arg: string;

  constructor(message: string, arg: string) {
    super(message);
    this.name = 'ArgumentError';
    this.arg = arg;
  }
}

// =============================================================================
// Parsing
// =============================================================================

const RUN_ONLY_OPTIONS = new Set(['--golden', '--update-golden', '--fail-fast', '--filter']);

/**
 * Parse `process.argv.slice(2)`.
 *
 * @throws ArgumentError on unknown options, missing values, or a second
 *   input file
 */
export function parseArgs(args: string[]): CLIArgs {
  const result: CLIArgs = {
    config: {},
    help: false,
    subcommandArgs: [],
    runOptions: {},
  };

  let i = 0;

  // Check for subcommand first
  if (args.length > 0 && args[0] === 'run') {
    result.subcommand = 'run';
    i = 1;
    // Default to pretty output for run command
    result.runOptions.outputFormat = 'pretty';
  }

  while (i < args.length) {
    const arg = args[i];

    if (RUN_ONLY_OPTIONS.has(arg) && result.subcommand !== 'run') {
      throw new ArgumentError(`${arg} is only valid with the run command`, arg);
    }

    switch (arg) {
      case '--pretty':
        result.config.outputFormat = 'pretty';
        result.runOptions.outputFormat = 'pretty';
        break;
      case '--json':
        result.config.outputFormat = 'json';
        result.runOptions.outputFormat = 'json';
        break;
      case '--timestamps':
        result.config.includeTimestamps = true;
        break;
      case '--html':
        result.config.inputFormat = 'html';
        break;
      case '--text':
        result.config.inputFormat = 'text';
        break;
      case '--headers':
        result.config.hasHeaders = true;
        break;
      case '--no-headers':
        result.config.hasHeaders = false;
        break;
      case '--verbose':
      case '-v':
        result.config.verbose = true;
        result.runOptions.verbose = true;
        break;
      case '--help':
      case '-h':
        result.help = true;
        break;
      // Run command specific options
      case '--golden':
        result.runOptions.golden = true;
        break;
      case '--update-golden':
        result.runOptions.golden = true;
        result.runOptions.updateGolden = true;
        break;
      case '--fail-fast':
        result.runOptions.failFast = true;
        break;
      case '--filter':
        i++;
        if (i >= args.length) {
          throw new ArgumentError('--filter requires a value', arg);
        }
        result.runOptions.filter = args[i];
        break;
      default:
        if (arg.startsWith('-') && arg !== '-') {
          throw new ArgumentError(`Unknown option: ${arg}`, arg);
        } else if (result.subcommand) {
          result.subcommandArgs.push(arg);
        } else if (result.inputPath === undefined) {
          result.inputPath = arg;
        } else {
          throw new ArgumentError(`Unexpected argument: ${arg}`, arg);
        }
    }
    i++;
  }

  return result;
}
