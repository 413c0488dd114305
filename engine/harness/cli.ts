#!/usr/bin/env node
/**
 * Tablepaste Harness - CLI Entry Point
 *
 * Usage:
 *   # Single paste
 *   tablepaste paste.txt [options]
 *   pbpaste | tablepaste --pretty
 *   tablepaste clipboard.html --headers
 *
 *   # Regression runner
 *   tablepaste run <glob-or-path> [options]
 *   tablepaste run engine/fixtures --golden
 *   tablepaste run "engine/fixtures/*.html" --golden --verbose
 */

import * as fs from 'fs';
import * as readline from 'readline';
import { createHarnessRunner } from './HarnessRunner.js';
import type { HarnessConfig } from './types.js';
import { DEFAULT_CONFIG } from './types.js';
import { ArgumentError, parseArgs } from './CommandParser.js';
import type { CLIArgs } from './CommandParser.js';
import {
  createRegressionRunner,
  DEFAULT_REGRESSION_OPTIONS,
} from './RegressionRunner.js';
import type { RegressionRunnerOptions } from './RegressionRunner.js';

// =============================================================================
// Help Text
// =============================================================================

const HELP_TEXT = `
Tablepaste - clipboard table reconstruction

USAGE:
  # Single paste (file, or stdin when no file is given)
  tablepaste [file] [options]
  pbpaste | tablepaste --pretty

  # Regression runner
  tablepaste run <glob-or-path...> [options]
  tablepaste run engine/fixtures --golden
  tablepaste run "engine/fixtures/*.paste.txt" --filter cities

OPTIONS:
  --pretty          Boxed text table (default: JSON)
  --json            JSON output (one object per line)
  --html            Treat the paste as the HTML clipboard flavour
  --text            Treat the paste as plain text, whatever its extension
  --headers         Force the first row to be the header
  --no-headers      Force the first row to be data
  --timestamps      Include timestamps in output
  --verbose, -v     Print classification and fallback diagnostics
  --help, -h        Show this help message

RUN COMMAND OPTIONS:
  --golden          Compare against <name>.golden.json
  --update-golden   Create/update golden files (implies --golden)
  --filter <str>    Run only fixtures matching substring
  --fail-fast       Stop on first failure
`;

// =============================================================================
// Main Entry Point
// =============================================================================

async function main(): Promise<void> {
  let cliArgs: CLIArgs;
  try {
    cliArgs = parseArgs(process.argv.slice(2));
  } catch (error) {
    if (error instanceof ArgumentError) {
      console.error(`Error: ${error.message}`);
      console.error('Run with --help for usage.');
      process.exit(1);
    }
    throw error;
  }

  if (cliArgs.help) {
    console.log(HELP_TEXT);
    process.exit(0);
  }

  // Handle 'run' subcommand for regression testing
  if (cliArgs.subcommand === 'run') {
    runRegression(cliArgs);
    return;
  }

  const config: HarnessConfig = {
    ...DEFAULT_CONFIG,
    ...cliArgs.config,
  };

  await runSinglePaste(cliArgs.inputPath, config);
}

// =============================================================================
// Single Paste
// =============================================================================

async function runSinglePaste(inputPath: string | undefined, config: HarnessConfig): Promise<void> {
  const runner = createHarnessRunner(config);
  const filePath = inputPath === undefined || inputPath === '-' ? null : inputPath;

  if (filePath === null && process.stdin.isTTY) {
    console.log(HELP_TEXT);
    process.exit(1);
  }

  let content: string;
  try {
    content = filePath === null ? await readStdin() : fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    runner.reportError(error, 'Input', filePath ?? 'stdin');
    process.exit(1);
  }

  const table = runner.runInput(content, filePath ?? undefined);
  process.exit(table === null ? 1 : 0);
}

async function readStdin(): Promise<string> {
  const rl = readline.createInterface({
    input: process.stdin,
    terminal: false,
  });

  const lines: string[] = [];
  for await (const line of rl) {
    lines.push(line);
  }
  return lines.join('\n');
}

// =============================================================================
// Regression Runner
// =============================================================================

function runRegression(cliArgs: CLIArgs): void {
  const patterns = cliArgs.subcommandArgs;

  if (patterns.length === 0) {
    console.error('Error: run command requires at least one file path or glob pattern');
    console.error('Usage: tablepaste run <glob-or-path> [options]');
    console.error('Examples:');
    console.error('  tablepaste run engine/fixtures/cities.paste.txt');
    console.error('  tablepaste run "engine/fixtures/*.html"');
    console.error('  tablepaste run engine/fixtures --golden');
    process.exit(1);
  }

  const options: Partial<RegressionRunnerOptions> = {
    ...DEFAULT_REGRESSION_OPTIONS,
    ...cliArgs.runOptions,
    config: cliArgs.config,
  };

  const result = createRegressionRunner(options).run(patterns);
  process.exit(result.allPassed ? 0 : 1);
}

// Run
main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
