/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Command-line entry point for running TestCase classes.
 *
 * @example
 * ```typescript
 * import { main } from '@unit-harness/unit';
 * import { ArithmeticTests, StringTests } from './tests.js';
 *
 * await main({ tests: [ArithmeticTests, StringTests] });
 * // node tests.js -v -k Arithmetic
 * ```
 */

import { Command } from 'commander';
import { TestLoader, type LoaderOptions, type TestCaseClass } from './loader.js';
import { TextTestRunner, type OutputStream } from './runner.js';
import type { TestResult } from './result.js';

/**
 * Options for `main()`.
 */
export interface ProgramOptions {
  /** TestCase classes to load */
  tests: Iterable<TestCaseClass>;
  /** Arguments to parse (default: process.argv without node and the script) */
  argv?: string[];
  /** Program name shown in help output (default: "unit") */
  name?: string;
  /** Builds the loader from the parsed options (default: a plain TestLoader) */
  createLoader?: (options: LoaderOptions) => TestLoader;
  /** Where the runner writes (default: process.stderr) */
  stream?: OutputStream;
  /** Verbosity when neither -v nor -q is given (default: 1) */
  verbosity?: number;
  /** Fail fast even without -f (default: false) */
  failfast?: boolean;
  /**
   * Behave as a process entry point (default: true): commander may exit on
   * bad arguments, `process.exitCode` reflects the outcome, and errors raised
   * outside any test end the process. When false, every error propagates.
   */
  exit?: boolean;
}

interface ParsedFlags {
  verbose?: boolean;
  quiet?: boolean;
  failfast?: boolean;
  pattern?: string[];
}

/**
 * Parse arguments, load the given TestCase classes, and run them.
 *
 * @returns The collected result
 */
export async function main(options: ProgramOptions): Promise<TestResult> {
  const exit = options.exit ?? true;

  const program = new Command()
    .name(options.name ?? 'unit')
    .description('Run unit tests')
    .option('-v, --verbose', 'One line per test')
    .option('-q, --quiet', 'Summary only')
    .option('-f, --failfast', 'Stop on the first failure or error')
    .option('-k, --pattern <patterns...>', 'Only run tests whose id contains (or wildcard-matches) a pattern');
  if (!exit) {
    program.exitOverride();
  }
  program.parse(options.argv ?? process.argv.slice(2), { from: 'user' });
  const flags = program.opts<ParsedFlags>();

  let verbosity = options.verbosity ?? 1;
  if (flags.verbose) {
    verbosity = 2;
  } else if (flags.quiet) {
    verbosity = 0;
  }

  const loaderOptions: LoaderOptions = flags.pattern ? { testNamePatterns: flags.pattern } : {};
  const loader = options.createLoader ? options.createLoader(loaderOptions) : new TestLoader(loaderOptions);
  const runner = new TextTestRunner({
    stream: options.stream,
    verbosity,
    failfast: flags.failfast ?? options.failfast ?? false,
  });

  try {
    const result = await runner.run(loader.loadTestsFromTestCases(options.tests));
    if (exit) {
      process.exitCode = result.wasSuccessful() ? 0 : 1;
    }
    return result;
  } catch (err) {
    if (!exit) {
      throw err;
    }
    exitError(err instanceof Error ? err.message : String(err));
  }
}

/**
 * Exit with error message.
 */
function exitError(message: string): never {
  console.error(`Error: ${message}`);
  process.exit(1);
}
