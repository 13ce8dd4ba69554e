/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Text test runner.
 *
 * Runs a test or suite and writes progress, failure reports and a summary
 * to a stream (stderr by default).
 */

import type { TestCase } from './case.js';
import { formatError } from './errors.js';
import { TestResult, type TestOutcome } from './result.js';
import type { Test } from './suite.js';

const SEPARATOR_HEAVY = '='.repeat(70);
const SEPARATOR_LIGHT = '-'.repeat(70);

/**
 * Minimal writable the runner reports to.
 */
export interface OutputStream {
  write(chunk: string): unknown;
}

/**
 * Runner configuration.
 */
export interface RunnerOptions {
  /** Where to write output (default: process.stderr) */
  stream?: OutputStream;
  /** 0 = summary only, 1 = one character per test, 2 = one line per test (default: 1) */
  verbosity?: number;
  /** Stop on the first failure or error (default: false) */
  failfast?: boolean;
}

/**
 * A TestResult that reports progress as tests complete.
 */
export class TextTestResult extends TestResult {
  constructor(
    private readonly stream: OutputStream,
    private readonly verbosity: number
  ) {
    super();
  }

  startTest(test: TestCase): void {
    super.startTest(test);
    if (this.verbosity > 1) {
      this.stream.write(`${test.toString()} ... `);
    }
  }

  addSuccess(test: TestCase): void {
    super.addSuccess(test);
    this.report('ok', '.');
  }

  addFailure(test: TestCase, error: unknown): void {
    super.addFailure(test, error);
    this.report('FAIL', 'F');
  }

  addError(test: TestCase, error: unknown): void {
    super.addError(test, error);
    this.report('ERROR', 'E');
  }

  addSkip(test: TestCase, reason: string): void {
    super.addSkip(test, reason);
    this.report(`skipped '${reason}'`, 's');
  }

  /**
   * Write the detailed report of every error and failure.
   */
  printErrors(): void {
    if (this.verbosity === 1) {
      this.stream.write('\n');
    }
    this.printErrorList('ERROR', this.errors);
    this.printErrorList('FAIL', this.failures);
  }

  private printErrorList(flavour: string, outcomes: TestOutcome[]): void {
    for (const { test, error } of outcomes) {
      this.stream.write(`${SEPARATOR_HEAVY}\n`);
      this.stream.write(`${flavour}: ${test.toString()}\n`);
      this.stream.write(`${SEPARATOR_LIGHT}\n`);
      this.stream.write(`${formatError(error)}\n\n`);
    }
  }

  private report(word: string, character: string): void {
    if (this.verbosity > 1) {
      this.stream.write(`${word}\n`);
    } else if (this.verbosity === 1) {
      this.stream.write(character);
    }
  }
}

export class TextTestRunner {
  private readonly stream: OutputStream;
  private readonly verbosity: number;
  private readonly failfast: boolean;

  constructor(options: RunnerOptions = {}) {
    this.stream = options.stream ?? process.stderr;
    this.verbosity = options.verbosity ?? 1;
    this.failfast = options.failfast ?? false;
  }

  /**
   * Run a test or suite and print the summary.
   *
   * Errors raised outside any single test (for example a suite that could
   * not start its server) propagate to the caller.
   */
  async run(test: Test): Promise<TextTestResult> {
    const result = new TextTestResult(this.stream, this.verbosity);
    result.failfast = this.failfast;

    const startedAt = performance.now();
    await test.run(result);
    const seconds = (performance.now() - startedAt) / 1000;

    result.printErrors();
    this.stream.write(`${SEPARATOR_LIGHT}\n`);
    const count = result.testsRun;
    this.stream.write(`Ran ${count} test${count === 1 ? '' : 's'} in ${seconds.toFixed(3)}s\n\n`);

    const details: string[] = [];
    if (result.failures.length > 0) {
      details.push(`failures=${result.failures.length}`);
    }
    if (result.errors.length > 0) {
      details.push(`errors=${result.errors.length}`);
    }
    if (result.skipped.length > 0) {
      details.push(`skipped=${result.skipped.length}`);
    }
    const status = result.wasSuccessful() ? 'OK' : 'FAILED';
    this.stream.write(details.length > 0 ? `${status} (${details.join(', ')})\n` : `${status}\n`);

    return result;
  }
}
