/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Test result collection.
 *
 * A TestResult is the sink every test reports into. Failed expectations and
 * unexpected exceptions are recorded here rather than thrown, so one failing
 * test never stops its siblings from running.
 */

import type { TestCase } from './case.js';

/**
 * A recorded failure or error.
 */
export interface TestOutcome {
  /** The test that produced the outcome */
  test: TestCase;
  /** The value that was thrown */
  error: unknown;
}

/**
 * A recorded skip.
 */
export interface SkipOutcome {
  test: TestCase;
  reason: string;
}

/**
 * Collects the outcome of every test run into it.
 */
export class TestResult {
  /** Number of tests started */
  testsRun = 0;
  /** Tests whose expectations failed */
  readonly failures: TestOutcome[] = [];
  /** Tests that raised something other than an assertion failure */
  readonly errors: TestOutcome[] = [];
  /** Tests that were skipped */
  readonly skipped: SkipOutcome[] = [];
  /** Tests that passed */
  readonly successes: TestCase[] = [];
  /** Set when the run should stop after the current test */
  shouldStop = false;
  /** Stop on the first failure or error */
  failfast = false;

  startTest(_test: TestCase): void {
    this.testsRun += 1;
  }

  stopTest(_test: TestCase): void {}

  addSuccess(test: TestCase): void {
    this.successes.push(test);
  }

  addFailure(test: TestCase, error: unknown): void {
    this.failures.push({ test, error });
    if (this.failfast) {
      this.stop();
    }
  }

  addError(test: TestCase, error: unknown): void {
    this.errors.push({ test, error });
    if (this.failfast) {
      this.stop();
    }
  }

  addSkip(test: TestCase, reason: string): void {
    this.skipped.push({ test, reason });
  }

  /**
   * Whether every test run so far passed (or was skipped).
   */
  wasSuccessful(): boolean {
    return this.failures.length === 0 && this.errors.length === 0;
  }

  /**
   * Ask the run to stop after the current test.
   */
  stop(): void {
    this.shouldStop = true;
  }
}
