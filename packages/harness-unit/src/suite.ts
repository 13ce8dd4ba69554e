/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Composite tests.
 *
 * A suite holds leaves (single test cases) and groups (nested suites). Each
 * member is tagged when it is added, so code walking a suite never has to
 * guess which of the two it is looking at.
 */

import { TestCase } from './case.js';
import { TestResult } from './result.js';

/**
 * Anything a suite can hold.
 */
export type Test = TestCase | TestSuite;

/**
 * A tagged suite member.
 */
export type SuiteMember =
  | { type: 'leaf'; test: TestCase }
  | { type: 'group'; suite: TestSuite };

export class TestSuite implements Iterable<Test> {
  private readonly entries: SuiteMember[] = [];

  constructor(tests: Iterable<Test> = []) {
    this.addTests(tests);
  }

  addTest(test: Test): void {
    if (test instanceof TestSuite) {
      this.entries.push({ type: 'group', suite: test });
    } else {
      this.entries.push({ type: 'leaf', test });
    }
  }

  addTests(tests: Iterable<Test>): void {
    for (const test of tests) {
      this.addTest(test);
    }
  }

  /**
   * Direct members, in the order they were added.
   */
  get members(): readonly SuiteMember[] {
    return this.entries;
  }

  *[Symbol.iterator](): Iterator<Test> {
    for (const member of this.entries) {
      yield member.type === 'leaf' ? member.test : member.suite;
    }
  }

  /**
   * Number of leaves, counted through every level of nesting.
   */
  countTestCases(): number {
    let count = 0;
    for (const member of this.entries) {
      count += member.type === 'leaf' ? 1 : member.suite.countTestCases();
    }
    return count;
  }

  /**
   * Run every member in order, one at a time, stopping early once the
   * result asks to.
   */
  async run(result: TestResult = new TestResult()): Promise<TestResult> {
    for (const member of this.entries) {
      if (result.shouldStop) {
        break;
      }
      if (member.type === 'leaf') {
        await member.test.run(result);
      } else {
        await member.suite.run(result);
      }
    }
    return result;
  }

  /**
   * Run every member without collecting results; the first error propagates.
   */
  async debug(): Promise<void> {
    for (const member of this.entries) {
      if (member.type === 'leaf') {
        await member.test.debug();
      } else {
        await member.suite.debug();
      }
    }
  }
}
