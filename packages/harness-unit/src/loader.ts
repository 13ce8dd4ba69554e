/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Test discovery.
 *
 * Turns TestCase classes into suites holding one instance per test method.
 * Subclasses change the kind of suite produced by overriding `createSuite`.
 */

import { TestCase } from './case.js';
import { TestSuite, type Test } from './suite.js';

/**
 * A concrete TestCase class.
 */
export interface TestCaseClass<T extends TestCase = TestCase> {
  new (methodName: string): T;
  readonly prototype: T;
  readonly name: string;
}

/**
 * Options for a TestLoader.
 */
export interface LoaderOptions {
  /** Prefix identifying test methods (default: "test") */
  testMethodPrefix?: string;
  /**
   * Only load tests whose id contains one of these substrings, or matches
   * one of them as a `*` wildcard pattern (default: load everything)
   */
  testNamePatterns?: string[];
}

export class TestLoader {
  readonly testMethodPrefix: string;
  readonly testNamePatterns: string[];

  constructor(options: LoaderOptions = {}) {
    this.testMethodPrefix = options.testMethodPrefix ?? 'test';
    this.testNamePatterns = options.testNamePatterns ?? [];
  }

  /**
   * Build the suite that holds the given tests.
   */
  createSuite(tests: Test[]): TestSuite {
    return new TestSuite(tests);
  }

  /**
   * Sorted names of the test methods of a TestCase class, searched up its
   * prototype chain (stopping at TestCase itself).
   */
  getTestCaseNames(caseClass: TestCaseClass): string[] {
    const names = new Set<string>();
    let proto: object | null = caseClass.prototype;
    while (proto !== null && proto !== TestCase.prototype && proto !== Object.prototype) {
      for (const name of Object.getOwnPropertyNames(proto)) {
        if (!name.startsWith(this.testMethodPrefix)) {
          continue;
        }
        const descriptor = Object.getOwnPropertyDescriptor(proto, name);
        if (typeof descriptor?.value !== 'function') {
          continue;
        }
        if (this.matchesPatterns(`${caseClass.name}.${name}`)) {
          names.add(name);
        }
      }
      proto = Object.getPrototypeOf(proto);
    }
    return [...names].sort();
  }

  /**
   * Load one suite holding an instance of `caseClass` per test method.
   *
   * A class without test methods that defines `runTest` yields a single
   * `runTest` instance.
   */
  loadTestsFromTestCase(caseClass: TestCaseClass): TestSuite {
    let names = this.getTestCaseNames(caseClass);
    if (names.length === 0 && typeof Reflect.get(caseClass.prototype, 'runTest') === 'function') {
      names = ['runTest'];
    }
    return this.createSuite(names.map((name) => new caseClass(name)));
  }

  /**
   * Load a suite holding one suite per class.
   */
  loadTestsFromTestCases(caseClasses: Iterable<TestCaseClass>): TestSuite {
    const suites: Test[] = [];
    for (const caseClass of caseClasses) {
      suites.push(this.loadTestsFromTestCase(caseClass));
    }
    return this.createSuite(suites);
  }

  private matchesPatterns(fullName: string): boolean {
    if (this.testNamePatterns.length === 0) {
      return true;
    }
    return this.testNamePatterns.some((pattern) =>
      pattern.includes('*') ? wildcardToRegExp(pattern).test(fullName) : fullName.includes(pattern)
    );
  }
}

function wildcardToRegExp(pattern: string): RegExp {
  const escaped = pattern
    .split('*')
    .map((part) => part.replace(/[.+?^${}()|[\]\\]/g, '\\$&'))
    .join('.*');
  return new RegExp(`^${escaped}$`);
}
