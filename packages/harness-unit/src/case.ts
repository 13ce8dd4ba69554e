/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * The xUnit test case.
 *
 * One TestCase instance runs one test method, named at construction. The
 * loader builds one instance per method. `run()` records outcomes into a
 * TestResult; `debug()` runs the same steps and lets errors propagate.
 *
 * `setUp`, the test method and `tearDown` are always looked up on the
 * instance at call time and called with no arguments, so a wrapper that
 * temporarily shadows them with own properties changes what runs without
 * the host knowing.
 */

import assert from 'node:assert/strict';
import { inspect, isDeepStrictEqual } from 'node:util';
import { TestResult } from './result.js';
import { SkipTest, isAssertionFailure } from './errors.js';

export type Awaitable<T> = T | Promise<T>;

/**
 * A function registered with `addCleanup()`.
 */
export type Cleanup = () => Awaitable<void>;

/**
 * What `assertRejects()` accepts to match the rejection.
 */
export type RejectionMatcher =
  | RegExp
  | (new (...args: never[]) => Error)
  | ((error: unknown) => boolean);

export class TestCase {
  /** Name of the test method this instance runs */
  readonly methodName: string;
  private readonly cleanups: Cleanup[] = [];

  constructor(methodName: string = 'runTest') {
    if (typeof Reflect.get(this, methodName) !== 'function') {
      throw new TypeError(`No test method '${methodName}' on ${this.constructor.name}`);
    }
    this.methodName = methodName;
  }

  // ===========================================================================
  // Fixtures
  // ===========================================================================

  /**
   * Hook run before the test method. Subclasses may declare parameters; the
   * host itself always calls it without arguments.
   */
  setUp(..._resources: unknown[]): Awaitable<void> {}

  /**
   * Hook run after the test method, when `setUp` succeeded.
   */
  tearDown(..._resources: unknown[]): Awaitable<void> {}

  /**
   * Register a function to run after `tearDown`, in reverse order of
   * registration. Cleanups run even when `setUp` fails.
   */
  addCleanup(cleanup: Cleanup): void {
    this.cleanups.push(cleanup);
  }

  // ===========================================================================
  // Identity
  // ===========================================================================

  id(): string {
    return `${this.constructor.name}.${this.methodName}`;
  }

  toString(): string {
    return `${this.methodName} (${this.constructor.name})`;
  }

  // ===========================================================================
  // Execution
  // ===========================================================================

  /**
   * Run the test, recording its outcome into `result`.
   *
   * @param result - Result sink (a fresh one when omitted)
   * @returns The result the outcome was recorded into
   */
  async run(result: TestResult = new TestResult()): Promise<TestResult> {
    result.startTest(this);
    try {
      let passed = await this.attempt(result, () => this.setUp());
      if (passed) {
        passed = await this.attempt(result, () => this.invokeTestMethod());
        passed = (await this.attempt(result, () => this.tearDown())) && passed;
      }
      passed = (await this.runCleanups(result)) && passed;
      if (passed) {
        result.addSuccess(this);
      }
    } finally {
      result.stopTest(this);
    }
    return result;
  }

  /**
   * Run the test without collecting the result; the first error propagates.
   */
  async debug(): Promise<void> {
    await this.setUp();
    await this.invokeTestMethod();
    await this.tearDown();
    let cleanup = this.cleanups.pop();
    while (cleanup) {
      await cleanup();
      cleanup = this.cleanups.pop();
    }
  }

  private async invokeTestMethod(): Promise<void> {
    const method: unknown = Reflect.get(this, this.methodName);
    if (typeof method !== 'function') {
      throw new TypeError(`No test method '${this.methodName}' on ${this.constructor.name}`);
    }
    await Reflect.apply(method, this, []);
  }

  private async attempt(result: TestResult, step: () => Awaitable<unknown>): Promise<boolean> {
    try {
      await step();
      return true;
    } catch (err) {
      if (err instanceof SkipTest) {
        result.addSkip(this, err.reason);
      } else if (isAssertionFailure(err)) {
        result.addFailure(this, err);
      } else {
        result.addError(this, err);
      }
      return false;
    }
  }

  private async runCleanups(result: TestResult): Promise<boolean> {
    let passed = true;
    let cleanup = this.cleanups.pop();
    while (cleanup) {
      const current = cleanup;
      passed = (await this.attempt(result, () => current())) && passed;
      cleanup = this.cleanups.pop();
    }
    return passed;
  }

  // ===========================================================================
  // Assertions
  // ===========================================================================

  assertEqual(actual: unknown, expected: unknown, message?: string): void {
    assert.deepStrictEqual(actual, expected, message);
  }

  assertNotEqual(actual: unknown, expected: unknown, message?: string): void {
    assert.notDeepStrictEqual(actual, expected, message);
  }

  assertTrue(value: unknown, message?: string): void {
    assert.ok(value, message ?? `${inspect(value)} is not truthy`);
  }

  assertFalse(value: unknown, message?: string): void {
    assert.ok(!value, message ?? `${inspect(value)} is not falsy`);
  }

  /** Identity comparison (`Object.is`). */
  assertIs(actual: unknown, expected: unknown, message?: string): void {
    assert.strictEqual(actual, expected, message);
  }

  assertIsNot(actual: unknown, expected: unknown, message?: string): void {
    assert.notStrictEqual(actual, expected, message);
  }

  /**
   * Containment: substring for strings, `has()` for maps and sets, deep
   * equality against the items of other iterables, own keys of plain objects.
   */
  assertIn(member: unknown, container: unknown, message?: string): void {
    if (!contains(container, member)) {
      assert.fail(message ?? `${inspect(member)} not found in ${inspect(container)}`);
    }
  }

  assertNotIn(member: unknown, container: unknown, message?: string): void {
    if (contains(container, member)) {
      assert.fail(message ?? `${inspect(member)} unexpectedly found in ${inspect(container)}`);
    }
  }

  async assertRejects(fn: () => Promise<unknown>, expected?: RejectionMatcher): Promise<void> {
    if (expected === undefined) {
      await assert.rejects(fn);
    } else {
      await assert.rejects(fn, expected);
    }
  }

  fail(message: string = 'Test failed'): never {
    assert.fail(message);
  }

  skipTest(reason: string): never {
    throw new SkipTest(reason);
  }
}

function isIterable(value: unknown): value is Iterable<unknown> {
  return typeof value === 'object' && value !== null && typeof Reflect.get(value, Symbol.iterator) === 'function';
}

function contains(container: unknown, member: unknown): boolean {
  if (typeof container === 'string') {
    return typeof member === 'string' && container.includes(member);
  }
  if (container instanceof Map || container instanceof Set) {
    return container.has(member);
  }
  if (isIterable(container)) {
    for (const item of container) {
      if (isDeepStrictEqual(item, member)) {
        return true;
      }
    }
    return false;
  }
  if (typeof container === 'object' && container !== null) {
    return typeof member === 'string' && Object.prototype.hasOwnProperty.call(container, member);
  }
  throw new TypeError(`${inspect(container)} is not a container`);
}
