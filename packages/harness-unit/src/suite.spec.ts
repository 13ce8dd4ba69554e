/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Tests for suite.ts and loader.ts - composite tests and loading
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { TestCase } from './case.js';
import { TestLoader } from './loader.js';
import { TestResult } from './result.js';
import { TestSuite } from './suite.js';

class Alpha extends TestCase {
  test_b() {}
  test_a() {}
  helper() {}
}

class Beta extends Alpha {
  test_c() {}
}

class Fails extends TestCase {
  test_one() {
    this.fail('one');
  }
  test_two() {
    this.fail('two');
  }
}

describe('TestSuite', () => {
  it('tags leaves and groups as they are added', () => {
    const leaf = new Alpha('test_a');
    const group = new TestSuite([new Alpha('test_b')]);
    const suite = new TestSuite([leaf, group]);

    assert.deepStrictEqual(
      suite.members.map((member) => member.type),
      ['leaf', 'group']
    );
    assert.deepStrictEqual([...suite], [leaf, group]);
  });

  it('counts test cases through nesting', () => {
    const suite = new TestSuite([new Alpha('test_a'), new TestSuite([new Alpha('test_b'), new TestSuite([new Beta('test_c')])])]);

    assert.strictEqual(suite.countTestCases(), 3);
  });

  it('runs members in order into one result', async () => {
    const log: string[] = [];
    class Logged extends TestCase {
      test_x() {
        log.push(this.id());
      }
      test_y() {
        log.push(this.id());
      }
    }
    const suite = new TestSuite([new Logged('test_y'), new TestSuite([new Logged('test_x')])]);

    const result = await suite.run();

    assert.deepStrictEqual(log, ['Logged.test_y', 'Logged.test_x']);
    assert.strictEqual(result.testsRun, 2);
  });

  it('stops after the first failure when failfast is set', async () => {
    const result = new TestResult();
    result.failfast = true;

    await new TestSuite([new Fails('test_one'), new Fails('test_two')]).run(result);

    assert.strictEqual(result.testsRun, 1);
    assert.strictEqual(result.failures.length, 1);
  });
});

describe('TestLoader', () => {
  it('finds test methods up the prototype chain, sorted', () => {
    const loader = new TestLoader();

    assert.deepStrictEqual(loader.getTestCaseNames(Alpha), ['test_a', 'test_b']);
    assert.deepStrictEqual(loader.getTestCaseNames(Beta), ['test_a', 'test_b', 'test_c']);
  });

  it('builds one instance per test method', () => {
    const suite = new TestLoader().loadTestsFromTestCase(Alpha);

    assert.deepStrictEqual(
      [...suite].map((test) => (test instanceof TestCase ? test.id() : 'suite')),
      ['Alpha.test_a', 'Alpha.test_b']
    );
  });

  it('falls back to runTest', () => {
    class Single extends TestCase {
      runTest() {}
    }
    const suite = new TestLoader().loadTestsFromTestCase(Single);

    assert.strictEqual(suite.countTestCases(), 1);
  });

  it('filters by substring and wildcard patterns', () => {
    assert.deepStrictEqual(new TestLoader({ testNamePatterns: ['test_b'] }).getTestCaseNames(Alpha), ['test_b']);
    assert.deepStrictEqual(new TestLoader({ testNamePatterns: ['Beta.*_c'] }).getTestCaseNames(Beta), ['test_c']);
    assert.deepStrictEqual(new TestLoader({ testNamePatterns: ['Alpha.*_c'] }).getTestCaseNames(Beta), []);
  });

  it('honours a custom method prefix', () => {
    class Checks extends TestCase {
      check_one() {}
      test_two() {}
    }

    assert.deepStrictEqual(new TestLoader({ testMethodPrefix: 'check' }).getTestCaseNames(Checks), ['check_one']);
  });

  it('groups several classes into a suite of suites', () => {
    const suite = new TestLoader().loadTestsFromTestCases([Alpha, Fails]);

    assert.deepStrictEqual(
      suite.members.map((member) => member.type),
      ['group', 'group']
    );
    assert.strictEqual(suite.countTestCases(), 4);
  });
});
