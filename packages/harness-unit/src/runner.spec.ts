/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Tests for runner.ts and program.ts - text output and the CLI entry point
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { TestCase } from './case.js';
import { main } from './program.js';
import { TextTestRunner } from './runner.js';
import { TestSuite } from './suite.js';

/**
 * Collects everything written to it.
 */
class Capture {
  text = '';

  write(chunk: string): boolean {
    this.text += chunk;
    return true;
  }

  lines(): string[] {
    return this.text.split('\n');
  }
}

class Mixed extends TestCase {
  test_a_pass() {}
  test_b_fail() {
    this.fail('expected failure');
  }
  test_c_error() {
    throw 'plain string';
  }
  test_d_skip() {
    this.skipTest('later');
  }
}

class Passing extends TestCase {
  test_one() {}
}

describe('TextTestRunner', () => {
  it('writes one line per test at verbosity 2', async () => {
    const stream = new Capture();
    const suite = new TestSuite([
      new Mixed('test_a_pass'),
      new Mixed('test_b_fail'),
      new Mixed('test_c_error'),
      new Mixed('test_d_skip'),
    ]);

    const result = await new TextTestRunner({ stream, verbosity: 2 }).run(suite);

    const lines = stream.lines();
    assert.deepStrictEqual(lines.slice(0, 4), [
      'test_a_pass (Mixed) ... ok',
      'test_b_fail (Mixed) ... FAIL',
      'test_c_error (Mixed) ... ERROR',
      "test_d_skip (Mixed) ... skipped 'later'",
    ]);
    assert.strictEqual(lines.at(-2), 'FAILED (failures=1, errors=1, skipped=1)');
    assert.strictEqual(result.testsRun, 4);
  });

  it('reports errors before failures', async () => {
    const stream = new Capture();
    const suite = new TestSuite([new Mixed('test_b_fail'), new Mixed('test_c_error')]);

    await new TextTestRunner({ stream, verbosity: 1 }).run(suite);

    const lines = stream.lines();
    assert.strictEqual(lines[0], 'FE');
    assert.strictEqual(lines[1], '='.repeat(70));
    assert.strictEqual(lines[2], 'ERROR: test_c_error (Mixed)');
    assert.strictEqual(lines[3], '-'.repeat(70));
    assert.strictEqual(lines[4], 'plain string');
    assert.ok(lines.includes('FAIL: test_b_fail (Mixed)'));
  });

  it('prints a summary for a passing run', async () => {
    const stream = new Capture();

    await new TextTestRunner({ stream, verbosity: 0 }).run(new Passing('test_one'));

    const lines = stream.lines();
    assert.strictEqual(lines[0], '-'.repeat(70));
    assert.match(lines[1] ?? '', /^Ran 1 test in \d+\.\d{3}s$/);
    assert.strictEqual(lines[2], '');
    assert.strictEqual(lines[3], 'OK');
  });

  it('stops at the first failure with failfast', async () => {
    const stream = new Capture();
    const suite = new TestSuite([new Mixed('test_b_fail'), new Mixed('test_a_pass')]);

    const result = await new TextTestRunner({ stream, verbosity: 0, failfast: true }).run(suite);

    assert.strictEqual(result.testsRun, 1);
  });
});

describe('main', () => {
  it('runs the given classes and returns the result', async () => {
    const stream = new Capture();

    const result = await main({ tests: [Passing, Mixed], argv: [], stream, exit: false });

    assert.strictEqual(result.testsRun, 5);
    assert.strictEqual(result.successes.length, 2);
    assert.strictEqual(stream.lines().at(-2), 'FAILED (failures=1, errors=1, skipped=1)');
  });

  it('selects tests with -k', async () => {
    const stream = new Capture();

    const result = await main({ tests: [Passing, Mixed], argv: ['-k', 'pass'], stream, exit: false });

    assert.strictEqual(result.testsRun, 1);
    assert.ok(result.wasSuccessful());
  });

  it('switches to one line per test with -v', async () => {
    const stream = new Capture();

    await main({ tests: [Passing], argv: ['-v'], stream, exit: false });

    assert.strictEqual(stream.lines()[0], 'test_one (Passing) ... ok');
  });

  it('honours -f', async () => {
    const stream = new Capture();

    const result = await main({ tests: [Mixed], argv: ['-q', '-f', '-k', 'fail', 'error'], stream, exit: false });

    assert.strictEqual(result.testsRun, 1);
  });

  it('rejects unknown options when not exiting', async () => {
    await assert.rejects(
      () => main({ tests: [Passing], argv: ['--bogus'], stream: new Capture(), exit: false }),
      { code: 'commander.unknownOption' }
    );
  });
});
