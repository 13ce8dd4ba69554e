/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Tests for case.ts and scope.ts - resource-injecting test cases
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { AppClientTestCase, AppTestCase, ClientTestCase, LiveTestCase } from './case.js';
import { ContractViolationError, UsageError } from './errors.js';
import { scopePhase } from './scope.js';
import { FakeApplication, FakeClient, gate } from './test-helpers.js';

/**
 * Assert that none of the overridable names is shadowed on the instance.
 */
function assertNoOverrides(test: object, methodName: string): void {
  for (const name of ['setUp', methodName, 'tearDown']) {
    assert.strictEqual(Object.getOwnPropertyDescriptor(test, name), undefined, `${name} is still overridden`);
  }
}

describe('AppTestCase', () => {
  it('injects what a plain factory returned and leaves no override behind', async () => {
    const app = new FakeApplication();
    const seen: unknown[] = [];
    class NeedsApp extends AppTestCase<FakeApplication> {
      createApp() {
        return app;
      }
      test_app(received: FakeApplication) {
        seen.push(received);
      }
    }
    const test = new NeedsApp('test_app');

    const result = await test.run();

    assert.ok(result.wasSuccessful());
    assert.strictEqual(result.successes.length, 1);
    assert.deepStrictEqual(seen, [app]);
    assert.strictEqual(test.test_app, NeedsApp.prototype.test_app);
    assertNoOverrides(test, 'test_app');
  });

  it('passes the application to setUp and tearDown', async () => {
    const app = new FakeApplication();
    const seen: string[] = [];
    class Hooks extends AppTestCase<FakeApplication> {
      createApp() {
        return app;
      }
      setUp(received: FakeApplication) {
        seen.push(received === app ? 'setUp:app' : 'setUp:other');
      }
      test_x() {
        seen.push('test');
      }
      tearDown(received: FakeApplication) {
        seen.push(received === app ? 'tearDown:app' : 'tearDown:other');
      }
    }

    await new Hooks('test_x').run();

    assert.deepStrictEqual(seen, ['setUp:app', 'test', 'tearDown:app']);
  });

  it('builds a fresh application for every test', async () => {
    let built = 0;
    const seen: FakeApplication[] = [];
    class Fresh extends AppTestCase<FakeApplication> {
      createApp() {
        built += 1;
        return new FakeApplication();
      }
      test_a(app: FakeApplication) {
        seen.push(app);
      }
      test_b(app: FakeApplication) {
        seen.push(app);
      }
    }

    await new Fresh('test_a').run();
    await new Fresh('test_b').run();

    assert.strictEqual(built, 2);
    assert.notStrictEqual(seen[0], seen[1]);
  });

  it('runs generator cleanup after the test', async () => {
    const steps: string[] = [];
    const app = new FakeApplication();
    class Generated extends AppTestCase<FakeApplication> {
      *createApp() {
        steps.push('before');
        yield app;
        steps.push('after');
      }
      test_x() {
        steps.push('test');
      }
    }

    const result = await new Generated('test_x').run();

    assert.ok(result.wasSuccessful());
    assert.deepStrictEqual(steps, ['before', 'test', 'after']);
  });

  it('raises a contract violation for a second yield and still restores bindings', async () => {
    const steps: string[] = [];
    class YieldsTwice extends AppTestCase<FakeApplication> {
      *createApp() {
        const app = new FakeApplication();
        yield app;
        steps.push('resumed');
        yield app;
      }
      test_x() {
        steps.push('test');
      }
    }
    const test = new YieldsTwice('test_x');

    await assert.rejects(
      () => test.run(),
      (err: unknown) => err instanceof ContractViolationError && err.violation === 'extra-yield'
    );
    assert.deepStrictEqual(steps, ['test', 'resumed']);
    assertNoOverrides(test, 'test_x');
    assert.strictEqual(scopePhase(test), 'idle');
  });

  it('does not run the test when the generator yields nothing', async () => {
    const steps: string[] = [];
    class YieldsNothing extends AppTestCase<FakeApplication> {
      *createApp(): Generator<FakeApplication, void, undefined> {
        steps.push('factory');
      }
      test_x() {
        steps.push('test');
      }
    }

    await assert.rejects(
      () => new YieldsNothing('test_x').run(),
      (err: unknown) => err instanceof ContractViolationError && err.violation === 'no-yield'
    );
    assert.deepStrictEqual(steps, ['factory']);
  });

  it('returns to idle when the factory fails', async () => {
    class Broken extends AppTestCase<FakeApplication> {
      createApp(): FakeApplication {
        throw new Error('factory failed');
      }
      test_x() {}
    }
    const test = new Broken('test_x');

    await assert.rejects(() => test.run(), { message: 'factory failed' });
    assert.strictEqual(scopePhase(test), 'idle');
    assertNoOverrides(test, 'test_x');
  });

  it('requires createApp', async () => {
    class NoFactory extends AppTestCase {
      test_x() {}
    }

    await assert.rejects(() => new NoFactory('test_x').run(), {
      name: 'UsageError',
      message: 'NoFactory must define createApp()',
    });
  });

  it('records assertion failures without leaking them', async () => {
    class Failing extends AppTestCase<FakeApplication> {
      createApp() {
        return new FakeApplication();
      }
      test_x(app: FakeApplication) {
        this.assertEqual(app.runs.length, 1);
      }
    }
    const test = new Failing('test_x');

    const result = await test.run();

    assert.strictEqual(result.failures.length, 1);
    assertNoOverrides(test, 'test_x');
  });

  it('injects resources in debug mode and lets errors propagate', async () => {
    const app = new FakeApplication();
    class Debugged extends AppTestCase<FakeApplication> {
      createApp() {
        return app;
      }
      test_x(received: FakeApplication) {
        this.assertIs(received, app);
        throw new Error('debug error');
      }
    }
    const test = new Debugged('test_x');

    await assert.rejects(() => test.debug(), { message: 'debug error' });
    assertNoOverrides(test, 'test_x');
  });

  it('refuses to run a test that is already in flight', async () => {
    const { opened, open } = gate();
    class Slow extends AppTestCase<FakeApplication> {
      createApp() {
        return new FakeApplication();
      }
      async test_wait() {
        await opened;
      }
    }
    const test = new Slow('test_wait');

    const first = test.run();
    await new Promise<void>((resolve) => setImmediate(() => resolve()));
    assert.strictEqual(scopePhase(test), 'active');

    await assert.rejects(() => test.run(), {
      name: 'UsageError',
      message: 'Slow.test_wait already has a test in flight',
    });

    open();
    const result = await first;
    assert.ok(result.wasSuccessful());
    assert.strictEqual(scopePhase(test), 'idle');
  });

  it('refuses a second run started before the first acquires its resources', async () => {
    let built = 0;
    class Counted extends AppTestCase<FakeApplication> {
      async createApp() {
        built += 1;
        return new FakeApplication();
      }
      test_x() {}
    }
    const test = new Counted('test_x');

    const first = test.run();
    const second = test.run();

    await assert.rejects(second, {
      name: 'UsageError',
      message: 'Counted.test_x already has a test in flight',
    });
    const result = await first;
    assert.ok(result.wasSuccessful());
    assert.strictEqual(result.testsRun, 1);
    assert.strictEqual(built, 1);
    assert.strictEqual(scopePhase(test), 'idle');
  });

  it('reports a failing test and a failing release together', async () => {
    class BothFail extends AppTestCase<FakeApplication> {
      *createApp() {
        yield new FakeApplication();
        throw new Error('release failed');
      }
      test_x() {
        throw new Error('test failed');
      }
    }

    await assert.rejects(
      () => new BothFail('test_x').debug(),
      (err: unknown) =>
        err instanceof AggregateError &&
        err.errors.length === 2 &&
        err.errors[0] instanceof Error &&
        err.errors[0].message === 'test failed' &&
        err.errors[1] instanceof Error &&
        err.errors[1].message === 'release failed'
    );
  });
});

describe('ClientTestCase', () => {
  it('injects an open client and closes it afterwards', async () => {
    const fakeApp = new FakeApplication();
    const phases: string[] = [];
    class NeedsClient extends ClientTestCase<FakeClient> {
      app = fakeApp;
      test_x(client: FakeClient) {
        phases.push(client.phase);
      }
    }

    const result = await new NeedsClient('test_x').run();

    assert.ok(result.wasSuccessful());
    assert.deepStrictEqual(phases, ['open']);
    assert.strictEqual(fakeApp.clients.length, 1);
    assert.strictEqual(fakeApp.clients[0]?.phase, 'closed');
    assert.strictEqual(fakeApp.clients[0]?.useCookies, true);
  });

  it('passes cookie mode and client options through', async () => {
    const fakeApp = new FakeApplication();
    class Configured extends ClientTestCase<FakeClient> {
      app = fakeApp;
      useCookies = false;
      clientOptions = { baseUrl: 'http://example.test' };
      test_x() {}
    }

    await new Configured('test_x').run();

    assert.strictEqual(fakeApp.clients[0]?.useCookies, false);
    assert.deepStrictEqual(fakeApp.clients[0]?.options, { baseUrl: 'http://example.test' });
  });

  it('closes the client when the test raises', async () => {
    const fakeApp = new FakeApplication();
    class Raising extends ClientTestCase<FakeClient> {
      app = fakeApp;
      test_x() {
        throw new Error('boom');
      }
    }

    const result = await new Raising('test_x').run();

    assert.strictEqual(result.errors.length, 1);
    assert.strictEqual(fakeApp.clients[0]?.phase, 'closed');
  });

  it('requires an app', async () => {
    class NoApp extends ClientTestCase {
      test_x() {}
    }

    await assert.rejects(
      () => new NoApp('test_x').run(),
      (err: unknown) => err instanceof UsageError && err.message === 'NoApp has no app; assign one before running its tests'
    );
  });
});

describe('AppClientTestCase', () => {
  it('injects the application and a client bound to it', async () => {
    const a1 = new FakeApplication();
    let c1: FakeClient | undefined;
    class Both extends AppClientTestCase<FakeClient, FakeApplication> {
      createApp() {
        return a1;
      }
      test_t(app: FakeApplication, client: FakeClient) {
        c1 = client;
        this.assertIs(app, a1);
        this.assertIs(client, a1.clients[0]);
        this.assertIs(client.app, app);
      }
    }
    const test = new Both('test_t');
    const original = Both.prototype.test_t;

    const result = await test.run();

    assert.ok(result.wasSuccessful());
    assert.strictEqual(c1, a1.clients[0]);
    assert.strictEqual(test.test_t, original);
    assertNoOverrides(test, 'test_t');
  });

  it('releases the client before the application when the test raises', async () => {
    const log: string[] = [];
    class Ordered extends AppClientTestCase<FakeClient, FakeApplication> {
      *createApp() {
        log.push('app.acquire');
        yield new FakeApplication({ log });
        log.push('app.release');
      }
      test_x() {
        log.push('test');
        throw new Error('boom');
      }
    }

    const result = await new Ordered('test_x').run();

    assert.strictEqual(result.errors.length, 1);
    assert.deepStrictEqual(log, ['app.acquire', 'client.open', 'test', 'client.close', 'app.release']);
  });

  it('releases the client before the application when tearDown raises', async () => {
    const log: string[] = [];
    class Ordered extends AppClientTestCase<FakeClient, FakeApplication> {
      *createApp() {
        yield new FakeApplication({ log });
        log.push('app.release');
      }
      test_x() {}
      tearDown() {
        log.push('tearDown');
        throw new Error('tearDown failed');
      }
    }

    const result = await new Ordered('test_x').run();

    assert.strictEqual(result.errors.length, 1);
    assert.deepStrictEqual(log, ['client.open', 'tearDown', 'client.close', 'app.release']);
  });

  it('releases the application when the client cannot open', async () => {
    const log: string[] = [];
    class Refused extends AppClientTestCase<FakeClient, FakeApplication> {
      *createApp() {
        yield new FakeApplication({ log, failOpen: true });
        log.push('app.release');
      }
      test_x() {
        log.push('test');
      }
    }

    await assert.rejects(() => new Refused('test_x').run(), { message: 'client refused to open' });
    assert.deepStrictEqual(log, ['app.release']);
  });
});

describe('LiveTestCase', () => {
  it('refuses to expose the endpoint before injection', () => {
    class Live extends LiveTestCase {
      test_x() {}
    }
    const test = new Live('test_x');

    assert.strictEqual(test.injected, false);
    assert.throws(() => test.serverUrl, {
      name: 'UsageError',
      message: 'Live.test_x: serverUrl is only available inside a LiveTestSuite',
    });
  });

  it('exposes the injected endpoint', () => {
    class Live extends LiveTestCase<FakeApplication> {
      test_x() {}
    }
    const app = new FakeApplication();
    const test = new Live('test_x');

    test.inject({ serverUrl: 'http://127.0.0.1:5000', app });

    assert.strictEqual(test.serverUrl, 'http://127.0.0.1:5000');
    assert.strictEqual(test.app, app);
  });
});
