/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * A suite that serves its application on a real socket before running.
 *
 * The server is started once per host:port for the whole process and never
 * stopped: its handle is unref'd so it does not keep the process alive.
 *
 * @example
 * ```typescript
 * class HealthTests extends LiveTestCase {
 *   async test_health() {
 *     const response = await fetch(`${this.serverUrl}/health`);
 *     this.assertEqual(response.status, 200);
 *   }
 * }
 *
 * const app = createApplication(buildApp(), { PORT: 5055 });
 * const suite = new LiveTestLoader(app).loadTestsFromTestCase(HealthTests);
 * const result = await suite.run();
 * ```
 */

import { TestResult, TestSuite, type Test, type TestCase } from '@unit-harness/unit';
import { LiveTestCase, type LiveEndpoint } from './case.js';
import { resolveSuiteConfig, serverUrl, type LiveSuiteOptions, type SuiteConfig } from './config.js';
import { UsageError } from './errors.js';
import { waitForPort } from './probe.js';
import { isDetachable, type Application } from './types.js';

interface RunningEndpoint {
  app: Application;
  ready: Promise<void>;
}

/** Servers started by live suites, keyed by host:port */
const endpoints = new Map<string, RunningEndpoint>();

export class LiveTestSuite<A extends Application = Application> extends TestSuite {
  readonly config: SuiteConfig;

  /**
   * @throws {UsageError} If the application's HOST or PORT is invalid
   */
  constructor(
    readonly app: A,
    options: LiveSuiteOptions = {},
    tests: Iterable<Test> = []
  ) {
    super(tests);
    this.config = resolveSuiteConfig(app.config, options);
  }

  get serverUrl(): string {
    return serverUrl(this.config.host, this.config.port);
  }

  /**
   * Start the server, wait for it, inject the endpoint, then run the tests.
   *
   * @throws {ReadinessTimeoutError} If the server never accepts connections
   * @throws {UsageError} If another application already serves this endpoint
   */
  async run(result: TestResult = new TestResult()): Promise<TestResult> {
    await this.start();
    this.injectEndpoint();
    return super.run(result);
  }

  async debug(): Promise<void> {
    await this.start();
    this.injectEndpoint();
    await super.debug();
  }

  /**
   * Start serving (once per endpoint) and resolve when connections are
   * accepted.
   */
  start(): Promise<void> {
    const key = `${this.config.host}:${this.config.port}`;
    const running = endpoints.get(key);
    if (running) {
      if (running.app !== this.app) {
        return Promise.reject(new UsageError(`${key} is already served by a different application`));
      }
      return running.ready;
    }

    const ready = bootstrap(this.app, this.config);
    endpoints.set(key, { app: this.app, ready });
    return ready;
  }

  private injectEndpoint(): void {
    const endpoint: LiveEndpoint<A> = { serverUrl: this.serverUrl, app: this.app };
    for (const member of this.members) {
      if (member.type === 'leaf') {
        injectInto(member.test, endpoint);
        continue;
      }
      for (const inner of member.suite.members) {
        if (inner.type === 'leaf') {
          injectInto(inner.test, endpoint);
        }
      }
    }
  }
}

function injectInto(test: TestCase, endpoint: LiveEndpoint): void {
  if (test instanceof LiveTestCase) {
    test.inject(endpoint);
  }
}

/**
 * Run the application in the background and wait for it to listen. A
 * failure of `run()` aborts the wait with that failure.
 */
async function bootstrap(app: Application, config: SuiteConfig): Promise<void> {
  const { host, port } = config;
  const controller = new AbortController();

  void Promise.resolve()
    .then(() => app.run({ host, port, reload: false }))
    .then(
      (handle) => {
        if (isDetachable(handle)) {
          handle.unref();
        }
      },
      (err: unknown) => controller.abort(err)
    );

  await waitForPort(host, port, {
    timeout: config.timeout,
    interval: config.pollInterval,
    signal: controller.signal,
  });
}
