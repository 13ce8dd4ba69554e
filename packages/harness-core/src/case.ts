/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Test case variants that receive resources as parameters.
 *
 * | Variant             | Parameters      | Resources built per test        |
 * | ------------------- | --------------- | ------------------------------- |
 * | `AppTestCase`       | `(app)`         | application from `createApp()`  |
 * | `ClientTestCase`    | `(client)`      | client of the `app` field       |
 * | `AppClientTestCase` | `(app, client)` | both; client released first     |
 * | `LiveTestCase`      | `()`            | none; `app`/`serverUrl` injected |
 *
 * @example
 * ```typescript
 * class IndexTests extends ClientTestCase<TestClient> {
 *   app = createApplication(buildApp());
 *
 *   async test_index(client: TestClient) {
 *     const response = await client.get('/');
 *     this.assertEqual(response.status, 200);
 *   }
 * }
 * ```
 */

import { TestCase, TestResult, type Awaitable } from '@unit-harness/unit';
import { UsageError } from './errors.js';
import { provision, resourceShape, type Provision, type ResourceFactory } from './provision.js';
import { MethodOverrideScope, type Acquired } from './scope.js';
import { isApplication, isClientHandle, type Application, type ClientHandle, type ClientOptions } from './types.js';

/**
 * What `createApp()` may return: the application, a promise of it, or a
 * generator yielding it once.
 */
export type AppFactoryResult<A> = ReturnType<ResourceFactory<A>>;

/**
 * Base class for variants that provision resources per test.
 *
 * `run()` and `debug()` wrap the host's versions in a MethodOverrideScope,
 * so `setUp`, the test method and `tearDown` receive the resources.
 */
export abstract class ResourceTestCase<R extends readonly unknown[]> extends TestCase {
  /**
   * Provision this test's resources.
   */
  protected abstract acquire(): Promise<Acquired<R>>;

  async run(result: TestResult = new TestResult()): Promise<TestResult> {
    await new MethodOverrideScope(this).run(
      () => this.acquire(),
      () => super.run(result)
    );
    return result;
  }

  async debug(): Promise<void> {
    await new MethodOverrideScope(this).run(
      () => this.acquire(),
      () => super.debug()
    );
  }
}

// =============================================================================
// Application
// =============================================================================

/**
 * Receives a fresh application per test, built by `createApp()`.
 */
export class AppTestCase<A extends Application = Application> extends ResourceTestCase<[A]> {
  /**
   * Build the application for one test. May be a generator that yields the
   * application once and cleans up after the test.
   */
  createApp?(): AppFactoryResult<A>;

  setUp(_app: A): Awaitable<void> {}

  tearDown(_app: A): Awaitable<void> {}

  protected async acquire(): Promise<Acquired<[A]>> {
    const app = await provisionApplication(this, this.createApp);
    return { resources: [app.resource], provisions: [app] };
  }
}

// =============================================================================
// Client
// =============================================================================

/**
 * Receives a fresh client per test, bound to the `app` field.
 */
export class ClientTestCase<C extends ClientHandle = ClientHandle> extends ResourceTestCase<[C]> {
  /** Application the clients are bound to; must be set before tests run */
  app?: Application<C>;
  /** Keep cookies between requests of one test */
  useCookies = true;
  /** Extra options passed to `app.testClient()` */
  clientOptions: ClientOptions = {};

  setUp(_client: C): Awaitable<void> {}

  tearDown(_client: C): Awaitable<void> {}

  protected async acquire(): Promise<Acquired<[C]>> {
    const app = this.app;
    if (!app) {
      throw new UsageError(`${this.constructor.name} has no app; assign one before running its tests`);
    }
    const client = await openClient(app, this.useCookies, this.clientOptions);
    return { resources: [client.resource], provisions: [client] };
  }
}

// =============================================================================
// Application and client
// =============================================================================

/**
 * Receives a fresh application and a client bound to it per test.
 *
 * The client is released before the application, on every exit path.
 */
export class AppClientTestCase<
  C extends ClientHandle = ClientHandle,
  A extends Application<C> = Application<C>,
> extends ResourceTestCase<[A, C]> {
  /** Keep cookies between requests of one test */
  useCookies = true;
  /** Extra options passed to `app.testClient()` */
  clientOptions: ClientOptions = {};

  /**
   * Build the application for one test. May be a generator that yields the
   * application once and cleans up after the test.
   */
  createApp?(): AppFactoryResult<A>;

  setUp(_app: A, _client: C): Awaitable<void> {}

  tearDown(_app: A, _client: C): Awaitable<void> {}

  protected async acquire(): Promise<Acquired<[A, C]>> {
    const app = await provisionApplication(this, this.createApp);
    let client: Provision<C>;
    try {
      client = await openClient(app.resource, this.useCookies, this.clientOptions);
    } catch (err) {
      await app.dispose();
      throw err;
    }
    return { resources: [app.resource, client.resource], provisions: [app, client] };
  }
}

// =============================================================================
// Live endpoint
// =============================================================================

/**
 * What a LiveTestSuite injects into its tests.
 */
export interface LiveEndpoint<A extends Application = Application> {
  /** Base URL of the running server, e.g. "http://127.0.0.1:5000" */
  serverUrl: string;
  /** The application being served */
  app: A;
}

/**
 * Talks to a real server started by an enclosing LiveTestSuite.
 *
 * Receives no parameters; `serverUrl` and `app` are set by the suite before
 * any test runs. Reading them earlier is an error, not `undefined`.
 */
export class LiveTestCase<A extends Application = Application> extends TestCase {
  private endpoint?: LiveEndpoint<A>;

  get serverUrl(): string {
    return this.requireEndpoint('serverUrl').serverUrl;
  }

  get app(): A {
    return this.requireEndpoint('app').app;
  }

  /**
   * Whether a suite has injected the endpoint yet.
   */
  get injected(): boolean {
    return this.endpoint !== undefined;
  }

  inject(endpoint: LiveEndpoint<A>): void {
    this.endpoint = endpoint;
  }

  private requireEndpoint(property: string): LiveEndpoint<A> {
    if (!this.endpoint) {
      throw new UsageError(`${this.id()}: ${property} is only available inside a LiveTestSuite`);
    }
    return this.endpoint;
  }
}

// =============================================================================
// Helpers
// =============================================================================

function provisionApplication<A extends Application>(
  owner: TestCase,
  createApp: (() => AppFactoryResult<A>) | undefined
): Promise<Provision<A>> {
  if (!createApp) {
    throw new UsageError(`${owner.constructor.name} must define createApp()`);
  }
  return provision(() => createApp.call(owner), resourceShape<A>('application', isApplication));
}

/**
 * Open a client for one test: `open()` on acquisition, `close()` on release.
 */
export function openClient<C extends ClientHandle>(
  app: Application<C>,
  useCookies: boolean,
  options: ClientOptions
): Promise<Provision<C>> {
  return provision(async function* scopedClient(): AsyncGenerator<C, void, undefined> {
    const client = app.testClient(useCookies, options);
    await client.open();
    try {
      yield client;
    } finally {
      await client.close();
    }
  }, resourceShape<C>('client', isClientHandle));
}
