/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * What the harness needs from the application under test.
 *
 * The harness never looks inside an application or a client: it only builds
 * them, hands them to tests, and releases them. Adapters (such as
 * `@unit-harness/hono`) implement these interfaces for a concrete framework.
 */

import type { Awaitable } from '@unit-harness/unit';

/**
 * Open-ended options passed through to client construction.
 */
export type ClientOptions = Record<string, unknown>;

/**
 * A simulated request-issuing client, scoped to one test.
 */
export interface ClientHandle {
  /** Called once before the client is handed to a test */
  open(): Awaitable<void>;
  /** Called once after the test (and its tearDown) finished */
  close(): Awaitable<void>;
}

/**
 * Options for serving an application on a real socket.
 */
export interface RunOptions {
  /** Bind address */
  host: string;
  /** TCP port */
  port: number;
  /** Restart on source changes; the harness always passes false */
  reload: boolean;
}

/**
 * A server handle that can be told not to keep the process alive.
 */
export interface Detachable {
  unref(): unknown;
}

/**
 * An application under test.
 *
 * @typeParam C - The client type `testClient()` builds
 */
export interface Application<C extends ClientHandle = ClientHandle> {
  /**
   * Configuration lookups. The live suite reads `HOST` (default
   * `127.0.0.1`) and `PORT` (default `5000`).
   */
  readonly config: Readonly<Record<string, unknown>>;

  /**
   * Build a client bound to this application.
   *
   * @param useCookies - Whether the client keeps a cookie jar between requests
   * @param options - Extra client construction options
   */
  testClient(useCookies: boolean, options: ClientOptions): C;

  /**
   * Start serving on a socket. Must not block until the server stops: the
   * returned value (or promise) settles once the server is started, and may
   * be a handle the harness detaches from the process lifetime.
   */
  run(options: RunOptions): Awaitable<Detachable | void>;
}

/**
 * Check the capabilities of an application without knowing its framework.
 */
export function isApplication(value: unknown): boolean {
  return (
    typeof value === 'object' &&
    value !== null &&
    typeof Reflect.get(value, 'testClient') === 'function' &&
    typeof Reflect.get(value, 'run') === 'function' &&
    isConfig(Reflect.get(value, 'config'))
  );
}

function isConfig(value: unknown): boolean {
  return typeof value === 'object' && value !== null;
}

/**
 * Check the capabilities of a client handle.
 */
export function isClientHandle(value: unknown): boolean {
  return (
    typeof value === 'object' &&
    value !== null &&
    typeof Reflect.get(value, 'open') === 'function' &&
    typeof Reflect.get(value, 'close') === 'function'
  );
}

/**
 * Whether a value returned by `Application.run()` can be detached.
 */
export function isDetachable(value: unknown): value is Detachable {
  return typeof value === 'object' && value !== null && typeof Reflect.get(value, 'unref') === 'function';
}
