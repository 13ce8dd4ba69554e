/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

import type { Server as NetServer } from 'node:net';
import { serve, type ServerType } from '@hono/node-server';
import { UsageError, type Application, type ClientOptions, type RunOptions } from '@unit-harness/core';
import { TestClient, type FetchHandler, type TestClientOptions } from './client.js';

/**
 * Anything with a fetch-style entry point, such as a Hono app.
 */
export interface Fetchable {
  fetch: FetchHandler;
}

/**
 * A fetch-style application under test.
 *
 * Clients dispatch in process; `run()` serves it over HTTP with
 * `@hono/node-server`.
 */
export class HonoApplication implements Application<TestClient> {
  readonly config: Readonly<Record<string, unknown>>;
  private readonly servers: ServerType[] = [];

  constructor(
    readonly hono: Fetchable,
    config: Record<string, unknown> = {}
  ) {
    this.config = Object.freeze({ ...config });
  }

  /**
   * @param options - Accepts `baseUrl`, `headers` and `followRedirects`
   * @throws {UsageError} If an option has the wrong type
   */
  testClient(useCookies: boolean, options: ClientOptions): TestClient {
    return new TestClient((request) => this.hono.fetch(request), useCookies, toClientOptions(options));
  }

  /**
   * Serve on host:port. Resolves with the server once it listens.
   *
   * @throws {UsageError} If `reload` is requested
   */
  async run(options: RunOptions): Promise<ServerType> {
    if (options.reload) {
      throw new UsageError('Reloading is not supported when serving a test application');
    }
    return new Promise((resolve, reject) => {
      const httpServer = serve(
        {
          fetch: (request) => this.hono.fetch(request),
          port: options.port,
          hostname: options.host,
        },
        () => resolve(httpServer)
      );
      this.servers.push(httpServer);
      const listener: NetServer = httpServer;
      listener.once('error', reject);
    });
  }

  /**
   * Stop every server started by `run()`, dropping open connections.
   */
  async close(): Promise<void> {
    const servers = this.servers.splice(0);
    await Promise.all(
      servers.map(
        (httpServer) =>
          new Promise<void>((resolve, reject) => {
            if ('closeAllConnections' in httpServer) {
              httpServer.closeAllConnections();
            }
            const listener: NetServer = httpServer;
            listener.close((err) => (err ? reject(err) : resolve()));
          })
      )
    );
  }
}

/**
 * Wrap a fetch-style application for the harness.
 *
 * @param app - The application, typically a Hono instance
 * @param config - Config lookups; `HOST` and `PORT` select the live endpoint
 *
 * @example
 * ```typescript
 * const app = createApplication(new Hono().get('/', (c) => c.text('ok')), { PORT: 5055 });
 * ```
 */
export function createApplication(app: Fetchable, config: Record<string, unknown> = {}): HonoApplication {
  return new HonoApplication(app, config);
}

function toClientOptions(options: ClientOptions): TestClientOptions {
  const result: TestClientOptions = {};
  const { baseUrl, headers, followRedirects } = options;
  if (baseUrl !== undefined) {
    if (typeof baseUrl !== 'string') {
      throw new UsageError('Client option baseUrl must be a string');
    }
    result.baseUrl = baseUrl;
  }
  if (headers !== undefined) {
    result.headers = toHeaderRecord(headers);
  }
  if (followRedirects !== undefined) {
    if (typeof followRedirects !== 'boolean') {
      throw new UsageError('Client option followRedirects must be a boolean');
    }
    result.followRedirects = followRedirects;
  }
  return result;
}

function toHeaderRecord(value: unknown): Record<string, string> {
  if (typeof value !== 'object' || value === null) {
    throw new UsageError('Client option headers must be an object of strings');
  }
  const record: Record<string, string> = {};
  for (const [name, header] of Object.entries(value)) {
    if (typeof header !== 'string') {
      throw new UsageError(`Client header ${name} must be a string`);
    }
    record[name] = header;
  }
  return record;
}
