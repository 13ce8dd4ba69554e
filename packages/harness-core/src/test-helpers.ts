/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Test utilities: fake applications and clients that record what happens
 * to them, and helpers for real sockets.
 */

import { createServer, type Server } from 'node:net';
import type { Application, ClientHandle, ClientOptions, RunOptions } from './types.js';

export type FakePhase = 'idle' | 'open' | 'closed';

export interface FakeApplicationOptions {
  /** Config lookups (HOST, PORT) */
  config?: Record<string, unknown>;
  /** Shared effect log */
  log?: string[];
  /** Make every client's open() throw */
  failOpen?: boolean;
}

export class FakeClient implements ClientHandle {
  phase: FakePhase = 'idle';

  constructor(
    readonly app: FakeApplication,
    readonly useCookies: boolean,
    readonly options: ClientOptions
  ) {}

  open(): void {
    if (this.app.failOpen) {
      throw new Error('client refused to open');
    }
    this.phase = 'open';
    this.app.log.push('client.open');
  }

  async close(): Promise<void> {
    this.phase = 'closed';
    this.app.log.push('client.close');
  }
}

/**
 * An application that builds FakeClients and never listens.
 */
export class FakeApplication implements Application<FakeClient> {
  readonly config: Readonly<Record<string, unknown>>;
  readonly log: string[];
  readonly failOpen: boolean;
  readonly clients: FakeClient[] = [];
  readonly runs: RunOptions[] = [];

  constructor(options: FakeApplicationOptions = {}) {
    this.config = options.config ?? {};
    this.log = options.log ?? [];
    this.failOpen = options.failOpen ?? false;
  }

  testClient(useCookies: boolean, options: ClientOptions): FakeClient {
    const client = new FakeClient(this, useCookies, options);
    this.clients.push(client);
    return client;
  }

  run(options: RunOptions): void {
    this.runs.push(options);
  }
}

/**
 * An application whose run() opens a real TCP listener that hangs up on
 * every connection.
 */
export class ListeningApplication extends FakeApplication {
  readonly servers: Server[] = [];

  run(options: RunOptions): Promise<Server> {
    this.runs.push(options);
    return new Promise((resolve, reject) => {
      const server = createServer((socket) => socket.end());
      this.servers.push(server);
      server.once('error', reject);
      server.listen(options.port, options.host, () => resolve(server));
    });
  }
}

/**
 * A port nothing listens on at the time of the call.
 */
export async function freePort(host = '127.0.0.1'): Promise<number> {
  const server = createServer();
  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(0, host, resolve);
  });
  const address = server.address();
  const port = typeof address === 'object' && address !== null ? address.port : 0;
  await new Promise<void>((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
  return port;
}

/**
 * A promise and the function that resolves it.
 */
export function gate(): { opened: Promise<void>; open: () => void } {
  let open = (): void => {};
  const opened = new Promise<void>((resolve) => {
    open = resolve;
  });
  return { opened, open };
}
