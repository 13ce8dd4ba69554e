/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * TCP readiness probe.
 */

import { createConnection } from 'node:net';
import { setTimeout as delay } from 'node:timers/promises';
import { ReadinessTimeoutError } from './errors.js';

/** Upper bound on a single connection attempt */
const ATTEMPT_TIMEOUT = 1000;

export interface ProbeOptions {
  /** Total time to wait, in ms */
  timeout: number;
  /** Delay between attempts, in ms */
  interval: number;
  /** Aborting rejects with the signal's reason */
  signal?: AbortSignal;
}

/**
 * Wait until something accepts TCP connections on host:port.
 *
 * At least one attempt is made, even with a zero timeout. Each probe
 * socket is destroyed as soon as it connects.
 *
 * @throws {ReadinessTimeoutError} If no attempt succeeds before the deadline
 */
export async function waitForPort(host: string, port: number, options: ProbeOptions): Promise<void> {
  const deadline = Date.now() + options.timeout;

  for (;;) {
    options.signal?.throwIfAborted();
    const remaining = deadline - Date.now();
    if (await canConnect(host, port, Math.max(1, Math.min(remaining, ATTEMPT_TIMEOUT)))) {
      return;
    }
    options.signal?.throwIfAborted();

    const left = deadline - Date.now();
    if (left <= 0) {
      throw new ReadinessTimeoutError(host, port, options.timeout);
    }
    try {
      await delay(Math.min(options.interval, left), undefined, { signal: options.signal });
    } catch (err) {
      // delay() rejects with its own AbortError
      options.signal?.throwIfAborted();
      throw err;
    }
  }
}

/**
 * Try one connection.
 */
function canConnect(host: string, port: number, timeout: number): Promise<boolean> {
  return new Promise((resolve) => {
    let settled = false;
    const socket = createConnection({ host, port });
    const settle = (connected: boolean) => {
      if (settled) {
        return;
      }
      settled = true;
      socket.destroy();
      resolve(connected);
    };
    socket.setTimeout(timeout);
    socket.on('connect', () => settle(true));
    socket.on('timeout', () => settle(false));
    socket.on('error', () => settle(false));
  });
}
