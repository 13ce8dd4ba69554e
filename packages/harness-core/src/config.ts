/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Live suite configuration.
 *
 * The endpoint comes from the application's `HOST` and `PORT` config keys
 * unless overridden; the readiness timeout from the options, then the
 * `UNIT_HARNESS_READINESS_TIMEOUT` environment variable (milliseconds).
 */

import { UsageError } from './errors.js';

export const DEFAULT_HOST = '127.0.0.1';
export const DEFAULT_PORT = 5000;
export const DEFAULT_READINESS_TIMEOUT = 5000;
export const DEFAULT_POLL_INTERVAL = 50;

/** Environment variable holding the readiness timeout in milliseconds */
export const READINESS_TIMEOUT_ENV = 'UNIT_HARNESS_READINESS_TIMEOUT';

/**
 * Options for a LiveTestSuite.
 */
export interface LiveSuiteOptions {
  /** Bind and probe address (default: `config.HOST`, then 127.0.0.1) */
  host?: string;
  /** TCP port (default: `config.PORT`, then 5000) */
  port?: number;
  /** How long to wait for the server to accept connections, in ms (default: 5000) */
  timeout?: number;
  /** Delay between connection attempts, in ms (default: 50) */
  pollInterval?: number;
}

/**
 * Resolved live suite configuration.
 */
export interface SuiteConfig {
  readonly host: string;
  readonly port: number;
  readonly timeout: number;
  readonly pollInterval: number;
}

/**
 * Resolve the configuration of a live suite.
 *
 * @param config - The application's config lookups
 * @param options - Explicit overrides
 * @param env - Environment to read the timeout from (default: process.env)
 *
 * @throws {UsageError} If HOST, PORT, the timeout or the poll interval is invalid
 */
export function resolveSuiteConfig(
  config: Readonly<Record<string, unknown>>,
  options: LiveSuiteOptions = {},
  env: NodeJS.ProcessEnv = process.env
): SuiteConfig {
  const host = options.host ?? readHost(config['HOST']);
  const port = checkPort(options.port ?? readPort(config['PORT']));
  const timeout = checkDuration('timeout', options.timeout ?? readTimeout(env[READINESS_TIMEOUT_ENV]));
  const pollInterval = checkDuration('pollInterval', options.pollInterval ?? DEFAULT_POLL_INTERVAL);
  return { host, port, timeout, pollInterval };
}

/**
 * Base URL of a server listening on host:port.
 */
export function serverUrl(host: string, port: number): string {
  const authority = host.includes(':') ? `[${host}]` : host;
  return `http://${authority}:${port}`;
}

function readHost(value: unknown): string {
  if (value === undefined) {
    return DEFAULT_HOST;
  }
  if (typeof value !== 'string' || value === '') {
    throw new UsageError(`HOST must be a non-empty string, got ${JSON.stringify(value)}`);
  }
  return value;
}

function readPort(value: unknown): number {
  if (value === undefined) {
    return DEFAULT_PORT;
  }
  if (typeof value === 'number') {
    return value;
  }
  if (typeof value === 'string' && /^\d+$/.test(value)) {
    return Number(value);
  }
  throw new UsageError(`PORT must be a port number, got ${JSON.stringify(value)}`);
}

function checkPort(port: number): number {
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new UsageError(`PORT must be an integer between 1 and 65535, got ${port}`);
  }
  return port;
}

function readTimeout(value: string | undefined): number {
  if (value === undefined || value === '') {
    return DEFAULT_READINESS_TIMEOUT;
  }
  const timeout = Number(value);
  if (Number.isNaN(timeout)) {
    throw new UsageError(`${READINESS_TIMEOUT_ENV} must be a number of milliseconds, got "${value}"`);
  }
  return timeout;
}

function checkDuration(name: string, value: number): number {
  if (!Number.isFinite(value) || value < 0) {
    throw new UsageError(`${name} must be a non-negative number of milliseconds, got ${value}`);
  }
  return value;
}
