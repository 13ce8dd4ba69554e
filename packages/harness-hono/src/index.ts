/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Hono adapter for the harness: wraps a Hono app as an Application whose
 * clients dispatch in process and whose `run()` serves it over HTTP.
 */

export { HonoApplication, createApplication, type Fetchable } from './application.js';
export {
  TestClient,
  MAX_REDIRECTS,
  type FetchHandler,
  type QueryValue,
  type ClientPhase,
  type TestClientOptions,
  type RequestOptions,
} from './client.js';
export { CookieJar, parseSetCookie, type SetCookie } from './cookies.js';
