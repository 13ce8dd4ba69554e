/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * In-process HTTP client for a fetch-style application.
 *
 * Requests never touch a socket: each one is built as a `Request` and
 * handed to the application's `fetch`.
 *
 * @example
 * ```typescript
 * const client = new TestClient((req) => app.fetch(req), true);
 * await client.post('/auth/login', { form: { username: 'alice', password: 'pw' } });
 * const home = await client.get('/', { followRedirects: true });
 * ```
 */

import { UsageError, type ClientHandle } from '@unit-harness/core';
import { CookieJar } from './cookies.js';

/** Maximum redirects followed by one request */
export const MAX_REDIRECTS = 10;

export type FetchHandler = (request: Request) => Response | Promise<Response>;

export type QueryValue = string | number | boolean;

export type ClientPhase = 'idle' | 'open' | 'closed';

/**
 * Client construction options.
 */
export interface TestClientOptions {
  /** Origin relative paths resolve against (default: "http://localhost") */
  baseUrl?: string;
  /** Headers sent with every request */
  headers?: Record<string, string>;
  /** Follow redirects unless a request says otherwise (default: false) */
  followRedirects?: boolean;
}

/**
 * Per-request options. At most one of `json`, `form` and `body` may be given.
 */
export interface RequestOptions {
  /** HTTP method (default: GET) */
  method?: string;
  headers?: Record<string, string>;
  /** Appended to the URL's search parameters */
  query?: Record<string, QueryValue>;
  /** Serialized as JSON with `Content-Type: application/json` */
  json?: unknown;
  /** Sent URL-encoded with `Content-Type: application/x-www-form-urlencoded` */
  form?: Record<string, string>;
  /** Raw body */
  body?: RequestInit['body'];
  followRedirects?: boolean;
}

interface EncodedBody {
  body: RequestInit['body'];
  contentType?: string;
}

export class TestClient implements ClientHandle {
  readonly baseUrl: string;
  private readonly defaultHeaders: Record<string, string>;
  private readonly followRedirects: boolean;
  private readonly jar = new CookieJar();
  private state: ClientPhase = 'idle';

  /**
   * @param handler - Dispatches a request to the application
   * @param useCookies - Keep cookies between requests
   */
  constructor(
    private readonly handler: FetchHandler,
    readonly useCookies: boolean,
    options: TestClientOptions = {}
  ) {
    this.baseUrl = options.baseUrl ?? 'http://localhost';
    this.defaultHeaders = { ...options.headers };
    this.followRedirects = options.followRedirects ?? false;
  }

  get phase(): ClientPhase {
    return this.state;
  }

  open(): void {
    if (this.state === 'closed') {
      throw new UsageError('Cannot reopen a closed client');
    }
    this.state = 'open';
  }

  close(): void {
    this.state = 'closed';
    this.jar.clear();
  }

  // ===========================================================================
  // Cookies
  // ===========================================================================

  getCookie(name: string): string | undefined {
    return this.jar.get(name);
  }

  /**
   * @throws {UsageError} If the client was built without cookies
   */
  setCookie(name: string, value: string): void {
    if (!this.useCookies) {
      throw new UsageError('Cookies are disabled for this client');
    }
    this.jar.set(name, value);
  }

  deleteCookie(name: string): boolean {
    return this.jar.delete(name);
  }

  clearCookies(): void {
    this.jar.clear();
  }

  // ===========================================================================
  // Requests
  // ===========================================================================

  get(path: string, options: Omit<RequestOptions, 'method'> = {}): Promise<Response> {
    return this.request(path, { ...options, method: 'GET' });
  }

  post(path: string, options: Omit<RequestOptions, 'method'> = {}): Promise<Response> {
    return this.request(path, { ...options, method: 'POST' });
  }

  put(path: string, options: Omit<RequestOptions, 'method'> = {}): Promise<Response> {
    return this.request(path, { ...options, method: 'PUT' });
  }

  patch(path: string, options: Omit<RequestOptions, 'method'> = {}): Promise<Response> {
    return this.request(path, { ...options, method: 'PATCH' });
  }

  delete(path: string, options: Omit<RequestOptions, 'method'> = {}): Promise<Response> {
    return this.request(path, { ...options, method: 'DELETE' });
  }

  /**
   * Send a request, following redirects if enabled.
   *
   * A 303, or a 301/302 answering anything but GET or HEAD, is followed with
   * a bodiless GET; other redirects repeat the method and body.
   *
   * @throws {UsageError} If the client is closed or the body options conflict
   * @throws {Error} If more than MAX_REDIRECTS redirects are followed
   */
  async request(path: string, options: RequestOptions = {}): Promise<Response> {
    if (this.state === 'closed') {
      throw new UsageError('Cannot send a request on a closed client');
    }

    let method = (options.method ?? 'GET').toUpperCase();
    let url = this.resolve(path, options.query);
    let encoded: EncodedBody | undefined = encodeBody(options);
    let response = await this.dispatch(method, url, options.headers, encoded);

    const follow = options.followRedirects ?? this.followRedirects;
    let hops = 0;
    while (follow && isRedirect(response.status)) {
      const location = response.headers.get('location');
      if (location === null) {
        break;
      }
      if (hops === MAX_REDIRECTS) {
        throw new Error(`Too many redirects (more than ${MAX_REDIRECTS}) starting from ${method} ${path}`);
      }
      hops++;

      const status = response.status;
      if (status === 303 || ((status === 301 || status === 302) && method !== 'GET' && method !== 'HEAD')) {
        method = 'GET';
        encoded = undefined;
      }
      url = new URL(location, url);
      response = await this.dispatch(method, url, options.headers, encoded);
    }

    return response;
  }

  private resolve(path: string, query: Record<string, QueryValue> | undefined): URL {
    const url = new URL(path, this.baseUrl);
    for (const [key, value] of Object.entries(query ?? {})) {
      url.searchParams.append(key, String(value));
    }
    return url;
  }

  private async dispatch(
    method: string,
    url: URL,
    headers: Record<string, string> | undefined,
    encoded: EncodedBody | undefined
  ): Promise<Response> {
    const merged = new Headers(this.defaultHeaders);
    for (const [name, value] of Object.entries(headers ?? {})) {
      merged.set(name, value);
    }
    if (encoded?.contentType && !merged.has('content-type')) {
      merged.set('content-type', encoded.contentType);
    }
    if (this.useCookies) {
      const cookies = this.jar.header();
      if (cookies !== undefined) {
        const explicit = merged.get('cookie');
        merged.set('cookie', explicit ? `${explicit}; ${cookies}` : cookies);
      }
    }

    const request = new Request(url, { method, headers: merged, body: encoded?.body });
    const response = await this.handler(request);
    if (this.useCookies) {
      this.jar.store(response.headers);
    }
    return response;
  }
}

function isRedirect(status: number): boolean {
  return status === 301 || status === 302 || status === 303 || status === 307 || status === 308;
}

function encodeBody(options: RequestOptions): EncodedBody | undefined {
  const given = [options.json !== undefined, options.form !== undefined, options.body !== undefined];
  if (given.filter(Boolean).length > 1) {
    throw new UsageError('Pass at most one of json, form and body');
  }
  if (options.json !== undefined) {
    return { body: JSON.stringify(options.json), contentType: 'application/json' };
  }
  if (options.form !== undefined) {
    return { body: new URLSearchParams(options.form).toString(), contentType: 'application/x-www-form-urlencoded' };
  }
  if (options.body !== undefined) {
    return { body: options.body };
  }
  return undefined;
}
