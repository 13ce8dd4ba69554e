/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * A name-keyed cookie jar for the in-process client.
 *
 * Domain and path attributes are not tracked: every stored cookie is sent
 * with every request of the client that received it.
 */

/**
 * A parsed `Set-Cookie` header.
 */
export interface SetCookie {
  name: string;
  value: string;
  /** Max-Age <= 0, or an Expires date in the past */
  expired: boolean;
}

/**
 * Parse one `Set-Cookie` header value.
 *
 * @param now - Reference time for `Expires` (ms since epoch)
 * @returns null if the header has no `name=value` pair
 */
export function parseSetCookie(header: string, now: number = Date.now()): SetCookie | null {
  const [pair = '', ...attributes] = header.split(';');
  const eq = pair.indexOf('=');
  if (eq <= 0) {
    return null;
  }
  const name = pair.slice(0, eq).trim();
  const value = pair.slice(eq + 1).trim();
  if (name === '') {
    return null;
  }

  let maxAge: number | undefined;
  let expires: number | undefined;
  for (const attribute of attributes) {
    const sep = attribute.indexOf('=');
    const key = (sep === -1 ? attribute : attribute.slice(0, sep)).trim().toLowerCase();
    const raw = sep === -1 ? '' : attribute.slice(sep + 1).trim();
    if (key === 'max-age') {
      const seconds = Number(raw);
      if (raw !== '' && Number.isFinite(seconds)) {
        maxAge = seconds;
      }
    } else if (key === 'expires') {
      const time = Date.parse(raw);
      if (!Number.isNaN(time)) {
        expires = time;
      }
    }
  }

  // Max-Age wins over Expires
  const expired = maxAge !== undefined ? maxAge <= 0 : expires !== undefined && expires <= now;
  return { name, value, expired };
}

export class CookieJar {
  private readonly cookies = new Map<string, string>();

  get size(): number {
    return this.cookies.size;
  }

  get(name: string): string | undefined {
    return this.cookies.get(name);
  }

  set(name: string, value: string): void {
    this.cookies.set(name, value);
  }

  delete(name: string): boolean {
    return this.cookies.delete(name);
  }

  clear(): void {
    this.cookies.clear();
  }

  entries(): IterableIterator<[string, string]> {
    return this.cookies.entries();
  }

  /**
   * Apply the `Set-Cookie` headers of a response.
   */
  store(headers: Headers, now: number = Date.now()): void {
    for (const header of headers.getSetCookie()) {
      const cookie = parseSetCookie(header, now);
      if (!cookie) {
        continue;
      }
      if (cookie.expired) {
        this.cookies.delete(cookie.name);
      } else {
        this.cookies.set(cookie.name, cookie.value);
      }
    }
  }

  /**
   * The `Cookie` request header for the stored cookies, or undefined if
   * the jar is empty.
   */
  header(): string | undefined {
    if (this.cookies.size === 0) {
      return undefined;
    }
    return [...this.cookies].map(([name, value]) => `${name}=${value}`).join('; ');
  }
}
