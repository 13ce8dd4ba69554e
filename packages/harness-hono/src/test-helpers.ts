/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * A small Hono application used by the harness's own tests.
 *
 * Routes:
 * - `GET /` greets the logged-in user, or "guest"
 * - `GET /health` returns `{ "status": "ok" }`
 * - `POST /auth/register` (form: username, password) redirects to /auth/login
 * - `POST /auth/login` sets the `user` cookie and redirects to /
 * - `GET /auth/logout` deletes the cookie and redirects to /
 * - `POST /echo` returns the JSON body and query it received
 * - `GET /loop` redirects to itself forever
 */

import { Hono } from 'hono';
import { deleteCookie, getCookie, setCookie } from 'hono/cookie';

export function buildSampleApp(): Hono {
  const users = new Map<string, string>();
  const app = new Hono();

  app.get('/', (c) => {
    const user = getCookie(c, 'user');
    return c.text(`Hello, ${user ?? 'guest'}`);
  });

  app.get('/health', (c) => c.json({ status: 'ok' }));

  app.post('/auth/register', async (c) => {
    const { username, password } = await c.req.parseBody();
    if (typeof username !== 'string' || typeof password !== 'string' || username === '') {
      return c.text('Username and password are required', 400);
    }
    if (users.has(username)) {
      return c.text(`User ${username} is already registered`, 409);
    }
    users.set(username, password);
    return c.redirect('/auth/login');
  });

  app.post('/auth/login', async (c) => {
    const { username, password } = await c.req.parseBody();
    if (typeof username !== 'string' || users.get(username) !== password) {
      return c.text('Incorrect username or password', 401);
    }
    setCookie(c, 'user', username, { path: '/', httpOnly: true });
    return c.redirect('/');
  });

  app.get('/auth/logout', (c) => {
    deleteCookie(c, 'user', { path: '/' });
    return c.redirect('/');
  });

  app.post('/echo', async (c) => {
    const body: unknown = await c.req.json();
    return c.json({ body, query: c.req.query(), contentType: c.req.header('content-type') ?? null });
  });

  app.get('/loop', (c) => c.redirect('/loop'));

  return app;
}
