import type { Server } from 'http';
import express from 'express';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mountRoutes } from './express-adapter';
import type { RouteArgs } from './route';
import { readJsonBody } from './route';

describe('mountRoutes', () => {
  let server: Server;
  let baseUrl: string;

  beforeEach(async () => {
    const app = express();
    mountRoutes(app, [
      {
        path: 'api/items/:id',
        module: {
          loader: async ({ request, params }: RouteArgs) =>
            Response.json({ id: params.id, query: new URL(request.url).searchParams.get('q') }),
          action: async ({ request, params }: RouteArgs) =>
            Response.json(
              { id: params.id, method: request.method, body: await readJsonBody(request) },
              { status: 201, headers: { 'X-Item': 'saved' } }
            ),
        },
      },
      {
        path: 'api/read-only',
        module: {
          loader: async () => Response.json({ ok: true }),
        },
      },
    ]);

    await new Promise<void>((resolve) => {
      server = app.listen(0, '127.0.0.1', () => resolve());
    });
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Server did not bind a TCP port');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  });

  it('hands a POST body and route params to the action', async () => {
    const response = await fetch(`${baseUrl}/api/items/abc-123`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ title: 'Greeting' }),
    });

    expect(response.status).toBe(201);
    expect(response.headers.get('x-item')).toBe('saved');
    await expect(response.json()).resolves.toEqual({
      id: 'abc-123',
      method: 'POST',
      body: { title: 'Greeting' },
    });
  });

  it('routes GET to the loader with the query string intact', async () => {
    const response = await fetch(`${baseUrl}/api/items/abc-123?q=hello`);

    expect(response.status).toBe(200);
    await expect(response.json()).resolves.toEqual({ id: 'abc-123', query: 'hello' });
  });

  it('answers 405 when the module has no handler for the method', async () => {
    const response = await fetch(`${baseUrl}/api/read-only`, { method: 'DELETE' });

    expect(response.status).toBe(405);
    await expect(response.json()).resolves.toEqual({ error: 'Method DELETE not allowed' });
  });
});
