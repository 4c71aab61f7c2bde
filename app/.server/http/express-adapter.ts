/**
 * Mounts loader/action route modules on an express app.
 *
 * GET and HEAD go to `loader`, every other method to `action`. Bodies arrive
 * raw (see express.raw in server.ts) and are handed to the web Request as is.
 */

import express from 'express';
import type { Express, NextFunction, Request as ExpressRequest, Response as ExpressResponse } from 'express';
import type { RouteHandler, RouteModule } from './route';
import { methodNotAllowed } from './route';

export interface RouteDefinition {
  path: string;
  module: RouteModule;
}

export function toWebRequest(req: ExpressRequest): Request {
  const url = `${req.protocol}://${req.get('host') ?? 'localhost'}${req.originalUrl}`;

  const headers = new Headers();
  for (const [name, value] of Object.entries(req.headers)) {
    if (Array.isArray(value)) {
      value.forEach((item) => headers.append(name, item));
    } else if (value !== undefined) {
      headers.set(name, value);
    }
  }

  const raw: unknown = req.body;
  const body = req.method !== 'GET' && req.method !== 'HEAD' && Buffer.isBuffer(raw) && raw.length > 0
    ? raw
    : undefined;

  return new Request(url, { method: req.method, headers, body });
}

export async function sendWebResponse(res: ExpressResponse, response: Response): Promise<void> {
  res.status(response.status);
  response.headers.forEach((value, name) => {
    res.setHeader(name, value);
  });
  res.end(Buffer.from(await response.arrayBuffer()));
}

function pickHandler(module: RouteModule, method: string): RouteHandler | undefined {
  return method === 'GET' || method === 'HEAD' ? module.loader : module.action;
}

export function mountRoutes(app: Express, routes: RouteDefinition[]): void {
  const router = express.Router();
  router.use(express.raw({ type: '*/*', limit: '25mb' }));

  for (const route of routes) {
    router.all(`/${route.path}`, (req: ExpressRequest, res: ExpressResponse, next: NextFunction) => {
      const request = toWebRequest(req);
      const handler = pickHandler(route.module, req.method);
      const pending = handler ? handler({ request, params: req.params }) : Promise.resolve(methodNotAllowed(request));

      pending
        .then((response) => sendWebResponse(res, response))
        .catch(next);
    });
  }

  app.use(router);
}
