// Shared pieces for API route modules
import { ZodError } from 'zod';
import { NotFoundError, PublicationError, ValidationError } from '~/.server/errors';
import type { AppLogger } from '~/.server/log/logger';

export interface RouteArgs {
  request: Request;
  params: Record<string, string | undefined>;
}

export type RouteHandler = (args: RouteArgs) => Promise<Response>;

export interface RouteModule {
  loader?: RouteHandler;
  action?: RouteHandler;
}

export function requireParam(params: RouteArgs['params'], name: string): string {
  const value = params[name];
  if (!value) {
    throw new ValidationError(`Missing route parameter: ${name}`);
  }
  return value;
}

/**
 * Parse the request body as JSON; an empty body reads as `{}`
 */
export async function readJsonBody(request: Request): Promise<unknown> {
  const text = await request.text();
  if (!text.trim()) {
    return {};
  }
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new ValidationError(`Request body is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
}

export function methodNotAllowed(request: Request): Response {
  return Response.json({ error: `Method ${request.method} not allowed` }, { status: 405 });
}

function publicationStatus(error: PublicationError): number {
  switch (error.kind) {
    case 'unauthorized':
      return 401;
    case 'invalid-hash':
    case 'invalid-url':
      return 400;
    case 'request-failed':
      return 502;
  }
}

/**
 * Map a thrown error to a JSON response. Unexpected errors are logged and
 * reported with `fallbackMessage` only.
 */
export function errorResponse(error: unknown, log: AppLogger, fallbackMessage: string): Response {
  if (error instanceof ZodError) {
    return Response.json({ error: 'Invalid request', details: error.flatten() }, { status: 400 });
  }
  if (error instanceof ValidationError) {
    return Response.json({ error: error.message }, { status: 400 });
  }
  if (error instanceof NotFoundError) {
    return Response.json({ error: error.message }, { status: 404 });
  }
  if (error instanceof PublicationError) {
    log.warn({ err: error, kind: error.kind, status: error.status }, fallbackMessage);
    return Response.json({ error: error.message, kind: error.kind }, { status: publicationStatus(error) });
  }

  log.error({ err: error }, fallbackMessage);
  return Response.json({ error: fallbackMessage }, { status: 500 });
}
