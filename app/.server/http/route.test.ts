import { describe, expect, it, vi } from 'vitest';
import { z } from 'zod';
import { errorResponse, readJsonBody, requireParam } from './route';
import { IOError, NotFoundError, PublicationError, ValidationError } from '~/.server/errors';
import type { AppLogger } from '~/.server/log/logger';

function createLogger(): AppLogger {
  const logger: AppLogger = {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    child: () => logger,
  };
  return logger;
}

describe('errorResponse', () => {
  it.each([
    [new ValidationError('bad input'), 400],
    [new NotFoundError('missing'), 404],
    [new PublicationError('unauthorized'), 401],
    [new PublicationError('invalid-hash'), 400],
    [new PublicationError('invalid-url'), 400],
    [new PublicationError('request-failed', { status: 503 }), 502],
    [new IOError('disk full'), 500],
  ])('maps %s to %i', (error, status) => {
    expect(errorResponse(error, createLogger(), 'Failed').status).toBe(status);
  });

  it('maps zod failures to 400 with details', async () => {
    const result = z.object({ name: z.string() }).safeParse({});
    if (result.success) throw new Error('expected a parse failure');

    const response = errorResponse(result.error, createLogger(), 'Failed');

    expect(response.status).toBe(400);
    await expect(response.json()).resolves.toMatchObject({
      error: 'Invalid request',
      details: { fieldErrors: { name: ['Required'] } },
    });
  });

  it('hides unexpected errors behind the fallback message and logs them', async () => {
    const log = createLogger();
    const error = new Error('secret internals');

    const response = errorResponse(error, log, 'Failed to do the thing');

    await expect(response.json()).resolves.toEqual({ error: 'Failed to do the thing' });
    expect(log.error).toHaveBeenCalledWith({ err: error }, 'Failed to do the thing');
  });

  it('reports the publication kind', async () => {
    const response = errorResponse(new PublicationError('unauthorized'), createLogger(), 'Failed');

    await expect(response.json()).resolves.toEqual({
      error: 'Unauthorized - check your credentials',
      kind: 'unauthorized',
    });
  });
});

describe('readJsonBody', () => {
  it('reads an empty body as an empty object', async () => {
    await expect(readJsonBody(new Request('http://localhost/', { method: 'POST' }))).resolves.toEqual({});
  });

  it('throws ValidationError for malformed JSON', async () => {
    await expect(readJsonBody(new Request('http://localhost/', { method: 'POST', body: '{' })))
      .rejects.toBeInstanceOf(ValidationError);
  });
});

describe('requireParam', () => {
  it('returns present params and rejects missing ones', () => {
    expect(requireParam({ id: 'abc' }, 'id')).toBe('abc');
    expect(() => requireParam({}, 'id')).toThrow(ValidationError);
  });
});
