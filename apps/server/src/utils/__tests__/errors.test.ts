/**
 * Error class and Fastify error handler tests
 */

import { describe, it, expect, afterEach } from 'vitest';
import Fastify, { type FastifyInstance } from 'fastify';
import { z } from 'zod';
import {
  AppError,
  ConnectorError,
  ErrorCodes,
  HistoryStorageError,
  InternalError,
  MalformedObservationError,
  NotFoundError,
  ServiceUnavailableError,
  ValidationError,
  errorMessage,
  registerErrorHandler,
} from '../errors.js';

describe('AppError subclasses', () => {
  it('serializes NotFoundError with and without an id', () => {
    expect(new NotFoundError('Session', 'abc').toJSON()).toEqual({
      statusCode: 404,
      error: 'NotFoundError',
      message: "Session with ID 'abc' not found",
      code: 'RES_001',
    });
    expect(new NotFoundError().message).toBe('Resource not found');
  });

  it('keeps instanceof through the hierarchy', () => {
    const error = new ValidationError('bad');

    expect(error).toBeInstanceOf(ValidationError);
    expect(error).toBeInstanceOf(AppError);
    expect(error).toBeInstanceOf(Error);
  });

  it('builds ValidationError fields from a zod error', () => {
    const result = z.object({ limit: z.number().max(100) }).safeParse({ limit: 500 });
    if (result.success) throw new Error('expected failure');

    const error = ValidationError.fromZodError(result.error);

    expect(error.message).toBe('Validation failed');
    expect(error.statusCode).toBe(400);
    expect(error.fields).toHaveLength(1);
    expect(error.fields?.[0]?.field).toBe('limit');
    expect(error.toJSON().details).toEqual({ fields: error.fields });
  });

  it('omits details when a ValidationError has no fields', () => {
    expect(new ValidationError('bad').toJSON()).not.toHaveProperty('details');
  });

  it('marks InternalError as non-operational', () => {
    const error = new InternalError();

    expect(error.isOperational).toBe(false);
    expect(error.statusCode).toBe(500);
    expect(error.message).toBe('An unexpected error occurred');
  });

  it('names the unavailable service', () => {
    const error = new ServiceUnavailableError('Redis');

    expect(error.message).toBe('Redis is currently unavailable');
    expect(error.code).toBe(ErrorCodes.SERVICE_UNAVAILABLE);
  });

  it('nests the path of malformed observation fields', () => {
    const result = z
      .object({ snapshot: z.object({ userId: z.string() }) })
      .safeParse({ snapshot: { userId: 7 } });
    if (result.success) throw new Error('expected failure');

    const error = MalformedObservationError.fromZodError(result.error);

    expect(error.code).toBe('VAL_002');
    expect(error.message).toBe('Malformed observation');
    expect(error.toJSON().details).toMatchObject({ fields: [{ field: 'snapshot.userId' }] });
  });

  it('keeps the cause of a history storage failure', () => {
    const cause = new Error('connection terminated');
    const error = new HistoryStorageError(undefined, cause);

    expect(error.message).toBe('History write failed');
    expect(error.code).toBe('SRV_003');
    expect(error.cause).toBe(cause);
  });
});

describe('ConnectorError', () => {
  it.each([
    ['unreachable', 502, 'EXT_001', true],
    ['unauthorized', 502, 'EXT_002', false],
    ['not_found', 404, 'EXT_003', false],
    ['timeout', 504, 'EXT_004', true],
    ['malformed_response', 502, 'EXT_005', false],
  ] as const)('%s maps to %i %s', (kind, statusCode, code, retryable) => {
    const error = new ConnectorError('plex', kind, 'detail');

    expect(error.statusCode).toBe(statusCode);
    expect(error.code).toBe(code);
    expect(error.retryable).toBe(retryable);
    expect(error.details).toEqual({ kind });
  });

  it('prefixes the message with the server type', () => {
    expect(new ConnectorError('jellyfin', 'timeout', 'request timed out').message).toBe(
      'Jellyfin timeout: request timed out'
    );
  });
});

describe('errorMessage', () => {
  it('reads Error messages and stringifies the rest', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('plain')).toBe('plain');
    expect(errorMessage(42)).toBe('42');
  });
});

describe('registerErrorHandler', () => {
  let app: FastifyInstance;

  afterEach(async () => {
    await app.close();
  });

  async function buildTestApp(): Promise<FastifyInstance> {
    app = Fastify({ logger: false });
    registerErrorHandler(app);
    app.get('/app-error', async () => {
      throw new NotFoundError('Session', 'missing');
    });
    app.get('/status-error', async () => {
      throw Object.assign(new Error('Teapot'), { statusCode: 418 });
    });
    app.get('/plain-error', async () => {
      throw new Error('unexpected');
    });
    app.post(
      '/schema',
      {
        schema: {
          body: {
            type: 'object',
            required: ['name'],
            properties: { name: { type: 'string' } },
          },
        },
      },
      async () => ({ ok: true })
    );
    await app.ready();
    return app;
  }

  it('sends AppError JSON', async () => {
    await buildTestApp();

    const response = await app.inject({ method: 'GET', url: '/app-error' });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({
      statusCode: 404,
      error: 'NotFoundError',
      message: "Session with ID 'missing' not found",
      code: 'RES_001',
    });
  });

  it('keeps the status of errors that carry one', async () => {
    await buildTestApp();

    const response = await app.inject({ method: 'GET', url: '/status-error' });

    expect(response.statusCode).toBe(418);
    expect(response.json()).toEqual({ statusCode: 418, error: 'Error', message: 'Teapot' });
  });

  it('turns unknown errors into 500', async () => {
    await buildTestApp();

    const response = await app.inject({ method: 'GET', url: '/plain-error' });

    expect(response.statusCode).toBe(500);
    expect(response.json()).toMatchObject({ statusCode: 500, error: 'InternalServerError' });
  });

  it('reports schema validation failures as VAL_001', async () => {
    await buildTestApp();

    const response = await app.inject({ method: 'POST', url: '/schema', payload: {} });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toMatchObject({ code: 'VAL_001', message: 'Validation failed' });
  });

  it('answers unknown routes with 404', async () => {
    await buildTestApp();

    const response = await app.inject({ method: 'GET', url: '/nowhere' });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({
      statusCode: 404,
      error: 'NotFound',
      message: 'Route GET /nowhere not found',
    });
  });
});
