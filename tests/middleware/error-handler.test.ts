import { describe, it, expect, beforeEach } from 'vitest';
import { createErrorHandler } from '../../src/middleware/error-handler.js';
import {
  ConfigurationError,
  ValidationError,
  VerifierNotFoundError,
} from '../../src/errors.js';
import { ConsoleLogProvider } from '../../src/providers/ConsoleLogProvider.js';
import type { Handler, HandlerContext, Middleware } from '../../src/middleware/pipeline.js';

describe('error handler', () => {
  const ctx: HandlerContext = { requestId: 'req-42' };
  const req = new Request('http://test');
  let logProvider: ConsoleLogProvider;
  let errorHandler: Middleware;

  function throwing(err: unknown): Handler {
    return async () => {
      throw err;
    };
  }

  beforeEach(() => {
    logProvider = new ConsoleLogProvider();
    errorHandler = createErrorHandler(logProvider);
  });

  it('should pass through successful responses', async () => {
    const handler: Handler = async () => new Response(JSON.stringify({ ok: true }), { status: 200 });

    const res = await errorHandler(handler)(req, ctx);

    expect(res.status).toBe(200);
    expect(logProvider.events).toHaveLength(0);
  });

  it('should map ValidationError to 400 with details', async () => {
    const res = await errorHandler(throwing(new ValidationError('Bad input', { field: 'inputs' })))(req, ctx);
    const body = await res.json();

    expect(res.status).toBe(400);
    expect(body.error.code).toBe('INVALID_REQUEST');
    expect(body.error.details).toEqual({ field: 'inputs' });
  });

  it('should map VerifierNotFoundError to 404 listing the available verifiers', async () => {
    const res = await errorHandler(throwing(new VerifierNotFoundError('nope', ['arganno', 'argmap'])))(req, ctx);
    const body = await res.json();

    expect(res.status).toBe(404);
    expect(body.error).toEqual({
      code: 'VERIFIER_NOT_FOUND',
      message: 'Verifier "nope" not found',
      details: { available: ['arganno', 'argmap'] },
    });
  });

  it('should map ConfigurationError to 422', async () => {
    const res = await errorHandler(throwing(new ConfigurationError('Option "N" must be a positive integer')))(req, ctx);
    const body = await res.json();

    expect(res.status).toBe(422);
    expect(body.error.code).toBe('INVALID_CONFIG');
    expect(body.error.details).toBeUndefined();
  });

  it('should map unknown errors to 500 without exposing internals', async () => {
    const res = await errorHandler(throwing(new Error('secret stack detail')))(req, ctx);
    const body = await res.json();

    expect(res.status).toBe(500);
    expect(body).toEqual({ error: { code: 'INTERNAL_ERROR', message: 'An unexpected error occurred' } });
  });

  it('should log unknown errors with the request id', async () => {
    await errorHandler(throwing(new Error('secret stack detail')))(req, ctx);

    expect(logProvider.events).toHaveLength(1);
    expect(logProvider.events[0]).toMatchObject({
      level: 'error',
      message: 'Unhandled error',
      fields: { requestId: 'req-42', error: 'secret stack detail' },
    });
  });

  it('should log thrown non-errors as strings', async () => {
    await errorHandler(throwing('plain failure'))(req, ctx);

    expect(logProvider.events[0].fields).toEqual({ requestId: 'req-42', error: 'plain failure' });
  });

  it('should set Content-Type to application/json', async () => {
    const res = await errorHandler(throwing(new VerifierNotFoundError('gone', [])))(req, ctx);

    expect(res.headers.get('Content-Type')).toBe('application/json');
  });
});
