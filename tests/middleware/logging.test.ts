import { describe, it, expect, beforeEach } from 'vitest';
import { createLoggingMiddleware } from '../../src/middleware/logging.js';
import { ConsoleLogProvider } from '../../src/providers/ConsoleLogProvider.js';
import type { Handler, HandlerContext } from '../../src/middleware/pipeline.js';

function makeRequest(method: string, path: string): Request {
  return new Request(`https://example.com${path}`, { method });
}

const ctx: HandlerContext = { requestId: 'req-7' };

describe('logging middleware', () => {
  let logProvider: ConsoleLogProvider;
  let middleware: ReturnType<typeof createLoggingMiddleware>;

  beforeEach(() => {
    logProvider = new ConsoleLogProvider();
    middleware = createLoggingMiddleware(logProvider);
  });

  it('should log a successful request', async () => {
    const handler: Handler = async () => new Response(JSON.stringify({ ok: true }), { status: 200 });

    const response = await middleware(handler)(makeRequest('GET', '/api/v1/verifiers'), ctx);

    expect(response.status).toBe(200);
    expect(logProvider.events).toHaveLength(1);
    expect(logProvider.events[0]).toMatchObject({
      level: 'info',
      method: 'GET',
      path: '/api/v1/verifiers',
      status: 200,
      requestId: 'req-7',
    });
    expect(logProvider.events[0].message).toMatch(/^GET \/api\/v1\/verifiers → 200 \(\d+ms\)$/);
  });

  it('should pass through the response unmodified', async () => {
    const body = JSON.stringify({ data: 'test' });
    const handler: Handler = async () =>
      new Response(body, {
        status: 201,
        headers: { 'Content-Type': 'application/json', 'X-Custom': 'yes' },
      });

    const response = await middleware(handler)(makeRequest('POST', '/api/v1/verify/argmap'), ctx);

    expect(response.status).toBe(201);
    expect(response.headers.get('X-Custom')).toBe('yes');
    expect(await response.text()).toBe(body);
  });

  it('should log 4xx responses at warn level', async () => {
    const handler: Handler = async () => new Response(null, { status: 422 });

    await middleware(handler)(makeRequest('POST', '/api/v1/verify/logreco'), ctx);

    expect(logProvider.events[0]).toMatchObject({ level: 'warn', status: 422 });
  });

  it('should log 5xx responses at error level', async () => {
    const handler: Handler = async () => new Response('Internal Error', { status: 500 });

    await middleware(handler)(makeRequest('POST', '/api/v1/verify/logreco'), ctx);

    expect(logProvider.events[0]).toMatchObject({ level: 'error', status: 500 });
  });

  it('should measure request duration', async () => {
    const handler: Handler = async () => {
      await new Promise((r) => setTimeout(r, 20));
      return new Response(null, { status: 200 });
    };

    await middleware(handler)(makeRequest('GET', '/api/v1/health'), ctx);

    expect(logProvider.events[0]).toMatchObject({ durationMs: expect.any(Number) });
    const [event] = logProvider.events;
    expect(event.message).toMatch(/\((\d{2,})ms\)$/);
  });

  it('should log and re-throw if the handler throws', async () => {
    const handler: Handler = async () => {
      throw new Error('boom');
    };

    await expect(middleware(handler)(makeRequest('POST', '/api/v1/verify/arganno'), ctx)).rejects.toThrow('boom');

    expect(logProvider.events).toHaveLength(1);
    expect(logProvider.events[0]).toMatchObject({
      level: 'error',
      status: 500,
      requestId: 'req-7',
      fields: { error: 'boom' },
    });
    expect(logProvider.events[0].message).toContain('POST /api/v1/verify/arganno → 500');
  });

  it('should log path without query parameters', async () => {
    const handler: Handler = async () => new Response(null, { status: 200 });

    await middleware(handler)(makeRequest('GET', '/api/v1/verifiers?category=core'), ctx);

    expect(logProvider.events[0]).toMatchObject({ path: '/api/v1/verifiers' });
  });
});
