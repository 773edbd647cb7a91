/**
 * API router.
 * Matches method and path against the route table. Unmatched paths get a
 * 404, known paths with the wrong method a 405 with an Allow header. Every
 * response carries the CORS headers.
 */

import type { Container } from '../container.js';
import type { Handler, HandlerContext } from '../middleware/pipeline.js';
import type { ApiErrorResponse } from '../types/api.js';
import { json } from './http.js';
import { createVerifierHandlers } from './verifiers.js';
import { createVerifyHandlers } from './verify.js';

export interface Route {
  method: 'GET' | 'POST';
  pattern: RegExp;
  handler: Handler;
}

const CORS_HEADERS: Readonly<Record<string, string>> = Object.freeze({
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Methods': 'GET, POST, OPTIONS',
  'Access-Control-Allow-Headers': 'Content-Type',
  'Access-Control-Max-Age': '86400',
});

export function createRouter(container: Container) {
  const verifiers = createVerifierHandlers(container);
  const { verify } = createVerifyHandlers(container);

  const routes: Route[] = [
    { method: 'GET', pattern: /^\/api\/v1\/health\/?$/, handler: verifiers.health },
    { method: 'GET', pattern: /^\/api\/v1\/verifiers\/?$/, handler: verifiers.list },
    { method: 'GET', pattern: /^\/api\/v1\/verifiers\/[^/]+\/?$/, handler: verifiers.get },
    { method: 'POST', pattern: /^\/api\/v1\/verify\/[^/]+\/?$/, handler: verify },
  ];

  const handle: Handler = async (req: Request, ctx: HandlerContext) => {
    if (req.method === 'OPTIONS') {
      return new Response(null, { status: 204, headers: CORS_HEADERS });
    }

    const { pathname } = new URL(req.url);
    const onPath = routes.filter((r) => r.pattern.test(pathname));
    const route = onPath.find((r) => r.method === req.method);

    if (route) return withCors(await route.handler(req, ctx));

    if (onPath.length > 0) {
      const response = errorResponse(405, {
        error: { code: 'INVALID_REQUEST', message: `Method ${req.method} not allowed on ${pathname}` },
      });
      response.headers.set('Allow', onPath.map((r) => r.method).join(', '));
      return response;
    }

    return errorResponse(404, {
      error: { code: 'NOT_FOUND', message: `No route matches ${req.method} ${pathname}` },
    });
  };

  return { handle, routes };
}

function errorResponse(status: number, body: ApiErrorResponse): Response {
  return withCors(json(body, status));
}

function withCors(response: Response): Response {
  const headers = new Headers(response.headers);
  for (const [key, value] of Object.entries(CORS_HEADERS)) headers.set(key, value);
  return new Response(response.body, { status: response.status, statusText: response.statusText, headers });
}
