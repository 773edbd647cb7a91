/**
 * Response and request helpers shared by the endpoint modules.
 */

import { ValidationError } from '../errors.js';
import type { HandlerContext } from '../middleware/pipeline.js';

const JSON_HEADERS = { 'Content-Type': 'application/json' };

export function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: JSON_HEADERS });
}

/** Decoded final path segment, e.g. `logreco` for /api/v1/verify/logreco/. */
export function lastSegment(req: Request): string {
  const parts = new URL(req.url).pathname.split('/').filter(Boolean);
  return decodeURIComponent(parts[parts.length - 1] ?? '');
}

/** The body validateBody parsed. Throws on routes without that middleware. */
export function requireBody(ctx: HandlerContext): Record<string, unknown> {
  if (!ctx.body) throw new ValidationError('Request body is required');
  return ctx.body;
}
