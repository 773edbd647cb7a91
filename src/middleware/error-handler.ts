/**
 * Error handler middleware.
 * Maps thrown errors to structured JSON responses. AppError subclasses keep
 * their status code and details; anything else is logged and becomes a bare
 * 500.
 */

import { AppError } from '../errors.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { ApiErrorResponse } from '../types/api.js';
import type { Handler, Middleware } from './pipeline.js';

const JSON_HEADERS = { 'Content-Type': 'application/json' };

function json(body: ApiErrorResponse, status: number): Response {
  return new Response(JSON.stringify(body), { status, headers: JSON_HEADERS });
}

export function createErrorHandler(logProvider: ILogProvider): Middleware {
  return (next: Handler): Handler => {
    return async (req, ctx) => {
      try {
        return await next(req, ctx);
      } catch (err) {
        if (err instanceof AppError) {
          return json(
            {
              error: {
                code: err.code,
                message: err.message,
                ...(err.details && { details: err.details }),
              },
            },
            err.statusCode
          );
        }

        logProvider.error('Unhandled error', {
          requestId: ctx.requestId,
          error: err instanceof Error ? err.message : String(err),
          ...(err instanceof Error && err.stack && { stack: err.stack }),
        });

        // Internals stay out of the response
        return json({ error: { code: 'INTERNAL_ERROR', message: 'An unexpected error occurred' } }, 500);
      }
    };
  };
}
