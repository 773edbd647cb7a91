/**
 * Request logging middleware.
 * One event per request: 2xx info, 4xx warn, 5xx and thrown errors error.
 * Thrown errors are logged as 500 and re-thrown.
 */

import type { ILogProvider, LogLevel, RequestLogEvent } from '../providers/ILogProvider.js';
import type { Handler, Middleware } from './pipeline.js';

function levelForStatus(status: number): LogLevel {
  if (status >= 500) return 'error';
  return status >= 400 ? 'warn' : 'info';
}

export function createLoggingMiddleware(logProvider: ILogProvider): Middleware {
  return (next: Handler): Handler => {
    return async (req, ctx) => {
      const { method } = req;
      const path = new URL(req.url).pathname;
      const start = performance.now();

      const record = (status: number, fields?: Record<string, unknown>) => {
        const durationMs = Math.round(performance.now() - start);
        const event: RequestLogEvent = {
          level: fields ? 'error' : levelForStatus(status),
          message: `${method} ${path} → ${status} (${durationMs}ms)`,
          method,
          path,
          status,
          durationMs,
          requestId: ctx.requestId,
          ...(fields && { fields }),
        };
        logProvider.log(event);
      };

      let response: Response;
      try {
        response = await next(req, ctx);
      } catch (err) {
        record(500, { error: err instanceof Error ? err.message : String(err) });
        throw err;
      }
      record(response.status);
      return response;
    };
  };
}
