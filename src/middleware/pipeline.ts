/**
 * Middleware composition for the API handlers.
 * `pipeline(a, b)(handler)` runs a around b around handler.
 */

export interface HandlerContext {
  /** Correlates the log events and verification runs of one request. */
  requestId: string;
  /** Parsed JSON body, set by validateBody. */
  body?: Record<string, unknown>;
}

export type Handler = (req: Request, ctx: HandlerContext) => Promise<Response>;
export type Middleware = (next: Handler) => Handler;

export function pipeline(...middlewares: Middleware[]) {
  return (handler: Handler): Handler => middlewares.reduceRight<Handler>((next, wrap) => wrap(next), handler);
}
