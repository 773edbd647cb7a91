export { pipeline } from './pipeline.js';
export type { Handler, HandlerContext, Middleware } from './pipeline.js';
export { createErrorHandler } from './error-handler.js';
export { validateBody } from './validate-body.js';
export { createLoggingMiddleware } from './logging.js';
