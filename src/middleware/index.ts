export { pipeline } from './pipeline.js';
export type { Handler, HandlerContext, Middleware } from './pipeline.js';
export { createErrorHandler } from './error-handler.js';
export { validateBody, readJsonBody } from './validate-body.js';
export { createLoggingMiddleware } from './logging.js';
export { resolveTraceId, TRACE_HEADER } from './trace.js';
