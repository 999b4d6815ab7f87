/**
 * Request logging middleware.
 * One event per request: method, path (no query string), status, duration
 * and trace id. 4xx logs at warn, 5xx and handler exceptions at error.
 * Exceptions are re-thrown after logging.
 */

import type { ILogProvider, LogLevel, RequestLogEvent } from '../providers/ILogProvider.js';
import type { Handler, Middleware } from './pipeline.js';

function levelForStatus(status: number): LogLevel {
  if (status >= 500) return 'error';
  if (status >= 400) return 'warn';
  return 'info';
}

export function createLoggingMiddleware(logProvider: ILogProvider): Middleware {
  return (next: Handler): Handler => {
    return async (req, ctx) => {
      const { pathname: path } = new URL(req.url);
      const start = performance.now();

      const emit = (status: number, fields?: Record<string, unknown>) => {
        const durationMs = Math.round(performance.now() - start);
        const event: RequestLogEvent = {
          level: levelForStatus(status),
          message: `${req.method} ${path} → ${status} (${durationMs}ms)`,
          method: req.method,
          path,
          status,
          durationMs,
          traceId: ctx.traceId,
          fields,
        };
        logProvider.log(event);
      };

      let response: Response;
      try {
        response = await next(req, ctx);
      } catch (err) {
        emit(500, { error: err instanceof Error ? err.message : String(err) });
        throw err;
      }
      emit(response.status);
      return response;
    };
  };
}
