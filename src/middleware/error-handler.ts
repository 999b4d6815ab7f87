/**
 * Error handler middleware.
 * Maps thrown errors to the `{ error: { code, message, details?, traceId } }`
 * envelope. AppErrors keep their status; anything else is a 500 whose
 * message never reaches the caller. Server-side failures are logged.
 */

import { AppError } from '../errors.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { ApiErrorResponse, ErrorCode } from '../types/api.js';
import type { Handler, Middleware } from './pipeline.js';

const JSON_HEADERS = { 'Content-Type': 'application/json' };

export function createErrorHandler(logProvider: ILogProvider): Middleware {
  return (next: Handler): Handler => {
    return async (req, ctx) => {
      try {
        return await next(req, ctx);
      } catch (err) {
        if (err instanceof AppError) {
          if (err.statusCode >= 500) {
            logProvider.error(err.message, { traceId: ctx.traceId, code: err.code, ...err.details });
          }
          return errorResponse(err.statusCode, err.code, err.message, ctx.traceId, err.details);
        }

        logProvider.error('Unhandled error', {
          traceId: ctx.traceId,
          error: err instanceof Error ? err.message : String(err),
          stack: err instanceof Error ? err.stack : undefined,
        });
        return errorResponse(500, 'INTERNAL_ERROR', 'An unexpected error occurred', ctx.traceId);
      }
    };
  };
}

function errorResponse(
  status: number,
  code: ErrorCode,
  message: string,
  traceId: string,
  details?: Record<string, unknown>
): Response {
  const body: ApiErrorResponse = {
    error: { code, message, ...(details && { details }), traceId },
  };
  return new Response(JSON.stringify(body), { status, headers: JSON_HEADERS });
}
