/**
 * Express application.
 * Every request goes to the Fetch-style API router; express only owns the
 * socket, the raw body and the final write.
 */

import express, {
  type ErrorRequestHandler,
  type Express,
  type Request as ExpressRequest,
  type Response as ExpressResponse,
} from 'express';
import type { ILogProvider } from './providers/ILogProvider.js';
import type { ApiErrorResponse } from './types/api.js';
import { isFiniteNumber, isRecord } from './utils/guards.js';

export const MAX_BODY_BYTES = 1_048_576;

// Framing headers belong to the inbound connection, not the rebuilt request.
const HOP_BY_HOP = new Set(['connection', 'keep-alive', 'transfer-encoding', 'content-length']);

export interface FetchHandler {
  handle(req: Request): Promise<Response>;
}

export function createApp(router: FetchHandler, logger: ILogProvider): Express {
  const app = express();
  app.disable('x-powered-by');
  app.set('etag', false);

  app.use(express.raw({ type: () => true, limit: MAX_BODY_BYTES }));

  app.use((req, res, next) => {
    router
      .handle(toFetchRequest(req))
      .then((response) => send(res, response))
      .catch(next);
  });

  const onError: ErrorRequestHandler = (err: unknown, _req, res, _next) => {
    const status = isRecord(err) && isFiniteNumber(err.status) ? err.status : 500;
    const clientError = status >= 400 && status < 500;
    if (!clientError) {
      logger.error('Unhandled request failure', {
        error: err instanceof Error ? err.message : String(err),
      });
    }
    const body: ApiErrorResponse = {
      error: clientError
        ? { code: 'INVALID_REQUEST', message: err instanceof Error ? err.message : 'Invalid request' }
        : { code: 'INTERNAL_ERROR', message: 'An unexpected error occurred' },
    };
    res.status(clientError ? status : 500).json(body);
  };
  app.use(onError);

  return app;
}

export function toFetchRequest(req: ExpressRequest): Request {
  const headers = new Headers();
  for (const [name, value] of Object.entries(req.headers)) {
    if (HOP_BY_HOP.has(name)) continue;
    if (typeof value === 'string') {
      headers.set(name, value);
    } else if (Array.isArray(value)) {
      for (const v of value) headers.append(name, v);
    }
  }

  const body: Buffer | undefined =
    Buffer.isBuffer(req.body) && req.body.length > 0 ? req.body : undefined;

  return new Request(`${req.protocol}://${req.get('host') ?? 'localhost'}${req.originalUrl}`, {
    method: req.method,
    headers,
    body,
  });
}

async function send(res: ExpressResponse, response: Response): Promise<void> {
  res.status(response.status);
  response.headers.forEach((value, name) => {
    res.setHeader(name, value);
  });
  res.send(Buffer.from(await response.arrayBuffer()));
}
