/**
 * API router.
 * Maps HTTP method + path pattern to handlers.
 * Framework-agnostic: works with any Request/Response based runtime.
 */

import type { Container } from '../container.js';
import type { Handler } from '../middleware/pipeline.js';
import { resolveTraceId, TRACE_HEADER } from '../middleware/trace.js';
import { createDomainHandlers } from './domains.js';
import { createFuseHandlers } from './fuse.js';
import { createHealthHandlers } from './health.js';
import { createQueryHandlers } from './query.js';
import { createRouteHandlers } from './route.js';

interface Route {
  method: string;
  pattern: RegExp;
  handler: Handler;
}

export function createRouter(container: Container) {
  const domains = createDomainHandlers(container);
  const fuse = createFuseHandlers(container);
  const health = createHealthHandlers(container);
  const query = createQueryHandlers(container);
  const route = createRouteHandlers(container);

  const routes: Route[] = [
    { method: 'POST', pattern: /^\/api\/v1\/query\/?$/, handler: query.query },
    { method: 'POST', pattern: /^\/api\/v1\/route\/?$/, handler: route.route },
    { method: 'POST', pattern: /^\/api\/v1\/fuse\/?$/, handler: fuse.fuse },
    { method: 'GET', pattern: /^\/api\/v1\/domains\/?$/, handler: domains.getDomains },
    { method: 'GET', pattern: /^\/health\/?$/, handler: health.health },
  ];

  const handle = async (req: Request): Promise<Response> => {
    const url = new URL(req.url);
    const method = req.method;
    const ctx = { traceId: resolveTraceId(req) };

    // CORS preflight
    if (method === 'OPTIONS') {
      return new Response(null, {
        status: 204,
        headers: corsHeaders(),
      });
    }

    for (const r of routes) {
      if (r.method === method && r.pattern.test(url.pathname)) {
        const response = await r.handler(req, ctx);
        return addCommonHeaders(response, ctx.traceId);
      }
    }

    // Check if path matches but method doesn't
    const matching = routes.filter((r) => r.pattern.test(url.pathname));
    if (matching.length > 0) {
      return new Response(
        JSON.stringify({
          error: {
            code: 'INVALID_REQUEST',
            message: `Method ${method} not allowed`,
            traceId: ctx.traceId,
          },
        }),
        {
          status: 405,
          headers: {
            'Content-Type': 'application/json',
            Allow: matching.map((r) => r.method).join(', '),
            [TRACE_HEADER]: ctx.traceId,
            ...corsHeaders(),
          },
        }
      );
    }

    return new Response(
      JSON.stringify({
        error: {
          code: 'NOT_FOUND',
          message: `No route matches ${method} ${url.pathname}`,
          traceId: ctx.traceId,
        },
      }),
      {
        status: 404,
        headers: {
          'Content-Type': 'application/json',
          [TRACE_HEADER]: ctx.traceId,
          ...corsHeaders(),
        },
      }
    );
  };

  return { handle, routes };
}

function corsHeaders(): Record<string, string> {
  return {
    'Access-Control-Allow-Origin': '*',
    'Access-Control-Allow-Methods': 'GET, POST, OPTIONS',
    'Access-Control-Allow-Headers': `Content-Type, ${TRACE_HEADER}`,
    'Access-Control-Expose-Headers': TRACE_HEADER,
    'Access-Control-Max-Age': '86400',
  };
}

function addCommonHeaders(response: Response, traceId: string): Response {
  const headers = new Headers(response.headers);
  for (const [key, value] of Object.entries(corsHeaders())) {
    headers.set(key, value);
  }
  headers.set(TRACE_HEADER, traceId);
  return new Response(response.body, {
    status: response.status,
    statusText: response.statusText,
    headers,
  });
}
