/**
 * Routing endpoint.
 * POST /api/v1/route: Build a routing plan without dispatching it
 */

import { pipeline, validateBody, readJsonBody } from '../middleware/index.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import { ValidationError } from '../errors.js';
import { SERVICE_NAME } from '../services/QueryService.js';
import { MAX_EXPLICIT_DOMAINS } from './query.js';
import { jsonResponse, optionalStringArray } from './payloads.js';

export function createRouteHandlers(container: Container) {
  const route: Handler = pipeline(
    container.logging,
    container.errors,
    validateBody({
      queryText: { type: 'string', required: true, maxLength: container.config.routing.maxQueryLength },
      domains: { type: 'array', items: 'string', maxLength: MAX_EXPLICIT_DOMAINS },
    })
  )(async (req, ctx) => {
    const body = await readJsonBody(req);
    if (typeof body.queryText !== 'string') {
      throw new ValidationError('queryText is required');
    }

    const { plan } = await container.routingService.route({
      queryText: body.queryText,
      domains: optionalStringArray(body.domains),
      traceId: ctx.traceId,
    });

    return jsonResponse({
      _meta: {
        source: SERVICE_NAME,
        routing: plan.mode,
        fallbackReason: plan.fallbackReason,
      },
      plan,
    });
  });

  return { route };
}
