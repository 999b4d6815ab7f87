/**
 * Query endpoint.
 * POST /api/v1/query: Route, fan out and fuse one query
 */

import { pipeline, validateBody, readJsonBody } from '../middleware/index.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import type { BodySchema } from '../types/common.js';
import { CONFLICT_STRATEGIES } from '../types/models.js';
import { ValidationError } from '../errors.js';
import {
  jsonResponse,
  optionalBoolean,
  optionalNumber,
  optionalRecord,
  optionalStringArray,
  parseConflictStrategy,
} from './payloads.js';

export const MAX_TOP_K = 100;
export const MAX_TIMEOUT_MS = 120_000;
export const MAX_EXPLICIT_DOMAINS = 32;

export function querySchema(maxQueryLength: number): BodySchema {
  return {
    queryText: { type: 'string', required: true, maxLength: maxQueryLength },
    topK: { type: 'number', integer: true, min: 1, max: MAX_TOP_K },
    domains: { type: 'array', items: 'string', maxLength: MAX_EXPLICIT_DOMAINS },
    filters: { type: 'object' },
    synthesize: { type: 'boolean' },
    timeoutMs: { type: 'number', integer: true, min: 1, max: MAX_TIMEOUT_MS },
    conflictStrategy: { type: 'string', enum: CONFLICT_STRATEGIES },
  };
}

export function createQueryHandlers(container: Container) {
  const query: Handler = pipeline(
    container.logging,
    container.errors,
    validateBody(querySchema(container.config.routing.maxQueryLength))
  )(async (req, ctx) => {
    const body = await readJsonBody(req);
    if (typeof body.queryText !== 'string') {
      throw new ValidationError('queryText is required');
    }

    const result = await container.queryService.query(
      {
        queryText: body.queryText,
        topK: optionalNumber(body.topK),
        domains: optionalStringArray(body.domains),
        filters: optionalRecord(body.filters),
        synthesize: optionalBoolean(body.synthesize),
        timeoutMs: optionalNumber(body.timeoutMs),
        conflictStrategy: parseConflictStrategy(body.conflictStrategy),
      },
      ctx.traceId
    );

    return jsonResponse(result);
  });

  return { query };
}
