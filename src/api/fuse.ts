/**
 * Fusion endpoint.
 * POST /api/v1/fuse: Fuse responses collected by the caller
 */

import { randomUUID } from 'node:crypto';
import { pipeline, validateBody, readJsonBody } from '../middleware/index.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import { CONFLICT_STRATEGIES } from '../types/models.js';
import { domainRelevanceFor } from '../fusion/rank.js';
import {
  jsonResponse,
  optionalBoolean,
  optionalString,
  parseConflictStrategy,
  parseCoverageGaps,
  parseDomainSignals,
  parseRecallResponses,
  parseReferenceTime,
} from './payloads.js';

export function createFuseHandlers(container: Container) {
  const fuse: Handler = pipeline(
    container.logging,
    container.errors,
    validateBody({
      queryId: { type: 'string', maxLength: 128 },
      originalText: { type: 'string', required: true, maxLength: container.config.routing.maxQueryLength },
      responses: { type: 'array', required: true, items: 'object' },
      coverageGaps: { type: 'array', items: 'object' },
      conflictStrategy: { type: 'string', enum: CONFLICT_STRATEGIES },
      synthesize: { type: 'boolean' },
      traceId: { type: 'string', maxLength: 128 },
      domainSignals: { type: 'array', items: 'object' },
      asOf: { type: 'string', maxLength: 64 },
    })
  )(async (req, ctx) => {
    const body = await readJsonBody(req);
    const responses = parseRecallResponses(body.responses);

    const result = await container.fusionService.fuse({
      queryId: optionalString(body.queryId) ?? randomUUID(),
      originalText: optionalString(body.originalText) ?? '',
      responses,
      gaps: parseCoverageGaps(body.coverageGaps),
      traceId: optionalString(body.traceId) ?? ctx.traceId,
      conflictStrategy: parseConflictStrategy(body.conflictStrategy),
      synthesize: optionalBoolean(body.synthesize),
      domainRelevance: domainRelevanceFor(parseDomainSignals(body.domainSignals)),
      now: parseReferenceTime(body.asOf, responses),
    });

    return jsonResponse(result);
  });

  return { fuse };
}
