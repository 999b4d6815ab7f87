/**
 * Domain endpoints.
 * GET /api/v1/domains: Routable domains from the registry
 */

import { pipeline } from '../middleware/index.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import { jsonResponse } from './payloads.js';

export function createDomainHandlers(container: Container) {
  const getDomains: Handler = pipeline(
    container.logging,
    container.errors
  )(async (_req, _ctx) => {
    const result = await container.domainService.getDomains();
    return jsonResponse(result);
  });

  return { getDomains };
}
