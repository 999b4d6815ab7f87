/**
 * Health endpoint.
 * GET /health: 200 once the registry has loaded, 503 before
 */

import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import type { HealthResponse } from '../types/api.js';
import { SERVICE_NAME } from '../services/QueryService.js';
import { jsonResponse } from './payloads.js';

export function createHealthHandlers(container: Container) {
  const health: Handler = async () => {
    const snapshot = container.registry.peek();
    const body: HealthResponse = {
      service: SERVICE_NAME,
      status: snapshot ? 'ok' : 'degraded',
      uptimeSeconds: Math.floor((container.clock().getTime() - container.startedAt.getTime()) / 1000),
      registeredDomains: snapshot?.size ?? 0,
      registryRefreshedAt: snapshot?.refreshedAt.toISOString() ?? null,
    };
    return jsonResponse(body, snapshot ? 200 : 503);
  };

  return { health };
}
