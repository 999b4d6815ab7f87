/**
 * Domain service.
 * Read-only view of the routable registry.
 */

import type { DomainRegistryCache } from '../stores/DomainRegistryCache.js';
import type { DomainListResponse } from '../types/api.js';

export class DomainService {
  constructor(private readonly registry: DomainRegistryCache) {}

  async getDomains(): Promise<DomainListResponse> {
    const snapshot = await this.registry.snapshot();
    return {
      domains: snapshot.registrations().map((reg) => ({
        domainId: reg.domain.domainId,
        name: reg.domain.name,
        description: reg.domain.description,
        agentId: reg.agentId,
        status: reg.status,
      })),
      refreshedAt: snapshot.refreshedAt.toISOString(),
    };
  }
}
