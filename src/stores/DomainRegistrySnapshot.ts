/**
 * Immutable view of the domain registry at one point in time.
 * Only READY and DEGRADED agents are routable; a domain is "registered"
 * when it has a routable agent.
 */

import type { MeshAgentRow } from '../types/database.js';
import {
  AGENT_STATUSES,
  type AgentRegistration,
  type AgentStatus,
  type DomainDescriptor,
} from '../types/models.js';
import { parseTimestamp } from '../utils/guards.js';

const ROUTABLE: ReadonlySet<AgentStatus> = new Set<AgentStatus>(['READY', 'DEGRADED']);

export class DomainRegistrySnapshot {
  private readonly byDomain: ReadonlyMap<string, AgentRegistration>;

  constructor(
    registrations: readonly AgentRegistration[],
    readonly refreshedAt: Date
  ) {
    const byDomain = new Map<string, AgentRegistration>();
    for (const reg of registrations) {
      if (!ROUTABLE.has(reg.status)) continue;
      const existing = byDomain.get(reg.domain.domainId);
      if (!existing || prefer(reg, existing)) {
        byDomain.set(reg.domain.domainId, reg);
      }
    }
    this.byDomain = byDomain;
  }

  static fromRows(rows: readonly MeshAgentRow[], refreshedAt: Date): DomainRegistrySnapshot {
    return new DomainRegistrySnapshot(rows.map(toRegistration), refreshedAt);
  }

  get size(): number {
    return this.byDomain.size;
  }

  has(domainId: string): boolean {
    return this.byDomain.has(domainId);
  }

  get(domainId: string): AgentRegistration | undefined {
    return this.byDomain.get(domainId);
  }

  /** Registered domain ids, sorted. */
  domainIds(): string[] {
    return [...this.byDomain.keys()].sort();
  }

  descriptors(): DomainDescriptor[] {
    return this.registrations().map((reg) => reg.domain);
  }

  registrations(): AgentRegistration[] {
    return this.domainIds().flatMap((id) => {
      const reg = this.byDomain.get(id);
      return reg ? [reg] : [];
    });
  }
}

/** READY beats DEGRADED; then the freshest heartbeat; then the lower agent id. */
function prefer(candidate: AgentRegistration, current: AgentRegistration): boolean {
  if (candidate.status !== current.status) return candidate.status === 'READY';
  const a = candidate.lastHeartbeatAt?.getTime() ?? 0;
  const b = current.lastHeartbeatAt?.getTime() ?? 0;
  if (a !== b) return a > b;
  return candidate.agentId < current.agentId;
}

export function toRegistration(row: MeshAgentRow): AgentRegistration {
  const status = AGENT_STATUSES.find((s) => s === row.status) ?? 'OFFLINE';
  return {
    agentId: row.agent_id,
    baseUrl: row.base_url,
    status,
    domain: {
      domainId: row.domain_id,
      name: row.domain_name,
      description: row.domain_description,
      keywords: row.domain_keywords ?? [],
    },
    lastHeartbeatAt: parseTimestamp(row.last_heartbeat_at),
  };
}
