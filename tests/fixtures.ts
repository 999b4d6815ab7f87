/**
 * Builders for test data.
 */

import type { MeshAgentRow } from '../src/types/database.js';
import type {
  NormalizedItem,
  MergedItem,
  RecallItem,
  RecallResponse,
  RoutingPlan,
} from '../src/types/models.js';
import { DomainRegistrySnapshot } from '../src/stores/DomainRegistrySnapshot.js';

export const NOW = new Date('2024-06-01T00:00:00.000Z');

const HOUR = 60 * 60 * 1000;
const DAY = 24 * HOUR;

export function hoursAgo(hours: number, from: Date = NOW): Date {
  return new Date(from.getTime() - hours * HOUR);
}

export function daysAgo(days: number, from: Date = NOW): Date {
  return new Date(from.getTime() - days * DAY);
}

export function makeRow(domainId: string, overrides: Partial<MeshAgentRow> = {}): MeshAgentRow {
  return {
    agent_id: `${domainId}-agent`,
    base_url: `http://${domainId}.agents.test`,
    status: 'READY',
    domain_id: domainId,
    domain_name: domainId.charAt(0).toUpperCase() + domainId.slice(1),
    domain_description: `The ${domainId} knowledge domain`,
    domain_keywords: [domainId],
    registered_at: '2024-01-01T00:00:00.000Z',
    last_heartbeat_at: '2024-05-31T23:59:00.000Z',
    ...overrides,
  };
}

export function makeSnapshot(domainIds: string[]): DomainRegistrySnapshot {
  return DomainRegistrySnapshot.fromRows(domainIds.map((id) => makeRow(id)), NOW);
}

export function makeItem(
  chunkId: string,
  overrides: {
    content?: string;
    score?: number;
    domainId?: string;
    sourcePath?: string;
    timestamp?: Date;
    metadata?: Record<string, unknown>;
  } = {}
): RecallItem {
  const domainId = overrides.domainId ?? 'docs';
  return {
    chunkId,
    content: overrides.content ?? `Content of ${chunkId} with enough words to count as a medium length chunk`,
    score: overrides.score ?? 0.5,
    citation: {
      documentId: `doc-${chunkId}`,
      chunkId,
      domainId,
      sourcePath: overrides.sourcePath ?? `${domainId}/${chunkId}.md`,
      lineRange: null,
      timestamp: overrides.timestamp ?? daysAgo(1),
    },
    metadata: overrides.metadata ?? {},
  };
}

export function makeResponse(
  domainId: string,
  items: RecallItem[],
  overrides: Partial<RecallResponse> = {}
): RecallResponse {
  return {
    queryId: 'q-1',
    agentId: `${domainId}-agent`,
    domainId,
    items,
    totalSearched: items.length * 10,
    latencyMs: 12,
    traceId: 'trace-1',
    ...overrides,
  };
}

/** A deduplicated item as conflict resolution and ranking receive it. */
export function makeMerged(
  chunkId: string,
  overrides: {
    content?: string;
    score?: number;
    normalizedScore?: number;
    domainId?: string;
    sourcePath?: string;
    timestamp?: Date;
    metadata?: Record<string, unknown>;
    duplicatesAbsorbed?: number;
  } = {}
): MergedItem {
  const item = makeItem(chunkId, overrides);
  const domainId = overrides.domainId ?? 'docs';
  const normalized: NormalizedItem = {
    ...item,
    sourceAgentId: `${domainId}-agent`,
    sourceDomainId: domainId,
    agentLatencyMs: 10,
    normalizedScore: overrides.normalizedScore ?? 0.5,
  };
  return {
    ...normalized,
    corroboratingCitations: [],
    duplicatesAbsorbed: overrides.duplicatesAbsorbed ?? 0,
  };
}

export function makePlan(domainIds: string[], overrides: Partial<RoutingPlan> = {}): RoutingPlan {
  return {
    queryId: 'q-1',
    originalText: 'how does the cache expire entries',
    targets: domainIds.map((domainId) => ({
      domainId,
      agentId: `${domainId}-agent`,
      relevance: 0.8,
      rewrittenQuery: null,
    })),
    signals: domainIds.map((domainId) => ({ domainId, score: 0.8, keywords: [] })),
    mode: 'classified',
    fallbackReason: null,
    createdAt: NOW,
    traceId: 'trace-1',
    ...overrides,
  };
}
