import type { CoverageGap, RecallResponse, TaggedItem } from '../types/models.js';

export interface CollectedItems {
  items: TaggedItem[];
  gaps: CoverageGap[];
  agentsResponded: number;
  totalCandidatesSearched: number;
}

/**
 * Flatten every response into provenance-tagged items.
 * Within-agent order is preserved; nothing is filtered.
 */
export function collect(
  responses: readonly RecallResponse[],
  gaps: readonly CoverageGap[]
): CollectedItems {
  const items: TaggedItem[] = [];
  let totalCandidatesSearched = 0;

  for (const response of responses) {
    totalCandidatesSearched += response.totalSearched;
    for (const item of response.items) {
      items.push({
        ...item,
        sourceAgentId: response.agentId,
        sourceDomainId: response.domainId,
        agentLatencyMs: response.latencyMs,
      });
    }
  }

  return {
    items,
    gaps: [...gaps],
    agentsResponded: responses.length,
    totalCandidatesSearched,
  };
}
