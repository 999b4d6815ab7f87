/**
 * Conflict detection and resolution.
 *
 * Only cross-domain pairs are examined. Conflicting pairs are grouped by
 * transitive closure; each group yields exactly one ConflictRecord whatever
 * the outcome.
 */

import type { ConflictConfig } from '../config.js';
import type {
  ConflictKind,
  ConflictRecord,
  ConflictResolution,
  ConflictStrategy,
  MergedItem,
  RecallItem,
  ResolvedItem,
} from '../types/models.js';
import { compareStrings, cosineSimilarity, jaccard, normalizeText, tokenize } from '../utils/text.js';
import { parseTimestamp } from '../utils/guards.js';

const NEGATIONS: ReadonlySet<string> = new Set([
  'not', 'no', 'never', 'none', 'nor', 'cannot', "can't", "don't", "doesn't",
  "didn't", "isn't", "aren't", "wasn't", "weren't", "won't", "shouldn't",
  "hasn't", "haven't", 'without',
]);

/** Token overlap, negations removed, above which a negated pair counts as the same claim. */
export const NEGATION_OVERLAP = 0.6;

const KIND_ORDER: readonly ConflictKind[] = [
  'same-entity',
  'temporal',
  'negation',
  'semantic-opposition',
];

export interface ItemEmbeddings {
  query: number[];
  /** Aligned with the items passed to detection. */
  items: number[][];
}

export interface ConflictGroup {
  /** Indexes into the detected item list, ascending. */
  members: number[];
  kinds: ConflictKind[];
}

// ── Detection ──

export function detectConflicts(
  items: readonly MergedItem[],
  config: Pick<ConflictConfig, 'semanticOppositionFloor' | 'topicalRelevanceFloor'>,
  embeddings?: ItemEmbeddings
): ConflictGroup[] {
  const features = items.map(extractFeatures);
  const parent = items.map((_, i) => i);
  const find = (i: number): number => {
    while (parent[i] !== i) {
      parent[i] = parent[parent[i]];
      i = parent[i];
    }
    return i;
  };

  const pairKinds = new Map<number, Set<ConflictKind>>();

  for (let i = 0; i < items.length; i++) {
    for (let j = i + 1; j < items.length; j++) {
      if (items[i].sourceDomainId === items[j].sourceDomainId) continue;

      const kinds = pairConflicts(features[i], features[j]);
      if (embeddings && config.semanticOppositionFloor !== null) {
        if (isSemanticOpposition(i, j, embeddings, config.semanticOppositionFloor, config.topicalRelevanceFloor)) {
          kinds.push('semantic-opposition');
        }
      }
      if (kinds.length === 0) continue;

      const ri = find(i);
      const rj = find(j);
      const root = Math.min(ri, rj);
      const merged = new Set([...(pairKinds.get(ri) ?? []), ...(pairKinds.get(rj) ?? []), ...kinds]);
      parent[Math.max(ri, rj)] = root;
      pairKinds.delete(Math.max(ri, rj));
      pairKinds.set(root, merged);
    }
  }

  const groups = new Map<number, number[]>();
  for (let i = 0; i < items.length; i++) {
    const root = find(i);
    if (!pairKinds.has(root)) continue;
    const members = groups.get(root) ?? [];
    members.push(i);
    groups.set(root, members);
  }

  return [...groups.entries()]
    .sort(([a], [b]) => a - b)
    .map(([root, members]) => {
      const kinds = pairKinds.get(root) ?? new Set<ConflictKind>();
      return { members, kinds: KIND_ORDER.filter((k) => kinds.has(k)) };
    });
}

interface ItemFeatures {
  content: string;
  sourcePath: string;
  entities: string[];
  event: string | null;
  occurredAt: string | null;
  negated: boolean;
  claim: Set<string>;
}

function extractFeatures(item: MergedItem): ItemFeatures {
  const tokens = tokenize(item.content);
  const entities = ['entity', 'symbol']
    .map((key) => item.metadata[key])
    .filter((v): v is string => typeof v === 'string' && v.trim() !== '');
  const event = item.metadata.event;
  const occurredAt = item.metadata.occurredAt;
  return {
    content: normalizeText(item.content),
    sourcePath: item.citation.sourcePath.trim(),
    entities,
    event: typeof event === 'string' && event.trim() !== '' ? event.trim() : null,
    occurredAt: typeof occurredAt === 'string' && occurredAt.trim() !== '' ? occurredAt.trim() : null,
    negated: tokens.some((t) => NEGATIONS.has(t)),
    claim: new Set(tokens.filter((t) => !NEGATIONS.has(t))),
  };
}

function pairConflicts(a: ItemFeatures, b: ItemFeatures): ConflictKind[] {
  const kinds: ConflictKind[] = [];

  const sameEntity =
    (a.sourcePath !== '' && a.sourcePath === b.sourcePath) ||
    a.entities.some((e) => b.entities.includes(e));
  if (sameEntity && a.content !== b.content) {
    kinds.push('same-entity');
  }

  if (a.event !== null && a.event === b.event && a.occurredAt && b.occurredAt && !sameInstant(a.occurredAt, b.occurredAt)) {
    kinds.push('temporal');
  }

  if (a.negated !== b.negated && a.claim.size > 0 && b.claim.size > 0 && jaccard(a.claim, b.claim) >= NEGATION_OVERLAP) {
    kinds.push('negation');
  }

  return kinds;
}

function sameInstant(a: string, b: string): boolean {
  const da = parseTimestamp(a);
  const db = parseTimestamp(b);
  if (da && db) return da.getTime() === db.getTime();
  return a === b;
}

function isSemanticOpposition(
  i: number,
  j: number,
  embeddings: ItemEmbeddings,
  floor: number,
  topicalFloor: number
): boolean {
  const a = embeddings.items[i];
  const b = embeddings.items[j];
  if (!a || !b) return false;
  if (cosineSimilarity(embeddings.query, a) < topicalFloor) return false;
  if (cosineSimilarity(embeddings.query, b) < topicalFloor) return false;
  return cosineSimilarity(a, b) < floor;
}

// ── Resolution ──

export interface ResolutionOptions {
  strategy: ConflictStrategy;
  config: Pick<ConflictConfig, 'tieWindowMs' | 'demotionPenalty' | 'flagPenalty' | 'resolvedLoserAction'>;
  /** Domain precedence for SOURCE_AUTHORITY, highest first. */
  authorityOrder: readonly string[];
}

export interface ResolutionResult {
  items: ResolvedItem[];
  conflicts: ConflictRecord[];
  itemsDropped: number;
}

export function resolveConflicts(
  items: readonly MergedItem[],
  groups: readonly ConflictGroup[],
  options: ResolutionOptions
): ResolutionResult {
  const penalties = new Map<number, number>();
  const dropped = new Set<number>();
  const conflicts: ConflictRecord[] = [];

  for (const group of groups) {
    const byRecency = [...group.members].sort((a, b) => compareRecency(items[a], items[b]));
    const outcome = decide(group.members, byRecency, items, options);

    if (outcome.winner === null) {
      for (const index of byRecency.slice(1)) {
        penalties.set(index, options.config.flagPenalty);
      }
    } else {
      for (const index of group.members) {
        if (index === outcome.winner) continue;
        if (options.config.resolvedLoserAction === 'drop') {
          dropped.add(index);
        } else {
          penalties.set(index, options.config.demotionPenalty);
        }
      }
    }

    conflicts.push({
      items: group.members.map((i) => toRecallItem(items[i])),
      kinds: group.kinds,
      resolution: outcome.resolution,
      resolvedTo: outcome.winner === null ? null : toRecallItem(items[outcome.winner]),
    });
  }

  const resolved: ResolvedItem[] = [];
  items.forEach((item, index) => {
    if (dropped.has(index)) return;
    const penalty = penalties.get(index) ?? 0;
    resolved.push({
      ...item,
      effectiveScore: Math.max(0, item.normalizedScore - penalty),
      demoted: penalty > 0,
    });
  });

  return { items: resolved, conflicts, itemsDropped: dropped.size };
}

function decide(
  members: readonly number[],
  byRecency: readonly number[],
  items: readonly MergedItem[],
  options: ResolutionOptions
): { resolution: ConflictResolution; winner: number | null } {
  const best = (compare: (a: MergedItem, b: MergedItem) => number) =>
    [...members].sort((a, b) => compare(items[a], items[b]))[0];

  switch (options.strategy) {
    case 'RECENCY':
      return { resolution: 'RECENCY', winner: byRecency[0] };
    case 'CONFIDENCE':
      return {
        resolution: 'CONFIDENCE',
        winner: best((a, b) => b.normalizedScore - a.normalizedScore || compareRecency(a, b)),
      };
    case 'SOURCE_AUTHORITY': {
      const rank = (domainId: string) => {
        const i = options.authorityOrder.indexOf(domainId);
        return i === -1 ? Number.MAX_SAFE_INTEGER : i;
      };
      return {
        resolution: 'SOURCE_AUTHORITY',
        winner: best((a, b) => rank(a.sourceDomainId) - rank(b.sourceDomainId) || compareRecency(a, b)),
      };
    }
    case 'FLAG':
      return { resolution: 'FLAG', winner: null };
    case 'RECENCY_THEN_FLAG': {
      const newest = items[byRecency[0]].citation.timestamp.getTime();
      const runnerUp = items[byRecency[1]].citation.timestamp.getTime();
      return newest - runnerUp <= options.config.tieWindowMs
        ? { resolution: 'FLAG', winner: null }
        : { resolution: 'RECENCY', winner: byRecency[0] };
    }
  }
}

/** Newest citation first; then higher normalized score, domain id, chunk id. */
export function compareRecency(a: MergedItem, b: MergedItem): number {
  return (
    b.citation.timestamp.getTime() - a.citation.timestamp.getTime() ||
    b.normalizedScore - a.normalizedScore ||
    compareStrings(a.sourceDomainId, b.sourceDomainId) ||
    compareStrings(a.chunkId, b.chunkId)
  );
}

function toRecallItem(item: MergedItem): RecallItem {
  return {
    chunkId: item.chunkId,
    content: item.content,
    score: item.score,
    citation: item.citation,
    metadata: item.metadata,
  };
}
