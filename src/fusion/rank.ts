/**
 * Weighted composite ranking into a deterministic total order.
 */

import type { RankWeights } from '../config.js';
import type { DomainSignal, RankedItem, ResolvedItem, RoutingPlan } from '../types/models.js';
import { compareStrings, countTokens } from '../utils/text.js';

export const RANK_TIE_EPSILON = 1e-6;

const MS_PER_DAY = 24 * 60 * 60 * 1000;

export interface RankOptions {
  weights: RankWeights;
  recencyDecayDays: number;
  /** Reference time for recency; fixed per fusion run. */
  now: Date;
  /** Routing relevance per domain; missing domains score 0. */
  domainRelevance: ReadonlyMap<string, number>;
}

export function rank(items: readonly ResolvedItem[], options: RankOptions): RankedItem[] {
  const { weights } = options;
  const ranked = items.map((item) => {
    const rankScore =
      weights.normalizedScore * item.effectiveScore +
      weights.corroboration * (item.duplicatesAbsorbed > 0 ? 1 : 0) +
      weights.recency * recencySignal(item.citation.timestamp, options.now, options.recencyDecayDays) +
      weights.domainRelevance * (options.domainRelevance.get(item.sourceDomainId) ?? 0) +
      weights.length * lengthSignal(item.content);
    return { ...item, rankScore };
  });
  return ranked.sort(compareRanked);
}

/** Higher rank first; near-ties fall back to raw score, recency, domain id, chunk id. */
export function compareRanked(a: RankedItem, b: RankedItem): number {
  if (Math.abs(a.rankScore - b.rankScore) > RANK_TIE_EPSILON) {
    return b.rankScore - a.rankScore;
  }
  return (
    b.score - a.score ||
    b.citation.timestamp.getTime() - a.citation.timestamp.getTime() ||
    compareStrings(a.sourceDomainId, b.sourceDomainId) ||
    compareStrings(a.chunkId, b.chunkId)
  );
}

export function recencySignal(timestamp: Date, now: Date, decayDays: number): number {
  const days = Math.max(0, (now.getTime() - timestamp.getTime()) / MS_PER_DAY);
  return Math.exp(-days / decayDays);
}

export function lengthSignal(content: string): number {
  const tokens = countTokens(content);
  if (tokens < 10) return 0.2;
  if (tokens > 500) return 0.7;
  return 1;
}

/**
 * Relevance per domain from classifier signals, falling back to target
 * relevance (explicit and broadcast plans carry no usable signals).
 * Out-of-range signal scores count as 0.
 */
export function domainRelevanceFor(
  signals: readonly DomainSignal[],
  plan?: Pick<RoutingPlan, 'targets'>
): Map<string, number> {
  const relevance = new Map<string, number>();
  for (const s of signals) {
    const score = Number.isFinite(s.score) && s.score >= 0 && s.score <= 1 ? s.score : 0;
    relevance.set(s.domainId, Math.max(relevance.get(s.domainId) ?? 0, score));
  }
  for (const target of plan?.targets ?? []) {
    if (!relevance.has(target.domainId)) {
      relevance.set(target.domainId, target.relevance);
    }
  }
  return relevance;
}
