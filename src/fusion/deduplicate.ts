/**
 * Fuzzy deduplication by token-set Jaccard similarity.
 *
 * Candidates are visited in collection order and compared only against
 * survivors accepted so far. A merged pair keeps the item with the higher
 * normalized score (the earlier survivor on a tie); the other's citation is
 * carried as corroborating provenance.
 *
 * Jaccard can never exceed min(|A|, |B|) / max(|A|, |B|), so pairs whose
 * token-set sizes differ too much are skipped without computing it. Past a
 * few hundred survivors a bucketing pre-filter (e.g. MinHash) would be needed.
 */

import type { MergedItem, NormalizedItem, SourceCitation } from '../types/models.js';
import { jaccard, tokenize } from '../utils/text.js';

export interface DeduplicationResult {
  items: MergedItem[];
  duplicatesRemoved: number;
}

interface Survivor {
  item: MergedItem;
  tokens: ReadonlySet<string>;
}

export function deduplicate(
  items: readonly NormalizedItem[],
  threshold: number
): DeduplicationResult {
  const survivors: Survivor[] = [];
  let duplicatesRemoved = 0;

  for (const candidate of items) {
    const tokens = new Set(tokenize(candidate.content));
    const match = survivors.find(
      (s) => sizeBound(s.tokens, tokens) >= threshold && jaccard(s.tokens, tokens) >= threshold
    );

    if (!match) {
      survivors.push({
        item: { ...candidate, corroboratingCitations: [], duplicatesAbsorbed: 0 },
        tokens,
      });
      continue;
    }

    duplicatesRemoved++;
    const current = match.item;
    if (candidate.normalizedScore > current.normalizedScore) {
      match.item = {
        ...candidate,
        corroboratingCitations: [current.citation, ...current.corroboratingCitations],
        duplicatesAbsorbed: current.duplicatesAbsorbed + 1,
      };
      match.tokens = tokens;
    } else {
      match.item = {
        ...current,
        corroboratingCitations: [...current.corroboratingCitations, candidate.citation],
        duplicatesAbsorbed: current.duplicatesAbsorbed + 1,
      };
    }
  }

  return { items: survivors.map((s) => s.item), duplicatesRemoved };
}

/** The item's own citation followed by every citation it absorbed. */
export function allCitations(item: MergedItem): SourceCitation[] {
  return [item.citation, ...item.corroboratingCitations];
}

function sizeBound(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  const larger = Math.max(a.size, b.size);
  return larger === 0 ? 1 : Math.min(a.size, b.size) / larger;
}
