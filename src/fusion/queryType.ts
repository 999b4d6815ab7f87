/**
 * Query type inference for SOURCE_AUTHORITY resolution.
 * A classified query promotes its type's configured domains ahead of the
 * default order; an unclassified query uses the default order as is.
 */

import { containsPhrase, normalizeText } from '../utils/text.js';

export type QueryType = 'current-behavior' | 'intended-design' | 'historical-decision';

const CUES: ReadonlyArray<[QueryType, readonly string[]]> = [
  [
    'historical-decision',
    ['why did', 'why was', 'why were', 'decided', 'decision', 'history', 'originally', 'used to', 'previously', 'rationale'],
  ],
  [
    'intended-design',
    ['supposed to', 'intended', 'meant to', 'designed', 'architecture', 'proposal'],
  ],
  [
    'current-behavior',
    ['currently', 'right now', 'how does', 'what happens', 'actually', 'implementation', 'implemented', 'behavior', 'behave'],
  ],
];

/** The type with the most cue matches; earlier types in CUES win ties. */
export function inferQueryType(queryText: string): QueryType | null {
  const text = normalizeText(queryText);
  let best: QueryType | null = null;
  let bestHits = 0;
  for (const [type, cues] of CUES) {
    const hits = cues.filter((cue) => containsPhrase(text, cue)).length;
    if (hits > bestHits) {
      best = type;
      bestHits = hits;
    }
  }
  return best;
}

/** Type-listed domains first, then the rest of the default order in place. */
export function authorityOrderFor(
  queryType: QueryType | null,
  defaultOrder: readonly string[],
  typeOrders: Readonly<Record<QueryType, readonly string[]>>
): readonly string[] {
  if (!queryType) return defaultOrder;
  return [...new Set([...typeOrders[queryType], ...defaultOrder])];
}
