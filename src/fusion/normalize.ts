/**
 * Per-agent min-max normalization.
 * Each agent's best item lands on 1.0 and its worst on 0.0; an agent whose
 * items all share one score (including a single item) normalizes to 0.5.
 */

import type { NormalizedItem, TaggedItem } from '../types/models.js';
import { FusionPipelineError } from '../errors.js';

export const TIED_SCORE = 0.5;

export function normalize(items: readonly TaggedItem[]): NormalizedItem[] {
  const ranges = new Map<string, { min: number; max: number }>();

  for (const item of items) {
    if (!Number.isFinite(item.score) || item.score < 0 || item.score > 1) {
      throw new FusionPipelineError('normalize', 'recall score outside [0, 1]', {
        agentId: item.sourceAgentId,
        chunkId: item.chunkId,
        score: String(item.score),
      });
    }
    const range = ranges.get(item.sourceAgentId);
    if (!range) {
      ranges.set(item.sourceAgentId, { min: item.score, max: item.score });
    } else {
      range.min = Math.min(range.min, item.score);
      range.max = Math.max(range.max, item.score);
    }
  }

  return items.map((item) => {
    const range = ranges.get(item.sourceAgentId);
    if (!range) {
      throw new FusionPipelineError('normalize', 'item from an unknown agent', {
        agentId: item.sourceAgentId,
      });
    }
    const spread = range.max - range.min;
    const normalizedScore = spread === 0 ? TIED_SCORE : (item.score - range.min) / spread;
    return { ...item, normalizedScore };
  });
}
