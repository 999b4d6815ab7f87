import { describe, it, expect } from 'vitest';
import { allCitations, deduplicate } from '../../src/fusion/deduplicate.js';
import type { NormalizedItem } from '../../src/types/models.js';
import { makeMerged } from '../fixtures.js';

function normalized(
  chunkId: string,
  content: string,
  normalizedScore: number,
  domainId = 'docs'
): NormalizedItem {
  const { corroboratingCitations: _c, duplicatesAbsorbed: _d, ...item } = makeMerged(chunkId, {
    content,
    normalizedScore,
    domainId,
  });
  return item;
}

const SENTENCE = 'The cache expires entries after ten minutes of inactivity';

describe('deduplicate', () => {
  it('never keeps both of two near-identical items', () => {
    const result = deduplicate(
      [
        normalized('d1', SENTENCE, 0.4, 'docs'),
        normalized('c1', `${SENTENCE.toLowerCase()}.`, 0.9, 'code'),
      ],
      0.85
    );

    expect(result.items).toHaveLength(1);
    expect(result.duplicatesRemoved).toBe(1);
  });

  it('keeps the higher normalized score and both citations', () => {
    const result = deduplicate(
      [normalized('d1', SENTENCE, 0.4, 'docs'), normalized('c1', SENTENCE, 0.9, 'code')],
      0.85
    );

    const [survivor] = result.items;
    expect(survivor.chunkId).toBe('c1');
    expect(survivor.duplicatesAbsorbed).toBe(1);
    expect(allCitations(survivor).map((c) => c.chunkId)).toEqual(['c1', 'd1']);
  });

  it('keeps the earlier survivor on a score tie', () => {
    const result = deduplicate(
      [normalized('d1', SENTENCE, 0.5, 'docs'), normalized('c1', SENTENCE, 0.5, 'code')],
      0.85
    );

    expect(result.items[0].chunkId).toBe('d1');
    expect(result.items[0].corroboratingCitations.map((c) => c.chunkId)).toEqual(['c1']);
  });

  it('leaves dissimilar items alone', () => {
    const result = deduplicate(
      [
        normalized('d1', SENTENCE, 0.5),
        normalized('c1', 'Connection pooling is configured per downstream agent', 0.5, 'code'),
      ],
      0.85
    );

    expect(result.items.map((i) => i.chunkId)).toEqual(['d1', 'c1']);
    expect(result.duplicatesRemoved).toBe(0);
  });

  it('treats similarity exactly at the threshold as a duplicate', () => {
    // 4 shared tokens of 5 total: Jaccard 0.8
    const result = deduplicate(
      [
        normalized('a', 'alpha beta gamma delta', 0.5, 'docs'),
        normalized('b', 'alpha beta gamma delta epsilon', 0.5, 'code'),
      ],
      0.8
    );
    expect(result.items).toHaveLength(1);
  });

  it('compares candidates against survivors only', () => {
    const result = deduplicate(
      [
        normalized('a', SENTENCE, 0.3, 'docs'),
        normalized('b', SENTENCE, 0.6, 'code'),
        normalized('c', SENTENCE, 0.9, 'research'),
      ],
      0.85
    );

    expect(result.items).toHaveLength(1);
    expect(result.items[0].chunkId).toBe('c');
    expect(result.duplicatesRemoved).toBe(2);
    expect(allCitations(result.items[0]).map((c) => c.chunkId)).toEqual(['c', 'b', 'a']);
  });

  it('handles an empty list', () => {
    expect(deduplicate([], 0.85)).toEqual({ items: [], duplicatesRemoved: 0 });
  });
});
