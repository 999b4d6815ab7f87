import { describe, it, expect } from 'vitest';
import { collect } from '../../src/fusion/collect.js';
import { normalize, TIED_SCORE } from '../../src/fusion/normalize.js';
import { FusionPipelineError } from '../../src/errors.js';
import { makeItem, makeResponse } from '../fixtures.js';

describe('collect', () => {
  it('tags items with their source and preserves within-agent order', () => {
    const collected = collect(
      [
        makeResponse('code', [makeItem('c1', { domainId: 'code' }), makeItem('c2', { domainId: 'code' })], {
          totalSearched: 40,
          latencyMs: 30,
        }),
        makeResponse('docs', [makeItem('d1')], { totalSearched: 7 }),
      ],
      [{ domainId: 'research', agentId: 'research-agent', reason: 'timeout after 50ms' }]
    );

    expect(collected.items.map((i) => i.chunkId)).toEqual(['c1', 'c2', 'd1']);
    expect(collected.items[0]).toMatchObject({
      sourceAgentId: 'code-agent',
      sourceDomainId: 'code',
      agentLatencyMs: 30,
    });
    expect(collected.agentsResponded).toBe(2);
    expect(collected.totalCandidatesSearched).toBe(47);
    expect(collected.gaps).toEqual([
      { domainId: 'research', agentId: 'research-agent', reason: 'timeout after 50ms' },
    ]);
  });

  it('accepts zero responses', () => {
    const collected = collect([], []);
    expect(collected.items).toEqual([]);
    expect(collected.agentsResponded).toBe(0);
    expect(collected.totalCandidatesSearched).toBe(0);
  });
});

describe('normalize', () => {
  it('maps each agent best item to 1.0 and worst to 0.0', () => {
    const { items } = collect(
      [
        makeResponse('code', [
          makeItem('c1', { score: 0.9 }),
          makeItem('c2', { score: 0.3 }),
          makeItem('c3', { score: 0.6 }),
        ]),
      ],
      []
    );

    const normalized = normalize(items);

    expect(normalized[0].normalizedScore).toBe(1);
    expect(normalized[1].normalizedScore).toBe(0);
    expect(normalized[2].normalizedScore).toBeCloseTo(0.5, 10);
  });

  it('uses only the agent own scores', () => {
    const { items } = collect(
      [
        makeResponse('code', [makeItem('c1', { score: 0.2 }), makeItem('c2', { score: 0.1 })]),
        makeResponse('docs', [makeItem('d1', { score: 0.95 }), makeItem('d2', { score: 0.9 })]),
      ],
      []
    );

    const normalized = normalize(items);

    expect(normalized.map((i) => i.normalizedScore)).toEqual([1, 0, 1, 0]);
  });

  it('gives 0.5 to a single item', () => {
    const { items } = collect([makeResponse('code', [makeItem('c1', { score: 0.42 })])], []);
    expect(normalize(items)[0].normalizedScore).toBe(TIED_SCORE);
  });

  it('gives 0.5 to every item when all scores tie', () => {
    const { items } = collect(
      [makeResponse('code', [makeItem('c1', { score: 0.7 }), makeItem('c2', { score: 0.7 })])],
      []
    );
    expect(normalize(items).map((i) => i.normalizedScore)).toEqual([0.5, 0.5]);
  });

  it('keeps the raw score', () => {
    const { items } = collect([makeResponse('code', [makeItem('c1', { score: 0.42 })])], []);
    expect(normalize(items)[0].score).toBe(0.42);
  });

  it('rejects a score outside [0, 1]', () => {
    const { items } = collect([makeResponse('code', [makeItem('c1', { score: 1.5 })])], []);
    expect(() => normalize(items)).toThrow(FusionPipelineError);
  });

  it('rejects a non-finite score', () => {
    const { items } = collect([makeResponse('code', [makeItem('c1', { score: Number.NaN })])], []);
    expect(() => normalize(items)).toThrow('Fusion failed at normalize: recall score outside [0, 1]');
  });
});
