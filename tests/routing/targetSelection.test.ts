import { describe, it, expect } from 'vitest';
import {
  broadcastTargets,
  explicitTargets,
  selectTargets,
  SignalRangeError,
} from '../../src/routing/targetSelection.js';
import { UnknownDomainError } from '../../src/errors.js';
import type { DomainSignal } from '../../src/types/models.js';
import { makeSnapshot } from '../fixtures.js';

const registry = makeSnapshot(['code', 'conversations', 'docs', 'research']);
const thresholds = { primaryThreshold: 0.6, secondaryThreshold: 0.3, maxDomains: 4 };

function signals(scores: Record<string, number>): DomainSignal[] {
  return Object.entries(scores).map(([domainId, score]) => ({ domainId, score, keywords: [] }));
}

describe('selectTargets', () => {
  it('takes primaries and secondaries in descending score order', () => {
    const result = selectTargets(
      signals({ research: 0.4, code: 0.9, conversations: 0.1, docs: 0.7 }),
      registry,
      thresholds
    );

    expect(result.mode).toBe('classified');
    expect(result.targets.map((t) => [t.domainId, t.relevance])).toEqual([
      ['code', 0.9],
      ['docs', 0.7],
      ['research', 0.4],
    ]);
    expect(result.targets.every((t) => t.rewrittenQuery === null)).toBe(true);
  });

  it('never drops a primary to honour maxDomains', () => {
    const result = selectTargets(
      signals({ code: 0.9, docs: 0.7, research: 0.65, conversations: 0.5 }),
      registry,
      { ...thresholds, maxDomains: 2 }
    );
    expect(result.targets.map((t) => t.domainId)).toEqual(['code', 'docs', 'research']);
  });

  it('fills remaining room with secondaries', () => {
    const result = selectTargets(
      signals({ code: 0.9, docs: 0.5, research: 0.4 }),
      registry,
      { ...thresholds, maxDomains: 2 }
    );
    expect(result.targets.map((t) => t.domainId)).toEqual(['code', 'docs']);
  });

  it('caps secondaries at maxDomains when there is no primary', () => {
    const result = selectTargets(signals({ research: 0.4, docs: 0.5 }), registry, {
      ...thresholds,
      maxDomains: 1,
    });
    expect(result.mode).toBe('classified');
    expect(result.targets.map((t) => t.domainId)).toEqual(['docs']);
  });

  it('broadcasts when every signal is below the secondary threshold', () => {
    const result = selectTargets(signals({ code: 0.1, docs: 0.2 }), registry, thresholds);

    expect(result.mode).toBe('broadcast');
    expect(result.targets.map((t) => [t.domainId, t.relevance])).toEqual([
      ['code', 0.1],
      ['conversations', 0],
      ['docs', 0.2],
      ['research', 0],
    ]);
  });

  it('orders equal scores by domain id', () => {
    const result = selectTargets(signals({ docs: 0.7, code: 0.7 }), registry, thresholds);
    expect(result.targets.map((t) => t.domainId)).toEqual(['code', 'docs']);
  });

  it('reports signals for unregistered domains and skips them', () => {
    const result = selectTargets(signals({ legal: 0.95, code: 0.8 }), registry, thresholds);

    expect(result.targets.map((t) => t.domainId)).toEqual(['code']);
    expect(result.unregistered.map((s) => s.domainId)).toEqual(['legal']);
  });

  it('rejects out-of-range scores', () => {
    expect(() => selectTargets(signals({ code: 1.5 }), registry, thresholds)).toThrow(SignalRangeError);
    expect(() => selectTargets(signals({ code: Number.NaN }), registry, thresholds)).toThrow(
      'Domain signal score out of range: code=NaN'
    );
  });

  it('targets the registered agent', () => {
    const result = selectTargets(signals({ code: 0.9 }), registry, thresholds);
    expect(result.targets[0].agentId).toBe('code-agent');
  });
});

describe('broadcastTargets', () => {
  it('covers every registered domain with zero relevance by default', () => {
    expect(broadcastTargets(registry).map((t) => [t.domainId, t.relevance])).toEqual([
      ['code', 0],
      ['conversations', 0],
      ['docs', 0],
      ['research', 0],
    ]);
  });
});

describe('explicitTargets', () => {
  it('keeps the caller order and collapses duplicates', () => {
    const targets = explicitTargets(['docs', 'code', 'docs'], registry);
    expect(targets.map((t) => [t.domainId, t.relevance])).toEqual([
      ['docs', 1],
      ['code', 1],
    ]);
  });

  it('rejects unknown domains', () => {
    expect(() => explicitTargets(['docs', 'legal'], registry)).toThrow(UnknownDomainError);
    expect(() => explicitTargets(['legal'], registry)).toThrow('Unknown domain: legal');
  });
});
