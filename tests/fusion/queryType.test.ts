import { describe, it, expect } from 'vitest';
import { authorityOrderFor, inferQueryType } from '../../src/fusion/queryType.js';

describe('inferQueryType', () => {
  it('recognizes current-behavior questions', () => {
    expect(inferQueryType('How does the cache currently expire entries?')).toBe('current-behavior');
  });

  it('recognizes intended-design questions', () => {
    expect(inferQueryType('What is the cache supposed to do on a miss?')).toBe('intended-design');
  });

  it('recognizes historical-decision questions', () => {
    expect(inferQueryType('Why did we pick a ten minute TTL?')).toBe('historical-decision');
  });

  it('returns null without cues', () => {
    expect(inferQueryType('cache TTL')).toBeNull();
  });

  it('ignores common words that do not signal a query type', () => {
    expect(inferQueryType('What should the retry plan look like?')).toBeNull();
    expect(inferQueryType('Which endpoint returns the design tokens?')).toBeNull();
  });
});

describe('authorityOrderFor', () => {
  const defaults = ['code', 'docs', 'conversations', 'research'];
  const typeOrders = {
    'current-behavior': ['code', 'docs'],
    'intended-design': ['docs', 'code'],
    'historical-decision': ['conversations', 'docs', 'research'],
  };

  it('promotes the type order ahead of the configured order', () => {
    expect(authorityOrderFor('intended-design', defaults, typeOrders)).toEqual([
      'docs',
      'code',
      'conversations',
      'research',
    ]);
    expect(authorityOrderFor('historical-decision', defaults, typeOrders)).toEqual([
      'conversations',
      'docs',
      'research',
      'code',
    ]);
  });

  it('keeps the configured position of domains the type order does not list', () => {
    expect(authorityOrderFor('intended-design', ['wiki', 'tickets', 'docs'], typeOrders)).toEqual([
      'docs',
      'code',
      'wiki',
      'tickets',
    ]);
  });

  it('falls back to the configured order', () => {
    expect(authorityOrderFor(null, ['docs'], typeOrders)).toEqual(['docs']);
  });
});
