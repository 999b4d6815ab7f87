import { describe, it, expect } from 'vitest';
import { loadConfig, validateRankWeights, DEFAULT_RANK_WEIGHTS } from '../src/config.js';
import { ConfigError } from '../src/errors.js';

describe('loadConfig', () => {
  it('uses defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config.port).toBe(8080);
    expect(config.logLevel).toBe('info');
    expect(config.classifierBackend).toBe('keyword');
    expect(config.registryTtlMs).toBe(30_000);
    expect(config.fusion.rankWeights).toEqual(DEFAULT_RANK_WEIGHTS);
    expect(config.fusion.conflicts.semanticOppositionFloor).toBeNull();
    expect(config.supabase).toBeNull();
    expect(config.axiom).toBeNull();
    expect(config.openaiApiKey).toBeNull();
    expect(config.kafkaBrokers).toEqual([]);
  });

  it('reads overrides', () => {
    const config = loadConfig({
      PORT: '3000',
      CLASSIFIER_BACKEND: 'llm',
      CONFLICT_STRATEGY: 'RECENCY_THEN_FLAG',
      RECENCY_TIE_WINDOW_HOURS: '2',
      AUTHORITY_ORDER: 'docs, code',
      AUTHORITY_ORDER_HISTORICAL_DECISION: 'tickets, wiki',
      SEMANTIC_OPPOSITION_FLOOR: '0.4',
      RANK_WEIGHTS: '0.4,0.2,0.2,0.1,0.1',
      KAFKA_BROKERS: 'kafka-1:9092,kafka-2:9092',
      SUPABASE_URL: 'http://localhost:54321',
      SUPABASE_SERVICE_ROLE_KEY: 'test-secret',
    });

    expect(config.port).toBe(3000);
    expect(config.classifierBackend).toBe('llm');
    expect(config.fusion.conflicts.strategy).toBe('RECENCY_THEN_FLAG');
    expect(config.fusion.conflicts.tieWindowMs).toBe(7_200_000);
    expect(config.fusion.conflicts.authorityOrder).toEqual(['docs', 'code']);
    expect(config.fusion.conflicts.queryTypeOrders['historical-decision']).toEqual(['tickets', 'wiki']);
    expect(config.fusion.conflicts.queryTypeOrders['intended-design']).toEqual(['docs', 'code']);
    expect(config.fusion.conflicts.semanticOppositionFloor).toBe(0.4);
    expect(config.fusion.rankWeights).toEqual({
      normalizedScore: 0.4,
      corroboration: 0.2,
      recency: 0.2,
      domainRelevance: 0.1,
      length: 0.1,
    });
    expect(config.kafkaBrokers).toEqual(['kafka-1:9092', 'kafka-2:9092']);
    expect(config.supabase).toEqual({ url: 'http://localhost:54321', serviceRoleKey: 'test-secret' });
  });

  it('rejects ranking weights that do not sum to 1', () => {
    expect(() => loadConfig({ RANK_WEIGHTS: '0.5,0.2,0.2,0.2,0.1' })).toThrow(
      'Ranking weights must sum to 1.0'
    );
  });

  it('rejects malformed ranking weights', () => {
    expect(() => loadConfig({ RANK_WEIGHTS: '0.5,0.5' })).toThrow(
      'RANK_WEIGHTS must be five comma-separated numbers, got "0.5,0.5"'
    );
  });

  it('rejects a non-numeric value', () => {
    expect(() => loadConfig({ PORT: 'eighty' })).toThrow('PORT must be a number, got "eighty"');
  });

  it('rejects an unknown enum value', () => {
    expect(() => loadConfig({ CONFLICT_STRATEGY: 'LOUDEST' })).toThrow(ConfigError);
    expect(() => loadConfig({ LOG_LEVEL: 'trace' })).toThrow(
      'LOG_LEVEL must be one of debug, info, warn, error, got "trace"'
    );
  });

  it('rejects thresholds outside [0, 1]', () => {
    expect(() => loadConfig({ DEDUP_THRESHOLD: '1.5' })).toThrow('DEDUP_THRESHOLD must be within [0, 1], got 1.5');
  });

  it('rejects a secondary threshold above the primary', () => {
    expect(() => loadConfig({ PRIMARY_THRESHOLD: '0.4', SECONDARY_THRESHOLD: '0.5' })).toThrow(
      'SECONDARY_THRESHOLD (0.5) exceeds PRIMARY_THRESHOLD (0.4)'
    );
  });

  it('rejects non-integer counts and budgets', () => {
    expect(() => loadConfig({ MAX_DOMAINS: '2.5' })).toThrow('MAX_DOMAINS must be a positive integer, got 2.5');
    expect(() => loadConfig({ PER_TARGET_DEADLINE_MS: '0' })).toThrow(
      'PER_TARGET_DEADLINE_MS must be a positive integer, got 0'
    );
  });

  it('rejects an empty authority order', () => {
    expect(() => loadConfig({ AUTHORITY_ORDER: ' , ' })).toThrow('AUTHORITY_ORDER must name at least one domain');
  });
});

describe('validateRankWeights', () => {
  it('rejects negative weights', () => {
    expect(() => validateRankWeights({ ...DEFAULT_RANK_WEIGHTS, recency: -0.1 })).toThrow(
      'Ranking weight recency must be a non-negative number, got -0.1'
    );
  });

  it('accepts the defaults', () => {
    expect(() => validateRankWeights(DEFAULT_RANK_WEIGHTS)).not.toThrow();
  });
});
