/**
 * Startup configuration.
 * Read once from the environment; invalid values are rejected with ConfigError,
 * never silently normalized.
 */

import { ConfigError } from './errors.js';
import type { QueryType } from './fusion/queryType.js';
import type { LogLevel } from './providers/ILogProvider.js';
import { CONFLICT_STRATEGIES, type ConflictStrategy } from './types/models.js';

export interface RoutingConfig {
  primaryThreshold: number;
  secondaryThreshold: number;
  maxDomains: number;
  classificationBudgetMs: number;
  /** Rewrites longer than this many tokens are discarded. */
  rewriteMaxTokens: number;
  maxQueryLength: number;
}

export interface FanOutConfig {
  perTargetDeadlineMs: number;
  defaultTopK: number;
  /** Overall query deadline when the request names none. */
  queryTimeoutMs: number;
}

export interface RankWeights {
  normalizedScore: number;
  corroboration: number;
  recency: number;
  domainRelevance: number;
  length: number;
}

export type ResolvedLoserAction = 'demote' | 'drop';

export interface ConflictConfig {
  strategy: ConflictStrategy;
  tieWindowMs: number;
  /** Subtracted from a resolved conflict's loser when it is kept. */
  demotionPenalty: number;
  /** Subtracted from the provisional loser(s) of a flagged conflict. */
  flagPenalty: number;
  resolvedLoserAction: ResolvedLoserAction;
  /** Domain precedence for SOURCE_AUTHORITY when no query type is inferred. */
  authorityOrder: string[];
  /**
   * Domains promoted ahead of the rest of `authorityOrder` for an inferred
   * query type. Unlisted domains keep their configured relative position.
   */
  queryTypeOrders: Record<QueryType, string[]>;
  /** Embedding similarity under which two on-topic items are treated as opposed. null disables. */
  semanticOppositionFloor: number | null;
  /** Query similarity both items need before the opposition check applies. */
  topicalRelevanceFloor: number;
}

export interface SynthesisConfig {
  topN: number;
  timeoutMs: number;
  maxWords: number;
}

export interface FusionConfig {
  dedupThreshold: number;
  conflicts: ConflictConfig;
  rankWeights: RankWeights;
  recencyDecayDays: number;
  synthesis: SynthesisConfig;
}

export type ClassifierBackend = 'keyword' | 'embedding' | 'llm';

export interface AppConfig {
  port: number;
  logLevel: LogLevel;
  classifierBackend: ClassifierBackend;
  registryTtlMs: number;
  routing: RoutingConfig;
  fanOut: FanOutConfig;
  fusion: FusionConfig;
  supabase: { url: string; serviceRoleKey: string } | null;
  openaiApiKey: string | null;
  kafkaBrokers: string[];
  axiom: { apiToken: string; dataset: string } | null;
}

export const DEFAULT_ROUTING_CONFIG: RoutingConfig = {
  primaryThreshold: 0.6,
  secondaryThreshold: 0.3,
  maxDomains: 4,
  classificationBudgetMs: 2000,
  rewriteMaxTokens: 64,
  maxQueryLength: 2000,
};

export const DEFAULT_FAN_OUT_CONFIG: FanOutConfig = {
  perTargetDeadlineMs: 5000,
  defaultTopK: 20,
  queryTimeoutMs: 30_000,
};

export const DEFAULT_RANK_WEIGHTS: RankWeights = {
  normalizedScore: 0.5,
  corroboration: 0.15,
  recency: 0.15,
  domainRelevance: 0.1,
  length: 0.1,
};

export const DEFAULT_FUSION_CONFIG: FusionConfig = {
  dedupThreshold: 0.85,
  conflicts: {
    strategy: 'RECENCY',
    tieWindowMs: 24 * 60 * 60 * 1000,
    demotionPenalty: 0.5,
    flagPenalty: 0.1,
    resolvedLoserAction: 'demote',
    authorityOrder: ['code', 'docs', 'conversations', 'research'],
    queryTypeOrders: {
      'current-behavior': ['code', 'docs'],
      'intended-design': ['docs', 'code'],
      'historical-decision': ['conversations', 'docs', 'research'],
    },
    semanticOppositionFloor: null,
    topicalRelevanceFloor: 0.3,
  },
  rankWeights: DEFAULT_RANK_WEIGHTS,
  recencyDecayDays: 90,
  synthesis: {
    topN: 10,
    timeoutMs: 15_000,
    maxWords: 300,
  },
};

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];
const CLASSIFIER_BACKENDS: readonly ClassifierBackend[] = ['keyword', 'embedding', 'llm'];
const WEIGHT_SUM_TOLERANCE = 1e-9;

/** Ranking weights are a contract: they must sum to 1.0. */
export function validateRankWeights(weights: RankWeights): void {
  const values = Object.entries(weights);
  for (const [name, value] of values) {
    if (!Number.isFinite(value) || value < 0) {
      throw new ConfigError(`Ranking weight ${name} must be a non-negative number, got ${value}`);
    }
  }
  const sum = values.reduce((acc, [, value]) => acc + value, 0);
  if (Math.abs(sum - 1) > WEIGHT_SUM_TOLERANCE) {
    throw new ConfigError(`Ranking weights must sum to 1.0, got ${sum}`);
  }
}

export function validateRoutingConfig(config: RoutingConfig): void {
  assertUnit('PRIMARY_THRESHOLD', config.primaryThreshold);
  assertUnit('SECONDARY_THRESHOLD', config.secondaryThreshold);
  if (config.secondaryThreshold > config.primaryThreshold) {
    throw new ConfigError(
      `SECONDARY_THRESHOLD (${config.secondaryThreshold}) exceeds PRIMARY_THRESHOLD (${config.primaryThreshold})`
    );
  }
  assertPositiveInt('MAX_DOMAINS', config.maxDomains);
  assertPositiveInt('REWRITE_MAX_TOKENS', config.rewriteMaxTokens);
  assertPositiveInt('CLASSIFICATION_BUDGET_MS', config.classificationBudgetMs);
  assertPositiveInt('MAX_QUERY_LENGTH', config.maxQueryLength);
}

export function validateFanOutConfig(config: FanOutConfig): void {
  assertPositiveInt('PER_TARGET_DEADLINE_MS', config.perTargetDeadlineMs);
  assertPositiveInt('DEFAULT_TOP_K', config.defaultTopK);
  assertPositiveInt('QUERY_TIMEOUT_MS', config.queryTimeoutMs);
}

export function validateFusionConfig(config: FusionConfig): void {
  assertUnit('DEDUP_THRESHOLD', config.dedupThreshold);
  assertUnit('DEMOTION_PENALTY', config.conflicts.demotionPenalty);
  assertUnit('FLAG_PENALTY', config.conflicts.flagPenalty);
  assertUnit('TOPICAL_RELEVANCE_FLOOR', config.conflicts.topicalRelevanceFloor);
  if (config.conflicts.semanticOppositionFloor !== null) {
    assertUnit('SEMANTIC_OPPOSITION_FLOOR', config.conflicts.semanticOppositionFloor);
  }
  if (config.conflicts.authorityOrder.length === 0) {
    throw new ConfigError('AUTHORITY_ORDER must name at least one domain');
  }
  if (!(config.recencyDecayDays > 0)) {
    throw new ConfigError(`RECENCY_DECAY_DAYS must be positive, got ${config.recencyDecayDays}`);
  }
  assertPositiveInt('SYNTHESIS_TOP_N', config.synthesis.topN);
  assertPositiveInt('SYNTHESIS_TIMEOUT_MS', config.synthesis.timeoutMs);
  assertPositiveInt('SYNTHESIS_MAX_WORDS', config.synthesis.maxWords);
  validateRankWeights(config.rankWeights);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const routing: RoutingConfig = {
    primaryThreshold: num(env, 'PRIMARY_THRESHOLD', DEFAULT_ROUTING_CONFIG.primaryThreshold),
    secondaryThreshold: num(env, 'SECONDARY_THRESHOLD', DEFAULT_ROUTING_CONFIG.secondaryThreshold),
    maxDomains: num(env, 'MAX_DOMAINS', DEFAULT_ROUTING_CONFIG.maxDomains),
    classificationBudgetMs: num(env, 'CLASSIFICATION_BUDGET_MS', DEFAULT_ROUTING_CONFIG.classificationBudgetMs),
    rewriteMaxTokens: num(env, 'REWRITE_MAX_TOKENS', DEFAULT_ROUTING_CONFIG.rewriteMaxTokens),
    maxQueryLength: num(env, 'MAX_QUERY_LENGTH', DEFAULT_ROUTING_CONFIG.maxQueryLength),
  };

  const fanOut: FanOutConfig = {
    perTargetDeadlineMs: num(env, 'PER_TARGET_DEADLINE_MS', DEFAULT_FAN_OUT_CONFIG.perTargetDeadlineMs),
    defaultTopK: num(env, 'DEFAULT_TOP_K', DEFAULT_FAN_OUT_CONFIG.defaultTopK),
    queryTimeoutMs: num(env, 'QUERY_TIMEOUT_MS', DEFAULT_FAN_OUT_CONFIG.queryTimeoutMs),
  };

  const defaults = DEFAULT_FUSION_CONFIG;
  const fusion: FusionConfig = {
    dedupThreshold: num(env, 'DEDUP_THRESHOLD', defaults.dedupThreshold),
    conflicts: {
      strategy: oneOf(env, 'CONFLICT_STRATEGY', CONFLICT_STRATEGIES, defaults.conflicts.strategy),
      tieWindowMs:
        num(env, 'RECENCY_TIE_WINDOW_HOURS', defaults.conflicts.tieWindowMs / 3_600_000) * 3_600_000,
      demotionPenalty: num(env, 'DEMOTION_PENALTY', defaults.conflicts.demotionPenalty),
      flagPenalty: num(env, 'FLAG_PENALTY', defaults.conflicts.flagPenalty),
      resolvedLoserAction: oneOf(
        env,
        'RESOLVED_LOSER_ACTION',
        ['demote', 'drop'] as const,
        defaults.conflicts.resolvedLoserAction
      ),
      authorityOrder: list(env, 'AUTHORITY_ORDER') ?? defaults.conflicts.authorityOrder,
      queryTypeOrders: {
        'current-behavior':
          list(env, 'AUTHORITY_ORDER_CURRENT_BEHAVIOR') ?? defaults.conflicts.queryTypeOrders['current-behavior'],
        'intended-design':
          list(env, 'AUTHORITY_ORDER_INTENDED_DESIGN') ?? defaults.conflicts.queryTypeOrders['intended-design'],
        'historical-decision':
          list(env, 'AUTHORITY_ORDER_HISTORICAL_DECISION') ??
          defaults.conflicts.queryTypeOrders['historical-decision'],
      },
      semanticOppositionFloor: env.SEMANTIC_OPPOSITION_FLOOR
        ? num(env, 'SEMANTIC_OPPOSITION_FLOOR', 0)
        : defaults.conflicts.semanticOppositionFloor,
      topicalRelevanceFloor: num(env, 'TOPICAL_RELEVANCE_FLOOR', defaults.conflicts.topicalRelevanceFloor),
    },
    rankWeights: parseRankWeights(env.RANK_WEIGHTS) ?? defaults.rankWeights,
    recencyDecayDays: num(env, 'RECENCY_DECAY_DAYS', defaults.recencyDecayDays),
    synthesis: {
      topN: num(env, 'SYNTHESIS_TOP_N', defaults.synthesis.topN),
      timeoutMs: num(env, 'SYNTHESIS_TIMEOUT_MS', defaults.synthesis.timeoutMs),
      maxWords: num(env, 'SYNTHESIS_MAX_WORDS', defaults.synthesis.maxWords),
    },
  };

  validateRoutingConfig(routing);
  validateFanOutConfig(fanOut);
  validateFusionConfig(fusion);

  const port = num(env, 'PORT', 8080);
  assertPositiveInt('PORT', port);
  const registryTtlMs = num(env, 'REGISTRY_TTL_MS', 30_000);
  assertPositiveInt('REGISTRY_TTL_MS', registryTtlMs);

  const supabase =
    env.SUPABASE_URL && env.SUPABASE_SERVICE_ROLE_KEY
      ? { url: env.SUPABASE_URL, serviceRoleKey: env.SUPABASE_SERVICE_ROLE_KEY }
      : null;

  const axiom =
    env.AXIOM_API_KEY && env.AXIOM_DATASET
      ? { apiToken: env.AXIOM_API_KEY, dataset: env.AXIOM_DATASET }
      : null;

  return {
    port,
    logLevel: oneOf(env, 'LOG_LEVEL', LOG_LEVELS, 'info'),
    classifierBackend: oneOf(env, 'CLASSIFIER_BACKEND', CLASSIFIER_BACKENDS, 'keyword'),
    registryTtlMs,
    routing,
    fanOut,
    fusion,
    supabase,
    openaiApiKey: env.OPENAI_API_KEY || null,
    kafkaBrokers: list(env, 'KAFKA_BROKERS') ?? [],
    axiom,
  };
}

// ── Parsing helpers ──

function num(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigError(`${name} must be a number, got "${raw}"`);
  }
  return value;
}

function oneOf<T extends string>(
  env: NodeJS.ProcessEnv,
  name: string,
  allowed: readonly T[],
  fallback: T
): T {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const match = allowed.find((value) => value === raw.trim());
  if (!match) {
    throw new ConfigError(`${name} must be one of ${allowed.join(', ')}, got "${raw}"`);
  }
  return match;
}

function list(env: NodeJS.ProcessEnv, name: string): string[] | null {
  const raw = env[name];
  if (!raw) return null;
  return raw
    .split(',')
    .map((part) => part.trim())
    .filter(Boolean);
}

/** RANK_WEIGHTS is "score,corroboration,recency,domainRelevance,length". */
function parseRankWeights(raw: string | undefined): RankWeights | null {
  if (!raw) return null;
  const parts = raw.split(',').map((part) => Number(part.trim()));
  if (parts.length !== 5 || parts.some((part) => !Number.isFinite(part))) {
    throw new ConfigError(`RANK_WEIGHTS must be five comma-separated numbers, got "${raw}"`);
  }
  const [normalizedScore, corroboration, recency, domainRelevance, length] = parts;
  return { normalizedScore, corroboration, recency, domainRelevance, length };
}

function assertUnit(name: string, value: number): void {
  if (!(value >= 0 && value <= 1)) {
    throw new ConfigError(`${name} must be within [0, 1], got ${value}`);
  }
}

function assertPositiveInt(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigError(`${name} must be a positive integer, got ${value}`);
  }
}
