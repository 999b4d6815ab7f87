/**
 * Fusion pipeline: collect → normalize → deduplicate → resolve conflicts →
 * rank → (optional) synthesize. Strictly sequential per query and stateless
 * between calls.
 *
 * Only stages 1–5 can fail a query, and only on an invariant violation.
 * Synthesis and the embedding lookup for semantic-opposition detection
 * degrade silently (with a warning) to "not available".
 */

import type { FusionConfig } from '../config.js';
import type { IEmbeddingProvider } from '../providers/IEmbeddingProvider.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { ISynthesisProvider } from '../providers/ISynthesisProvider.js';
import type {
  ConflictStrategy,
  CoverageGap,
  FusionResult,
  MergedItem,
  RankedItem,
  RecallResponse,
  ConflictRecord,
} from '../types/models.js';
import { AppError, FusionPipelineError, type FusionStage } from '../errors.js';
import { collect } from '../fusion/collect.js';
import { normalize } from '../fusion/normalize.js';
import { deduplicate } from '../fusion/deduplicate.js';
import { detectConflicts, resolveConflicts, type ItemEmbeddings } from '../fusion/conflicts.js';
import { authorityOrderFor, inferQueryType } from '../fusion/queryType.js';
import { rank } from '../fusion/rank.js';
import { buildSynthesisPrompt } from '../fusion/synthesis.js';
import { withDeadline } from '../utils/deadline.js';

export interface FusionInput {
  queryId: string;
  originalText: string;
  responses: readonly RecallResponse[];
  gaps: readonly CoverageGap[];
  traceId: string;
  conflictStrategy?: ConflictStrategy;
  synthesize?: boolean;
  domainRelevance?: ReadonlyMap<string, number>;
  /** Reference time for recency; defaults to the service clock. */
  now?: Date;
}

export interface FusionRunOptions {
  /** Overall query cancellation; aborts synthesis and the embedding lookup. */
  signal?: AbortSignal;
}

export class FusionService {
  constructor(
    private readonly config: FusionConfig,
    private readonly logger: ILogProvider,
    private readonly synthesizer: ISynthesisProvider | null = null,
    private readonly embeddings: IEmbeddingProvider | null = null,
    private readonly clock: () => Date = () => new Date()
  ) {}

  async fuse(input: FusionInput, options: FusionRunOptions = {}): Promise<FusionResult> {
    const started = Date.now();
    const log = this.logger.child({ traceId: input.traceId, queryId: input.queryId });
    const now = input.now ?? this.clock();
    const strategy = input.conflictStrategy ?? this.config.conflicts.strategy;

    const collected = stage('collect', () => collect(input.responses, input.gaps));
    const normalized = stage('normalize', () => normalize(collected.items));
    const deduped = stage('deduplicate', () => deduplicate(normalized, this.config.dedupThreshold));

    const vectors = await this.embedForOpposition(input.originalText, deduped.items, options.signal);

    const resolution = stage('resolve-conflicts', () => {
      const groups = detectConflicts(deduped.items, this.config.conflicts, vectors ?? undefined);
      return resolveConflicts(deduped.items, groups, {
        strategy,
        config: this.config.conflicts,
        authorityOrder: authorityOrderFor(
          inferQueryType(input.originalText),
          this.config.conflicts.authorityOrder,
          this.config.conflicts.queryTypeOrders
        ),
      });
    });

    const ranked = stage('rank', () =>
      rank(resolution.items, {
        weights: this.config.rankWeights,
        recencyDecayDays: this.config.recencyDecayDays,
        now,
        domainRelevance: input.domainRelevance ?? new Map(),
      })
    );

    log.debug('Fusion stages complete', {
      collected: collected.items.length,
      duplicatesRemoved: deduped.duplicatesRemoved,
      conflicts: resolution.conflicts.length,
      dropped: resolution.itemsDropped,
      ranked: ranked.length,
      strategy,
    });

    const synthesis = input.synthesize
      ? await this.synthesize(input.originalText, ranked, resolution.conflicts, collected.gaps, options.signal, log)
      : null;

    return {
      queryId: input.queryId,
      items: ranked,
      synthesis,
      conflicts: resolution.conflicts,
      coverageGaps: collected.gaps,
      domainsQueried: [...new Set(input.responses.map((r) => r.domainId))].sort(),
      stats: {
        agentsResponded: collected.agentsResponded,
        totalCandidatesSearched: collected.totalCandidatesSearched,
        candidatesCollected: collected.items.length,
        duplicatesRemoved: deduped.duplicatesRemoved,
        conflictsDetected: resolution.conflicts.length,
        itemsDropped: resolution.itemsDropped,
      },
      totalLatencyMs: Date.now() - started,
      traceId: input.traceId,
    };
  }

  private async embedForOpposition(
    queryText: string,
    items: readonly MergedItem[],
    signal: AbortSignal | undefined
  ): Promise<ItemEmbeddings | null> {
    if (!this.embeddings || this.config.conflicts.semanticOppositionFloor === null || items.length < 2) {
      return null;
    }
    try {
      const [query, ...vectors] = await this.embeddings.generateBatch(
        [queryText, ...items.map((i) => i.content)],
        { signal }
      );
      if (!query || vectors.length !== items.length) {
        throw new Error(`expected ${items.length + 1} embeddings`);
      }
      return { query, items: vectors };
    } catch (err) {
      this.logger.warn('Embeddings unavailable; semantic opposition check skipped', {
        error: err instanceof Error ? err.message : String(err),
      });
      return null;
    }
  }

  private async synthesize(
    queryText: string,
    items: readonly RankedItem[],
    conflicts: readonly ConflictRecord[],
    gaps: readonly CoverageGap[],
    signal: AbortSignal | undefined,
    log: ILogProvider
  ): Promise<string | null> {
    const synthesizer = this.synthesizer;
    if (!synthesizer) {
      log.warn('Synthesis requested but no provider is configured');
      return null;
    }
    const { topN, timeoutMs, maxWords } = this.config.synthesis;
    const prompt = buildSynthesisPrompt({ queryText, items, conflicts, gaps, topN, maxWords });
    try {
      return await withDeadline(
        (budget) => synthesizer.generate(prompt, { signal: budget, maxWords }),
        timeoutMs,
        signal
      );
    } catch (err) {
      log.warn('Synthesis failed; returning result without it', {
        error: err instanceof Error ? err.message : String(err),
      });
      return null;
    }
  }
}

/** Runs one pure stage, attributing any unexpected fault to it. */
function stage<T>(name: FusionStage, run: () => T): T {
  try {
    return run();
  } catch (err) {
    if (err instanceof AppError) throw err;
    throw new FusionPipelineError(name, err instanceof Error ? err.message : String(err));
  }
}
