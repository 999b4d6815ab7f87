/**
 * Routing: classify a query into weighted domain targets and build the routing plan.
 * Classification runs under its own budget; any classifier failure, timeout or
 * out-of-range signal falls back to broadcasting to every registered domain.
 */

import { randomUUID } from 'node:crypto';
import type { RoutingConfig } from '../config.js';
import type { IDomainSignalSource } from '../providers/IDomainSignalSource.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { DomainRegistryCache } from '../stores/DomainRegistryCache.js';
import type { DomainRegistrySnapshot } from '../stores/DomainRegistrySnapshot.js';
import type {
  ClassificationResult,
  DomainSignal,
  RoutingMode,
  RoutingPlan,
  RoutingTarget,
} from '../types/models.js';
import {
  broadcastTargets,
  explicitTargets,
  selectTargets,
  SignalRangeError,
} from '../routing/targetSelection.js';
import { attachRewrites } from '../routing/queryRewrite.js';
import { DeadlineExceededError, withDeadline } from '../utils/deadline.js';
import { ValidationError } from '../errors.js';

export interface RouteInput {
  queryText: string;
  /** Explicit targets; classification is skipped entirely. */
  domains?: string[];
  queryId?: string;
  traceId: string;
}

export interface RoutedQuery {
  plan: RoutingPlan;
  /** The registry view the plan was built against; dispatch resolves agents from it. */
  registry: DomainRegistrySnapshot;
}

export class RoutingService {
  constructor(
    private readonly registry: DomainRegistryCache,
    private readonly signalSource: IDomainSignalSource,
    private readonly config: RoutingConfig,
    private readonly logger: ILogProvider,
    private readonly clock: () => Date = () => new Date()
  ) {}

  async route(input: RouteInput, signal?: AbortSignal): Promise<RoutedQuery> {
    const queryText = this.validateQuery(input.queryText);
    const snapshot = await this.registry.snapshot();
    const log = this.logger.child({ traceId: input.traceId });

    const base = {
      queryId: input.queryId ?? randomUUID(),
      originalText: queryText,
      createdAt: this.clock(),
      traceId: input.traceId,
    };

    if (input.domains && input.domains.length > 0) {
      const plan: RoutingPlan = {
        ...base,
        targets: explicitTargets(input.domains, snapshot),
        signals: [],
        mode: 'explicit',
        fallbackReason: null,
      };
      return { plan, registry: snapshot };
    }

    let classification: ClassificationResult;
    try {
      classification = await withDeadline(
        (budgetSignal) =>
          this.signalSource.classify(queryText, snapshot.descriptors(), { signal: budgetSignal }),
        this.config.classificationBudgetMs,
        signal
      );
    } catch (err) {
      const reason =
        err instanceof DeadlineExceededError
          ? `classification ${err.message}`
          : `classification failed: ${err instanceof Error ? err.message : String(err)}`;
      log.warn('Classification unavailable; broadcasting', {
        backend: this.signalSource.name,
        reason,
      });
      return {
        plan: { ...base, targets: broadcastTargets(snapshot), signals: [], mode: 'broadcast', fallbackReason: reason },
        registry: snapshot,
      };
    }

    const { signals, rewrites } = classification;
    let targets: RoutingTarget[];
    let mode: RoutingMode;
    let fallbackReason: string | null = null;

    try {
      const selection = selectTargets(signals, snapshot, this.config);
      for (const skipped of selection.unregistered) {
        log.warn('Skipping signal for unregistered domain', {
          domainId: skipped.domainId,
          score: skipped.score,
        });
      }
      targets = selection.targets;
      mode = selection.mode;
      if (mode === 'broadcast') {
        fallbackReason = 'no domain reached the secondary threshold';
      }
    } catch (err) {
      if (!(err instanceof SignalRangeError)) throw err;
      log.error('Classifier produced out-of-range signals; broadcasting', {
        backend: this.signalSource.name,
        signals: err.signals.map((s) => ({ domainId: s.domainId, score: s.score })),
      });
      targets = broadcastTargets(snapshot, signals);
      mode = 'broadcast';
      fallbackReason = err.message;
    }

    const rewritten = attachRewrites(targets, rewrites, queryText, this.config.rewriteMaxTokens);
    for (const rejection of rewritten.rejected) {
      log.debug('Discarded query rewrite', rejection);
    }

    const plan: RoutingPlan = {
      ...base,
      targets: rewritten.targets,
      signals: keepAll(signals),
      mode,
      fallbackReason,
    };

    log.debug('Routing plan built', {
      queryId: plan.queryId,
      mode,
      targets: plan.targets.map((t) => t.domainId),
    });

    return { plan, registry: snapshot };
  }

  private validateQuery(queryText: string): string {
    const trimmed = queryText.trim();
    if (!trimmed) {
      throw new ValidationError('queryText must not be empty');
    }
    if (trimmed.length > this.config.maxQueryLength) {
      throw new ValidationError(
        `queryText must be ${this.config.maxQueryLength} characters or less`,
        { length: trimmed.length }
      );
    }
    return trimmed;
  }
}

function keepAll(signals: readonly DomainSignal[]): DomainSignal[] {
  return signals.map((s) => ({ ...s, keywords: [...s.keywords] }));
}
