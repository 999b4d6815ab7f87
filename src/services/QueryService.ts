/**
 * End-to-end query: route → fan out → fuse.
 * The whole query runs under one overall deadline. When it passes, agent
 * calls still in flight become coverage gaps and any pending synthesis is
 * dropped; stages that already produced output are kept.
 */

import { randomUUID } from 'node:crypto';
import type { FanOutConfig, FusionConfig } from '../config.js';
import type { IEventPublisher, RoutingFeedbackEvent } from '../providers/IEventPublisher.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { QueryRequest, QueryResponse } from '../types/api.js';
import type { FusionResult, RoutingPlan } from '../types/models.js';
import type { RoutingService } from './RoutingService.js';
import type { FanOutService } from './FanOutService.js';
import type { FusionService } from './FusionService.js';
import { domainRelevanceFor } from '../fusion/rank.js';
import { deadlineSignal } from '../utils/deadline.js';

export const SERVICE_NAME = 'query-mesh';

export class QueryService {
  constructor(
    private readonly routing: RoutingService,
    private readonly fanOut: FanOutService,
    private readonly fusion: FusionService,
    private readonly events: IEventPublisher,
    private readonly config: { fanOut: FanOutConfig; synthesis: FusionConfig['synthesis'] },
    private readonly logger: ILogProvider
  ) {}

  async query(input: QueryRequest, traceId: string): Promise<QueryResponse> {
    const deadline = deadlineSignal(input.timeoutMs ?? this.config.fanOut.queryTimeoutMs);
    try {
      const { plan, registry } = await this.routing.route(
        { queryText: input.queryText, domains: input.domains, queryId: randomUUID(), traceId },
        deadline.signal
      );

      const outcome = await this.fanOut.dispatch(plan, registry, {
        perTargetDeadlineMs: this.config.fanOut.perTargetDeadlineMs,
        topK: input.topK ?? this.config.fanOut.defaultTopK,
        filters: input.filters,
        signal: deadline.signal,
      });

      const result = await this.fusion.fuse(
        {
          queryId: plan.queryId,
          originalText: plan.originalText,
          responses: outcome.responses,
          gaps: outcome.gaps,
          traceId,
          conflictStrategy: input.conflictStrategy,
          synthesize: input.synthesize,
          domainRelevance: domainRelevanceFor(plan.signals, plan),
        },
        { signal: deadline.signal }
      );

      void this.events.publish(this.feedbackEvent(plan, result));

      this.logger.info('Query complete', {
        traceId,
        queryId: plan.queryId,
        mode: plan.mode,
        targets: plan.targets.length,
        gaps: result.coverageGaps.length,
        items: result.items.length,
      });

      return {
        _meta: {
          source: SERVICE_NAME,
          status: result.coverageGaps.length > 0 ? 'partial' : 'complete',
          routing: plan.mode,
          fallbackReason: plan.fallbackReason,
        },
        plan,
        result,
      };
    } finally {
      deadline.dispose();
    }
  }

  private feedbackEvent(plan: RoutingPlan, result: FusionResult): RoutingFeedbackEvent {
    const window = result.items.slice(0, this.config.synthesis.topN);
    return {
      eventId: randomUUID(),
      queryId: plan.queryId,
      traceId: plan.traceId,
      routingMode: plan.mode,
      queriedDomains: plan.targets.map((t) => t.domainId),
      contributingDomains: [...new Set(window.map((i) => i.sourceDomainId))].sort(),
      gapDomains: result.coverageGaps.map((g) => g.domainId),
      emittedAt: new Date(),
    };
  }
}
