/**
 * Fan-out: dispatch one recall request per routing target, concurrently,
 * each under its own deadline and the query's overall cancellation signal.
 * A failed, slow or cancelled target becomes a coverage gap; dispatch itself
 * never throws for a single target.
 */

import type { IAgentClient } from '../providers/IAgentClient.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { DomainRegistrySnapshot } from '../stores/DomainRegistrySnapshot.js';
import type {
  CoverageGap,
  DispatchOutcome,
  RecallResponse,
  RoutingPlan,
  RoutingTarget,
} from '../types/models.js';
import { withDeadline } from '../utils/deadline.js';

export interface DispatchOptions {
  perTargetDeadlineMs: number;
  topK: number;
  filters?: Record<string, unknown>;
  /** Overall query cancellation. */
  signal?: AbortSignal;
}

type TargetOutcome =
  | { ok: true; response: RecallResponse }
  | { ok: false; gap: CoverageGap };

export class FanOutService {
  constructor(
    private readonly client: IAgentClient,
    private readonly logger: ILogProvider
  ) {}

  async dispatch(
    plan: RoutingPlan,
    registry: DomainRegistrySnapshot,
    options: DispatchOptions
  ): Promise<DispatchOutcome> {
    const log = this.logger.child({ traceId: plan.traceId, queryId: plan.queryId });

    const outcomes = await Promise.all(
      plan.targets.map((target) => this.callTarget(plan, target, registry, options))
    );

    const responses: RecallResponse[] = [];
    const gaps: CoverageGap[] = [];
    for (const outcome of outcomes) {
      if (outcome.ok) {
        responses.push(outcome.response);
      } else {
        gaps.push(outcome.gap);
        log.warn('Recall target unavailable', { ...outcome.gap });
      }
    }

    log.debug('Fan-out complete', {
      targets: plan.targets.length,
      responded: responses.length,
      gaps: gaps.length,
    });

    return { responses, gaps };
  }

  private async callTarget(
    plan: RoutingPlan,
    target: RoutingTarget,
    registry: DomainRegistrySnapshot,
    options: DispatchOptions
  ): Promise<TargetOutcome> {
    const agent = registry.get(target.domainId);
    if (!agent || agent.agentId !== target.agentId) {
      return {
        ok: false,
        gap: { domainId: target.domainId, agentId: target.agentId, reason: 'agent no longer registered' },
      };
    }

    try {
      const response = await withDeadline(
        (signal) =>
          this.client.recall(
            agent,
            {
              queryId: plan.queryId,
              queryText: target.rewrittenQuery ?? plan.originalText,
              originalText: plan.originalText,
              domainId: target.domainId,
              topK: options.topK,
              filters: options.filters ?? {},
              traceId: plan.traceId,
              timeoutMs: options.perTargetDeadlineMs,
            },
            signal
          ),
        options.perTargetDeadlineMs,
        options.signal
      );
      const problem = replyProblem(target, response);
      if (problem) {
        return { ok: false, gap: { domainId: target.domainId, agentId: target.agentId, reason: problem } };
      }
      return { ok: true, response };
    } catch (err) {
      return {
        ok: false,
        gap: {
          domainId: target.domainId,
          agentId: target.agentId,
          reason: err instanceof Error ? err.message : String(err),
        },
      };
    }
  }
}

/** Replies that would break fusion invariants are the agent's fault, not the query's. */
function replyProblem(target: RoutingTarget, response: RecallResponse): string | null {
  if (response.domainId !== target.domainId || response.agentId !== target.agentId) {
    return `malformed reply: answered as ${response.agentId}/${response.domainId}`;
  }
  const bad = response.items.find(
    (item) => !(Number.isFinite(item.score) && item.score >= 0 && item.score <= 1)
  );
  return bad ? `malformed reply: score ${bad.score} outside [0, 1] for ${bad.chunkId}` : null;
}
