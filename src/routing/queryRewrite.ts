/**
 * Per-target query rewriting.
 * A rewrite is only kept when it is usable; anything else falls back to
 * identity passthrough (rewrittenQuery = null).
 */

import type { RoutingTarget } from '../types/models.js';
import { countTokens, normalizeText } from '../utils/text.js';

export type RewriteRejection = 'missing' | 'empty' | 'over-budget' | 'identical';

export type RewriteCheck =
  | { ok: true; query: string }
  | { ok: false; reason: RewriteRejection };

export function checkRewrite(
  originalText: string,
  candidate: string | undefined,
  maxTokens: number
): RewriteCheck {
  if (candidate === undefined) return { ok: false, reason: 'missing' };
  const trimmed = candidate.trim();
  if (!trimmed) return { ok: false, reason: 'empty' };
  if (countTokens(trimmed) > maxTokens) return { ok: false, reason: 'over-budget' };
  if (normalizeText(trimmed) === normalizeText(originalText)) {
    return { ok: false, reason: 'identical' };
  }
  return { ok: true, query: trimmed };
}

export interface RewriteOutcome {
  targets: RoutingTarget[];
  /** Domains whose proposed rewrite was discarded, with the reason. */
  rejected: Array<{ domainId: string; reason: Exclude<RewriteRejection, 'missing'> }>;
}

export function attachRewrites(
  targets: readonly RoutingTarget[],
  rewrites: Readonly<Record<string, string>>,
  originalText: string,
  maxTokens: number
): RewriteOutcome {
  const rejected: RewriteOutcome['rejected'] = [];

  const rewritten = targets.map((target) => {
    const candidate = Object.prototype.hasOwnProperty.call(rewrites, target.domainId)
      ? rewrites[target.domainId]
      : undefined;
    const check = checkRewrite(originalText, candidate, maxTokens);
    if (check.ok) return { ...target, rewrittenQuery: check.query };
    if (check.reason !== 'missing') {
      rejected.push({ domainId: target.domainId, reason: check.reason });
    }
    return { ...target, rewrittenQuery: null };
  });

  return { targets: rewritten, rejected };
}
