/**
 * Target selection.
 * Turns classifier signals into a bounded, ordered list of routing targets.
 * Pure: depends only on the signals and a registry snapshot.
 */

import type { DomainSignal, RoutingTarget } from '../types/models.js';
import type { DomainRegistrySnapshot } from '../stores/DomainRegistrySnapshot.js';
import { UnknownDomainError } from '../errors.js';
import { compareStrings } from '../utils/text.js';

export interface SelectionThresholds {
  primaryThreshold: number;
  secondaryThreshold: number;
  maxDomains: number;
}

export interface SelectionResult {
  targets: RoutingTarget[];
  mode: 'classified' | 'broadcast';
  /** Signals naming domains with no routable agent. */
  unregistered: DomainSignal[];
}

/** A classifier produced a score outside [0, 1]. */
export class SignalRangeError extends Error {
  constructor(readonly signals: DomainSignal[]) {
    super(
      `Domain signal score out of range: ${signals
        .map((s) => `${s.domainId}=${s.score}`)
        .join(', ')}`
    );
    this.name = 'SignalRangeError';
  }
}

export function assertSignalsInRange(signals: readonly DomainSignal[]): void {
  const bad = signals.filter((s) => !(Number.isFinite(s.score) && s.score >= 0 && s.score <= 1));
  if (bad.length > 0) throw new SignalRangeError(bad);
}

/** Descending by score; equal scores fall back to domain id for a stable order. */
export function sortSignals(signals: readonly DomainSignal[]): DomainSignal[] {
  return [...signals].sort(
    (a, b) => b.score - a.score || compareStrings(a.domainId, b.domainId)
  );
}

export function selectTargets(
  signals: readonly DomainSignal[],
  registry: DomainRegistrySnapshot,
  thresholds: SelectionThresholds
): SelectionResult {
  assertSignalsInRange(signals);

  const unregistered: DomainSignal[] = [];
  const registered: DomainSignal[] = [];
  const seen = new Set<string>();
  for (const signal of sortSignals(signals)) {
    if (!registry.has(signal.domainId)) {
      unregistered.push(signal);
    } else if (!seen.has(signal.domainId)) {
      // First occurrence is the highest-scoring one.
      seen.add(signal.domainId);
      registered.push(signal);
    }
  }

  const { primaryThreshold, secondaryThreshold, maxDomains } = thresholds;
  const primaries = registered.filter((s) => s.score >= primaryThreshold);
  const secondaries = registered.filter(
    (s) => s.score >= secondaryThreshold && s.score < primaryThreshold
  );

  let selected: DomainSignal[];
  if (primaries.length > 0) {
    const room = Math.max(0, maxDomains - primaries.length);
    selected = [...primaries, ...secondaries.slice(0, room)];
  } else if (secondaries.length > 0) {
    selected = secondaries.slice(0, maxDomains);
  } else {
    return { targets: broadcastTargets(registry, signals), mode: 'broadcast', unregistered };
  }

  const targets = selected.flatMap((signal): RoutingTarget[] => {
    const reg = registry.get(signal.domainId);
    return reg
      ? [{ domainId: signal.domainId, agentId: reg.agentId, relevance: signal.score, rewrittenQuery: null }]
      : [];
  });

  return { targets, mode: 'classified', unregistered };
}

/**
 * Every registered domain, in domain id order. Relevance is the domain's
 * signal when one exists and is in range, otherwise 0.
 */
export function broadcastTargets(
  registry: DomainRegistrySnapshot,
  signals: readonly DomainSignal[] = []
): RoutingTarget[] {
  const scores = new Map<string, number>();
  for (const s of signals) {
    const inRange = Number.isFinite(s.score) && s.score >= 0 && s.score <= 1;
    if (inRange && s.score > (scores.get(s.domainId) ?? -1)) {
      scores.set(s.domainId, s.score);
    }
  }

  return registry.registrations().map((reg) => ({
    domainId: reg.domain.domainId,
    agentId: reg.agentId,
    relevance: scores.get(reg.domain.domainId) ?? 0,
    rewrittenQuery: null,
  }));
}

/**
 * Caller-named domains, verbatim and in the caller's order (duplicates collapsed).
 * Every one must be registered.
 */
export function explicitTargets(
  domainIds: readonly string[],
  registry: DomainRegistrySnapshot
): RoutingTarget[] {
  const unique = [...new Set(domainIds)];
  const unknown = unique.filter((id) => !registry.has(id));
  if (unknown.length > 0) throw new UnknownDomainError(unknown);

  return unique.flatMap((domainId): RoutingTarget[] => {
    const reg = registry.get(domainId);
    return reg ? [{ domainId, agentId: reg.agentId, relevance: 1, rewrittenQuery: null }] : [];
  });
}
