/**
 * Domain models: the entities routing and fusion work with.
 * Decoupled from both API shapes and the agent wire format.
 * Every entity is created per query and never mutated after the stage that produced it.
 */

// ── Enumerations ──

export const CONFLICT_STRATEGIES = [
  'RECENCY',
  'SOURCE_AUTHORITY',
  'CONFIDENCE',
  'FLAG',
  'RECENCY_THEN_FLAG',
] as const;

export type ConflictStrategy = (typeof CONFLICT_STRATEGIES)[number];

/** Outcome recorded on a conflict: the strategy that actually decided it. */
export type ConflictResolution = Exclude<ConflictStrategy, 'RECENCY_THEN_FLAG'>;

export const AGENT_STATUSES = [
  'STARTING',
  'READY',
  'DEGRADED',
  'DRAINING',
  'OFFLINE',
] as const;

export type AgentStatus = (typeof AGENT_STATUSES)[number];

export type RoutingMode = 'classified' | 'broadcast' | 'explicit';

// ── Registry ──

export interface DomainDescriptor {
  domainId: string;
  name: string;
  description: string;
  /** Terms the rule-based classifier matches against. */
  keywords: string[];
}

export interface AgentRegistration {
  agentId: string;
  baseUrl: string;
  status: AgentStatus;
  domain: DomainDescriptor;
  lastHeartbeatAt: Date | null;
}

// ── Routing ──

export interface DomainSignal {
  domainId: string;
  /** Expected in [0, 1]. Never clamped: an out-of-range value is a producer bug. */
  score: number;
  keywords: string[];
}

export interface ClassificationResult {
  signals: DomainSignal[];
  /** Per-domain rewritten query, keyed by domain id. */
  rewrites: Record<string, string>;
}

export interface RoutingTarget {
  domainId: string;
  agentId: string;
  relevance: number;
  /** null means identity passthrough: the agent receives the original text. */
  rewrittenQuery: string | null;
}

export interface RoutingPlan {
  queryId: string;
  originalText: string;
  targets: RoutingTarget[];
  /** All signals, including those below threshold or for unregistered domains. */
  signals: DomainSignal[];
  mode: RoutingMode;
  /** Why classification was bypassed or abandoned, when it was. */
  fallbackReason: string | null;
  createdAt: Date;
  traceId: string;
}

// ── Recall ──

export interface SourceCitation {
  documentId: string;
  chunkId: string;
  domainId: string;
  sourcePath: string;
  lineRange: [number, number] | null;
  timestamp: Date;
}

export interface RecallItem {
  chunkId: string;
  content: string;
  /** Agent-local relevance in [0, 1]; never compared raw across agents. */
  score: number;
  citation: SourceCitation;
  metadata: Record<string, unknown>;
}

export interface RecallRequest {
  queryId: string;
  /** The rewritten query when the target has one, otherwise the original text. */
  queryText: string;
  originalText: string;
  domainId: string;
  topK: number;
  /** Opaque to routing; interpreted by the agent. */
  filters: Record<string, unknown>;
  traceId: string;
  /** Hint for the agent's own budget. */
  timeoutMs: number;
}

export interface RecallResponse {
  queryId: string;
  agentId: string;
  domainId: string;
  items: RecallItem[];
  totalSearched: number;
  latencyMs: number;
  traceId: string;
}

export interface CoverageGap {
  domainId: string;
  agentId: string;
  reason: string;
}

export interface DispatchOutcome {
  responses: RecallResponse[];
  gaps: CoverageGap[];
}

// ── Fusion ──

/** A recall item tagged with provenance during collection. */
export interface TaggedItem extends RecallItem {
  sourceAgentId: string;
  sourceDomainId: string;
  agentLatencyMs: number;
}

/** A tagged item after normalization; `normalizedScore` is fixed from here on. */
export interface NormalizedItem extends TaggedItem {
  readonly normalizedScore: number;
}

/** A deduplication survivor carrying the provenance of everything it absorbed. */
export interface MergedItem extends NormalizedItem {
  corroboratingCitations: SourceCitation[];
  duplicatesAbsorbed: number;
}

/** A merged item as it leaves conflict resolution, with any demotion applied. */
export interface ResolvedItem extends MergedItem {
  /** normalizedScore minus any conflict penalty, floored at 0. */
  effectiveScore: number;
  demoted: boolean;
}

export interface RankedItem extends ResolvedItem {
  rankScore: number;
}

export type ConflictKind =
  | 'same-entity'
  | 'temporal'
  | 'negation'
  | 'semantic-opposition';

export interface ConflictRecord {
  /** Always at least two items. */
  items: RecallItem[];
  kinds: ConflictKind[];
  resolution: ConflictResolution;
  /** null iff the conflict was flagged rather than resolved. */
  resolvedTo: RecallItem | null;
}

export interface FusionStats {
  agentsResponded: number;
  totalCandidatesSearched: number;
  candidatesCollected: number;
  duplicatesRemoved: number;
  conflictsDetected: number;
  itemsDropped: number;
}

export interface FusionResult {
  queryId: string;
  /** Ordering is the contract: callers must not re-sort. */
  items: RankedItem[];
  synthesis: string | null;
  conflicts: ConflictRecord[];
  coverageGaps: CoverageGap[];
  domainsQueried: string[];
  stats: FusionStats;
  totalLatencyMs: number;
  traceId: string;
}
