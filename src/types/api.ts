/**
 * API types: shapes for request/response payloads.
 * Decoupled from domain models so the API can evolve independently.
 * Dates travel as ISO-8601 strings.
 */

import type {
  AgentStatus,
  ConflictStrategy,
  FusionResult,
  RoutingMode,
  RoutingPlan,
} from './models.js';

// ── Requests ──

export interface QueryRequest {
  queryText: string;
  topK?: number;
  /** Explicit target domains; bypasses classification. */
  domains?: string[];
  filters?: Record<string, unknown>;
  synthesize?: boolean;
  timeoutMs?: number;
  conflictStrategy?: ConflictStrategy;
}

export interface RouteRequest {
  queryText: string;
  domains?: string[];
}

export interface SourceCitationPayload {
  documentId: string;
  chunkId: string;
  domainId: string;
  sourcePath: string;
  lineRange?: [number, number] | null;
  timestamp: string;
}

export interface RecallItemPayload {
  chunkId: string;
  content: string;
  score: number;
  citation: SourceCitationPayload;
  metadata?: Record<string, unknown>;
}

export interface RecallResponsePayload {
  queryId: string;
  agentId: string;
  domainId: string;
  items: RecallItemPayload[];
  totalSearched: number;
  latencyMs: number;
  traceId: string;
}

export interface CoverageGapPayload {
  domainId: string;
  agentId: string;
  reason: string;
}

export interface DomainSignalPayload {
  domainId: string;
  score: number;
  keywords?: string[];
}

export interface FuseRequest {
  queryId: string;
  originalText: string;
  responses: RecallResponsePayload[];
  coverageGaps?: CoverageGapPayload[];
  conflictStrategy?: ConflictStrategy;
  synthesize?: boolean;
  traceId?: string;
  /** Routing signals, used for the domain-relevance ranking feature. */
  domainSignals?: DomainSignalPayload[];
  /** Reference time for recency scoring. Defaults to the newest citation. */
  asOf?: string;
}

// ── Responses ──

export type QueryStatus = 'complete' | 'partial';

export interface QueryResponseMeta {
  source: string;
  /** 'partial' whenever at least one target left a coverage gap. */
  status: QueryStatus;
  routing: RoutingMode;
  fallbackReason: string | null;
}

export interface QueryResponse {
  _meta: QueryResponseMeta;
  plan: RoutingPlan;
  result: FusionResult;
}

export interface DomainSummary {
  domainId: string;
  name: string;
  description: string;
  agentId: string;
  status: AgentStatus;
}

export interface DomainListResponse {
  domains: DomainSummary[];
  refreshedAt: string;
}

export interface HealthResponse {
  service: string;
  status: 'ok' | 'degraded';
  uptimeSeconds: number;
  registeredDomains: number;
  registryRefreshedAt: string | null;
}

// ── Errors ──

export type ErrorCode =
  | 'INVALID_REQUEST'
  | 'UNKNOWN_DOMAIN'
  | 'NOT_FOUND'
  | 'REGISTRY_UNAVAILABLE'
  | 'FUSION_FAILED'
  | 'INTERNAL_ERROR';

export interface ApiErrorResponse {
  error: {
    code: ErrorCode;
    message: string;
    details?: Record<string, unknown>;
    traceId?: string;
  };
}
