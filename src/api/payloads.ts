/**
 * Parsing of API payloads into domain models.
 * Runs after schema validation; anything that still does not fit is a 400.
 */

import type {
  CoverageGap,
  DomainSignal,
  RecallItem,
  RecallResponse,
} from '../types/models.js';
import { CONFLICT_STRATEGIES, type ConflictStrategy } from '../types/models.js';
import { ValidationError } from '../errors.js';
import {
  isFiniteNumber,
  isNonEmptyString,
  isRecord,
  isStringArray,
  parseTimestamp,
} from '../utils/guards.js';

/** `asOf` when given, else the newest citation so a replayed payload ranks the same. */
export function parseReferenceTime(value: unknown, responses: readonly RecallResponse[]): Date | undefined {
  if (value !== undefined) {
    const asOf = parseTimestamp(value);
    if (!asOf) throw new ValidationError('asOf must be an ISO-8601 timestamp');
    return asOf;
  }
  let newest: Date | undefined;
  for (const response of responses) {
    for (const item of response.items) {
      if (!newest || item.citation.timestamp.getTime() > newest.getTime()) newest = item.citation.timestamp;
    }
  }
  return newest;
}

export function parseRecallResponses(value: unknown): RecallResponse[] {
  if (!Array.isArray(value)) throw new ValidationError('responses must be an array');
  return value.map((raw, i) => parseRecallResponse(raw, `responses[${i}]`));
}

function parseRecallResponse(raw: unknown, path: string): RecallResponse {
  if (!isRecord(raw)) throw new ValidationError(`${path} must be an object`);
  const { queryId, agentId, domainId, items, totalSearched, latencyMs, traceId } = raw;
  if (!isNonEmptyString(agentId)) throw new ValidationError(`${path}.agentId is required`);
  if (!isNonEmptyString(domainId)) throw new ValidationError(`${path}.domainId is required`);
  if (!Array.isArray(items)) throw new ValidationError(`${path}.items must be an array`);
  return {
    queryId: typeof queryId === 'string' ? queryId : '',
    agentId,
    domainId,
    items: items.map((item, j) => parseRecallItem(item, `${path}.items[${j}]`)),
    totalSearched: isFiniteNumber(totalSearched) ? totalSearched : items.length,
    latencyMs: isFiniteNumber(latencyMs) ? latencyMs : 0,
    traceId: typeof traceId === 'string' ? traceId : '',
  };
}

function parseRecallItem(raw: unknown, path: string): RecallItem {
  if (!isRecord(raw)) throw new ValidationError(`${path} must be an object`);
  const { chunkId, content, score, citation, metadata } = raw;
  if (!isNonEmptyString(chunkId)) throw new ValidationError(`${path}.chunkId is required`);
  if (typeof content !== 'string') throw new ValidationError(`${path}.content must be a string`);
  if (!isFiniteNumber(score) || score < 0 || score > 1) {
    throw new ValidationError(`${path}.score must be a number between 0 and 1`);
  }
  if (!isRecord(citation)) throw new ValidationError(`${path}.citation is required`);

  const timestamp = parseTimestamp(citation.timestamp);
  if (!timestamp) throw new ValidationError(`${path}.citation.timestamp must be an ISO-8601 string`);
  const { documentId, domainId, sourcePath, lineRange } = citation;
  if (typeof documentId !== 'string' || typeof domainId !== 'string' || typeof sourcePath !== 'string') {
    throw new ValidationError(`${path}.citation needs documentId, domainId and sourcePath`);
  }

  let range: [number, number] | null = null;
  if (Array.isArray(lineRange) && lineRange.length === 2) {
    const [start, end] = lineRange;
    if (isFiniteNumber(start) && isFiniteNumber(end)) range = [start, end];
  }

  return {
    chunkId,
    content,
    score,
    citation: {
      documentId,
      chunkId: typeof citation.chunkId === 'string' ? citation.chunkId : chunkId,
      domainId,
      sourcePath,
      lineRange: range,
      timestamp,
    },
    metadata: isRecord(metadata) ? metadata : {},
  };
}

export function parseCoverageGaps(value: unknown): CoverageGap[] {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) throw new ValidationError('coverageGaps must be an array');
  return value.map((raw, i) => {
    if (!isRecord(raw) || !isNonEmptyString(raw.domainId) || typeof raw.reason !== 'string') {
      throw new ValidationError(`coverageGaps[${i}] needs domainId and reason`);
    }
    return {
      domainId: raw.domainId,
      agentId: typeof raw.agentId === 'string' ? raw.agentId : '',
      reason: raw.reason,
    };
  });
}

export function parseDomainSignals(value: unknown): DomainSignal[] {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) throw new ValidationError('domainSignals must be an array');
  return value.map((raw, i) => {
    if (!isRecord(raw) || !isNonEmptyString(raw.domainId) || !isFiniteNumber(raw.score)) {
      throw new ValidationError(`domainSignals[${i}] needs domainId and score`);
    }
    return {
      domainId: raw.domainId,
      score: raw.score,
      keywords: isStringArray(raw.keywords) ? raw.keywords : [],
    };
  });
}

export function parseConflictStrategy(value: unknown): ConflictStrategy | undefined {
  if (value === undefined || value === null) return undefined;
  const strategy = CONFLICT_STRATEGIES.find((s) => s === value);
  if (!strategy) {
    throw new ValidationError(`conflictStrategy must be one of: ${CONFLICT_STRATEGIES.join(', ')}`);
  }
  return strategy;
}

export function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

export function optionalNumber(value: unknown): number | undefined {
  return isFiniteNumber(value) ? value : undefined;
}

export function optionalBoolean(value: unknown): boolean | undefined {
  return typeof value === 'boolean' ? value : undefined;
}

export function optionalStringArray(value: unknown): string[] | undefined {
  return isStringArray(value) ? value : undefined;
}

export function optionalRecord(value: unknown): Record<string, unknown> | undefined {
  return isRecord(value) ? value : undefined;
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}
