/**
 * HTTP recall client.
 * POSTs the snake_case recall request to {baseUrl}/recall and validates the
 * agent's reply before mapping it to domain models.
 * Connection reuse comes from the runtime's fetch pool (keep-alive, per-origin,
 * no per-query serialization).
 */

import type { IAgentClient } from './IAgentClient.js';
import type {
  AgentRegistration,
  RecallItem,
  RecallRequest,
  RecallResponse,
} from '../types/models.js';
import type { RecallRequestWire } from '../types/wire.js';
import { AgentCallError } from '../errors.js';
import {
  isFiniteNumber,
  isNonEmptyString,
  isRecord,
  parseTimestamp,
} from '../utils/guards.js';

export class HttpAgentClient implements IAgentClient {
  async recall(
    agent: AgentRegistration,
    request: RecallRequest,
    signal: AbortSignal
  ): Promise<RecallResponse> {
    const body: RecallRequestWire = {
      query_id: request.queryId,
      query_text: request.queryText,
      original_text: request.originalText,
      domain_id: request.domainId,
      top_k: request.topK,
      filters: request.filters,
      trace_id: request.traceId,
      timeout_ms: request.timeoutMs,
    };

    let res: Response;
    try {
      res = await fetch(`${agent.baseUrl.replace(/\/+$/, '')}/recall`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'X-Trace-Id': request.traceId,
        },
        body: JSON.stringify(body),
        signal,
      });
    } catch (err) {
      throw new AgentCallError(
        'transport',
        `transport error: ${err instanceof Error ? err.message : String(err)}`
      );
    }

    if (!res.ok) {
      throw new AgentCallError('status', `agent returned HTTP ${res.status}`, res.status);
    }

    let payload: unknown;
    try {
      payload = await res.json();
    } catch {
      throw new AgentCallError('malformed', 'agent returned invalid JSON');
    }

    const response = parseRecallResponse(payload);
    if (response.domainId !== request.domainId || response.agentId !== agent.agentId) {
      throw new AgentCallError(
        'malformed',
        `reply from ${response.agentId}/${response.domainId} does not match target ${agent.agentId}/${request.domainId}`
      );
    }
    return response;
  }
}

export function parseRecallResponse(raw: unknown): RecallResponse {
  if (!isRecord(raw)) {
    throw new AgentCallError('malformed', 'recall response is not an object');
  }
  const { query_id, agent_id, domain_id, items, total_searched, latency_ms, trace_id } = raw;
  if (
    !isNonEmptyString(query_id) ||
    !isNonEmptyString(agent_id) ||
    !isNonEmptyString(domain_id) ||
    !Array.isArray(items) ||
    !isFiniteNumber(total_searched) ||
    !isFiniteNumber(latency_ms) ||
    typeof trace_id !== 'string'
  ) {
    throw new AgentCallError('malformed', 'recall response is missing required fields');
  }

  return {
    queryId: query_id,
    agentId: agent_id,
    domainId: domain_id,
    items: items.map((item, index) => parseRecallItem(item, index)),
    totalSearched: total_searched,
    latencyMs: latency_ms,
    traceId: trace_id,
  };
}

function parseRecallItem(raw: unknown, index: number): RecallItem {
  const fail = (what: string) =>
    new AgentCallError('malformed', `recall item ${index}: ${what}`);

  if (!isRecord(raw)) throw fail('not an object');
  const { chunk_id, content, score, citation, metadata } = raw;
  if (!isNonEmptyString(chunk_id)) throw fail('chunk_id missing');
  if (typeof content !== 'string') throw fail('content missing');
  if (!isFiniteNumber(score)) throw fail('score missing');
  if (score < 0 || score > 1) throw fail(`score ${score} outside [0, 1]`);
  if (!isRecord(citation)) throw fail('citation missing');

  const timestamp = parseTimestamp(citation.timestamp);
  if (!timestamp) throw fail('citation timestamp missing or invalid');
  if (
    typeof citation.document_id !== 'string' ||
    typeof citation.domain_id !== 'string' ||
    typeof citation.source_path !== 'string'
  ) {
    throw fail('citation incomplete');
  }

  const lineRange = citation.line_range;
  const validRange =
    Array.isArray(lineRange) &&
    lineRange.length === 2 &&
    isFiniteNumber(lineRange[0]) &&
    isFiniteNumber(lineRange[1]);

  return {
    chunkId: chunk_id,
    content,
    score,
    citation: {
      documentId: citation.document_id,
      chunkId: typeof citation.chunk_id === 'string' ? citation.chunk_id : chunk_id,
      domainId: citation.domain_id,
      sourcePath: citation.source_path,
      lineRange: validRange ? [lineRange[0], lineRange[1]] : null,
      timestamp,
    },
    metadata: isRecord(metadata) ? metadata : {},
  };
}
