/**
 * Agent RPC wire format.
 * Recall agents speak snake_case JSON over HTTP: POST {baseUrl}/recall.
 */

export interface RecallRequestWire {
  query_id: string;
  query_text: string;
  original_text: string;
  domain_id: string;
  top_k: number;
  filters: Record<string, unknown>;
  trace_id: string;
  timeout_ms: number;
}

export interface SourceCitationWire {
  document_id: string;
  chunk_id: string;
  domain_id: string;
  source_path: string;
  line_range?: [number, number] | null;
  timestamp: string;
}

export interface RecallItemWire {
  chunk_id: string;
  content: string;
  score: number;
  citation: SourceCitationWire;
  metadata?: Record<string, unknown>;
}

export interface RecallResponseWire {
  query_id: string;
  agent_id: string;
  domain_id: string;
  items: RecallItemWire[];
  total_searched: number;
  latency_ms: number;
  trace_id: string;
}
