/**
 * Recall RPC to a domain agent.
 * Implementations reject with AgentCallError for transport, status and payload
 * failures, and stop work when the signal aborts.
 */

import type { AgentRegistration, RecallRequest, RecallResponse } from '../types/models.js';

export interface IAgentClient {
  recall(
    agent: AgentRegistration,
    request: RecallRequest,
    signal: AbortSignal
  ): Promise<RecallResponse>;
}
