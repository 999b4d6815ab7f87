/**
 * Supabase implementation of IDomainRepository.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { IDomainRepository } from './IDomainRepository.js';
import type { MeshAgentRow } from '../types/database.js';

export class SupabaseDomainRepository implements IDomainRepository {
  constructor(private readonly db: SupabaseClient) {}

  async listAgents(): Promise<MeshAgentRow[]> {
    const { data, error } = await this.db
      .from('mesh_agents')
      .select(
        'agent_id, base_url, status, domain_id, domain_name, domain_description, domain_keywords, registered_at, last_heartbeat_at'
      )
      .order('domain_id', { ascending: true });

    if (error) throw new Error(`Failed to list agents: ${error.message}`);
    return (data ?? []) as MeshAgentRow[];
  }
}
