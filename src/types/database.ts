/**
 * Database row types: mirror the Supabase registry table.
 * Column names use snake_case to match PostgreSQL conventions.
 */

export interface MeshAgentRow {
  agent_id: string;
  base_url: string;
  status: string;
  domain_id: string;
  domain_name: string;
  domain_description: string;
  domain_keywords: string[] | null;
  registered_at: string;
  last_heartbeat_at: string | null;
}
