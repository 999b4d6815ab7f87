/**
 * Domain registry data access interface.
 * Read-only: agents register and heartbeat through the registry service itself.
 */

import type { MeshAgentRow } from '../types/database.js';

export interface IDomainRepository {
  /** Every registered agent, whatever its status. */
  listAgents(): Promise<MeshAgentRow[]>;
}
