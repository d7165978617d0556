// =============================================================================
// STOCKROOM — Role Lookup
//
// Reads a user's current (non-archived) role assignments. Consulted only when
// a token pair is issued, never on the access-token fast path.
// =============================================================================

import { Pool } from 'pg';
import { Role, parseRoles } from '../types/roles';

export interface RoleLookup {
  /**
   * Current roles for a user. The signal fires when the request that needs
   * the answer has been abandoned.
   */
  fetchRoles(userId: string, signal?: AbortSignal): Promise<Role[]>;
}

/**
 * Postgres-backed lookup. A user holds at most one active role in practice;
 * only the oldest active assignment drives authorization.
 */
export class PgRoleLookup implements RoleLookup {
  constructor(private readonly db: Pool) {}

  async fetchRoles(userId: string, signal?: AbortSignal): Promise<Role[]> {
    signal?.throwIfAborted();

    const result = await this.db.query<{ role: string }>(
      `SELECT role FROM user_roles
       WHERE user_id = $1 AND archived_at IS NULL
       ORDER BY created_at ASC`,
      [userId]
    );

    return parseRoles(result.rows.map((r) => r.role)).slice(0, 1);
  }
}
