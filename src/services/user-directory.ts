// =============================================================================
// STOCKROOM — User Directory
// =============================================================================

import { Pool } from 'pg';

export interface UserDirectory {
  /** ID of the active (non-archived) user with this email, or null. */
  findActiveUserIdByEmail(email: string): Promise<string | null>;
}

export class PgUserDirectory implements UserDirectory {
  constructor(private readonly db: Pool) {}

  async findActiveUserIdByEmail(email: string): Promise<string | null> {
    const result = await this.db.query<{ id: string }>(
      `SELECT id FROM users WHERE email = $1 AND archived_at IS NULL`,
      [email]
    );
    return result.rows.length > 0 ? result.rows[0].id : null;
  }
}
