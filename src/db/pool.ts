// =============================================================================
// STOCKROOM — Database Connection Pool
// =============================================================================

import { Pool } from 'pg';
import { config } from '../config';
import { createLogger } from '../logging';

const log = createLogger('DB');

export function createPool(connectionString: string = config.db.connectionString): Pool {
  const pool = new Pool({
    connectionString,
    max: 20,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 5000,
  });

  pool.on('error', (err) => {
    log.error('Unexpected pool error:', err.message);
  });

  return pool;
}
