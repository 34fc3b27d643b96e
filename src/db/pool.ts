// =============================================================================
// GATEKEEP — Database Connection Pool
// =============================================================================

import { Pool } from 'pg';
import { createLogger } from '../services/logger';

const logger = createLogger('DB');

export type QueryRow = Record<string, unknown>;

/** The one query shape authenticators need. Tests substitute a fake. */
export type QueryFn = (text: string, params: unknown[]) => Promise<{ rows: QueryRow[] }>;

export function createPool(connectionString: string): Pool {
  const pool = new Pool({
    connectionString,
    max: 10,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 5000,
  });

  pool.on('error', (err) => {
    logger.error('Unexpected pool error:', err.message);
  });

  return pool;
}

export function poolQuery(pool: Pool): QueryFn {
  return (text, params) => pool.query(text, params);
}
