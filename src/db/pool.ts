// =============================================================================
// WARDEN — Database Connection Pool
// =============================================================================

import { Pool } from 'pg';
import { config } from '../config';

let shared: Pool | null = null;

/** Process-wide pool, created on first use */
export function getPool(): Pool {
  if (!shared) {
    shared = new Pool({
      connectionString: config.db.connectionString,
      max: 20,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 5000,
    });

    shared.on('error', (err) => {
      console.error('[DB] Unexpected pool error:', err.message);
    });
  }
  return shared;
}

export async function closePool(): Promise<void> {
  if (shared) {
    const pool = shared;
    shared = null;
    await pool.end();
  }
}
