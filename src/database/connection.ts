/**
 * Agrarian BNPL - Database Connection
 * PostgreSQL connection pool management
 *
 * MOCK MODE: If no database URL is configured, decisions are kept in memory
 */

import { Pool } from 'pg';

let pool: Pool | null = null;

export function getPool(databaseUrl: string | undefined): Pool | null {
  if (!databaseUrl) {
    return null;
  }

  if (!pool) {
    pool = new Pool({
      connectionString: databaseUrl,
      max: 20,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 2000,
    });

    pool.on('error', (err) => {
      console.error('[Database] Unexpected error on idle client:', err);
    });
  }

  return pool;
}

export async function closePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
    console.log('[Database] Connection pool closed');
  }
}

export async function testConnection(databaseUrl: string | undefined): Promise<boolean> {
  const p = getPool(databaseUrl);
  if (!p) {
    console.warn('[Database] DATABASE_URL not set - running in MOCK MODE');
    return true; // Mock mode is "successful"
  }

  try {
    const result = await p.query<{ now: Date }>('SELECT NOW() AS now');
    console.log('[Database] Connection test successful:', result.rows[0].now);
    return true;
  } catch (error) {
    console.error('[Database] Connection test failed:', error);
    return false;
  }
}
