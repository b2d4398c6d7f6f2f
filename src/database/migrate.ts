/**
 * Agrarian BNPL - Database Migration Runner
 * Executes schema.sql against PostgreSQL
 *
 * RUN: npm run build && npm run migrate (from the repository root)
 */

import { Pool } from 'pg';
import * as fs from 'fs';
import * as path from 'path';
import { loadConfig, loadEnvFile } from '../config/env';

const SCHEMA_PATH = path.resolve(process.cwd(), 'src/database/schema.sql');

/**
 * Apply the schema; true only when every statement succeeded
 */
export async function runMigration(pool: Pool, schema: string): Promise<boolean> {
  try {
    console.log('[Migrate] Executing schema...');
    await pool.query(schema);
    console.log('[Migrate] Schema applied successfully');

    const result = await pool.query<{ table_name: string }>(`
      SELECT table_name
      FROM information_schema.tables
      WHERE table_schema = 'public'
      ORDER BY table_name
    `);

    console.log('[Migrate] Tables present:');
    for (const row of result.rows) {
      console.log(`  - ${row.table_name}`);
    }
    console.log('[Migrate] Migration complete');
    return true;
  } catch (error) {
    console.error('[Migrate] Migration failed:', error);
    return false;
  }
}

async function migrate(): Promise<void> {
  loadEnvFile();
  const config = loadConfig();

  if (!config.DATABASE_URL) {
    console.error('[Migrate] DATABASE_URL is not set; nothing to migrate in mock mode');
    process.exit(1);
  }

  const pool = new Pool({ connectionString: config.DATABASE_URL });
  console.log('[Migrate] Connecting to database...');

  try {
    const ok = await runMigration(pool, fs.readFileSync(SCHEMA_PATH, 'utf-8'));
    if (!ok) {
      process.exitCode = 1;
    }
  } finally {
    await pool.end();
  }
}

if (require.main === module) {
  migrate().catch((error) => {
    console.error('[Migrate] Fatal error:', error);
    process.exit(1);
  });
}
