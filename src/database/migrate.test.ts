import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import * as fs from 'fs';
import * as path from 'path';
import { Pool } from 'pg';
import { newDb } from 'pg-mem';
import { runMigration } from './migrate';

const SCHEMA_SQL = fs.readFileSync(path.resolve(__dirname, 'schema.sql'), 'utf-8');

describe('runMigration', () => {
  let pool: Pool;

  beforeEach(() => {
    pool = new (newDb().adapters.createPg().Pool)();
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('creates the decision table and reports completion', async () => {
    expect(await runMigration(pool, SCHEMA_SQL)).toBe(true);

    const result = await pool.query<{ n: number }>('SELECT COUNT(*)::int AS n FROM bnpl_decisions');
    expect(result.rows[0].n).toBe(0);
    expect(console.log).toHaveBeenCalledWith('[Migrate] Migration complete');
  });

  it('reports failure without claiming completion', async () => {
    expect(await runMigration(pool, 'CREATE TABLE broken (')).toBe(false);

    expect(console.error).toHaveBeenCalledTimes(1);
    expect(console.log).not.toHaveBeenCalledWith('[Migrate] Migration complete');
  });
});
