/**
 * @file modules/decisioning/decision.repository.test.ts
 * @description PostgreSQL decision store against an in-process database
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import * as fs from 'fs';
import * as path from 'path';
import { Pool } from 'pg';
import { newDb } from 'pg-mem';
import { PgDecisionRepository } from './decision.repository';
import { runPipeline } from './pipeline';
import { DecisionRecord } from '../../shared/types/applicant.types';
import { createMockApplicant } from '../../../test/fixtures/applicants';

const SCHEMA_SQL = fs.readFileSync(path.resolve(__dirname, '../../database/schema.sql'), 'utf-8');

function createMockRecord(decisionId: string, applicantId = 'TEST_0001'): DecisionRecord {
  const { assessment, recommendation, terms } = runPipeline(createMockApplicant({ applicantId }));
  return {
    decisionId,
    applicantId,
    assessment,
    recommendation,
    terms,
    assessedAt: '2026-03-01T09:30:00.000Z',
  };
}

type StoredRow = {
  applicant_id: string;
  risk_tier: string;
  decision: string;
  product: string;
  credit_limit: number;
  tenor_months: number;
};

describe('PgDecisionRepository', () => {
  let pool: Pool;
  let repository: PgDecisionRepository;

  beforeEach(() => {
    const db = newDb();
    db.public.none(SCHEMA_SQL);
    const pg = db.adapters.createPg();
    pool = new pg.Pool();
    repository = new PgDecisionRepository(pool);
  });

  it('writes each value to its column', async () => {
    await repository.save(createMockRecord('0b7e6f4a-1c2d-4e5f-8a9b-0c1d2e3f4a5b'));

    const result = await pool.query<StoredRow>(
      'SELECT applicant_id, risk_tier, decision, product, credit_limit, tenor_months FROM bnpl_decisions'
    );
    expect(result.rows).toEqual([{
      applicant_id: 'TEST_0001',
      risk_tier: 'Low',
      decision: 'auto_approve',
      product: 'Seeds_BNPL',
      credit_limit: 15000,
      tenor_months: 4,
    }]);
  });

  it('reads back the full record', async () => {
    const record = createMockRecord('0b7e6f4a-1c2d-4e5f-8a9b-0c1d2e3f4a5b');
    await repository.save(record);

    const found = await repository.findById(record.decisionId);

    expect(found).toEqual(record);
    expect(found?.assessedAt).toBe('2026-03-01T09:30:00.000Z');
  });

  it('returns null for unknown decisions', async () => {
    expect(await repository.findById('9f8e7d6c-5b4a-4321-8fed-cba987654321')).toBeNull();
  });

  it('stores a batch in one transaction', async () => {
    await repository.saveMany([
      createMockRecord('11111111-1111-4111-8111-111111111111', 'TEST_A'),
      createMockRecord('22222222-2222-4222-8222-222222222222', 'TEST_B'),
    ]);

    const a = await repository.findById('11111111-1111-4111-8111-111111111111');
    const b = await repository.findById('22222222-2222-4222-8222-222222222222');
    expect(a?.applicantId).toBe('TEST_A');
    expect(b?.applicantId).toBe('TEST_B');
  });

  it('does nothing for an empty batch', async () => {
    await repository.saveMany([]);
    const result = await pool.query<{ n: number }>('SELECT COUNT(*)::int AS n FROM bnpl_decisions');
    expect(result.rows[0].n).toBe(0);
  });
});
