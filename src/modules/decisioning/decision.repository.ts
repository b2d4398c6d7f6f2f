/**
 * Agrarian BNPL - Decision Repository
 *
 * Audit trail for pipeline decisions. PostgreSQL when a pool is available,
 * in-memory otherwise (mock mode).
 */

import { Pool, PoolClient } from 'pg';
import { DecisionRecord } from '../../shared/types/applicant.types';

export interface DecisionRepository {
  save(record: DecisionRecord): Promise<void>;
  /** All or nothing */
  saveMany(records: DecisionRecord[]): Promise<void>;
  findById(decisionId: string): Promise<DecisionRecord | null>;
}

type DecisionRow = {
  decision_id: string;
  applicant_id: string;
  assessment: DecisionRecord['assessment'];
  recommendation: DecisionRecord['recommendation'];
  terms: DecisionRecord['terms'];
  assessed_at: Date;
};

const INSERT_DECISION = `
  INSERT INTO bnpl_decisions (
    decision_id, applicant_id, risk_tier, decision, late_probability,
    product, credit_limit, tenor_months,
    assessment, recommendation, terms, assessed_at
  ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12)
`;

// ============================================================================
// POSTGRES
// ============================================================================

export class PgDecisionRepository implements DecisionRepository {
  constructor(private pool: Pool) {}

  async save(record: DecisionRecord): Promise<void> {
    await this.pool.query(INSERT_DECISION, this.toValues(record));
  }

  async saveMany(records: DecisionRecord[]): Promise<void> {
    if (records.length === 0) return;

    const client = await this.beginTransaction();
    try {
      for (const record of records) {
        await client.query(INSERT_DECISION, this.toValues(record));
      }
    } catch (error) {
      await this.rollbackTransaction(client);
      throw error;
    }
    await this.commitTransaction(client);
  }

  async findById(decisionId: string): Promise<DecisionRecord | null> {
    const query = `
      SELECT decision_id, applicant_id, assessment, recommendation, terms, assessed_at
      FROM bnpl_decisions WHERE decision_id = $1
    `;
    const result = await this.pool.query<DecisionRow>(query, [decisionId]);

    if (result.rows.length === 0) return null;
    return this.mapRow(result.rows[0]);
  }

  // ==========================================================================
  // TRANSACTIONS
  // ==========================================================================

  private async beginTransaction(): Promise<PoolClient> {
    const client = await this.pool.connect();
    await client.query('BEGIN');
    return client;
  }

  private async commitTransaction(client: PoolClient): Promise<void> {
    await client.query('COMMIT');
    client.release();
  }

  private async rollbackTransaction(client: PoolClient): Promise<void> {
    await client.query('ROLLBACK');
    client.release();
  }

  // ==========================================================================
  // ROW MAPPERS
  // ==========================================================================

  private toValues(record: DecisionRecord): unknown[] {
    return [
      record.decisionId,
      record.applicantId,
      record.assessment.riskTier,
      record.assessment.decision,
      record.assessment.lateProbability,
      record.recommendation.product,
      record.terms.creditLimit,
      record.terms.tenorMonths,
      JSON.stringify(record.assessment),
      JSON.stringify(record.recommendation),
      JSON.stringify(record.terms),
      new Date(record.assessedAt),
    ];
  }

  private mapRow(row: DecisionRow): DecisionRecord {
    return {
      decisionId: row.decision_id,
      applicantId: row.applicant_id,
      assessment: row.assessment,
      recommendation: row.recommendation,
      terms: row.terms,
      assessedAt: row.assessed_at.toISOString(),
    };
  }
}

// ============================================================================
// IN-MEMORY (mock mode / tests)
// ============================================================================

export class InMemoryDecisionRepository implements DecisionRepository {
  private records = new Map<string, DecisionRecord>();

  async save(record: DecisionRecord): Promise<void> {
    this.records.set(record.decisionId, record);
  }

  async saveMany(records: DecisionRecord[]): Promise<void> {
    for (const record of records) {
      this.records.set(record.decisionId, record);
    }
  }

  async findById(decisionId: string): Promise<DecisionRecord | null> {
    return this.records.get(decisionId) ?? null;
  }

  get size(): number {
    return this.records.size;
  }
}
