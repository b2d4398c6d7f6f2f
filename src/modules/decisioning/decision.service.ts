/**
 * @file modules/decisioning/decision.service.ts
 * @description Agrarian BNPL - Decision Service
 *
 * Runs the pipeline for single applicants and batches, stamps each result
 * with a decision id and records it for audit.
 */

import { v4 as uuidv4 } from 'uuid';
import { ApplicantProfile, DecisionRecord } from '../../shared/types/applicant.types';
import { DecisionRepository } from './decision.repository';
import { runPipeline } from './pipeline';

// ============================================
// TYPES
// ============================================

export interface BatchSummary {
  totalCount: number;
  approvedCount: number;
  reducedLimitCount: number;
  manualReviewCount: number;
  declinedCount: number;
}

export interface BatchResult {
  records: DecisionRecord[];
  summary: BatchSummary;
}

// ============================================
// SERVICE
// ============================================

export class DecisionService {
  constructor(private repository: DecisionRepository) {}

  async assess(applicant: ApplicantProfile): Promise<DecisionRecord> {
    const record = this.decide(applicant);
    await this.repository.save(record);
    this.logDecision(record);
    return record;
  }

  /**
   * Every applicant is decided before anything is stored; the batch is
   * then persisted in one all-or-nothing write.
   */
  async assessBatch(applicants: ApplicantProfile[]): Promise<BatchResult> {
    const records = applicants.map(applicant => this.decide(applicant));
    await this.repository.saveMany(records);
    records.forEach(record => this.logDecision(record));

    const summary = summarizeBatch(records);
    console.log(
      `[Decision] Batch of ${summary.totalCount}: ${summary.approvedCount} approved, ` +
      `${summary.reducedLimitCount} reduced, ${summary.manualReviewCount} manual, ${summary.declinedCount} declined`
    );

    return { records, summary };
  }

  async getDecision(decisionId: string): Promise<DecisionRecord | null> {
    return this.repository.findById(decisionId);
  }

  private decide(applicant: ApplicantProfile): DecisionRecord {
    const { assessment, recommendation, terms } = runPipeline(applicant);
    return {
      decisionId: uuidv4(),
      applicantId: applicant.applicantId,
      assessment,
      recommendation,
      terms,
      assessedAt: new Date().toISOString(),
    };
  }

  private logDecision(record: DecisionRecord): void {
    const { assessment, recommendation, terms } = record;
    console.log(
      `[Decision] ${assessment.decision} | applicant=${record.applicantId} | ` +
      `pd=${assessment.lateProbability.toFixed(3)} | product=${recommendation.product} | ` +
      `limit=${terms.creditLimit} | tenor=${terms.tenorMonths} | decision_id=${record.decisionId}`
    );
  }
}

export function summarizeBatch(records: DecisionRecord[]): BatchSummary {
  const count = (decision: DecisionRecord['assessment']['decision']) =>
    records.filter(r => r.assessment.decision === decision).length;

  return {
    totalCount: records.length,
    approvedCount: count('auto_approve'),
    reducedLimitCount: count('reduced_limit'),
    manualReviewCount: count('manual_review'),
    declinedCount: count('auto_decline'),
  };
}
