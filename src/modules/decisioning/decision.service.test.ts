/**
 * @file modules/decisioning/decision.service.test.ts
 * @description Decision Service Tests
 */

import { describe, it, expect, beforeEach, jest } from '@jest/globals';
import { DecisionService, summarizeBatch } from './decision.service';
import { InMemoryDecisionRepository } from './decision.repository';
import { DecisionRecord } from '../../shared/types/applicant.types';
import { createMockApplicant } from '../../../test/fixtures/applicants';

/**
 * Store that refuses any batch write past the first record
 */
class RejectingDecisionRepository extends InMemoryDecisionRepository {
  async saveMany(records: DecisionRecord[]): Promise<void> {
    if (records.length > 1) {
      throw new Error('write failed on record 2');
    }
    return super.saveMany(records);
  }
}

describe('DecisionService', () => {
  let repository: InMemoryDecisionRepository;
  let service: DecisionService;

  beforeEach(() => {
    repository = new InMemoryDecisionRepository();
    service = new DecisionService(repository);
  });

  it('records each assessment under a fresh decision id', async () => {
    const record = await service.assess(createMockApplicant());

    expect(record.decisionId).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    expect(record.applicantId).toBe('TEST_0001');
    expect(record.recommendation.product).toBe('Seeds_BNPL');
    expect(record.terms.creditLimit).toBe(15000);
    expect(repository.size).toBe(1);
    expect(await service.getDecision(record.decisionId)).toEqual(record);
  });

  it('returns null for unknown decisions', async () => {
    expect(await service.getDecision('missing')).toBeNull();
  });

  it('gives identical results for identical applicants', async () => {
    const first = await service.assess(createMockApplicant());
    const second = await service.assess(createMockApplicant());
    expect(second.decisionId).not.toBe(first.decisionId);
    expect(second.assessment).toEqual(first.assessment);
    expect(second.recommendation).toEqual(first.recommendation);
    expect(second.terms).toEqual(first.terms);
  });

  it('summarizes a batch by decision', async () => {
    const { records, summary } = await service.assessBatch([
      createMockApplicant({ applicantId: 'TEST_A' }),
      createMockApplicant({
        applicantId: 'TEST_B',
        region: 'West',
        yearsExperience: 0,
        priorDefaults: 5,
        monthlyIncome: 5000,
        recentCashInflows: 0,
        farmSizeHa: 0.5,
        deviceTrustScore: 0,
        identityConsistency: 0,
      }),
    ]);

    expect(records.map(r => r.applicantId)).toEqual(['TEST_A', 'TEST_B']);
    expect(summary).toEqual({
      totalCount: 2,
      approvedCount: 1,
      reducedLimitCount: 0,
      manualReviewCount: 0,
      declinedCount: 1,
    });
    expect(records[1].terms.creditLimit).toBe(0);
    expect(repository.size).toBe(2);
  });

  it('writes a batch through a single all-or-nothing save', async () => {
    const save = jest.spyOn(repository, 'save');
    const saveMany = jest.spyOn(repository, 'saveMany');

    await service.assessBatch([
      createMockApplicant({ applicantId: 'TEST_A' }),
      createMockApplicant({ applicantId: 'TEST_B' }),
    ]);

    expect(save).not.toHaveBeenCalled();
    expect(saveMany).toHaveBeenCalledTimes(1);
    expect(saveMany.mock.calls[0][0].map(r => r.applicantId)).toEqual(['TEST_A', 'TEST_B']);
  });

  it('stores nothing when the batch write fails', async () => {
    const rejecting = new RejectingDecisionRepository();
    const batchService = new DecisionService(rejecting);

    await expect(batchService.assessBatch([
      createMockApplicant({ applicantId: 'TEST_A' }),
      createMockApplicant({ applicantId: 'TEST_B' }),
      createMockApplicant({ applicantId: 'TEST_C' }),
    ])).rejects.toThrow('write failed on record 2');
    expect(rejecting.size).toBe(0);
  });

  it('summarizes an empty batch as zeros', () => {
    expect(summarizeBatch([])).toEqual({
      totalCount: 0,
      approvedCount: 0,
      reducedLimitCount: 0,
      manualReviewCount: 0,
      declinedCount: 0,
    });
  });
});
