/**
 * @file modules/scoring/engine.test.ts
 * @description Scoring Engine Tests
 *
 * - Reference applicant breakdown
 * - Component buckets and clamps
 * - Tier boundaries
 * - Score/PD bounds over a synthetic portfolio
 */

import { describe, it, expect } from '@jest/globals';
import { getScoringEngine } from './engine';
import { FACTOR_ORDER, FACTOR_WEIGHTS } from './weights';
import { generateApplicants } from '../synthetic/generator';
import { createMockApplicant } from '../../../test/fixtures/applicants';
import { RiskTier } from '../../shared/types/applicant.types';

const engine = getScoringEngine();

describe('ScoringEngine', () => {
  describe('reference applicant', () => {
    const assessment = engine.score(createMockApplicant());

    it('computes every component', () => {
      const components = engine.computeComponents(createMockApplicant());
      expect(components.region_risk).toBe(0.15);
      expect(components.farm_type_risk).toBe(0.35);
      expect(components.experience_risk).toBe(0.25);
      expect(components.prior_defaults).toBe(0);
      expect(components.liquidity_risk).toBeCloseTo(1 / 9, 10);
      expect(components.farm_size_risk).toBe(0.10);
      expect(components.device_trust).toBeCloseTo(0.22, 10);
      expect(components.identity_consistency).toBeCloseTo(0.15, 10);
    });

    it('maps to a low-risk auto approval', () => {
      expect(assessment.linearScore).toBeCloseTo(0.170111, 5);
      expect(assessment.lateProbability).toBeCloseTo(0.063072, 5);
      expect(assessment.riskTier).toBe('Low');
      expect(assessment.decision).toBe('auto_approve');
    });

    it('explains the top three contributors', () => {
      expect(assessment.topFactors.map(f => f.factor)).toEqual([
        'farm_type_risk',
        'experience_risk',
        'device_trust',
      ]);
      expect(assessment.topFactors[0].contribution).toBeCloseTo(0.063, 10);
      expect(assessment.topFactors[0].weight).toBe(0.18);
      expect(assessment.topFactors[1].contribution).toBeCloseTo(0.0375, 10);
      expect(assessment.topFactors[2].contribution).toBeCloseTo(0.022, 10);
      expect(assessment.topFactors[2].rawRisk).toBeCloseTo(0.22, 10);
    });

    it('returns all eight components sorted by contribution', () => {
      expect(assessment.components).toHaveLength(8);
      for (let i = 1; i < assessment.components.length; i++) {
        expect(assessment.components[i - 1].contribution).toBeGreaterThanOrEqual(assessment.components[i].contribution);
      }
      expect(assessment.components[assessment.components.length - 1].factor).toBe('prior_defaults');
    });
  });

  describe('weights', () => {
    it('sum to one', () => {
      const total = FACTOR_ORDER.reduce((sum, f) => sum + FACTOR_WEIGHTS[f], 0);
      expect(total).toBeCloseTo(1, 10);
    });
  });

  describe('components', () => {
    it.each([
      [0, 0],
      [1, 0.15],
      [4, 0.60],
      [5, 0.75],
      [6, 0.75],
    ])('prior defaults %i → penalty %f', (priorDefaults, expected) => {
      const components = engine.computeComponents(createMockApplicant({ priorDefaults }));
      expect(components.prior_defaults).toBeCloseTo(expected, 10);
    });

    it('clamps the prior default penalty inclusively at five defaults', () => {
      const components = engine.computeComponents(createMockApplicant({ priorDefaults: 5 }));
      expect(components.prior_defaults).toBe(0.75);
    });

    it.each([
      [0, 0.40],
      [2, 0.40],
      [3, 0.25],
      [10, 0.25],
      [11, 0.15],
      [20, 0.15],
      [21, 0.10],
      [40, 0.10],
    ])('experience %i years → %f', (yearsExperience, expected) => {
      expect(engine.computeComponents(createMockApplicant({ yearsExperience })).experience_risk).toBe(expected);
    });

    it.each([
      [0.5, 0.30],
      [0.99, 0.30],
      [1, 0.10],
      [9.99, 0.10],
      [10, 0.05],
      [99.9, 0.05],
      [100, 0.15],
      [500, 0.15],
    ])('farm size %f ha → %f', (farmSizeHa, expected) => {
      expect(engine.computeComponents(createMockApplicant({ farmSizeHa })).farm_size_risk).toBe(expected);
    });

    it('treats zero income as maximum liquidity risk without faulting', () => {
      const applicant = createMockApplicant({ monthlyIncome: 0, recentCashInflows: 0 });
      expect(engine.computeComponents(applicant).liquidity_risk).toBe(1);
      const assessment = engine.score(applicant);
      expect(Number.isFinite(assessment.linearScore)).toBe(true);
      expect(Number.isFinite(assessment.lateProbability)).toBe(true);
    });

    it('treats inflows of three months income or more as fully liquid', () => {
      const applicant = createMockApplicant({ monthlyIncome: 40000, recentCashInflows: 150000 });
      expect(engine.computeComponents(applicant).liquidity_risk).toBe(0);
    });
  });

  describe('probability mapping', () => {
    it('crosses one half at the midpoint', () => {
      expect(engine.lateProbability(0.35)).toBe(0.5);
    });

    it('is increasing in the linear score', () => {
      expect(engine.lateProbability(0)).toBeCloseTo(0.005220, 5);
      expect(engine.lateProbability(0.2)).toBeLessThan(engine.lateProbability(0.3));
      expect(engine.lateProbability(1)).toBeCloseTo(0.999942, 5);
    });
  });

  describe('tiers and decisions', () => {
    const cases: [number, RiskTier, string][] = [
      [0, 'Low', 'auto_approve'],
      [0.1499, 'Low', 'auto_approve'],
      [0.15, 'Medium', 'reduced_limit'],
      [0.3499, 'Medium', 'reduced_limit'],
      [0.35, 'High', 'manual_review'],
      [0.4999, 'High', 'manual_review'],
      [0.5, 'Decline', 'auto_decline'],
      [1, 'Decline', 'auto_decline'],
    ];

    it.each(cases)('PD %f → %s / %s', (pd, tier, decision) => {
      expect(engine.riskTier(pd)).toBe(tier);
      expect(engine.decision(pd)).toBe(decision);
    });
  });

  describe('extreme profiles', () => {
    it('declines the riskiest profile', () => {
      const assessment = engine.score(createMockApplicant({
        region: 'West',
        farmType: 'smallholder',
        yearsExperience: 0,
        priorDefaults: 5,
        monthlyIncome: 5000,
        recentCashInflows: 0,
        farmSizeHa: 0.5,
        deviceTrustScore: 0,
        identityConsistency: 0,
      }));
      expect(assessment.linearScore).toBeCloseTo(0.603, 10);
      expect(assessment.lateProbability).toBeCloseTo(0.978011, 5);
      expect(assessment.riskTier).toBe('Decline');
      expect(assessment.topFactors[0].factor).toBe('prior_defaults');
    });

    it('approves the safest profile', () => {
      const assessment = engine.score(createMockApplicant({
        region: 'North',
        farmType: 'commercial',
        yearsExperience: 30,
        priorDefaults: 0,
        monthlyIncome: 100000,
        recentCashInflows: 400000,
        farmSizeHa: 50,
        deviceTrustScore: 100,
        identityConsistency: 100,
      }));
      expect(assessment.linearScore).toBeCloseTo(0.055, 10);
      expect(assessment.lateProbability).toBeCloseTo(0.011833, 5);
      expect(assessment.decision).toBe('auto_approve');
    });
  });

  describe('synthetic portfolio', () => {
    it('keeps linear score and PD within [0, 1]', () => {
      for (const applicant of generateApplicants(500, 7)) {
        const { linearScore, lateProbability } = engine.score(applicant);
        expect(linearScore).toBeGreaterThanOrEqual(0);
        expect(linearScore).toBeLessThanOrEqual(1);
        expect(lateProbability).toBeGreaterThanOrEqual(0);
        expect(lateProbability).toBeLessThanOrEqual(1);
      }
    });
  });
});
