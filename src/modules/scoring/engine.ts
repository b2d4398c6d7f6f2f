/**
 * @file modules/scoring/engine.ts
 * @description Agrarian BNPL - Risk Scoring Engine
 *
 * Rule-based scoring for BNPL applicants:
 * - Eight weighted risk components
 * - Linear score → late payment probability (sigmoid)
 * - Risk tier and decision
 * - Top contributor explanation
 */

import {
  ApplicantProfile,
  Decision,
  FactorContribution,
  RiskAssessment,
  RiskFactor,
  RiskTier,
} from '../../shared/types/applicant.types';
import {
  EXPERIENCE_BUCKETS,
  FACTOR_ORDER,
  FACTOR_WEIGHTS,
  FARM_SIZE_BUCKETS,
  FARM_TYPE_RISK,
  LIQUIDITY_TARGET_MONTHS,
  PRIOR_DEFAULT_CAP,
  PRIOR_DEFAULT_STEP,
  REGION_RISK,
  SIGMOID_MIDPOINT,
  SIGMOID_STEEPNESS,
  TIER_DECISIONS,
  TIER_THRESHOLDS,
} from './weights';

export type RiskComponents = Record<RiskFactor, number>;

const TOP_FACTOR_COUNT = 3;

// ============================================
// SCORING ENGINE
// ============================================

class ScoringEngine {
  /**
   * Run the full scoring pass for one applicant
   */
  score(applicant: ApplicantProfile): RiskAssessment {
    const components = this.computeComponents(applicant);
    const linearScore = this.computeLinearScore(components);
    const lateProbability = this.lateProbability(linearScore);
    const riskTier = this.riskTier(lateProbability);
    const ranked = this.rankContributions(components);

    return {
      linearScore,
      lateProbability,
      riskTier,
      decision: this.decision(lateProbability),
      topFactors: ranked.slice(0, TOP_FACTOR_COUNT),
      components: ranked,
    };
  }

  /**
   * Raw risk per component, each in [0, 1]
   */
  computeComponents(applicant: ApplicantProfile): RiskComponents {
    return {
      region_risk: REGION_RISK[applicant.region],
      farm_type_risk: FARM_TYPE_RISK[applicant.farmType],
      experience_risk: this.experienceRisk(applicant.yearsExperience),
      prior_defaults: Math.min(applicant.priorDefaults * PRIOR_DEFAULT_STEP, PRIOR_DEFAULT_CAP),
      liquidity_risk: this.liquidityRisk(applicant.recentCashInflows, applicant.monthlyIncome),
      farm_size_risk: this.farmSizeRisk(applicant.farmSizeHa),
      device_trust: (100 - applicant.deviceTrustScore) / 100,
      identity_consistency: (100 - applicant.identityConsistency) / 100,
    };
  }

  /**
   * Weighted sum of components, clamped to [0, 1]
   */
  computeLinearScore(components: RiskComponents): number {
    const sum = FACTOR_ORDER.reduce(
      (acc, factor) => acc + FACTOR_WEIGHTS[factor] * components[factor],
      0,
    );
    return Math.max(0, Math.min(1, sum));
  }

  /**
   * Logistic map from linear score to late payment probability
   */
  lateProbability(
    linearScore: number,
    steepness: number = SIGMOID_STEEPNESS,
    midpoint: number = SIGMOID_MIDPOINT,
  ): number {
    return 1 / (1 + Math.exp(-steepness * (linearScore - midpoint)));
  }

  riskTier(lateProbability: number): RiskTier {
    for (const { below, tier } of TIER_THRESHOLDS) {
      if (lateProbability < below) return tier;
    }
    return 'Decline';
  }

  decision(lateProbability: number): Decision {
    return TIER_DECISIONS[this.riskTier(lateProbability)];
  }

  /**
   * All contributions, largest first. Ties keep table order.
   */
  rankContributions(components: RiskComponents): FactorContribution[] {
    return FACTOR_ORDER
      .map(factor => ({
        factor,
        rawRisk: components[factor],
        weight: FACTOR_WEIGHTS[factor],
        contribution: FACTOR_WEIGHTS[factor] * components[factor],
      }))
      .sort((a, b) => b.contribution - a.contribution);
  }

  private experienceRisk(years: number): number {
    const bucket = EXPERIENCE_BUCKETS.find(b => years <= b.maxYears);
    return bucket ? bucket.risk : EXPERIENCE_BUCKETS[EXPERIENCE_BUCKETS.length - 1].risk;
  }

  private farmSizeRisk(hectares: number): number {
    const bucket = FARM_SIZE_BUCKETS.find(b => hectares < b.belowHa);
    return bucket ? bucket.risk : FARM_SIZE_BUCKETS[FARM_SIZE_BUCKETS.length - 1].risk;
  }

  /**
   * No income means no evidence of liquidity: maximum risk
   */
  private liquidityRisk(inflows: number, monthlyIncome: number): number {
    if (monthlyIncome <= 0) return 1;
    const coverage = inflows / (monthlyIncome * LIQUIDITY_TARGET_MONTHS);
    return 1 - Math.min(Math.max(coverage, 0), 1);
  }
}

// Singleton
let engine: ScoringEngine | null = null;

export function getScoringEngine(): ScoringEngine {
  if (!engine) {
    engine = new ScoringEngine();
  }
  return engine;
}

export { ScoringEngine };
