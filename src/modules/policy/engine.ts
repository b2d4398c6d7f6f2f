/**
 * @file modules/policy/engine.ts
 * @description Agrarian BNPL - Policy Engine
 *
 * Risk-adjusted credit limits and crop-cycle-aligned tenors.
 *
 *   limit = base × risk × income × tenure
 *   tenor = base − risk reduction, capped by crop cycle, floored at 1
 */

import {
  ApplicantProfile,
  BnplTerms,
  CropType,
  LimitBreakdown,
  ProductCode,
  TenorBreakdown,
} from '../../shared/types/applicant.types';
import { getProductInfo } from '../products/catalog';
import { DECLINE_THRESHOLD } from '../scoring/weights';

export type PolicyApplicant = Pick<
  ApplicantProfile,
  'farmType' | 'yearsExperience' | 'deviceTrustScore' | 'monthlyIncome' | 'cropType'
>;

// ============================================
// POLICY CONSTANTS
// ============================================

const RISK_MULTIPLIER_SLOPE = 2.5;
const RISK_MULTIPLIER_FLOOR = 0.2;

const INCOME_REFERENCE = 50000;
const INCOME_MULTIPLIER_CAP = 2.5;

const TENURE_BOOSTS: readonly {
  label: string;
  multiplier: number;
  applies: (a: PolicyApplicant) => boolean;
}[] = [
  { label: 'commercial farm (+30%)', multiplier: 1.3, applies: a => a.farmType === 'commercial' },
  { label: 'experienced farmer (+20%)', multiplier: 1.2, applies: a => a.yearsExperience > 15 },
  { label: 'high device trust (+10%)', multiplier: 1.1, applies: a => a.deviceTrustScore > 85 },
];

export const LIMIT_ROUNDING = 1000;

const MEDIUM_RISK_FROM = 0.15;
const HIGH_RISK_FROM = 0.30;

// Harvest cycle caps
const CROP_CYCLE_CAPS: Partial<Record<CropType, { months: number; reason: string }>> = {
  maize: { months: 4, reason: 'grain harvest cycle' },
  rice: { months: 4, reason: 'grain harvest cycle' },
  horticulture: { months: 3, reason: 'short-season crops' },
};

const MIN_TENOR_MONTHS = 1;

// ============================================
// POLICY ENGINE
// ============================================

class PolicyEngine {
  computeTerms(product: ProductCode, lateProbability: number, applicant: PolicyApplicant): BnplTerms {
    const limit = this.computeCreditLimit(product, lateProbability, applicant);
    const tenor = this.computeTenor(product, lateProbability, applicant.cropType);

    return {
      creditLimit: limit.finalLimit,
      tenorMonths: tenor.finalTenor,
      explanation: {
        limit,
        tenor,
        rationale:
          `Limit based on ${(lateProbability * 100).toFixed(1)}% PD and ` +
          `${Math.round(applicant.monthlyIncome).toLocaleString('en-US')} monthly income. ` +
          `Tenor aligned with ${applicant.cropType} crop cycle.`,
      },
    };
  }

  computeCreditLimit(product: ProductCode, lateProbability: number, applicant: PolicyApplicant): LimitBreakdown {
    const baseLimit = getProductInfo(product).baseLimit;
    const riskMultiplier = Math.max(RISK_MULTIPLIER_FLOOR, 1 - lateProbability * RISK_MULTIPLIER_SLOPE);
    const incomeMultiplier = Math.min(INCOME_MULTIPLIER_CAP, Math.max(0, applicant.monthlyIncome) / INCOME_REFERENCE);

    const boosts = TENURE_BOOSTS.filter(b => b.applies(applicant));
    const tenureMultiplier = boosts.reduce((m, b) => m * b.multiplier, 1);
    const tenureFactors = boosts.length > 0 ? boosts.map(b => b.label) : ['no tenure boosts'];

    const rawLimit = baseLimit * riskMultiplier * incomeMultiplier * tenureMultiplier;
    const declined = lateProbability >= DECLINE_THRESHOLD;

    return {
      baseLimit,
      riskMultiplier,
      incomeMultiplier,
      tenureMultiplier,
      tenureFactors,
      rawLimit,
      declined,
      finalLimit: declined ? 0 : this.roundLimit(rawLimit),
    };
  }

  computeTenor(product: ProductCode, lateProbability: number, cropType: CropType): TenorBreakdown {
    const baseTenor = getProductInfo(product).baseTenorMonths;

    let riskReductionMonths = 0;
    let riskAdjustment = 'Low risk: full base tenor';
    if (lateProbability >= HIGH_RISK_FROM) {
      riskReductionMonths = 2;
      riskAdjustment = 'High risk: shortened by 2 months';
    } else if (lateProbability >= MEDIUM_RISK_FROM) {
      riskReductionMonths = 1;
      riskAdjustment = 'Medium risk: shortened by 1 month';
    }

    let tenor = baseTenor - riskReductionMonths;

    const cap = CROP_CYCLE_CAPS[cropType];
    if (cap) {
      tenor = Math.min(tenor, cap.months);
    }

    return {
      baseTenor,
      riskReductionMonths,
      riskAdjustment,
      cropCycleCap: cap ? cap.months : null,
      cropCycleImpact: cap ? `capped at ${cap.months} months for ${cap.reason}` : 'No crop cycle override',
      finalTenor: Math.max(MIN_TENOR_MONTHS, tenor),
    };
  }

  /**
   * Nearest 1,000; a positive limit never rounds away to nothing
   */
  private roundLimit(rawLimit: number): number {
    if (rawLimit <= 0) return 0;
    return Math.max(LIMIT_ROUNDING, Math.round(rawLimit / LIMIT_ROUNDING) * LIMIT_ROUNDING);
  }
}

// Singleton
let engine: PolicyEngine | null = null;

export function getPolicyEngine(): PolicyEngine {
  if (!engine) {
    engine = new PolicyEngine();
  }
  return engine;
}

export { PolicyEngine };
