/**
 * @file modules/synthetic/generator.ts
 * @description Agrarian BNPL - Synthetic Applicant Generator
 *
 * 100% synthetic farmer profiles (ids prefixed SYNTHETIC_) with
 * ground-truth product labels used to validate the product matcher.
 */

import { stringify } from 'csv-stringify/sync';
import {
  ApplicantProfile,
  CROP_TYPES,
  CropType,
  FARM_TYPES,
  FarmType,
  ProductCode,
  REGIONS,
} from '../../shared/types/applicant.types';
import { SeededRandom } from './random';

// ============================================
// TYPES
// ============================================

export interface SyntheticApplicant extends ApplicantProfile {
  readonly liquidityRatio: number;
  readonly trueProduct: ProductCode;
}

export const DEFAULT_SEED = 42;

// ============================================
// DISTRIBUTIONS
// ============================================

const REGION_WEIGHTS = [0.25, 0.20, 0.25, 0.15, 0.15];
const FARM_TYPE_WEIGHTS = [0.60, 0.25, 0.15];

const FARM_SIZE_MULTIPLIER: Record<FarmType, number> = {
  smallholder: 0.3,
  commercial: 3.0,
  cooperative: 1.5,
};

function clip(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

function round(value: number, decimals: number): number {
  const factor = Math.pow(10, decimals);
  return Math.round(value * factor) / factor;
}

// ============================================
// GROUND TRUTH
// ============================================

/**
 * Labelling rules kept separate from the matcher so that agreement between
 * the two is a real check.
 */
export function labelPreferredProduct(
  cropType: CropType,
  farmType: FarmType,
  avgOrderValue: number,
  deviceTrustScore: number,
): ProductCode {
  if (farmType === 'commercial' && avgOrderValue > 80000) {
    return 'Equipment_Lease';
  } else if (avgOrderValue < 15000 && deviceTrustScore > 70) {
    return 'Cash_Advance';
  } else if ((cropType === 'maize' || cropType === 'rice') && avgOrderValue < 30000) {
    return 'Seeds_BNPL';
  } else if ((cropType === 'vegetables' || cropType === 'horticulture') && avgOrderValue < 50000) {
    return 'Fertilizer_BNPL';
  } else if ((cropType === 'mixed' || farmType === 'cooperative') && deviceTrustScore > 60) {
    return 'Input_Bundle';
  }
  return 'Premium_BNPL';
}

// ============================================
// GENERATOR
// ============================================

export function generateApplicants(count: number, seed: number = DEFAULT_SEED): SyntheticApplicant[] {
  if (!Number.isInteger(count) || count < 0) {
    throw new Error(`Sample count must be a non-negative integer, got ${count}`);
  }

  const rng = new SeededRandom(seed);
  const applicants: SyntheticApplicant[] = [];

  for (let i = 1; i <= count; i++) {
    const region = rng.choice(REGIONS, REGION_WEIGHTS);
    const farmType = rng.choice(FARM_TYPES, FARM_TYPE_WEIGHTS);
    const cropType = rng.choice(CROP_TYPES);

    // Log-normal size scaled by farm type
    const farmSizeHa = round(clip(rng.lognormal(2.0, 1.5) * FARM_SIZE_MULTIPLIER[farmType], 0.5, 500), 2);

    const yearsExperience = clip(Math.floor(rng.gamma(3, 4)), 0, 40);

    // Income tracks size and experience
    const baseIncome = 5000 + farmSizeHa * 800 + yearsExperience * 500;
    const monthlyIncome = round(clip(baseIncome * rng.lognormal(0, 0.4), 5000, 500000), 2);

    // 90-day inflows between 0 and 3x monthly income
    const recentCashInflows = round(clip(monthlyIncome * rng.beta(2, 3) * 3, 0, 1000000), 2);

    const baseOrder = 1000 + farmSizeHa * 200;
    const avgOrderValue = round(clip(baseOrder * rng.lognormal(0, 0.5), 1000, 200000), 2);

    // Right-skewed towards high trust
    const deviceTrustScore = round(clip(rng.beta(6, 2) * 100, 0, 100), 1);
    const identityConsistency = round(clip(rng.beta(7, 2) * 100, 0, 100), 1);

    // Heavily skewed to zero
    const priorDefaults = clip(rng.poisson(rng.beta(1, 9) * 2), 0, 5);

    applicants.push({
      applicantId: `SYNTHETIC_${String(i).padStart(4, '0')}`,
      region,
      farmType,
      cropType,
      farmSizeHa,
      yearsExperience,
      monthlyIncome,
      recentCashInflows,
      avgOrderValue,
      deviceTrustScore,
      identityConsistency,
      priorDefaults,
      liquidityRatio: round(recentCashInflows / monthlyIncome, 4),
      trueProduct: labelPreferredProduct(cropType, farmType, avgOrderValue, deviceTrustScore),
    });
  }

  return applicants;
}

// ============================================
// CSV EXPORT
// ============================================

export const CSV_COLUMNS: { key: keyof SyntheticApplicant; header: string }[] = [
  { key: 'applicantId', header: 'user_id' },
  { key: 'region', header: 'region' },
  { key: 'farmType', header: 'farm_type' },
  { key: 'cropType', header: 'crop_type' },
  { key: 'farmSizeHa', header: 'farm_size_ha' },
  { key: 'yearsExperience', header: 'years_experience' },
  { key: 'monthlyIncome', header: 'monthly_income_est' },
  { key: 'recentCashInflows', header: 'recent_cash_inflows' },
  { key: 'avgOrderValue', header: 'avg_order_value' },
  { key: 'deviceTrustScore', header: 'device_trust_score' },
  { key: 'identityConsistency', header: 'identity_consistency' },
  { key: 'priorDefaults', header: 'prior_defaults' },
  { key: 'liquidityRatio', header: 'liquidity_ratio' },
  { key: 'trueProduct', header: 'true_preferred_product' },
];

export function toCsv(applicants: SyntheticApplicant[]): string {
  return stringify(applicants, { header: true, columns: CSV_COLUMNS });
}
