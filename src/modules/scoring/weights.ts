/**
 * @file modules/scoring/weights.ts
 * @description Agrarian BNPL - Risk Weight Tables
 *
 * Static lookup tables for the eight scoring components.
 * Values are frozen at load; the scoring formula is audited against them.
 */

import { FarmType, Region, RiskFactor, RiskTier, Decision } from '../../shared/types/applicant.types';

// ============================================
// COMPONENT WEIGHTS (sum to 1.00)
// ============================================

export const FACTOR_WEIGHTS: Readonly<Record<RiskFactor, number>> = Object.freeze({
  region_risk: 0.12,
  farm_type_risk: 0.18,
  experience_risk: 0.15,
  prior_defaults: 0.20,
  liquidity_risk: 0.10,
  farm_size_risk: 0.08,
  device_trust: 0.10,
  identity_consistency: 0.07,
});

// Evaluation and tie-break order for explanations
export const FACTOR_ORDER: readonly RiskFactor[] = [
  'region_risk',
  'farm_type_risk',
  'experience_risk',
  'prior_defaults',
  'liquidity_risk',
  'farm_size_risk',
  'device_trust',
  'identity_consistency',
];

// ============================================
// CATEGORICAL RISK
// ============================================

// West/South carry higher historical late-payment rates
export const REGION_RISK: Readonly<Record<Region, number>> = Object.freeze({
  North: 0.15,
  South: 0.25,
  East: 0.15,
  West: 0.30,
  Central: 0.20,
});

export const FARM_TYPE_RISK: Readonly<Record<FarmType, number>> = Object.freeze({
  smallholder: 0.35,
  commercial: 0.10,
  cooperative: 0.20,
});

// ============================================
// BUCKETED RISK (upper bound inclusive for experience, exclusive for size)
// ============================================

export const EXPERIENCE_BUCKETS: readonly { maxYears: number; risk: number }[] = [
  { maxYears: 2, risk: 0.40 },
  { maxYears: 10, risk: 0.25 },
  { maxYears: 20, risk: 0.15 },
  { maxYears: Infinity, risk: 0.10 },
];

// U-shaped: subsistence plots and very large holdings both carry more risk
export const FARM_SIZE_BUCKETS: readonly { belowHa: number; risk: number }[] = [
  { belowHa: 1, risk: 0.30 },
  { belowHa: 10, risk: 0.10 },
  { belowHa: 100, risk: 0.05 },
  { belowHa: Infinity, risk: 0.15 },
];

export const PRIOR_DEFAULT_STEP = 0.15;
export const PRIOR_DEFAULT_CAP = 0.75;

// Inflows equal to three months of income count as fully liquid
export const LIQUIDITY_TARGET_MONTHS = 3;

// ============================================
// PD MAPPING
// ============================================

export const SIGMOID_STEEPNESS = 15.0;
export const SIGMOID_MIDPOINT = 0.35;

// Lower bound inclusive: PD of exactly 0.15 is Medium
export const TIER_THRESHOLDS: readonly { below: number; tier: RiskTier }[] = [
  { below: 0.15, tier: 'Low' },
  { below: 0.35, tier: 'Medium' },
  { below: 0.50, tier: 'High' },
  { below: Infinity, tier: 'Decline' },
];

export const TIER_DECISIONS: Readonly<Record<RiskTier, Decision>> = Object.freeze({
  Low: 'auto_approve',
  Medium: 'reduced_limit',
  High: 'manual_review',
  Decline: 'auto_decline',
});

export const DECLINE_THRESHOLD = 0.50;
