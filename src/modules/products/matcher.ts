/**
 * @file modules/products/matcher.ts
 * @description Agrarian BNPL - Product Matcher
 *
 * Ordered first-match-wins product rules:
 * - Primary product = first rule whose criteria all hold
 * - Remaining products ranked by how close they came to matching
 * - Premium_BNPL when nothing targeted applies
 */

import {
  ApplicantProfile,
  ProductCode,
  ProductRanking,
  ProductRecommendation,
} from '../../shared/types/applicant.types';
import { getProductInfo } from './catalog';

// ============================================
// TYPES
// ============================================

type NumericField = 'avgOrderValue' | 'deviceTrustScore';

export type MatchCriterion =
  | { kind: 'category'; label: string; test: (applicant: ApplicantProfile) => boolean }
  | { kind: 'above'; label: string; field: NumericField; threshold: number }
  | { kind: 'below'; label: string; field: NumericField; threshold: number };

export interface ProductRule {
  product: ProductCode;
  criteria: MatchCriterion[];
}

// ============================================
// RULE TABLE (priority order, first match wins)
// ============================================

export const FALLBACK_PRODUCT: ProductCode = 'Premium_BNPL';
export const FALLBACK_COMPATIBILITY = 0.5;

export const PRODUCT_RULES: readonly ProductRule[] = [
  {
    product: 'Equipment_Lease',
    criteria: [
      { kind: 'category', label: 'commercial farm', test: a => a.farmType === 'commercial' },
      { kind: 'above', label: 'order value above 80,000', field: 'avgOrderValue', threshold: 80000 },
    ],
  },
  {
    product: 'Cash_Advance',
    criteria: [
      { kind: 'below', label: 'order value below 15,000', field: 'avgOrderValue', threshold: 15000 },
      { kind: 'above', label: 'device trust above 70', field: 'deviceTrustScore', threshold: 70 },
    ],
  },
  {
    product: 'Seeds_BNPL',
    criteria: [
      { kind: 'category', label: 'maize or rice crop', test: a => a.cropType === 'maize' || a.cropType === 'rice' },
      { kind: 'below', label: 'order value below 30,000', field: 'avgOrderValue', threshold: 30000 },
    ],
  },
  {
    product: 'Fertilizer_BNPL',
    criteria: [
      {
        kind: 'category',
        label: 'vegetables or horticulture crop',
        test: a => a.cropType === 'vegetables' || a.cropType === 'horticulture',
      },
      { kind: 'below', label: 'order value below 50,000', field: 'avgOrderValue', threshold: 50000 },
    ],
  },
  {
    product: 'Input_Bundle',
    criteria: [
      {
        kind: 'category',
        label: 'mixed crop or cooperative',
        test: a => a.cropType === 'mixed' || a.farmType === 'cooperative',
      },
      { kind: 'above', label: 'device trust above 60', field: 'deviceTrustScore', threshold: 60 },
    ],
  },
  {
    product: FALLBACK_PRODUCT,
    criteria: [],
  },
];

// ============================================
// MATCHING
// ============================================

/**
 * Score a single criterion: 1 when satisfied, partial credit for near misses
 * on numeric thresholds, 0 for failed categories.
 */
export function criterionScore(criterion: MatchCriterion, applicant: ApplicantProfile): number {
  switch (criterion.kind) {
    case 'category':
      return criterion.test(applicant) ? 1 : 0;
    case 'above': {
      const value = applicant[criterion.field];
      if (value > criterion.threshold) return 1;
      return 0.5 * Math.max(0, 1 - (criterion.threshold - value) / criterion.threshold);
    }
    case 'below': {
      const value = applicant[criterion.field];
      if (value < criterion.threshold) return 1;
      return 0.5 * Math.max(0, 1 - (value - criterion.threshold) / criterion.threshold);
    }
  }
}

export function ruleMatches(rule: ProductRule, applicant: ApplicantProfile): boolean {
  return rule.criteria.every(c => criterionScore(c, applicant) === 1);
}

function compatibility(rule: ProductRule, applicant: ApplicantProfile): number {
  if (rule.criteria.length === 0) return FALLBACK_COMPATIBILITY;
  if (ruleMatches(rule, applicant)) return 1;
  const total = rule.criteria.reduce((sum, c) => sum + criterionScore(c, applicant), 0);
  return total / rule.criteria.length;
}

export function matchProduct(applicant: ApplicantProfile): ProductRecommendation {
  const primaryRule = PRODUCT_RULES.find(rule => ruleMatches(rule, applicant));
  const primary = primaryRule ? primaryRule.product : FALLBACK_PRODUCT;

  const others: ProductRanking[] = PRODUCT_RULES
    .filter(rule => rule.product !== primary)
    .map(rule => ({
      product: rule.product,
      compatibility: compatibility(rule, applicant),
      matched: ruleMatches(rule, applicant),
    }))
    // Array sort is stable: equal scores keep priority order
    .sort((a, b) => b.compatibility - a.compatibility);

  const ranking: ProductRanking[] = [
    { product: primary, compatibility: 1, matched: true },
    ...others,
  ];

  return {
    product: primary,
    top3: ranking.slice(0, 3).map(r => r.product),
    rationale: buildRationale(primaryRule, applicant),
    ranking,
  };
}

function buildRationale(rule: ProductRule | undefined, applicant: ApplicantProfile): string {
  const product = getProductInfo(rule ? rule.product : FALLBACK_PRODUCT);
  if (!rule || rule.criteria.length === 0) {
    return `${product.name}: no targeted product rule matched (${applicant.cropType} crop, ${applicant.farmType} farm)`;
  }
  return `${product.name}: ${rule.criteria.map(c => c.label).join(', ')}. ${product.description}`;
}

// ============================================
// ACCURACY
// ============================================

/**
 * Top-1 agreement between predictions and ground-truth labels
 */
export function computeMatchAccuracy(predictions: ProductCode[], truth: ProductCode[]): number {
  if (predictions.length !== truth.length) {
    throw new Error('Predictions and ground truth must have same length');
  }
  if (predictions.length === 0) {
    throw new Error('Cannot compute accuracy over an empty set');
  }
  const correct = predictions.filter((p, i) => p === truth[i]).length;
  return correct / predictions.length;
}
