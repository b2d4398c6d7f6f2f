/**
 * @file modules/dashboard/portfolio.ts
 * @description Agrarian BNPL - Portfolio Analytics
 *
 * Scores a synthetic portfolio and aggregates it for the dashboard:
 * - Risk tier and product distributions
 * - Mean PD by farm type and region
 * - Approval / auto-approve rates
 * - Matcher agreement with ground-truth labels
 */

import {
  FarmType,
  ProductCode,
  Region,
  RiskTier,
} from '../../shared/types/applicant.types';
import { getScoringEngine } from '../scoring/engine';
import { DECLINE_THRESHOLD } from '../scoring/weights';
import { computeMatchAccuracy, matchProduct } from '../products/matcher';
import { SyntheticApplicant } from '../synthetic/generator';

// ============================================
// TYPES
// ============================================

export interface ScoredApplicant extends SyntheticApplicant {
  linearScore: number;
  lateProbability: number;
  riskTier: RiskTier;
  recommendedProduct: ProductCode;
}

export interface PortfolioSummary {
  count: number;
  tierDistribution: Record<RiskTier, number>;
  productDistribution: Record<ProductCode, number>;
  meanPdByFarmType: Record<FarmType, number | null>;
  meanPdByRegion: Record<Region, number | null>;
  meanPd: number;
  medianPd: number;
  approvalRate: number;       // PD below decline threshold
  autoApproveRate: number;    // Low tier
  matchAccuracy: number;
  generatedAt: string;
}

export const RISK_TIERS: readonly RiskTier[] = ['Low', 'Medium', 'High', 'Decline'];

// ============================================
// SCORING
// ============================================

export function scorePortfolio(applicants: SyntheticApplicant[]): ScoredApplicant[] {
  const engine = getScoringEngine();
  return applicants.map(applicant => {
    const assessment = engine.score(applicant);
    return {
      ...applicant,
      linearScore: assessment.linearScore,
      lateProbability: assessment.lateProbability,
      riskTier: assessment.riskTier,
      recommendedProduct: matchProduct(applicant).product,
    };
  });
}

// ============================================
// AGGREGATION
// ============================================

function mean(values: number[]): number | null {
  if (values.length === 0) return null;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

function median(values: number[]): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
}

function countTiers(rows: ScoredApplicant[]): Record<RiskTier, number> {
  const counts: Record<RiskTier, number> = { Low: 0, Medium: 0, High: 0, Decline: 0 };
  for (const row of rows) {
    counts[row.riskTier] += 1;
  }
  return counts;
}

function countProducts(rows: ScoredApplicant[]): Record<ProductCode, number> {
  const counts: Record<ProductCode, number> = {
    Seeds_BNPL: 0,
    Fertilizer_BNPL: 0,
    Equipment_Lease: 0,
    Input_Bundle: 0,
    Cash_Advance: 0,
    Premium_BNPL: 0,
  };
  for (const row of rows) {
    counts[row.recommendedProduct] += 1;
  }
  return counts;
}

function meanPd(rows: ScoredApplicant[], keep: (row: ScoredApplicant) => boolean): number | null {
  return mean(rows.filter(keep).map(r => r.lateProbability));
}

export function summarizePortfolio(rows: ScoredApplicant[]): PortfolioSummary {
  if (rows.length === 0) {
    throw new Error('Cannot summarize an empty portfolio');
  }

  const pds = rows.map(r => r.lateProbability);

  return {
    count: rows.length,
    tierDistribution: countTiers(rows),
    productDistribution: countProducts(rows),
    meanPdByFarmType: {
      smallholder: meanPd(rows, r => r.farmType === 'smallholder'),
      commercial: meanPd(rows, r => r.farmType === 'commercial'),
      cooperative: meanPd(rows, r => r.farmType === 'cooperative'),
    },
    meanPdByRegion: {
      North: meanPd(rows, r => r.region === 'North'),
      South: meanPd(rows, r => r.region === 'South'),
      East: meanPd(rows, r => r.region === 'East'),
      West: meanPd(rows, r => r.region === 'West'),
      Central: meanPd(rows, r => r.region === 'Central'),
    },
    meanPd: mean(pds) ?? 0,
    medianPd: median(pds),
    approvalRate: pds.filter(pd => pd < DECLINE_THRESHOLD).length / rows.length,
    autoApproveRate: rows.filter(r => r.riskTier === 'Low').length / rows.length,
    matchAccuracy: computeMatchAccuracy(
      rows.map(r => r.recommendedProduct),
      rows.map(r => r.trueProduct),
    ),
    generatedAt: new Date().toISOString(),
  };
}
