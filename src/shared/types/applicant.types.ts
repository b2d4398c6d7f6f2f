/**
 * Agrarian BNPL - Applicant & Decision Types
 *
 * Shared records passed between the scoring, matching and policy engines.
 */

// ============================================
// ENUMERATIONS
// ============================================

export const REGIONS = ['North', 'South', 'East', 'West', 'Central'] as const;
export type Region = typeof REGIONS[number];

export const FARM_TYPES = ['smallholder', 'commercial', 'cooperative'] as const;
export type FarmType = typeof FARM_TYPES[number];

export const CROP_TYPES = ['maize', 'rice', 'vegetables', 'livestock', 'mixed', 'horticulture'] as const;
export type CropType = typeof CROP_TYPES[number];

export const PRODUCT_CODES = [
  'Seeds_BNPL',
  'Fertilizer_BNPL',
  'Equipment_Lease',
  'Input_Bundle',
  'Cash_Advance',
  'Premium_BNPL',
] as const;
export type ProductCode = typeof PRODUCT_CODES[number];

export type RiskTier = 'Low' | 'Medium' | 'High' | 'Decline';

export type Decision = 'auto_approve' | 'reduced_limit' | 'manual_review' | 'auto_decline';

export type RiskFactor =
  | 'region_risk'
  | 'farm_type_risk'
  | 'experience_risk'
  | 'prior_defaults'
  | 'liquidity_risk'
  | 'farm_size_risk'
  | 'device_trust'
  | 'identity_consistency';

// ============================================
// APPLICANT
// ============================================

export interface ApplicantProfile {
  readonly applicantId: string;
  readonly region: Region;
  readonly farmType: FarmType;
  readonly cropType: CropType;
  readonly farmSizeHa: number;
  readonly yearsExperience: number;
  readonly monthlyIncome: number;
  readonly recentCashInflows: number;      // Last 90 days
  readonly avgOrderValue: number;
  readonly deviceTrustScore: number;       // 0-100
  readonly identityConsistency: number;    // 0-100
  readonly priorDefaults: number;          // 0-5
}

// ============================================
// DERIVED RECORDS
// ============================================

export interface FactorContribution {
  factor: RiskFactor;
  rawRisk: number;
  weight: number;
  contribution: number;
}

export interface RiskAssessment {
  linearScore: number;
  lateProbability: number;
  riskTier: RiskTier;
  decision: Decision;
  topFactors: FactorContribution[];
  components: FactorContribution[];
}

export interface ProductRanking {
  product: ProductCode;
  compatibility: number;
  matched: boolean;
}

export interface ProductRecommendation {
  product: ProductCode;
  top3: ProductCode[];
  rationale: string;
  ranking: ProductRanking[];
}

export interface LimitBreakdown {
  baseLimit: number;
  riskMultiplier: number;
  incomeMultiplier: number;
  tenureMultiplier: number;
  tenureFactors: string[];
  rawLimit: number;
  declined: boolean;
  finalLimit: number;
}

export interface TenorBreakdown {
  baseTenor: number;
  riskReductionMonths: number;
  riskAdjustment: string;
  cropCycleCap: number | null;
  cropCycleImpact: string;
  finalTenor: number;
}

export interface BnplTerms {
  creditLimit: number;
  tenorMonths: number;
  explanation: {
    limit: LimitBreakdown;
    tenor: TenorBreakdown;
    rationale: string;
  };
}

export interface DecisionRecord {
  decisionId: string;
  applicantId: string;
  assessment: RiskAssessment;
  recommendation: ProductRecommendation;
  terms: BnplTerms;
  assessedAt: string;
}
