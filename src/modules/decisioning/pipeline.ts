/**
 * @file modules/decisioning/pipeline.ts
 * @description Agrarian BNPL - Scoring → Matching → Policy pipeline
 *
 * Pure composition of the three engines. No I/O, no shared state.
 */

import {
  ApplicantProfile,
  BnplTerms,
  ProductRecommendation,
  RiskAssessment,
} from '../../shared/types/applicant.types';
import { getScoringEngine } from '../scoring/engine';
import { matchProduct } from '../products/matcher';
import { getPolicyEngine } from '../policy/engine';

export interface PipelineResult {
  assessment: RiskAssessment;
  recommendation: ProductRecommendation;
  terms: BnplTerms;
}

export function runPipeline(applicant: ApplicantProfile): PipelineResult {
  const assessment = getScoringEngine().score(applicant);
  const recommendation = matchProduct(applicant);
  const terms = getPolicyEngine().computeTerms(
    recommendation.product,
    assessment.lateProbability,
    applicant,
  );

  return { assessment, recommendation, terms };
}
