/**
 * @file api/routes/scoring.routes.ts
 * @description Agrarian BNPL - Scoring API Routes
 *
 * POST /v1/score               risk assessment
 * POST /v1/recommend-product   product + BNPL terms
 * POST /v1/batch-score         batch recommendations + summary
 * GET  /v1/decisions/:id       audited decision
 * GET  /v1/products            product catalog
 */

import { NextFunction, Request, Response, Router } from 'express';
import { DecisionRecord } from '../../shared/types/applicant.types';
import { NotFoundError } from '../../shared/errors';
import { DecisionService } from '../../modules/decisioning';
import { getProductInfo, isProductCode, listProducts } from '../../modules/products/catalog';
import { parseApplicant, parseBatch } from '../schemas';

export interface ScoringRouteOptions {
  batchMaxSize: number;
}

// ============================================================================
// SERIALIZERS
// ============================================================================

function round3(value: number): number {
  return Math.round(value * 1000) / 1000;
}

export function toScoreResponse(record: DecisionRecord) {
  const { assessment } = record;
  return {
    user_id: record.applicantId,
    decision_id: record.decisionId,
    linear_risk_score: round3(assessment.linearScore),
    late_payment_prob: round3(assessment.lateProbability),
    risk_tier: assessment.riskTier,
    decision: assessment.decision,
    explanation: {
      top_contributors: assessment.topFactors.map(f => ({
        feature: f.factor,
        contribution: round3(f.contribution),
        weight: f.weight,
      })),
    },
    timestamp: record.assessedAt,
  };
}

export function toRecommendationResponse(record: DecisionRecord) {
  const { assessment, recommendation, terms } = record;
  return {
    user_id: record.applicantId,
    decision_id: record.decisionId,
    recommended_product: recommendation.product,
    top_3_products: recommendation.top3,
    bnpl_limit: terms.creditLimit,
    bnpl_tenor_months: terms.tenorMonths,
    late_payment_prob: round3(assessment.lateProbability),
    risk_tier: assessment.riskTier,
    decision: assessment.decision,
    match_reason: recommendation.rationale,
    terms_explanation: terms.explanation,
    timestamp: record.assessedAt,
  };
}

// ============================================================================
// ROUTES
// ============================================================================

export function createScoringRoutes(decisions: DecisionService, options: ScoringRouteOptions): Router {
  const router = Router();

  /**
   * POST /v1/score
   */
  router.post('/score', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const applicant = parseApplicant(req.body);
      const record = await decisions.assess(applicant);
      res.json(toScoreResponse(record));
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /v1/recommend-product
   */
  router.post('/recommend-product', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const applicant = parseApplicant(req.body);
      const record = await decisions.assess(applicant);
      res.json(toRecommendationResponse(record));
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /v1/batch-score
   */
  router.post('/batch-score', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const applicants = parseBatch(req.body, options.batchMaxSize);
      const { records, summary } = await decisions.assessBatch(applicants);
      res.json({
        results: records.map(toRecommendationResponse),
        batch_summary: {
          total_count: summary.totalCount,
          approved_count: summary.approvedCount,
          reduced_limit_count: summary.reducedLimitCount,
          manual_review_count: summary.manualReviewCount,
          declined_count: summary.declinedCount,
        },
      });
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /v1/decisions/:id
   */
  router.get('/decisions/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const record = await decisions.getDecision(req.params.id);
      if (!record) {
        throw new NotFoundError('Decision', req.params.id);
      }
      res.json({ decision: record });
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /v1/products
   */
  router.get('/products', (_req: Request, res: Response) => {
    res.json({ products: listProducts() });
  });

  /**
   * GET /v1/products/:code
   */
  router.get('/products/:code', (req: Request, res: Response, next: NextFunction) => {
    const code = req.params.code;
    if (!isProductCode(code)) {
      next(new NotFoundError('Product', code));
      return;
    }
    res.json({ product: getProductInfo(code) });
  });

  return router;
}
