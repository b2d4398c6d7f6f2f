/**
 * Agrarian BNPL - Request Schemas
 *
 * Wire format is snake_case; engines take camelCase ApplicantProfile.
 * Every range check happens here, before the pipeline runs.
 */

import { z } from 'zod';
import { ApplicantProfile, CROP_TYPES, FARM_TYPES, REGIONS } from '../shared/types/applicant.types';
import { ValidationError } from '../shared/errors';

export const ApplicantSchema = z.object({
  user_id: z.string().min(1).max(64),
  region: z.enum(REGIONS),
  farm_type: z.enum(FARM_TYPES),
  crop_type: z.enum(CROP_TYPES),
  farm_size_ha: z.number().min(0.5).max(500),
  years_experience: z.number().int().min(0).max(40),
  monthly_income_est: z.number().min(5000).max(500000),
  recent_cash_inflows: z.number().min(0).max(1000000),
  avg_order_value: z.number().min(1000).max(200000),
  device_trust_score: z.number().min(0).max(100),
  identity_consistency: z.number().min(0).max(100),
  prior_defaults: z.number().int().min(0).max(5),
});

export type ApplicantPayload = z.infer<typeof ApplicantSchema>;

export function toApplicantProfile(payload: ApplicantPayload): ApplicantProfile {
  return {
    applicantId: payload.user_id,
    region: payload.region,
    farmType: payload.farm_type,
    cropType: payload.crop_type,
    farmSizeHa: payload.farm_size_ha,
    yearsExperience: payload.years_experience,
    monthlyIncome: payload.monthly_income_est,
    recentCashInflows: payload.recent_cash_inflows,
    avgOrderValue: payload.avg_order_value,
    deviceTrustScore: payload.device_trust_score,
    identityConsistency: payload.identity_consistency,
    priorDefaults: payload.prior_defaults,
  };
}

function toValidationError(error: z.ZodError, message: string): ValidationError {
  return new ValidationError(
    'INVALID_APPLICANT',
    message,
    error.issues.map(issue => ({
      field: issue.path.join('.') || '(body)',
      message: issue.message,
    })),
  );
}

export function parseApplicant(body: unknown): ApplicantProfile {
  const parsed = ApplicantSchema.safeParse(body);
  if (!parsed.success) {
    throw toValidationError(parsed.error, 'Applicant failed validation');
  }
  return toApplicantProfile(parsed.data);
}

export function parseBatch(body: unknown, maxSize: number): ApplicantProfile[] {
  const BatchSchema = z.object({
    applicants: z.array(ApplicantSchema).min(1).max(maxSize),
  });
  const parsed = BatchSchema.safeParse(body);
  if (!parsed.success) {
    throw toValidationError(parsed.error, 'Batch failed validation');
  }
  return parsed.data.applicants.map(toApplicantProfile);
}
