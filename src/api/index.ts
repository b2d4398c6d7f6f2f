/**
 * Agrarian BNPL - API Module Export
 */

export { createApp, AppOptions, SERVICE_NAME, SERVICE_VERSION } from './app';
export { createScoringRoutes } from './routes/scoring.routes';
export { createDashboardRoutes } from './routes/dashboard.routes';
export { parseApplicant, parseBatch, ApplicantSchema } from './schemas';
