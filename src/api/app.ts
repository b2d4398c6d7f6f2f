/**
 * Agrarian BNPL - Express Application
 *
 * Built by a factory so tests can mount it with an in-memory repository.
 */

import express, { Request, Response } from 'express';
import helmet from 'helmet';
import cors from 'cors';
import rateLimit from 'express-rate-limit';
import { DecisionService } from '../modules/decisioning';
import { createScoringRoutes } from './routes/scoring.routes';
import { createDashboardRoutes } from './routes/dashboard.routes';
import { errorHandler, notFoundHandler } from './middleware/error.middleware';

export const SERVICE_NAME = 'agrarian-bnpl-risk';
export const SERVICE_VERSION = '1.0.0';

export interface AppOptions {
  decisions: DecisionService;
  batchMaxSize: number;
  rateLimit: { windowMs: number; max: number };
  dashboard: { sampleSize: number; seed: number };
  startedAt?: number;
}

export function createApp(options: AppOptions): express.Express {
  const startedAt = options.startedAt ?? Date.now();
  const app = express();

  // Security middleware
  app.use(helmet());
  app.use(cors());
  app.use(express.json({ limit: '2mb' }));
  app.use(rateLimit({
    windowMs: options.rateLimit.windowMs,
    limit: options.rateLimit.max,
    standardHeaders: true,
    legacyHeaders: false,
  }));

  app.get('/', (_req: Request, res: Response) => {
    res.json({
      message: 'Agrarian BNPL Risk Scoring API',
      version: SERVICE_VERSION,
      dashboard: '/dashboard',
      health: '/health',
    });
  });

  // Health check (public)
  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      uptime_seconds: Math.floor((Date.now() - startedAt) / 1000),
      checks: {
        scoring_engine: 'ready',
        product_matcher: 'ready',
        bnpl_policy: 'ready',
      },
      timestamp: new Date().toISOString(),
    });
  });

  app.use('/v1', createScoringRoutes(options.decisions, { batchMaxSize: options.batchMaxSize }));
  app.use('/dashboard', createDashboardRoutes(options.dashboard));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
