/**
 * Agrarian BNPL - Dashboard Routes
 *
 * GET /dashboard           HTML page
 * GET /dashboard/summary   summary statistics (JSON)
 * GET /dashboard/charts/:name   single chart as SVG
 */

import { Request, Response, Router } from 'express';
import { buildDashboard, Dashboard, DashboardCharts } from '../../modules/dashboard';
import { NotFoundError } from '../../shared/errors';

export interface DashboardRouteOptions {
  sampleSize: number;
  seed: number;
}

const CHART_FILES = new Map<string, keyof DashboardCharts>([
  ['pd-histogram.svg', 'pdHistogram'],
  ['size-vs-pd.svg', 'sizeVsPd'],
  ['product-counts.svg', 'productCounts'],
]);

export function createDashboardRoutes(options: DashboardRouteOptions): Router {
  const router = Router();

  // Seeded portfolio never changes for a given config; build on first request
  let dashboard: Dashboard | null = null;
  const getDashboard = (): Dashboard => {
    if (!dashboard) {
      console.log(`[Dashboard] Building portfolio (n=${options.sampleSize}, seed=${options.seed})`);
      dashboard = buildDashboard(options.sampleSize, options.seed);
    }
    return dashboard;
  };

  router.get('/', (_req: Request, res: Response) => {
    res.type('html').send(getDashboard().html);
  });

  router.get('/summary', (_req: Request, res: Response) => {
    res.json(getDashboard().summary);
  });

  router.get('/charts/:name', (req: Request, res: Response) => {
    const chart = CHART_FILES.get(req.params.name);
    if (!chart) {
      throw new NotFoundError('Chart', req.params.name);
    }
    res.type('image/svg+xml').send(getDashboard().charts[chart]);
  });

  return router;
}
