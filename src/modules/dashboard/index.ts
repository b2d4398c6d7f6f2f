/**
 * Agrarian BNPL - Dashboard Module
 */

import { generateApplicants } from '../synthetic/generator';
import { DashboardCharts, renderCharts } from './charts';
import { renderDashboardPage } from './page';
import { PortfolioSummary, scorePortfolio, summarizePortfolio } from './portfolio';

export * from './portfolio';
export * from './charts';
export * from './page';

export interface Dashboard {
  summary: PortfolioSummary;
  charts: DashboardCharts;
  html: string;
}

export function buildDashboard(sampleSize: number, seed: number): Dashboard {
  const rows = scorePortfolio(generateApplicants(sampleSize, seed));
  const summary = summarizePortfolio(rows);
  const charts = renderCharts(rows, summary);
  return { summary, charts, html: renderDashboardPage(summary, charts) };
}
