/**
 * Agrarian BNPL - Dashboard Page
 */

import { FARM_TYPES, PRODUCT_CODES, REGIONS } from '../../shared/types/applicant.types';
import { DashboardCharts, escapeXml } from './charts';
import { PortfolioSummary, RISK_TIERS } from './portfolio';

function pct(value: number): string {
  return `${(value * 100).toFixed(1)}%`;
}

function pdCell(value: number | null): string {
  return value === null ? '&mdash;' : pct(value);
}

function table(title: string, rows: [string, string][]): string {
  const body = rows
    .map(([label, value]) => `<tr><th>${escapeXml(label)}</th><td>${value}</td></tr>`)
    .join('');
  return `<section><h2>${escapeXml(title)}</h2><table>${body}</table></section>`;
}

export function renderDashboardPage(summary: PortfolioSummary, charts: DashboardCharts): string {
  const overview = table('Overview', [
    ['Applicants', String(summary.count)],
    ['Mean late payment probability', pct(summary.meanPd)],
    ['Median late payment probability', pct(summary.medianPd)],
    ['Approval rate (PD < 50%)', pct(summary.approvalRate)],
    ['Auto-approve rate (PD < 15%)', pct(summary.autoApproveRate)],
    ['Product match accuracy', pct(summary.matchAccuracy)],
  ]);

  const tiers = table('Risk tiers', RISK_TIERS.map(t => [t, String(summary.tierDistribution[t])]));
  const products = table('Products', PRODUCT_CODES.map(p => [p, String(summary.productDistribution[p])]));
  const farmTypes = table('Mean PD by farm type', FARM_TYPES.map(f => [f, pdCell(summary.meanPdByFarmType[f])]));
  const regions = table('Mean PD by region', REGIONS.map(r => [r, pdCell(summary.meanPdByRegion[r])]));

  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="utf-8">
<title>Agrarian BNPL Dashboard</title>
<style>
  body { font-family: sans-serif; margin: 24px; color: #222; }
  .charts, .tables { display: flex; flex-wrap: wrap; gap: 16px; }
  table { border-collapse: collapse; }
  th, td { border: 1px solid #ccc; padding: 4px 8px; text-align: left; }
  footer { margin-top: 24px; font-size: 12px; color: #666; }
</style>
</head>
<body>
<h1>Agrarian BNPL Risk Dashboard</h1>
<p>Synthetic portfolio only. No real applicant data.</p>
<div class="charts">
${charts.pdHistogram}
${charts.sizeVsPd}
${charts.productCounts}
</div>
<div class="tables">
${overview}
${tiers}
${products}
${farmTypes}
${regions}
</div>
<footer>Generated ${escapeXml(summary.generatedAt)}</footer>
</body>
</html>
`;
}
