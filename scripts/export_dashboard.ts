/**
 * Agrarian BNPL - Dashboard Export Script
 *
 * Renders the dashboard for a seeded synthetic portfolio and writes
 * the HTML page plus one SVG per chart.
 *
 * RUN: npm run build && npm run export:dashboard -- [count] [seed] [outDir]
 */

import * as fs from 'fs';
import * as path from 'path';
import { buildDashboard, RISK_TIERS } from '../src/modules/dashboard';
import { DEFAULT_SEED } from '../src/modules/synthetic';
import { MIN_SAMPLE_COUNT, MIN_SEED, parseIntArg } from '../src/shared/cli';

function main(): void {
  const [countArg, seedArg, outArg] = process.argv.slice(2);
  const count = parseIntArg(countArg, 1000, 'count', MIN_SAMPLE_COUNT);
  const seed = parseIntArg(seedArg, DEFAULT_SEED, 'seed', MIN_SEED);
  const outDir = path.resolve(outArg ?? 'output');

  console.log(`[Dashboard] Scoring ${count} synthetic applicants (seed=${seed})`);
  const { summary, charts, html } = buildDashboard(count, seed);

  fs.mkdirSync(outDir, { recursive: true });
  fs.writeFileSync(path.join(outDir, 'bnpl_dashboard.html'), html, 'utf-8');
  fs.writeFileSync(path.join(outDir, 'pd-histogram.svg'), charts.pdHistogram, 'utf-8');
  fs.writeFileSync(path.join(outDir, 'size-vs-pd.svg'), charts.sizeVsPd, 'utf-8');
  fs.writeFileSync(path.join(outDir, 'product-counts.svg'), charts.productCounts, 'utf-8');

  console.log('='.repeat(60));
  console.log(`  DASHBOARD SUMMARY (n=${summary.count} synthetic applicants)`);
  console.log('='.repeat(60));
  for (const tier of RISK_TIERS) {
    console.log(`  ${tier.padEnd(8)} ${summary.tierDistribution[tier]}`);
  }
  console.log(`  Mean PD:            ${(summary.meanPd * 100).toFixed(2)}%`);
  console.log(`  Median PD:          ${(summary.medianPd * 100).toFixed(2)}%`);
  console.log(`  Approval rate:      ${(summary.approvalRate * 100).toFixed(1)}%`);
  console.log(`  Auto-approve rate:  ${(summary.autoApproveRate * 100).toFixed(1)}%`);
  console.log(`  Match accuracy:     ${(summary.matchAccuracy * 100).toFixed(1)}%`);
  console.log(`\n[Dashboard] Written to ${outDir}`);
}

try {
  main();
} catch (error) {
  console.error('[Dashboard] Failed:', error instanceof Error ? error.message : error);
  process.exit(1);
}
