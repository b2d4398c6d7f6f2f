/**
 * Agrarian BNPL - Synthetic Dataset Script
 *
 * Writes a seeded synthetic applicant portfolio as CSV, with
 * ground-truth product labels, and reports matcher agreement.
 *
 * RUN: npm run build && npm run generate:dataset -- [count] [seed] [outFile]
 */

import * as fs from 'fs';
import * as path from 'path';
import { DEFAULT_SEED, generateApplicants, toCsv } from '../src/modules/synthetic';
import { computeMatchAccuracy, matchProduct } from '../src/modules/products/matcher';
import { MIN_SAMPLE_COUNT, MIN_SEED, parseIntArg } from '../src/shared/cli';

function main(): void {
  const [countArg, seedArg, outArg] = process.argv.slice(2);
  const count = parseIntArg(countArg, 1000, 'count', MIN_SAMPLE_COUNT);
  const seed = parseIntArg(seedArg, DEFAULT_SEED, 'seed', MIN_SEED);
  const outFile = path.resolve(outArg ?? 'output/synthetic_agrarian_bnpl_data.csv');

  console.log(`[Dataset] Generating ${count} synthetic applicants (seed=${seed})`);
  const applicants = generateApplicants(count, seed);

  fs.mkdirSync(path.dirname(outFile), { recursive: true });
  fs.writeFileSync(outFile, toCsv(applicants), 'utf-8');
  console.log(`[Dataset] Saved to ${outFile}`);

  const accuracy = computeMatchAccuracy(
    applicants.map(a => matchProduct(a).product),
    applicants.map(a => a.trueProduct),
  );
  console.log(`[Dataset] Product match accuracy: ${(accuracy * 100).toFixed(2)}%`);

  const distribution = new Map<string, number>();
  for (const a of applicants) {
    distribution.set(a.trueProduct, (distribution.get(a.trueProduct) ?? 0) + 1);
  }
  console.log('[Dataset] Label distribution:');
  for (const [product, n] of distribution) {
    console.log(`  - ${product}: ${n}`);
  }
}

try {
  main();
} catch (error) {
  console.error('[Dataset] Failed:', error instanceof Error ? error.message : error);
  process.exit(1);
}
