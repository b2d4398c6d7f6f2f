/**
 * @file modules/dashboard/dashboard.test.ts
 * @description Portfolio analytics and chart rendering tests
 */

import { describe, it, expect } from '@jest/globals';
import {
  buildDashboard,
  escapeXml,
  histogramCounts,
  HISTOGRAM_BINS,
  scorePortfolio,
  summarizePortfolio,
} from './index';
import { generateApplicants } from '../synthetic/generator';

describe('Portfolio analytics', () => {
  const rows = scorePortfolio(generateApplicants(300, 42));
  const summary = summarizePortfolio(rows);

  it('counts every applicant once per distribution', () => {
    const tierTotal = Object.values(summary.tierDistribution).reduce((s, n) => s + n, 0);
    const productTotal = Object.values(summary.productDistribution).reduce((s, n) => s + n, 0);
    expect(summary.count).toBe(300);
    expect(tierTotal).toBe(300);
    expect(productTotal).toBe(300);
  });

  it('derives rates from the tier counts', () => {
    expect(summary.autoApproveRate).toBeCloseTo(summary.tierDistribution.Low / 300, 10);
    expect(summary.approvalRate).toBeCloseTo(1 - summary.tierDistribution.Decline / 300, 10);
    expect(summary.approvalRate).toBeGreaterThanOrEqual(summary.autoApproveRate);
  });

  it('reports matcher agreement with ground truth', () => {
    expect(summary.matchAccuracy).toBeGreaterThanOrEqual(0.85);
    expect(summary.matchAccuracy).toBeLessThanOrEqual(1);
  });

  it('keeps mean and median PD inside [0, 1]', () => {
    expect(summary.meanPd).toBeGreaterThan(0);
    expect(summary.meanPd).toBeLessThan(1);
    expect(summary.medianPd).toBeGreaterThan(0);
    expect(summary.medianPd).toBeLessThan(1);
  });

  it('rejects an empty portfolio', () => {
    expect(() => summarizePortfolio([])).toThrow('Cannot summarize an empty portfolio');
  });
});

describe('Charts', () => {
  it('bins probabilities into equal-width buckets', () => {
    expect(histogramCounts([0, 0.05, 0.49, 0.5, 0.99, 1], 4)).toEqual([2, 1, 1, 2]);
  });

  it('uses forty bins by default', () => {
    expect(histogramCounts([0.1])).toHaveLength(HISTOGRAM_BINS);
    expect(HISTOGRAM_BINS).toBe(40);
  });

  it('escapes markup characters', () => {
    expect(escapeXml(`<a href="x">Tom & Jerry's</a>`)).toBe(
      '&lt;a href=&quot;x&quot;&gt;Tom &amp; Jerry&apos;s&lt;/a&gt;'
    );
  });
});

describe('buildDashboard', () => {
  const dashboard = buildDashboard(60, 7);

  it('renders three standalone SVG charts', () => {
    for (const svg of [dashboard.charts.pdHistogram, dashboard.charts.sizeVsPd, dashboard.charts.productCounts]) {
      expect(svg.startsWith('<svg xmlns="http://www.w3.org/2000/svg"')).toBe(true);
      expect(svg.endsWith('</svg>')).toBe(true);
    }
    expect(dashboard.charts.pdHistogram).toContain('Late Payment Probability (n=60)');
  });

  it('embeds the charts and summary in the page', () => {
    expect(dashboard.html).toContain('<title>Agrarian BNPL Dashboard</title>');
    expect(dashboard.html).toContain('<tr><th>Applicants</th><td>60</td></tr>');
    expect(dashboard.html).toContain(dashboard.charts.productCounts);
  });

  it('is reproducible for the same seed', () => {
    expect(buildDashboard(60, 7).summary.tierDistribution).toEqual(dashboard.summary.tierDistribution);
  });
});
