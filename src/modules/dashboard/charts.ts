/**
 * Agrarian BNPL - Dashboard Charts
 *
 * Renders the three portfolio charts as standalone SVG documents:
 * 1. Late payment probability histogram, coloured by risk tier
 * 2. Farm size (log axis) vs late payment probability, by farm type
 * 3. Recommended product counts
 */

import { FARM_TYPES, FarmType, PRODUCT_CODES, ProductCode, RiskTier } from '../../shared/types/applicant.types';
import { getScoringEngine } from '../scoring/engine';
import { TIER_THRESHOLDS } from '../scoring/weights';
import { PortfolioSummary, ScoredApplicant } from './portfolio';

export interface DashboardCharts {
  pdHistogram: string;
  sizeVsPd: string;
  productCounts: string;
}

// ============================================
// LAYOUT
// ============================================

const WIDTH = 520;
const HEIGHT = 340;
const MARGIN = { top: 40, right: 20, bottom: 50, left: 60 };
const PLOT_W = WIDTH - MARGIN.left - MARGIN.right;
const PLOT_H = HEIGHT - MARGIN.top - MARGIN.bottom;

export const HISTOGRAM_BINS = 40;

export const TIER_COLORS: Record<RiskTier, string> = {
  Low: '#2ecc71',
  Medium: '#f39c12',
  High: '#e74c3c',
  Decline: '#95a5a6',
};

const FARM_TYPE_COLORS: Record<FarmType, string> = {
  smallholder: '#e74c3c',
  commercial: '#2ecc71',
  cooperative: '#3498db',
};

const PRODUCT_COLORS: Record<ProductCode, string> = {
  Seeds_BNPL: '#2ecc71',
  Fertilizer_BNPL: '#27ae60',
  Equipment_Lease: '#e67e22',
  Input_Bundle: '#9b59b6',
  Cash_Advance: '#f39c12',
  Premium_BNPL: '#34495e',
};

const THRESHOLDS = TIER_THRESHOLDS.filter(t => Number.isFinite(t.below)).map(t => t.below);

// ============================================
// PRIMITIVES
// ============================================

export function escapeXml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

function fmt(n: number): string {
  return n.toFixed(1);
}

function svgDocument(title: string, body: string[]): string {
  return [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${WIDTH}" height="${HEIGHT}" viewBox="0 0 ${WIDTH} ${HEIGHT}" font-family="sans-serif" font-size="11">`,
    `<rect width="${WIDTH}" height="${HEIGHT}" fill="#ffffff"/>`,
    `<text x="${WIDTH / 2}" y="22" text-anchor="middle" font-size="14" font-weight="bold">${escapeXml(title)}</text>`,
    ...body,
    '</svg>',
  ].join('\n');
}

function axes(xLabel: string, yLabel: string): string[] {
  const x0 = MARGIN.left;
  const y0 = MARGIN.top + PLOT_H;
  return [
    `<line x1="${x0}" y1="${y0}" x2="${x0 + PLOT_W}" y2="${y0}" stroke="#333"/>`,
    `<line x1="${x0}" y1="${MARGIN.top}" x2="${x0}" y2="${y0}" stroke="#333"/>`,
    `<text x="${x0 + PLOT_W / 2}" y="${HEIGHT - 12}" text-anchor="middle" font-weight="bold">${escapeXml(xLabel)}</text>`,
    `<text x="16" y="${MARGIN.top + PLOT_H / 2}" text-anchor="middle" font-weight="bold" transform="rotate(-90 16 ${MARGIN.top + PLOT_H / 2})">${escapeXml(yLabel)}</text>`,
  ];
}

// ============================================
// CHART 1: PD HISTOGRAM
// ============================================

export function histogramCounts(values: number[], bins: number = HISTOGRAM_BINS): number[] {
  const counts = new Array<number>(bins).fill(0);
  for (const value of values) {
    const index = Math.min(bins - 1, Math.max(0, Math.floor(value * bins)));
    counts[index] += 1;
  }
  return counts;
}

export function renderPdHistogram(rows: ScoredApplicant[]): string {
  const counts = histogramCounts(rows.map(r => r.lateProbability));
  const maxCount = Math.max(1, ...counts);
  const barW = PLOT_W / HISTOGRAM_BINS;
  const engine = getScoringEngine();

  const bars = counts.map((count, i) => {
    const h = (count / maxCount) * PLOT_H;
    const center = (i + 0.5) / HISTOGRAM_BINS;
    const color = TIER_COLORS[engine.riskTier(center)];
    return `<rect x="${fmt(MARGIN.left + i * barW)}" y="${fmt(MARGIN.top + PLOT_H - h)}" width="${fmt(barW)}" height="${fmt(h)}" fill="${color}" stroke="#222" stroke-width="0.5"/>`;
  });

  const lines = THRESHOLDS.map(t => {
    const x = fmt(MARGIN.left + t * PLOT_W);
    return `<line x1="${x}" y1="${MARGIN.top}" x2="${x}" y2="${MARGIN.top + PLOT_H}" stroke="#000" stroke-dasharray="5,4"/>` +
      `<text x="${x}" y="${MARGIN.top - 4}" text-anchor="middle">${Math.round(t * 100)}%</text>`;
  });

  return svgDocument(`Late Payment Probability (n=${rows.length})`, [
    ...bars,
    ...lines,
    ...axes('Late payment probability', 'Count'),
  ]);
}

// ============================================
// CHART 2: FARM SIZE VS PD
// ============================================

const SIZE_MIN = 0.5;
const SIZE_MAX = 500;

function sizeToX(hectares: number): number {
  const clamped = Math.min(SIZE_MAX, Math.max(SIZE_MIN, hectares));
  const ratio = Math.log10(clamped / SIZE_MIN) / Math.log10(SIZE_MAX / SIZE_MIN);
  return MARGIN.left + ratio * PLOT_W;
}

function pdToY(pd: number): number {
  return MARGIN.top + (1 - pd) * PLOT_H;
}

export function renderSizeVsPd(rows: ScoredApplicant[]): string {
  const points = rows.map(r =>
    `<circle cx="${fmt(sizeToX(r.farmSizeHa))}" cy="${fmt(pdToY(r.lateProbability))}" r="3" fill="${FARM_TYPE_COLORS[r.farmType]}" fill-opacity="0.6" stroke="#000" stroke-width="0.3"/>`
  );

  const lines = THRESHOLDS.map(t =>
    `<line x1="${MARGIN.left}" y1="${fmt(pdToY(t))}" x2="${MARGIN.left + PLOT_W}" y2="${fmt(pdToY(t))}" stroke="#888" stroke-dasharray="4,4"/>`
  );

  const legend = FARM_TYPES.map((farmType, i) => {
    const y = MARGIN.top + 10 + i * 14;
    const x = MARGIN.left + PLOT_W - 90;
    return `<circle cx="${x}" cy="${y}" r="4" fill="${FARM_TYPE_COLORS[farmType]}"/>` +
      `<text x="${x + 8}" y="${y + 4}">${farmType}</text>`;
  });

  return svgDocument('Farm Size vs Payment Risk', [
    ...lines,
    ...points,
    ...legend,
    ...axes('Farm size (ha, log scale)', 'Late payment probability'),
  ]);
}

// ============================================
// CHART 3: PRODUCT COUNTS
// ============================================

export function renderProductCounts(summary: PortfolioSummary): string {
  const entries = PRODUCT_CODES
    .map(code => ({ code, count: summary.productDistribution[code] }))
    .sort((a, b) => b.count - a.count);
  const maxCount = Math.max(1, ...entries.map(e => e.count));
  const rowH = PLOT_H / entries.length;
  const labelW = 100;
  const barArea = PLOT_W - labelW - 60;

  const bars = entries.map((entry, i) => {
    const y = MARGIN.top + i * rowH;
    const w = (entry.count / maxCount) * barArea;
    const pct = ((entry.count / summary.count) * 100).toFixed(1);
    return `<text x="${MARGIN.left + labelW - 6}" y="${fmt(y + rowH / 2 + 4)}" text-anchor="end">${entry.code}</text>` +
      `<rect x="${MARGIN.left + labelW}" y="${fmt(y + rowH * 0.15)}" width="${fmt(w)}" height="${fmt(rowH * 0.7)}" fill="${PRODUCT_COLORS[entry.code]}" stroke="#000"/>` +
      `<text x="${fmt(MARGIN.left + labelW + w + 4)}" y="${fmt(y + rowH / 2 + 4)}" font-weight="bold">${entry.count} (${pct}%)</text>`;
  });

  return svgDocument('Recommended Product Distribution', bars);
}

export function renderCharts(rows: ScoredApplicant[], summary: PortfolioSummary): DashboardCharts {
  return {
    pdHistogram: renderPdHistogram(rows),
    sizeVsPd: renderSizeVsPd(rows),
    productCounts: renderProductCounts(summary),
  };
}
