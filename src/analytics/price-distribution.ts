/**
 * Price Distribution - adaptive price buckets, volume zone, sweet spot and a
 * buy/sell recommendation derived from a sample of sold prices.
 *
 * Bucketing runs in two passes. Pass 1 picks a step from the price span and
 * lays buckets from floor(min/step)*step until max is covered. When that
 * yields more than MAX_BUCKETS, pass 2 widens the step to ceil(span/5)
 * rounded up to a multiple of 100 and stops after MAX_BUCKETS buckets.
 */

import { round1, round2 } from '../utils/math';
import { nearestRank, sortAscending, standardDeviation, summarizePrices } from './price-stats';

// =============================================================================
// TYPES
// =============================================================================

export interface PriceRange {
  min: number;
  max: number;
}

export interface DistributionBucket extends PriceRange {
  /** Display label, e.g. "$400-600" */
  range: string;
  count: number;
  /** Share of the sample, 1 decimal */
  percentage: number;
  bar: string;
}

export interface SweetSpot {
  min: number;
  max: number;
  range: string;
  description: string;
}

export interface PriceRecommendation {
  targetBuyPrice: number;
  targetSellPrice: number;
  expectedMarginPct: number;
  volumeZone: string | null;
  advice: string;
}

export interface PricePercentiles {
  p10: number;
  p25: number;
  p50: number;
  p75: number;
  p90: number;
}

export interface DetailedPriceAnalysis {
  basicStats: {
    count: number;
    average: number;
    median: number;
    min: number;
    max: number;
    stdDev: number;
  };
  distribution: DistributionBucket[];
  volumeZone: string | null;
  sweetSpot: SweetSpot;
  percentiles: PricePercentiles;
  recommendation: PriceRecommendation;
}

export interface PriceDistributionReport {
  totalCount: number;
  average: number;
  median: number;
  min: number;
  max: number;
  ranges: DistributionBucket[];
  volumeZone: string | null;
  sweetSpot: SweetSpot;
}

// =============================================================================
// CONSTANTS
// =============================================================================

export const MAX_BUCKETS = 6;
export const BAR_WIDTH = 20;

/** Upper span bound -> step. Spans above the last bound use FALLBACK_STEP. */
const STEP_BREAKPOINTS: ReadonlyArray<[maxSpan: number, step: number]> = [
  [200, 50],
  [500, 100],
  [1000, 200],
  [2000, 300],
];
const FALLBACK_STEP = 500;

/** Target buy price as a fraction of the 25th percentile */
const BUY_FACTOR = 0.6;

export const ADVICE = {
  highDispersion: 'High price dispersion; condition drives large price gaps',
  stablePricing: 'Stable pricing; the market is easy to read',
  steadyDemand: 'High sales volume; demand is steady',
  thinMarket: 'Low sales volume; possibly a thin niche market',
} as const;

const ADVICE_SEPARATOR = '. ';

// =============================================================================
// BUCKETING
// =============================================================================

export function chooseStep(span: number): number {
  for (const [maxSpan, step] of STEP_BREAKPOINTS) {
    if (span <= maxSpan) return step;
  }
  return FALLBACK_STEP;
}

/** Step used by the second pass: ceil(span / 5), rounded up to the next 100. */
export function widenedStep(span: number): number {
  return Math.ceil(Math.ceil(span / 5) / 100) * 100;
}

/**
 * Lay consecutive [current, current + step] ranges starting at
 * floor(min / step) * step while current < max, stopping at `cap` ranges.
 */
export function buildRanges(min: number, max: number, step: number, cap = Infinity): PriceRange[] {
  const ranges: PriceRange[] = [];
  let current = Math.floor(min / step) * step;
  while (current < max && ranges.length < cap) {
    ranges.push({ min: current, max: current + step });
    current += step;
  }
  return ranges;
}

export function autoPriceRanges(prices: readonly number[]): PriceRange[] {
  if (prices.length === 0) return [];
  const min = Math.min(...prices);
  const max = Math.max(...prices);
  const span = max - min;

  const step = chooseStep(span);
  const firstPass = buildRanges(min, max, step);

  if (firstPass.length === 0) {
    // Every price sits exactly on one boundary
    const start = Math.floor(min / step) * step;
    return [{ min: start, max: start + step }];
  }
  if (firstPass.length <= MAX_BUCKETS) return firstPass;

  return buildRanges(min, max, widenedStep(span), MAX_BUCKETS);
}

export function renderBar(percentage: number, width = BAR_WIDTH): string {
  const filled = Math.min(width, Math.max(0, Math.round((percentage / 100) * width)));
  return '█'.repeat(filled) + '░'.repeat(width - filled);
}

export function rangeLabel(range: PriceRange): string {
  return `$${Math.trunc(range.min)}-${Math.trunc(range.max)}`;
}

/**
 * Count prices per range: [min, max) for every range but the last, which is
 * [min, max].
 */
export function priceDistribution(prices: readonly number[], ranges: readonly PriceRange[]): DistributionBucket[] {
  const total = prices.length;
  return ranges.map((range, i) => {
    const isLast = i === ranges.length - 1;
    const count = prices.filter((p) => p >= range.min && (isLast ? p <= range.max : p < range.max)).length;
    const percentage = total > 0 ? round1((count / total) * 100) : 0;
    return {
      range: rangeLabel(range),
      min: range.min,
      max: range.max,
      count,
      percentage,
      bar: renderBar(percentage),
    };
  });
}

/** First bucket holding the highest count. */
export function findVolumeZone(distribution: readonly DistributionBucket[]): DistributionBucket | null {
  let best: DistributionBucket | null = null;
  for (const bucket of distribution) {
    if (!best || bucket.count > best.count) best = bucket;
  }
  return best;
}

// =============================================================================
// RECOMMENDATION
// =============================================================================

export function sweetSpot(prices: readonly number[]): SweetSpot | null {
  if (prices.length === 0) return null;
  const sorted = sortAscending(prices);
  const p25 = nearestRank(sorted, 25);
  const p50 = nearestRank(sorted, 50);
  return {
    min: round2(p25),
    max: round2(p50),
    range: `$${Math.trunc(p25)}-${Math.trunc(p50)}`,
    description: 'Suggested buy range (25th percentile to median)',
  };
}

export function coefficientOfVariation(prices: readonly number[]): number {
  if (prices.length === 0) return 0;
  const avg = prices.reduce((s, p) => s + p, 0) / prices.length;
  if (avg === 0) return 0;
  return round1((standardDeviation(prices) / avg) * 100);
}

export function priceAdvice(prices: readonly number[]): string {
  if (prices.length === 0) return '';
  const cv = coefficientOfVariation(prices);
  const advice: string[] = [];

  if (cv > 50) {
    advice.push(ADVICE.highDispersion);
  } else if (cv < 20) {
    advice.push(ADVICE.stablePricing);
  }

  if (prices.length >= 50) {
    advice.push(ADVICE.steadyDemand);
  } else if (prices.length < 20) {
    advice.push(ADVICE.thinMarket);
  }

  return advice.join(ADVICE_SEPARATOR);
}

/**
 * Buy at 60% of the 25th percentile, sell at the 50th percentile.
 */
export function recommendation(
  prices: readonly number[],
  distribution: readonly DistributionBucket[],
): PriceRecommendation | null {
  if (prices.length === 0) return null;
  const sorted = sortAscending(prices);
  const buy = nearestRank(sorted, 25) * BUY_FACTOR;
  const sell = nearestRank(sorted, 50);

  return {
    targetBuyPrice: round2(buy),
    targetSellPrice: sell,
    expectedMarginPct: round1(((sell - buy) / buy) * 100),
    volumeZone: findVolumeZone(distribution)?.range ?? null,
    advice: priceAdvice(prices),
  };
}

// =============================================================================
// REPORTS
// =============================================================================

export function analyzeDistribution(
  prices: readonly number[],
  ranges: readonly PriceRange[] = autoPriceRanges(prices),
): PriceDistributionReport | null {
  const summary = summarizePrices(prices);
  const spot = sweetSpot(prices);
  if (!summary || !spot) return null;

  const distribution = priceDistribution(prices, ranges);
  return {
    totalCount: summary.count,
    average: summary.average,
    median: summary.median,
    min: summary.min,
    max: summary.max,
    ranges: distribution,
    volumeZone: findVolumeZone(distribution)?.range ?? null,
    sweetSpot: spot,
  };
}

export function analyzePrices(prices: readonly number[]): DetailedPriceAnalysis | null {
  const summary = summarizePrices(prices);
  const spot = sweetSpot(prices);
  const distribution = priceDistribution(prices, autoPriceRanges(prices));
  const rec = recommendation(prices, distribution);
  if (!summary || !spot || !rec) return null;

  const sorted = sortAscending(prices);
  return {
    basicStats: {
      ...summary,
      stdDev: standardDeviation(prices),
    },
    distribution,
    volumeZone: findVolumeZone(distribution)?.range ?? null,
    sweetSpot: spot,
    percentiles: {
      p10: nearestRank(sorted, 10),
      p25: nearestRank(sorted, 25),
      p50: nearestRank(sorted, 50),
      p75: nearestRank(sorted, 75),
      p90: nearestRank(sorted, 90),
    },
    recommendation: rec,
  };
}
