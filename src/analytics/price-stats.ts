/**
 * Price Statistics - central tendency, spread and percentiles over a sample
 * of sold prices.
 *
 * Pure functions. Samples reaching these functions are assumed valid; run
 * untrusted input through `validatePriceSample` first.
 */

import { InvalidPriceSampleError } from '../utils/errors';
import { round2 } from '../utils/math';

// =============================================================================
// TYPES
// =============================================================================

export interface PriceSummary {
  count: number;
  average: number;
  median: number;
  min: number;
  max: number;
}

export type ItemCondition =
  | 'new'
  | 'open_box'
  | 'refurbished'
  | 'used'
  | 'used_very_good'
  | 'used_good'
  | 'used_acceptable'
  | 'for_parts'
  | 'unknown';

/** One sold price with the condition it sold in. */
export interface PriceObservation {
  price: number;
  condition: ItemCondition;
}

// =============================================================================
// VALIDATION
// =============================================================================

/**
 * Check a raw sample at the boundary. Throws InvalidPriceSampleError on the
 * first value that is not a positive finite number.
 */
export function validatePriceSample(values: readonly unknown[]): number[] {
  return values.map((value, index) => {
    if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
      throw new InvalidPriceSampleError(index, value);
    }
    return value;
  });
}

// =============================================================================
// STATISTICS
// =============================================================================

export function sortAscending(prices: readonly number[]): number[] {
  return [...prices].sort((a, b) => a - b);
}

function sum(prices: readonly number[]): number {
  return prices.reduce((s, p) => s + p, 0);
}

export function mean(prices: readonly number[]): number | null {
  if (prices.length === 0) return null;
  return round2(sum(prices) / prices.length);
}

/**
 * Middle element for odd counts; mean of the two central elements
 * (2 decimals) for even counts.
 */
export function median(prices: readonly number[]): number | null {
  if (prices.length === 0) return null;
  const sorted = sortAscending(prices);
  const mid = Math.floor(sorted.length / 2);
  if (sorted.length % 2 === 1) return sorted[mid];
  return round2((sorted[mid - 1] + sorted[mid]) / 2);
}

/** Population standard deviation (2 decimals); 0 below two observations. */
export function standardDeviation(prices: readonly number[]): number {
  if (prices.length < 2) return 0;
  const avg = sum(prices) / prices.length;
  const variance = prices.reduce((s, p) => s + (p - avg) ** 2, 0) / prices.length;
  return round2(Math.sqrt(variance));
}

/** Nearest-rank lookup on an already sorted, non-empty sample. */
export function nearestRank(sorted: readonly number[], p: number): number {
  const clamped = Math.min(100, Math.max(0, p));
  // Math.round: x.5 goes up, so p50 of four values picks index 2
  const index = Math.round((clamped / 100) * (sorted.length - 1));
  return sorted[index];
}

/**
 * Nearest-rank percentile: the element at round(p/100 * (n-1)) of the sorted
 * sample. No interpolation, so `percentile(xs, 50)` can differ from `median`.
 */
export function percentile(prices: readonly number[], p: number): number | null {
  if (prices.length === 0) return null;
  return nearestRank(sortAscending(prices), p);
}

export function summarizePrices(prices: readonly number[]): PriceSummary | null {
  if (prices.length === 0) return null;
  const sorted = sortAscending(prices);
  const mid = Math.floor(sorted.length / 2);
  return {
    count: sorted.length,
    average: round2(sum(sorted) / sorted.length),
    median: sorted.length % 2 === 1 ? sorted[mid] : round2((sorted[mid - 1] + sorted[mid]) / 2),
    min: sorted[0],
    max: sorted[sorted.length - 1],
  };
}

/**
 * Partition observations by key and summarize each partition. Keys with no
 * prices never appear in the result.
 */
export function groupPricesBy<T, K extends string>(
  observations: readonly T[],
  keyOf: (observation: T) => K,
  priceOf: (observation: T) => number,
): Map<K, PriceSummary> {
  const partitions = new Map<K, number[]>();
  for (const observation of observations) {
    const key = keyOf(observation);
    const bucket = partitions.get(key) ?? [];
    bucket.push(priceOf(observation));
    partitions.set(key, bucket);
  }

  const result = new Map<K, PriceSummary>();
  for (const [key, prices] of partitions) {
    const summary = summarizePrices(prices);
    if (summary) result.set(key, summary);
  }
  return result;
}

export function summarizeByCondition(observations: readonly PriceObservation[]): Map<ItemCondition, PriceSummary> {
  return groupPricesBy(observations, (o) => o.condition, (o) => o.price);
}

// =============================================================================
// CONDITIONS
// =============================================================================

const CONDITION_BY_ID: Record<string, ItemCondition> = {
  '1000': 'new',
  '1500': 'open_box',
  '2000': 'refurbished',
  '2500': 'refurbished',
  '3000': 'used',
  '4000': 'used_very_good',
  '5000': 'used_good',
  '6000': 'used_acceptable',
  '7000': 'for_parts',
};

export function conditionFromId(conditionId: string | null | undefined): ItemCondition {
  if (!conditionId) return 'unknown';
  return CONDITION_BY_ID[conditionId] ?? 'unknown';
}

export const CONDITION_LABELS: Record<ItemCondition, string> = {
  new: 'New',
  open_box: 'Open box',
  refurbished: 'Refurbished',
  used: 'Used',
  used_very_good: 'Used (very good)',
  used_good: 'Used (good)',
  used_acceptable: 'Used (acceptable)',
  for_parts: 'For parts',
  unknown: 'Unknown',
};
