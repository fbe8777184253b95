/**
 * Trend Analyzer - direction of a product's balance over a window of
 * snapshots, plus population-wide rising-product and price-change reports.
 */

import { formatDate } from '../export/formats';
import type { ProductCatalog } from '../products/catalog';
import type { PriceChange, SnapshotStore } from '../snapshots/store';
import { windowStart } from '../snapshots/store';
import type { Product, Snapshot } from '../types';
import { round1, round2 } from '../utils/math';

// =============================================================================
// TYPES
// =============================================================================

export type Trend = 'rising' | 'falling' | 'stable' | 'unknown';

export interface TrendPoint {
  /** MM/DD in local time */
  date: string;
  recordedAt: Date;
  balance: number | null;
  activeCount: number | null;
  soldCount: number | null;
  avgPrice: number | null;
}

export interface ValueChange {
  oldest: number | null;
  newest: number | null;
  changePercent: number | null;
}

export interface InsufficientTrendData {
  status: 'insufficient_data';
  productName: string;
  periodDays: number;
  message: string;
}

export interface TrendReport {
  status: 'ok';
  productName: string;
  periodDays: number;
  dataPoints: number;
  balance: ValueChange;
  price: ValueChange;
  trend: Trend;
  /** Oldest first */
  points: TrendPoint[];
  advice: string;
}

export type TrendAnalysis = InsufficientTrendData | TrendReport;

export interface RisingProduct {
  product: Product;
  balanceChange: number;
  currentBalance: number | null;
}

export interface PriceChangeReport {
  periodDays: number;
  thresholdPercent: number;
  rising: PriceChange[];
  falling: PriceChange[];
  totalCount: number;
}

// =============================================================================
// CLASSIFICATION
// =============================================================================

/** ±10 percentage points */
export const TREND_THRESHOLD_PERCENT = 10;

export const TREND_ADVICE: Record<Trend, string> = {
  rising: 'Demand surging, consider buying',
  falling: 'Demand declining, wait and watch',
  stable: 'Stable demand, keep monitoring',
  unknown: 'Insufficient data to judge',
};

export const TREND_LABELS: Record<Trend, string> = {
  rising: 'Rising',
  falling: 'Falling',
  stable: 'Flat',
  unknown: 'Undetermined',
};

export const NO_HISTORY_MESSAGE = 'No snapshot history in this period';

export function percentChange(oldValue: number | null, newValue: number | null): number | null {
  if (oldValue === null || newValue === null || oldValue <= 0) return null;
  return round1(((newValue - oldValue) / oldValue) * 100);
}

export function classifyTrend(changePercent: number | null): Trend {
  if (changePercent === null) return 'unknown';
  if (changePercent >= TREND_THRESHOLD_PERCENT) return 'rising';
  if (changePercent <= -TREND_THRESHOLD_PERCENT) return 'falling';
  return 'stable';
}

function toPoint(snapshot: Snapshot): TrendPoint {
  return {
    date: formatDate(snapshot.recordedAt, 'short'),
    recordedAt: snapshot.recordedAt,
    balance: snapshot.balance,
    activeCount: snapshot.activeCount,
    soldCount: snapshot.soldCount,
    avgPrice: snapshot.avgPrice,
  };
}

function roundOrNull(value: number | null): number | null {
  return value === null ? null : round2(value);
}

function valueChange(oldest: number | null, newest: number | null): ValueChange {
  return {
    oldest: roundOrNull(oldest),
    newest: roundOrNull(newest),
    changePercent: percentChange(oldest, newest),
  };
}

export interface TrendWindow {
  days?: number;
  now?: Date;
}

/**
 * Compare the oldest and newest snapshots inside the window. Snapshots may
 * arrive in any order.
 */
export function analyzeTrend(
  product: Pick<Product, 'productName'>,
  snapshots: readonly Snapshot[],
  { days = 30, now = new Date() }: TrendWindow = {},
): TrendAnalysis {
  const from = windowStart(days, now).getTime();
  const inWindow = snapshots
    .filter((s) => s.recordedAt.getTime() >= from)
    .sort((a, b) => a.recordedAt.getTime() - b.recordedAt.getTime() || a.id - b.id);

  if (inWindow.length === 0) {
    return {
      status: 'insufficient_data',
      productName: product.productName,
      periodDays: days,
      message: NO_HISTORY_MESSAGE,
    };
  }

  const oldest = inWindow[0];
  const newest = inWindow[inWindow.length - 1];
  const balance = valueChange(oldest.balance, newest.balance);
  const trend = classifyTrend(balance.changePercent);

  return {
    status: 'ok',
    productName: product.productName,
    periodDays: days,
    dataPoints: inWindow.length,
    balance,
    price: valueChange(oldest.avgPrice, newest.avgPrice),
    trend,
    points: inWindow.map(toPoint),
    advice: TREND_ADVICE[trend],
  };
}

// =============================================================================
// ANALYZER
// =============================================================================

export interface TrendAnalyzer {
  analyze(product: Product, days?: number, now?: Date): TrendAnalysis;
  risingProducts(days?: number, limit?: number, now?: Date): RisingProduct[];
  priceChangeReport(days?: number, threshold?: number, now?: Date): PriceChangeReport;
}

export function createTrendAnalyzer(deps: { catalog: ProductCatalog; snapshots: SnapshotStore }): TrendAnalyzer {
  const { catalog, snapshots } = deps;

  function analyze(product: Product, days = 30, now = new Date()): TrendAnalysis {
    return analyzeTrend(product, snapshots.forProduct(product.id, days, now), { days, now });
  }

  return {
    analyze,

    risingProducts(days = 30, limit = 20, now = new Date()) {
      const results: RisingProduct[] = [];
      for (const product of catalog.list()) {
        const analysis = analyze(product, days, now);
        if (analysis.status !== 'ok' || analysis.trend !== 'rising') continue;
        // rising implies a change percent
        if (analysis.balance.changePercent === null) continue;
        results.push({
          product,
          balanceChange: analysis.balance.changePercent,
          currentBalance: analysis.balance.newest,
        });
      }
      return results.sort((a, b) => b.balanceChange - a.balanceChange).slice(0, limit);
    },

    priceChangeReport(days = 7, threshold = 0.1, now = new Date()) {
      const changes = snapshots.significantChanges(threshold, days, now);
      return {
        periodDays: days,
        thresholdPercent: Math.round(threshold * 100),
        rising: changes.filter((c) => c.direction === 'up'),
        falling: changes.filter((c) => c.direction === 'down'),
        totalCount: changes.length,
      };
    },
  };
}
