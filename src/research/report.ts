/**
 * Console rendering for trend, price-change and price analysis reports.
 */

import type { DetailedPriceAnalysis } from '../analytics/price-distribution';
import { CONDITION_LABELS, type ItemCondition, type PriceSummary } from '../analytics/price-stats';
import { round1 } from '../utils/math';
import { TREND_LABELS, type PriceChangeReport, type RisingProduct, type TrendAnalysis } from './trends';

const WIDE = '='.repeat(70);
const NARROW = '='.repeat(60);
const BAR_WIDTH = 20;

/** Converts a source-currency amount for display next to it. */
export interface LocalPricing {
  currency: string;
  convert(amount: number): number | null;
}

// =============================================================================
// Helpers
// =============================================================================

export function truncate(text: string, length: number): string {
  if (text.length <= length) return text;
  return text.slice(0, length - 3) + '...';
}

export function signed(value: number, digits = 1): string {
  return (value >= 0 ? '+' : '') + value.toFixed(digits);
}

function formatChange(change: number | null): string {
  if (change === null) return 'N/A';
  return change > 0 ? `+${change}%` : `${change}%`;
}

function formatLocal(amount: number, pricing?: LocalPricing): string {
  if (!pricing) return '';
  const converted = pricing.convert(amount);
  if (converted === null) return '';
  const formatted = new Intl.NumberFormat('en-US', {
    style: 'currency',
    currency: pricing.currency,
    maximumFractionDigits: 0,
  }).format(converted);
  return ` (${formatted})`;
}

// =============================================================================
// Trend
// =============================================================================

export function renderTrend(analysis: TrendAnalysis): string {
  if (analysis.status === 'insufficient_data') return `${analysis.productName}: ${analysis.message}`;

  const lines = [WIDE, `Trend: ${analysis.productName}`, WIDE, '', `Balance over the last ${analysis.periodDays} days`];

  const balances = analysis.points.map((p) => p.balance ?? 0);
  const maxBalance = Math.max(...balances) || 1;

  let previous: number | null = null;
  for (const point of analysis.points) {
    const balance = point.balance ?? 0;
    const filled = Math.round((balance / maxBalance) * BAR_WIDTH);
    const bar = '█'.repeat(filled) + '░'.repeat(BAR_WIDTH - filled);

    let change = '';
    if (previous !== null && previous > 0) {
      const pct = round1(((balance - previous) / previous) * 100);
      change = pct > 0 ? `  ↑ +${pct}%` : `  ↓ ${pct}%`;
    }
    previous = balance;

    lines.push(`   ${point.date}: ${balance.toFixed(1)}  ${bar}${change}`);
  }

  lines.push('');
  lines.push(
    `Verdict: ${TREND_LABELS[analysis.trend]} (${formatChange(analysis.balance.changePercent)} over ${analysis.periodDays} days)`,
  );
  lines.push(`Advice: ${analysis.advice}`);
  lines.push(WIDE);
  return lines.join('\n');
}

// =============================================================================
// Population reports
// =============================================================================

export function renderPriceChanges(report: PriceChangeReport): string {
  const lines = [
    WIDE,
    `Price changes (moved ${report.thresholdPercent}% or more over ${report.periodDays} days)`,
    WIDE,
  ];

  const section = (title: string, entries: PriceChangeReport['rising'], note: string) => {
    if (entries.length === 0) return;
    lines.push('', title);
    for (const item of entries) {
      const name = truncate(item.product.productName, 20).padEnd(20);
      lines.push(
        `  ${name} $${item.oldPrice.toFixed(0)} → $${item.newPrice.toFixed(0)} (${signed(item.changePercent)}%)  ${note}`,
      );
    }
  };

  section('Falling:', report.falling, 'market down');
  section('Rising:', report.rising, 'market up');

  if (report.totalCount === 0) {
    lines.push('', '  No products matched');
  }

  lines.push(WIDE);
  return lines.join('\n');
}

export function renderRisingProducts(products: readonly RisingProduct[], days: number): string {
  const lines = [WIDE, `Rising products (last ${days} days)`, WIDE];

  if (products.length === 0) {
    lines.push('', '   No products matched', '   Run fetch-all regularly to build up history');
  } else {
    lines.push('', `   ${'Product'.padEnd(35)} | Balance now | Change`, '   ' + '-'.repeat(60));
    for (const item of products) {
      const name = truncate(item.product.productName, 35).padEnd(35);
      const balance = (item.currentBalance ?? 0).toFixed(2).padStart(11);
      lines.push(`   ${name} | ${balance} | ${signed(item.balanceChange)}%`);
    }
  }

  lines.push('', WIDE);
  return lines.join('\n');
}

// =============================================================================
// Price analysis
// =============================================================================

export function renderPriceAnalysis(
  keyword: string,
  analysis: DetailedPriceAnalysis | null,
  pricing?: LocalPricing,
): string {
  const lines = [WIDE, `Price analysis: ${keyword}`, WIDE];

  if (!analysis) {
    lines.push('', 'No sold listings found');
    return lines.join('\n');
  }

  const stats = analysis.basicStats;
  lines.push(
    '',
    'Basic statistics',
    `   Sold:      ${stats.count} (last 90 days)`,
    `   Average:   $${stats.average}${formatLocal(stats.average, pricing)}`,
    `   Median:    $${stats.median}${formatLocal(stats.median, pricing)}`,
    `   Min:       $${stats.min}`,
    `   Max:       $${stats.max}`,
    `   Std dev:   $${stats.stdDev}`,
  );

  const pct = analysis.percentiles;
  lines.push(
    '',
    'Percentiles',
    `   10%: $${pct.p10}  25%: $${pct.p25}  50%: $${pct.p50}  75%: $${pct.p75}  90%: $${pct.p90}`,
  );

  lines.push('', 'Distribution');
  for (const bucket of analysis.distribution) {
    lines.push(`   ${bucket.range.padEnd(12)} ${bucket.bar} ${bucket.count} (${bucket.percentage}%)`);
  }

  lines.push(
    '',
    'Findings',
    `   Volume zone: ${analysis.volumeZone ?? 'N/A'} (most traded price band)`,
    `   Sweet spot:  ${analysis.sweetSpot.range} (${analysis.sweetSpot.description})`,
  );

  const rec = analysis.recommendation;
  lines.push(
    '',
    'Recommendation',
    `   Target buy price:  $${rec.targetBuyPrice}${formatLocal(rec.targetBuyPrice, pricing)}`,
    `   Target sell price: $${rec.targetSellPrice}${formatLocal(rec.targetSellPrice, pricing)}`,
    `   Expected margin:   ${rec.expectedMarginPct}%`,
  );
  if (rec.advice) lines.push(`   Advice:            ${rec.advice}`);

  lines.push('', WIDE);
  return lines.join('\n');
}

export function renderConditionComparison(keyword: string, byCondition: ReadonlyMap<ItemCondition, PriceSummary>): string {
  const lines = [NARROW, `Price by condition: ${keyword}`, NARROW];

  if (byCondition.size === 0) {
    lines.push('', 'No sold listings found');
    return lines.join('\n');
  }

  lines.push('', 'Condition          | Sold | Average   | Min     | Max     | Median', '-'.repeat(70));

  const rows = [...byCondition.entries()].sort(([, a], [, b]) => b.average - a.average);
  for (const [condition, summary] of rows) {
    lines.push(
      [
        CONDITION_LABELS[condition].padEnd(18),
        String(summary.count).padStart(4),
        `$${String(summary.average).padStart(8)}`,
        `$${String(summary.min).padStart(6)}`,
        `$${String(summary.max).padStart(6)}`,
        `$${String(summary.median).padStart(6)}`,
      ].join(' | '),
    );
  }

  lines.push('', NARROW);
  return lines.join('\n');
}
