/**
 * Balance Engine - demand/supply ratio (sold / active) and its rank scale.
 */

import { round2 } from '../utils/math';

// =============================================================================
// TYPES
// =============================================================================

export type Rank = 'excellent' | 'good' | 'fair' | 'poor';

export interface RankInfo {
  /** Lower bound, inclusive */
  min: number;
  label: string;
  description: string;
}

export interface BalanceInput {
  soldCount?: number | null;
  activeCount?: number | null;
}

export type WithBalance<T> = T & {
  balance: number | null;
  rank: Rank;
  rankLabel: string;
};

export interface GroupStats {
  count: number;
  avgBalance: number;
  maxBalance: number;
  minBalance: number;
  excellentCount: number;
  goodCount: number;
  fairCount: number;
  poorCount: number;
}

// =============================================================================
// RANKS
// =============================================================================

export const RANK_INFO: Record<Rank, RankInfo> = {
  excellent: { min: 2.0, label: 'Excellent', description: 'Demand exceeds supply; buy candidate' },
  good: { min: 1.0, label: 'Good', description: 'Demand and supply balanced; worth considering' },
  fair: { min: 0.5, label: 'Fair', description: 'Supply slightly ahead; wait and see' },
  poor: { min: 0.0, label: 'Poor', description: 'Oversupplied; avoid' },
};

/**
 * sold / active, 2 decimals. null when there are no active listings to
 * divide by; 0 when nothing sold.
 */
export function calculateBalance(
  soldCount: number | null | undefined,
  activeCount: number | null | undefined,
): number | null {
  if (!activeCount) return null;
  if (!soldCount) return 0;
  return round2(soldCount / activeCount);
}

export function rankBalance(balance: number | null | undefined): Rank {
  if (balance === null || balance === undefined || balance < RANK_INFO.fair.min) return 'poor';
  if (balance >= RANK_INFO.excellent.min) return 'excellent';
  if (balance >= RANK_INFO.good.min) return 'good';
  return 'fair';
}

export function rankInfo(balance: number | null | undefined): RankInfo {
  return RANK_INFO[rankBalance(balance)];
}

export function rankLabel(balance: number | null | undefined): string {
  return rankInfo(balance).label;
}

// =============================================================================
// COLLECTIONS
// =============================================================================

export function calculateAll<T extends BalanceInput>(items: readonly T[]): WithBalance<T>[] {
  return items.map((item) => {
    const balance = calculateBalance(item.soldCount, item.activeCount);
    return { ...item, balance, rank: rankBalance(balance), rankLabel: rankLabel(balance) };
  });
}

// Array.prototype.sort is stable, so equal balances keep input order
function byBalanceDesc<T>(items: WithBalance<T>[]): WithBalance<T>[] {
  return items.sort((a, b) => (b.balance ?? 0) - (a.balance ?? 0));
}

export function topProducts<T extends BalanceInput>(items: readonly T[], limit = 100): WithBalance<T>[] {
  const positive = calculateAll(items).filter((item) => item.balance !== null && item.balance > 0);
  return byBalanceDesc(positive).slice(0, limit);
}

export function recommendedProducts<T extends BalanceInput>(items: readonly T[]): WithBalance<T>[] {
  const recommended = calculateAll(items).filter((item) => item.rank === 'good' || item.rank === 'excellent');
  return byBalanceDesc(recommended);
}

function groupStats<T extends BalanceInput>(items: readonly WithBalance<T>[]): GroupStats | null {
  const balances = items.flatMap((item) => (item.balance === null ? [] : [item.balance]));
  if (balances.length === 0) return null;

  const countRank = (rank: Rank) => items.filter((item) => item.rank === rank).length;
  return {
    count: items.length,
    avgBalance: round2(balances.reduce((s, b) => s + b, 0) / balances.length),
    maxBalance: Math.max(...balances),
    minBalance: Math.min(...balances),
    excellentCount: countRank('excellent'),
    goodCount: countRank('good'),
    fairCount: countRank('fair'),
    poorCount: countRank('poor'),
  };
}

/** Group by key, then summarize. A group with no balance at all maps to null. */
export function statsBy<T extends BalanceInput>(
  items: readonly T[],
  keyOf: (item: T) => string,
): Map<string, GroupStats | null> {
  const groups = new Map<string, WithBalance<T>[]>();
  for (const item of calculateAll(items)) {
    const key = keyOf(item);
    const group = groups.get(key) ?? [];
    group.push(item);
    groups.set(key, group);
  }

  const result = new Map<string, GroupStats | null>();
  for (const [key, group] of groups) {
    result.set(key, groupStats(group));
  }
  return result;
}

export function statsByCategory<T extends BalanceInput & { category?: string | null }>(
  items: readonly T[],
): Map<string, GroupStats | null> {
  return statsBy(items, (item) => item.category ?? '');
}

export function statsByMaker<T extends BalanceInput & { maker?: string | null }>(
  items: readonly T[],
): Map<string, GroupStats | null> {
  return statsBy(items, (item) => item.maker ?? '');
}
