import { describe, it, expect } from 'vitest';
import {
  calculateAll,
  calculateBalance,
  rankBalance,
  rankLabel,
  recommendedProducts,
  statsByCategory,
  statsByMaker,
  topProducts,
} from './balance';

describe('calculateBalance', () => {
  it('divides sold by active, rounded to 2 decimals', () => {
    expect(calculateBalance(20, 10)).toBe(2);
    // 1 / 3 = 0.333...
    expect(calculateBalance(1, 3)).toBe(0.33);
  });

  it('rounds an exact half up', () => {
    // 57 / 200 = 0.285
    expect(calculateBalance(57, 200)).toBe(0.29);
  });

  it('returns 0 when nothing sold', () => {
    expect(calculateBalance(0, 10)).toBe(0);
    expect(calculateBalance(null, 10)).toBe(0);
  });

  it('returns null without active listings', () => {
    expect(calculateBalance(5, 0)).toBeNull();
    expect(calculateBalance(5, null)).toBeNull();
    expect(calculateBalance(undefined, undefined)).toBeNull();
  });
});

describe('rankBalance', () => {
  it('resolves boundaries to the higher rank', () => {
    expect(rankBalance(2.0)).toBe('excellent');
    expect(rankBalance(1.0)).toBe('good');
    expect(rankBalance(0.5)).toBe('fair');
    expect(rankBalance(0.49)).toBe('poor');
  });

  it('ranks a missing balance as poor', () => {
    expect(rankBalance(null)).toBe('poor');
    expect(rankLabel(null)).toBe('Poor');
  });

  it('ranks a 20 / 10 product as excellent', () => {
    expect(rankBalance(calculateBalance(20, 10))).toBe('excellent');
  });
});

const items = [
  { name: 'a', maker: 'Canon', category: 'Camera', soldCount: 5, activeCount: 10 }, // 0.5 fair
  { name: 'b', maker: 'Nikon', category: 'Camera', soldCount: 30, activeCount: 10 }, // 3 excellent
  { name: 'c', maker: 'Canon', category: 'Lens', soldCount: 0, activeCount: 4 }, // 0 poor
  { name: 'd', maker: 'Sony', category: 'Lens', soldCount: 12, activeCount: 12 }, // 1 good
  { name: 'e', maker: 'Sony', category: 'Camera', soldCount: 10, activeCount: 10 }, // 1 good
  { name: 'f', maker: 'Pentax', category: 'Film', soldCount: 3, activeCount: 0 }, // null
];

describe('calculateAll', () => {
  it('decorates every item', () => {
    const [first] = calculateAll(items);
    expect(first).toMatchObject({ name: 'a', balance: 0.5, rank: 'fair', rankLabel: 'Fair' });
  });
});

describe('topProducts', () => {
  it('keeps positive balances, sorted descending with stable ties', () => {
    expect(topProducts(items).map((i) => i.name)).toEqual(['b', 'd', 'e', 'a']);
  });

  it('truncates to the limit', () => {
    expect(topProducts(items, 2).map((i) => i.name)).toEqual(['b', 'd']);
  });
});

describe('recommendedProducts', () => {
  it('keeps good and excellent ranks', () => {
    expect(recommendedProducts(items).map((i) => i.name)).toEqual(['b', 'd', 'e']);
  });
});

describe('group stats', () => {
  it('summarizes by category', () => {
    const stats = statsByCategory(items);

    // Camera: balances 0.5, 3, 1 -> avg 1.5
    expect(stats.get('Camera')).toEqual({
      count: 3,
      avgBalance: 1.5,
      maxBalance: 3,
      minBalance: 0.5,
      excellentCount: 1,
      goodCount: 1,
      fairCount: 1,
      poorCount: 0,
    });
    expect(stats.get('Film')).toBeNull();
  });

  it('summarizes by maker', () => {
    const stats = statsByMaker(items);
    expect([...stats.keys()]).toEqual(['Canon', 'Nikon', 'Sony', 'Pentax']);
    expect(stats.get('Canon')?.avgBalance).toBe(0.25);
    expect(stats.get('Canon')?.poorCount).toBe(1);
  });
});
