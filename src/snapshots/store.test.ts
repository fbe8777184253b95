import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { MEMORY_PATH, type Database } from '../db/index';
import { openDatabase } from '../db/migrations';
import { createProductCatalog, type ProductCatalog } from '../products/catalog';
import { SnapshotOrderError, UnknownProductError } from '../utils/errors';
import { createSnapshotStore, diffSnapshots, type SnapshotStore } from './store';
import type { Snapshot } from '../types';

const DAY = 24 * 60 * 60 * 1000;
const NOW = new Date('2024-06-30T00:00:00Z');

function daysAgo(days: number): Date {
  return new Date(NOW.getTime() - days * DAY);
}

function snapshot(overrides: Partial<Snapshot>): Snapshot {
  return {
    id: 1,
    productId: 1,
    activeCount: null,
    soldCount: null,
    balance: null,
    avgPrice: null,
    minPrice: null,
    maxPrice: null,
    avgPriceLocal: null,
    recordedAt: NOW,
    ...overrides,
  };
}

describe('diffSnapshots', () => {
  it('reports percent changes and count deltas', () => {
    const older = snapshot({ balance: 1, avgPrice: 100, activeCount: 5, soldCount: 10 });
    const newer = snapshot({ balance: 1.5, avgPrice: 90, activeCount: null, soldCount: 12 });

    expect(diffSnapshots(newer, older)).toEqual({
      balanceChange: 50,
      priceChange: -10,
      activeCountChange: -5,
      soldCountChange: 2,
    });
  });

  it('leaves percent changes null when the older value is missing or zero', () => {
    const diff = diffSnapshots(snapshot({ balance: 2, avgPrice: 10 }), snapshot({ balance: 0, avgPrice: null }));
    expect(diff.balanceChange).toBeNull();
    expect(diff.priceChange).toBeNull();
  });
});

describe('SnapshotStore', () => {
  let db: Database;
  let catalog: ProductCatalog;
  let store: SnapshotStore;

  function product(rowNumber: number, name = `Product ${rowNumber}`) {
    return catalog.syncFromSheet({
      rowNumber,
      no: '',
      category: '',
      maker: '',
      productName: name,
      activeUrl: '',
      soldUrl: '',
    });
  }

  beforeEach(async () => {
    db = await openDatabase(MEMORY_PATH);
    catalog = createProductCatalog(db);
    store = createSnapshotStore(db);
  });

  afterEach(() => {
    db.close();
  });

  it('refuses snapshots for an unknown product', () => {
    expect(() => store.record(42, { activeCount: 1, soldCount: 1, balance: 1 })).toThrow(UnknownProductError);
    expect(store.count()).toBe(0);
  });

  it('records a measurement and returns the stored row', () => {
    const p = product(2);
    const saved = store.record(
      p.id,
      { activeCount: 10, soldCount: 20, balance: 2, avgPrice: 123.45, avgPriceLocal: 18_000 },
      daysAgo(1),
    );

    expect(saved).toMatchObject({
      productId: p.id,
      activeCount: 10,
      soldCount: 20,
      balance: 2,
      avgPrice: 123.45,
      minPrice: null,
      avgPriceLocal: 18_000,
    });
    expect(saved.recordedAt.getTime()).toBe(daysAgo(1).getTime());
    expect(store.latest(p.id)?.id).toBe(saved.id);
  });

  it('returns snapshots in ascending time order', () => {
    const p = product(2);
    store.record(p.id, { activeCount: 2, soldCount: 1, balance: 0.5 }, daysAgo(10));
    store.record(p.id, { activeCount: 1, soldCount: 1, balance: 1 }, daysAgo(3));
    store.record(p.id, { activeCount: 3, soldCount: 1, balance: 0.33 }, daysAgo(1));

    expect(store.forProduct(p.id).map((s) => s.activeCount)).toEqual([2, 1, 3]);
    expect(store.forProduct(p.id, 5, NOW).map((s) => s.activeCount)).toEqual([1, 3]);
    expect(store.since(daysAgo(3)).map((s) => s.activeCount)).toEqual([1, 3]);
    expect(store.latest(p.id)?.activeCount).toBe(3);
  });

  it('refuses a snapshot older than the latest one for the same product', () => {
    const p = product(2);
    const other = product(3);
    store.record(p.id, { activeCount: 1, soldCount: 1, balance: 1 }, daysAgo(0));

    expect(() => store.record(p.id, { activeCount: 2, soldCount: 1, balance: 0.5 }, daysAgo(29))).toThrow(
      SnapshotOrderError,
    );
    expect(store.count()).toBe(1);

    // Same timestamp is fine, and other products keep their own clock
    store.record(p.id, { activeCount: 3, soldCount: 1, balance: 0.33 }, daysAgo(0));
    store.record(other.id, { activeCount: 1, soldCount: 1, balance: 1 }, daysAgo(29));
    expect(store.count()).toBe(3);
  });

  it('returns null for the latest snapshot of a product without history', () => {
    expect(store.latest(product(2).id)).toBeNull();
  });

  it('diffs against a missing older snapshot as null', () => {
    const p = product(2);
    const only = store.record(p.id, { activeCount: 1, soldCount: 1, balance: 1 });
    expect(store.diff(only, null)).toBeNull();
  });

  it('lists significant price changes by magnitude', () => {
    const up = product(2, 'Up');
    const flat = product(3, 'Flat');
    const down = product(4, 'Down');
    const single = product(5, 'Single');

    const record = (id: number, avgPrice: number, days: number) =>
      store.record(id, { activeCount: 1, soldCount: 1, balance: 1, avgPrice }, daysAgo(days));

    record(up.id, 100, 6);
    record(up.id, 110, 3);
    record(up.id, 120, 1);
    // Outside the 7 day window
    record(flat.id, 10, 20);
    record(flat.id, 100, 6);
    record(flat.id, 95, 1);
    record(down.id, 100, 5);
    record(down.id, 70, 2);
    // One point in the window; the older one outside it does not count
    record(single.id, 1, 20);
    record(single.id, 10, 1);

    const changes = store.significantChanges(0.1, 7, NOW);

    expect(changes.map((c) => [c.product.productName, c.changePercent, c.direction])).toEqual([
      ['Down', -30, 'down'],
      ['Up', 20, 'up'],
    ]);
    expect(changes.some((c) => c.product.id === single.id)).toBe(false);
    expect(changes[1].oldPrice).toBe(100);
    expect(changes[1].newPrice).toBe(120);
  });

  it('drops snapshots with their product', () => {
    const p = product(2);
    store.record(p.id, { activeCount: 1, soldCount: 1, balance: 1 });
    db.run('DELETE FROM products WHERE id = ?', [p.id]);
    expect(store.count()).toBe(0);
  });
});
