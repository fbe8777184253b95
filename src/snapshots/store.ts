/**
 * Snapshot Store - append-only log of per-product measurements.
 */

import { columnDate, columnNullableNumber, columnNumber, type Database, type SqlRow } from '../db/index';
import { createProductCatalog } from '../products/catalog';
import { SnapshotOrderError, UnknownProductError } from '../utils/errors';
import { round1 } from '../utils/math';
import type { Product, Snapshot, SnapshotMeasurement } from '../types';

const DAY_MS = 24 * 60 * 60 * 1000;

// =============================================================================
// TYPES
// =============================================================================

export interface SnapshotDiff {
  /** Percent, 1 decimal; null when either side is missing or older <= 0 */
  balanceChange: number | null;
  priceChange: number | null;
  activeCountChange: number;
  soldCountChange: number;
}

export type PriceDirection = 'up' | 'down';

export interface PriceChange {
  product: Product;
  oldPrice: number;
  newPrice: number;
  changePercent: number;
  direction: PriceDirection;
}

export interface SnapshotStore {
  record(productId: number, measurement: SnapshotMeasurement, recordedAt?: Date): Snapshot;
  since(timestamp: Date): Snapshot[];
  forProduct(productId: number, days?: number, now?: Date): Snapshot[];
  latest(productId: number): Snapshot | null;
  diff(newer: Snapshot, older: Snapshot | null): SnapshotDiff | null;
  significantChanges(threshold?: number, days?: number, now?: Date): PriceChange[];
  count(): number;
}

// =============================================================================
// PURE HELPERS
// =============================================================================

function relativeChange(current: number | null, previous: number | null): number | null {
  if (current === null || previous === null || previous <= 0) return null;
  return round1(((current - previous) / previous) * 100);
}

export function diffSnapshots(newer: Snapshot, older: Snapshot): SnapshotDiff {
  return {
    balanceChange: relativeChange(newer.balance, older.balance),
    priceChange: relativeChange(newer.avgPrice, older.avgPrice),
    activeCountChange: (newer.activeCount ?? 0) - (older.activeCount ?? 0),
    soldCountChange: (newer.soldCount ?? 0) - (older.soldCount ?? 0),
  };
}

export function windowStart(days: number, now: Date): Date {
  return new Date(now.getTime() - days * DAY_MS);
}

function parseSnapshot(row: SqlRow): Snapshot {
  return {
    id: columnNumber(row, 'id'),
    productId: columnNumber(row, 'product_id'),
    activeCount: columnNullableNumber(row, 'active_count'),
    soldCount: columnNullableNumber(row, 'sold_count'),
    balance: columnNullableNumber(row, 'balance'),
    avgPrice: columnNullableNumber(row, 'avg_price'),
    minPrice: columnNullableNumber(row, 'min_price'),
    maxPrice: columnNullableNumber(row, 'max_price'),
    avgPriceLocal: columnNullableNumber(row, 'avg_price_local'),
    recordedAt: columnDate(row, 'recorded_at'),
  };
}

// =============================================================================
// STORE
// =============================================================================

export function createSnapshotStore(db: Database): SnapshotStore {
  const catalog = createProductCatalog(db);

  function byId(id: number): Snapshot {
    const row = db.get('SELECT * FROM snapshots WHERE id = ?', [id]);
    if (!row) throw new Error(`Snapshot ${id} not found after insert`);
    return parseSnapshot(row);
  }

  return {
    record(productId, measurement, recordedAt = new Date()) {
      const exists = db.get('SELECT 1 AS found FROM products WHERE id = ?', [productId]);
      if (!exists) throw new UnknownProductError(productId);

      const last = db.get('SELECT MAX(recorded_at) AS latest FROM snapshots WHERE product_id = ?', [productId]);
      const latestAt = last ? columnNullableNumber(last, 'latest') : null;
      if (latestAt !== null && recordedAt.getTime() < latestAt) {
        throw new SnapshotOrderError(productId, recordedAt, new Date(latestAt));
      }

      db.run(
        `INSERT INTO snapshots
           (product_id, active_count, sold_count, balance, avg_price, avg_price_local, min_price, max_price, recorded_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        [
          productId,
          measurement.activeCount,
          measurement.soldCount,
          measurement.balance,
          measurement.avgPrice ?? null,
          measurement.avgPriceLocal ?? null,
          measurement.minPrice ?? null,
          measurement.maxPrice ?? null,
          recordedAt.getTime(),
        ],
      );
      return byId(db.lastInsertId());
    },

    since(timestamp) {
      return db
        .query('SELECT * FROM snapshots WHERE recorded_at >= ? ORDER BY recorded_at, id', [timestamp.getTime()])
        .map(parseSnapshot);
    },

    forProduct(productId, days, now = new Date()) {
      if (days === undefined) {
        return db
          .query('SELECT * FROM snapshots WHERE product_id = ? ORDER BY recorded_at, id', [productId])
          .map(parseSnapshot);
      }
      return db
        .query('SELECT * FROM snapshots WHERE product_id = ? AND recorded_at >= ? ORDER BY recorded_at, id', [
          productId,
          windowStart(days, now).getTime(),
        ])
        .map(parseSnapshot);
    },

    latest(productId) {
      const row = db.get('SELECT * FROM snapshots WHERE product_id = ? ORDER BY recorded_at DESC, id DESC LIMIT 1', [
        productId,
      ]);
      return row ? parseSnapshot(row) : null;
    },

    diff(newer, older) {
      return older ? diffSnapshots(newer, older) : null;
    },

    significantChanges(threshold = 0.1, days = 7, now = new Date()) {
      const rows = db
        .query('SELECT * FROM snapshots WHERE recorded_at >= ? ORDER BY product_id, recorded_at, id', [
          windowStart(days, now).getTime(),
        ])
        .map(parseSnapshot);

      const byProduct = new Map<number, Snapshot[]>();
      for (const snapshot of rows) {
        const group = byProduct.get(snapshot.productId) ?? [];
        group.push(snapshot);
        byProduct.set(snapshot.productId, group);
      }

      const results: PriceChange[] = [];
      for (const [productId, snapshots] of byProduct) {
        if (snapshots.length < 2) continue;
        const oldPrice = snapshots[0].avgPrice;
        const newPrice = snapshots[snapshots.length - 1].avgPrice;
        if (oldPrice === null || newPrice === null || oldPrice <= 0) continue;

        const change = (newPrice - oldPrice) / oldPrice;
        if (Math.abs(change) < threshold) continue;

        const product = catalog.get(productId);
        if (!product) continue;

        results.push({
          product,
          oldPrice,
          newPrice,
          changePercent: round1(change * 100),
          direction: change > 0 ? 'up' : 'down',
        });
      }

      return results.sort((a, b) => Math.abs(b.changePercent) - Math.abs(a.changePercent));
    },

    count() {
      const row = db.get('SELECT COUNT(*) AS n FROM snapshots');
      return row ? columnNumber(row, 'n') : 0;
    },
  };
}
