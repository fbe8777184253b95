/**
 * Fetch runner - the batch driver behind the fetch-* commands.
 *
 * For each catalog row: parse its two search URLs, fetch the active and sold
 * counts (and optionally sold-price stats), compute the balance, append a
 * snapshot, and queue the row for write-back. Rows are processed one at a
 * time with a pause between marketplace calls; queued rows are flushed to the
 * sheet every `flushEvery` rows and once more at the end.
 */

import { calculateBalance } from '../analytics/balance';
import type { MarketplaceClient } from '../platforms/ebay/client';
import { queryFromParams } from '../platforms/ebay/client';
import { parseSearchUrl } from '../platforms/ebay/url-parser';
import type { ProductCatalog } from '../products/catalog';
import type { CatalogSheet, FullUpdate } from '../sheets/catalog-sheet';
import type { SnapshotStore } from '../snapshots/store';
import type { CatalogRow, SnapshotMeasurement } from '../types';
import { errorMessage } from '../utils/errors';
import { sleep as defaultSleep } from '../utils/http';
import { createLogger } from '../utils/logger';

const logger = createLogger('fetch-runner');

export const DEFAULT_FLUSH_EVERY = 50;

// =============================================================================
// Types
// =============================================================================

export interface FetchDeps {
  marketplace: Pick<MarketplaceClient, 'getActiveCount' | 'getSoldCount' | 'getPriceStats'>;
  sheet: Pick<CatalogSheet, 'batchUpdateCounts' | 'batchUpdateAll'>;
  /** Local-currency conversion for the average price */
  fx?: { convert(amount: number | null): Promise<number | null> } | null;
  /** Both set to record history; either missing disables it */
  catalog?: ProductCatalog | null;
  snapshots?: SnapshotStore | null;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

export interface FetchOptions {
  dryRun?: boolean;
  withPrice?: boolean;
  /** Pause between marketplace calls */
  delayMs?: number;
  flushEvery?: number;
  priceSampleLimit?: number;
  onProgress?: (done: number, total: number) => void;
}

/** End-of-run totals. */
export interface FetchSummary {
  processed: number;
  succeeded: number;
  failed: number;
  skipped: number;
  snapshotsSaved: number;
  rowsWritten: number;
}

export type ProductFetchResult = FullUpdate;

// =============================================================================
// Per-product fetch
// =============================================================================

/**
 * Fetch one product's counts (and prices when asked). A URL that yields no
 * keyword leaves its count null. Returns null when neither URL is usable.
 */
export async function fetchProductData(
  product: CatalogRow,
  marketplace: FetchDeps['marketplace'],
  options: {
    withPrice?: boolean;
    priceSampleLimit?: number;
    fx?: FetchDeps['fx'];
    pace?: () => Promise<void>;
  } = {},
): Promise<ProductFetchResult | null> {
  const pace = options.pace ?? (async () => undefined);
  const activeQuery = queryFromParams(parseSearchUrl(product.activeUrl));
  const soldQuery = queryFromParams(parseSearchUrl(product.soldUrl));

  if (!activeQuery && !soldQuery) {
    logger.warn({ row: product.rowNumber, product: product.productName }, 'No usable search URL; skipping');
    return null;
  }

  let activeCount: number | null = null;
  if (activeQuery) {
    await pace();
    activeCount = await marketplace.getActiveCount(activeQuery);
  }

  let soldCount: number | null = null;
  if (soldQuery) {
    await pace();
    soldCount = await marketplace.getSoldCount(soldQuery);
  }

  const result: ProductFetchResult = {
    rowNumber: product.rowNumber,
    activeCount,
    soldCount,
    balance: calculateBalance(soldCount, activeCount),
  };

  if (options.withPrice && soldQuery) {
    await pace();
    const stats = await marketplace.getPriceStats(soldQuery, options.priceSampleLimit);
    if (stats) {
      result.avgPrice = stats.average;
      result.minPrice = stats.min;
      result.maxPrice = stats.max;
      result.avgPriceLocal = options.fx ? await options.fx.convert(stats.average) : null;
    }
  }

  logger.info(
    {
      product: product.productName,
      active: activeCount,
      sold: soldCount,
      balance: result.balance,
      avgPrice: result.avgPrice,
    },
    'Fetched product',
  );
  return result;
}

function toMeasurement(result: ProductFetchResult): SnapshotMeasurement {
  return {
    activeCount: result.activeCount,
    soldCount: result.soldCount,
    balance: result.balance,
    avgPrice: result.avgPrice ?? null,
    minPrice: result.minPrice ?? null,
    maxPrice: result.maxPrice ?? null,
    avgPriceLocal: result.avgPriceLocal ?? null,
  };
}

// =============================================================================
// Batch driver
// =============================================================================

export async function runFetch(
  products: readonly CatalogRow[],
  deps: FetchDeps,
  options: FetchOptions = {},
): Promise<FetchSummary> {
  const summary: FetchSummary = {
    processed: 0,
    succeeded: 0,
    failed: 0,
    skipped: 0,
    snapshotsSaved: 0,
    rowsWritten: 0,
  };
  if (products.length === 0) return summary;

  const wait = deps.sleep ?? defaultSleep;
  const now = deps.now ?? (() => new Date());
  const delayMs = options.delayMs ?? 0;
  const flushEvery = Math.max(1, options.flushEvery ?? DEFAULT_FLUSH_EVERY);
  const history = deps.catalog && deps.snapshots ? { catalog: deps.catalog, snapshots: deps.snapshots } : null;

  let calls = 0;
  async function pace(): Promise<void> {
    if (calls++ > 0 && delayMs > 0) await wait(delayMs);
  }

  let pending: ProductFetchResult[] = [];
  function flush(): void {
    if (pending.length === 0) return;
    logger.info({ rows: pending.length }, 'Updating catalog sheet');
    if (options.withPrice) {
      deps.sheet.batchUpdateAll(pending, now());
    } else {
      deps.sheet.batchUpdateCounts(pending);
    }
    summary.rowsWritten += pending.length;
    pending = [];
  }

  logger.info({ total: products.length, dryRun: !!options.dryRun, withPrice: !!options.withPrice }, 'Starting fetch');

  for (const product of products) {
    summary.processed++;

    if (options.dryRun) {
      logger.debug({ product: product.productName }, 'Dry run: would process');
      summary.skipped++;
      options.onProgress?.(summary.processed, products.length);
      continue;
    }

    try {
      const result = await fetchProductData(product, deps.marketplace, {
        withPrice: options.withPrice,
        priceSampleLimit: options.priceSampleLimit,
        fx: deps.fx,
        pace,
      });

      if (result) {
        summary.succeeded++;
        pending.push(result);

        if (history) {
          try {
            const dbProduct = history.catalog.syncFromSheet(product, now());
            history.snapshots.record(dbProduct.id, toMeasurement(result), now());
            summary.snapshotsSaved++;
          } catch (err) {
            logger.warn({ product: product.productName, error: errorMessage(err) }, 'Failed to save snapshot');
          }
        }
      } else {
        summary.skipped++;
      }
    } catch (err) {
      summary.failed++;
      logger.error({ product: product.productName, error: errorMessage(err) }, 'Failed to process product');
    }

    if (pending.length >= flushEvery) flush();
    options.onProgress?.(summary.processed, products.length);
  }

  flush();

  logger.info({ ...summary }, 'Fetch completed');
  return summary;
}
