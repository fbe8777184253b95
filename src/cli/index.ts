#!/usr/bin/env node
/**
 * market-balance CLI
 *
 * Commands:
 * - fetch-all, fetch-batch, fetch-maker: counts (and prices) into the sheet
 * - analyze-price, analyze-row, price-comparison: sold-price analysis
 * - test-connection, show-stats, top-products, sample-parse, setup-sheet
 * - db-migrate, sync-to-db, trend, price-changes, rising-products: history
 */

// Logger level is read once when the logger module loads
if (process.argv.includes('--verbose')) {
  process.env.LOG_LEVEL = 'debug';
}

import { Command, InvalidArgumentError } from 'commander';
import { join } from 'path';
import { recommendedProducts, statsByCategory, topProducts } from '../analytics/balance';
import { createExchangeRateClient, type ExchangeRateClient } from '../currency/exchange-rate';
import { createDatabase, type Database } from '../db/index';
import { createMigrationRunner, openDatabase } from '../db/migrations';
import { formatCurrency } from '../export/formats';
import { runFetch, type FetchSummary } from '../jobs/fetch-runner';
import { createMarketplaceClient, queryFromParams, type MarketplaceClient } from '../platforms/ebay/client';
import { parseSearchUrl, type SearchParams } from '../platforms/ebay/url-parser';
import { createProductCatalog, type ProductCatalog } from '../products/catalog';
import {
  renderConditionComparison,
  renderPriceAnalysis,
  renderPriceChanges,
  renderRisingProducts,
  renderTrend,
  truncate,
} from '../research/report';
import { createTrendAnalyzer } from '../research/trends';
import { createCatalogSheet, DATA_START_ROW } from '../sheets/catalog-sheet';
import { createSnapshotStore, type SnapshotStore } from '../snapshots/store';
import type { CatalogRow, Config } from '../types';
import { loadConfig, loadEnvFiles, requireEbayCredentials, resolveStateDir } from '../utils/config';
import { errorMessage, MarketBalanceError } from '../utils/errors';
import { createHttpClient } from '../utils/http';
import { logger } from '../utils/logger';

loadEnvFiles();

const program = new Command();

process.on('unhandledRejection', (reason) => {
  logger.error({ reason }, 'Unhandled promise rejection');
});

// ============================================================================
// Option parsing
// ============================================================================

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

function parseNonNegative(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Must be a non-negative number.');
  }
  return parsed;
}

// ============================================================================
// Wiring
// ============================================================================

function marketplaceFor(config: Config): MarketplaceClient {
  requireEbayCredentials(config);
  return createMarketplaceClient({
    credentials: {
      clientId: config.ebay.clientId,
      clientSecret: config.ebay.clientSecret,
      environment: config.ebay.environment,
      marketplace: config.ebay.marketplace,
    },
    locatedIn: config.ebay.locatedIn || undefined,
    fetch: createHttpClient(config.http),
  });
}

function exchangeRateFor(config: Config): ExchangeRateClient {
  return createExchangeRateClient({
    cachePath: join(resolveStateDir(), 'exchange_rate_cache.json'),
    source: config.currency.source,
    target: config.currency.local,
    apiKey: config.currency.apiKey,
    cacheTtlMs: config.currency.cacheTtlMs,
    fetch: createHttpClient(config.http),
  });
}

interface History {
  db: Database;
  catalog: ProductCatalog;
  snapshots: SnapshotStore;
}

/** Open the migrated database, run `fn`, and always close it. */
async function withHistory<T>(config: Config, fn: (history: History) => Promise<T> | T): Promise<T> {
  const db = await openDatabase(config.database.path);
  try {
    return await fn({ db, catalog: createProductCatalog(db), snapshots: createSnapshotStore(db) });
  } finally {
    db.close();
  }
}

function printSummary(summary: FetchSummary): void {
  console.log('\nFetch summary');
  console.log(`  Processed:       ${summary.processed}`);
  console.log(`  Succeeded:       ${summary.succeeded}`);
  console.log(`  Failed:          ${summary.failed}`);
  console.log(`  Skipped:         ${summary.skipped}`);
  console.log(`  Snapshots saved: ${summary.snapshotsSaved}`);
  console.log(`  Rows written:    ${summary.rowsWritten}\n`);
}

function progressPrinter(): (done: number, total: number) => void {
  return (done, total) => {
    if (process.stdout.isTTY) {
      process.stdout.write(`\r  ${done}/${total} (${Math.floor((done / total) * 100)}%)`);
      if (done === total) process.stdout.write('\n');
    }
  };
}

interface FetchCommandOptions {
  dryRun?: boolean;
  delay?: number;
  withPrice?: boolean;
  saveHistory: boolean;
}

async function fetchProducts(config: Config, products: CatalogRow[], options: FetchCommandOptions): Promise<void> {
  logger.info({ count: products.length }, 'Products to process');
  if (products.length === 0) {
    console.log('No products to process.');
    return;
  }

  const marketplace = marketplaceFor(config);
  const sheet = createCatalogSheet(config.catalog.sheetPath);
  const fx = options.withPrice ? exchangeRateFor(config) : null;
  const fetchOptions = {
    dryRun: options.dryRun,
    withPrice: options.withPrice,
    delayMs: options.delay !== undefined ? options.delay * 1000 : config.ebay.requestDelayMs,
    flushEvery: config.fetch.flushEvery,
    priceSampleLimit: config.fetch.priceSampleLimit,
    onProgress: progressPrinter(),
  };

  const summary = options.saveHistory
    ? await withHistory(config, ({ catalog, snapshots }) =>
        runFetch(products, { marketplace, sheet, fx, catalog, snapshots }, fetchOptions),
      )
    : await runFetch(products, { marketplace, sheet, fx }, fetchOptions);

  printSummary(summary);
}

function addFetchOptions(command: Command): Command {
  return command
    .option('--dry-run', 'Walk the rows without calling the marketplace')
    .option('--delay <seconds>', 'Pause between marketplace calls', parseNonNegative)
    .option('--with-price', 'Also fetch sold-price stats')
    .option('--no-save-history', 'Do not record snapshots in the database');
}

async function analyzeKeyword(config: Config, keyword: string, options: { category?: string; limit: number }): Promise<void> {
  const marketplace = marketplaceFor(config);
  const analysis = await marketplace.getDetailedAnalysis({ keyword, categoryId: options.category }, options.limit);
  const pricing = analysis ? await exchangeRateFor(config).localPricing() : null;
  console.log(renderPriceAnalysis(keyword, analysis, pricing ?? undefined));
}

function describeParams(params: SearchParams | null): string {
  return params ? JSON.stringify(params) : '(no parameters)';
}

program
  .name('market-balance')
  .description('Demand/supply research for marketplace resale')
  .version('0.1.0')
  .option('--verbose', 'Debug logging');

// ============================================================================
// Fetch commands
// ============================================================================

addFetchOptions(
  program.command('fetch-all').description('Fetch counts for every product in the catalog sheet'),
).action(async (options: FetchCommandOptions) => {
  const config = loadConfig();
  const products = createCatalogSheet(config.catalog.sheetPath).readAllProducts();
  await fetchProducts(config, products, options);
});

addFetchOptions(
  program
    .command('fetch-batch <batch>')
    .description('Fetch one batch of rows (batch 1 starts at the first data row)')
    .option('--batch-size <n>', 'Rows per batch', parsePositiveInt),
).action(async (batch: string, options: FetchCommandOptions & { batchSize?: number }) => {
  const config = loadConfig();
  const batchNumber = parsePositiveInt(batch);
  const batchSize = options.batchSize ?? config.fetch.batchSize;
  const startRow = (batchNumber - 1) * batchSize + DATA_START_ROW;
  const endRow = startRow + batchSize - 1;
  logger.info({ batch: batchNumber, startRow, endRow }, 'Fetching batch');

  const products = createCatalogSheet(config.catalog.sheetPath).readProducts(startRow, endRow);
  await fetchProducts(config, products, options);
});

addFetchOptions(
  program.command('fetch-maker <maker>').description('Fetch counts for one maker (case-insensitive)'),
).action(async (maker: string, options: FetchCommandOptions) => {
  const config = loadConfig();
  const products = createCatalogSheet(config.catalog.sheetPath).readProductsByMaker(maker);
  await fetchProducts(config, products, options);
});

// ============================================================================
// Price analysis
// ============================================================================

program
  .command('analyze-price <keyword>')
  .description('Sold-price distribution, sweet spot and buy/sell targets for a keyword')
  .option('--category <id>', 'eBay category id')
  .option('--limit <n>', 'Sold items to sample', parsePositiveInt, 100)
  .action(async (keyword: string, options: { category?: string; limit: number }) => {
    await analyzeKeyword(loadConfig(), keyword, options);
  });

program
  .command('analyze-row <row>')
  .description('Price analysis for the sold-listing search of one sheet row')
  .option('--limit <n>', 'Sold items to sample', parsePositiveInt, 100)
  .action(async (row: string, options: { limit: number }) => {
    const config = loadConfig();
    const rowNumber = parsePositiveInt(row);
    const [product] = createCatalogSheet(config.catalog.sheetPath).readProducts(rowNumber, rowNumber);
    if (!product) {
      console.log(`Row ${rowNumber} not found`);
      return;
    }

    console.log(`Product:  ${product.productName}`);
    console.log(`Maker:    ${product.maker}`);
    console.log(`Category: ${product.category}\n`);

    const query = queryFromParams(parseSearchUrl(product.soldUrl));
    if (!query) {
      console.log('Could not extract a search keyword from the sold URL');
      return;
    }
    await analyzeKeyword(config, query.keyword, { category: query.categoryId ?? undefined, limit: options.limit });
  });

program
  .command('price-comparison <keyword>')
  .description('Sold prices grouped by item condition')
  .option('--category <id>', 'eBay category id')
  .option('--limit <n>', 'Sold items to sample', parsePositiveInt, 100)
  .action(async (keyword: string, options: { category?: string; limit: number }) => {
    const marketplace = marketplaceFor(loadConfig());
    const byCondition = await marketplace.getPriceByCondition({ keyword, categoryId: options.category }, options.limit);
    console.log(renderConditionComparison(keyword, byCondition));
  });

// ============================================================================
// Utilities
// ============================================================================

program
  .command('test-connection')
  .description('Check the catalog sheet, the marketplace API and the exchange rate API')
  .action(async () => {
    const config = loadConfig();
    console.log('='.repeat(50));
    console.log('Connection test');
    console.log('='.repeat(50));

    console.log('\n[Catalog sheet]');
    try {
      const total = createCatalogSheet(config.catalog.sheetPath).totalRows();
      console.log(`  OK. ${config.catalog.sheetPath}: ${total} rows`);
    } catch (err) {
      console.log(`  Failed: ${errorMessage(err)}`);
    }

    console.log('\n[eBay API]');
    try {
      const marketplace = marketplaceFor(config);
      const ok = await marketplace.testConnection('canon camera');
      console.log(ok ? '  OK' : '  Failed (see log)');
    } catch (err) {
      console.log(`  Failed: ${errorMessage(err)}`);
    }

    console.log('\n[Exchange rate API]');
    const info = await exchangeRateFor(config).currentRateInfo();
    console.log(
      info.rate === null
        ? '  Failed (see log)'
        : `  OK. ${config.currency.source}/${config.currency.local}: ${info.rate} (${info.origin})`,
    );
    console.log('\n' + '='.repeat(50));
  });

program
  .command('show-stats')
  .description('Product counts per category and maker, plus balance stats from history')
  .action(async () => {
    const config = loadConfig();
    const products = createCatalogSheet(config.catalog.sheetPath).readAllProducts();

    console.log('='.repeat(60));
    console.log('Catalog statistics');
    console.log('='.repeat(60));
    console.log(`\nProducts: ${products.length}`);

    const countBy = (keyOf: (p: CatalogRow) => string) => {
      const counts = new Map<string, number>();
      for (const p of products) counts.set(keyOf(p), (counts.get(keyOf(p)) ?? 0) + 1);
      return counts;
    };

    console.log('\nBy category:');
    for (const [category, count] of countBy((p) => p.category)) {
      console.log(`   ${category || '(none)'}: ${count}`);
    }

    console.log('\nBy maker (top 10):');
    const makers = [...countBy((p) => p.maker)].sort(([, a], [, b]) => b - a).slice(0, 10);
    for (const [maker, count] of makers) {
      console.log(`   ${maker || '(none)'}: ${count}`);
    }

    await withHistory(config, ({ catalog, snapshots }) => {
      const stats = statsByCategory(latestBalances(catalog, snapshots));
      if (stats.size === 0) return;
      console.log('\nBalance by category (latest snapshots):');
      for (const [category, group] of stats) {
        if (!group) continue;
        console.log(
          `   ${(category || '(none)').padEnd(20)} avg ${group.avgBalance.toFixed(2)}  ` +
            `max ${group.maxBalance.toFixed(2)}  excellent ${group.excellentCount}  good ${group.goodCount}`,
        );
      }
    });
  });

function latestBalances(catalog: ProductCatalog, snapshots: SnapshotStore) {
  return catalog.list().map((product) => {
    const latest = snapshots.latest(product.id);
    return {
      productName: product.productName,
      maker: product.maker,
      category: product.category,
      activeCount: latest?.activeCount ?? null,
      soldCount: latest?.soldCount ?? null,
      avgPrice: latest?.avgPrice ?? null,
    };
  });
}

program
  .command('top-products')
  .description('Products ranked by their latest balance')
  .option('--limit <n>', 'Rows to show', parsePositiveInt, 20)
  .option('--recommended', 'Only good and excellent ranks')
  .action(async (options: { limit: number; recommended?: boolean }) => {
    await withHistory(loadConfig(), ({ catalog, snapshots }) => {
      const items = latestBalances(catalog, snapshots);
      const ranked = options.recommended
        ? recommendedProducts(items).slice(0, options.limit)
        : topProducts(items, options.limit);

      if (ranked.length === 0) {
        console.log('No products with a balance yet. Run fetch-all first.');
        return;
      }
      console.log(`\n   ${'Product'.padEnd(35)} | Balance | Rank      | Avg price`);
      console.log('   ' + '-'.repeat(70));
      for (const item of ranked) {
        console.log(
          `   ${truncate(item.productName, 35).padEnd(35)} | ${(item.balance ?? 0).toFixed(2).padStart(7)} | ` +
            `${item.rankLabel.padEnd(9)} | ${formatCurrency(item.avgPrice)}`,
        );
      }
    });
  });

program
  .command('sample-parse')
  .description('Show the search parameters parsed from one row')
  .option('--row <n>', 'Sheet row', parsePositiveInt, DATA_START_ROW)
  .action((options: { row: number }) => {
    const config = loadConfig();
    const [product] = createCatalogSheet(config.catalog.sheetPath).readProducts(options.row, options.row);
    if (!product) {
      console.log(`Row ${options.row} not found`);
      return;
    }
    console.log('='.repeat(60));
    console.log('URL parse sample');
    console.log('='.repeat(60));
    console.log(`\nNo: ${product.no}  Category: ${product.category}  Maker: ${product.maker}`);
    console.log(`Product: ${product.productName}`);
    console.log(`\nActive URL: ${product.activeUrl}`);
    console.log(`  -> ${describeParams(parseSearchUrl(product.activeUrl))}`);
    console.log(`\nSold URL: ${product.soldUrl}`);
    console.log(`  -> ${describeParams(parseSearchUrl(product.soldUrl))}`);
  });

program
  .command('setup-sheet')
  .description('Write the header row of the catalog sheet')
  .action(() => {
    const config = loadConfig();
    createCatalogSheet(config.catalog.sheetPath).setupHeaders();
    console.log(`Headers written to ${config.catalog.sheetPath}`);
  });

// ============================================================================
// History
// ============================================================================

program
  .command('db-migrate')
  .description('Apply pending database migrations')
  .action(async () => {
    const config = loadConfig();
    const db = await createDatabase({ path: config.database.path });
    try {
      const runner = createMigrationRunner(db);
      const applied = runner.migrate();
      console.log(`Applied ${applied} migration(s). Current version: ${runner.getCurrentVersion()}`);
    } finally {
      db.close();
    }
  });

program
  .command('sync-to-db')
  .description('Upsert every catalog row into the product table')
  .action(async () => {
    const config = loadConfig();
    const rows = createCatalogSheet(config.catalog.sheetPath).readAllProducts();
    await withHistory(config, ({ catalog }) => {
      catalog.syncAll(rows);
      console.log(`Synced ${rows.length} products to the database`);
    });
  });

program
  .command('trend <name>')
  .description('Balance trend for products whose name contains <name>')
  .option('--days <n>', 'Window in days', parsePositiveInt, 30)
  .action(async (name: string, options: { days: number }) => {
    await withHistory(loadConfig(), ({ catalog, snapshots }) => {
      const products = catalog.searchByName(name);
      if (products.length === 0) {
        console.log(`No product matching "${name}". Run sync-to-db first.`);
        return;
      }
      const analyzer = createTrendAnalyzer({ catalog, snapshots });
      console.log(products.map((p) => renderTrend(analyzer.analyze(p, options.days))).join('\n\n'));
    });
  });

program
  .command('price-changes')
  .description('Products whose average price moved past a threshold')
  .option('--days <n>', 'Window in days', parsePositiveInt, 7)
  .option('--threshold <percent>', 'Minimum change in percent', parseNonNegative, 10)
  .action(async (options: { days: number; threshold: number }) => {
    await withHistory(loadConfig(), ({ catalog, snapshots }) => {
      const report = createTrendAnalyzer({ catalog, snapshots }).priceChangeReport(options.days, options.threshold / 100);
      console.log(renderPriceChanges(report));
    });
  });

program
  .command('rising-products')
  .description('Products whose balance is trending up')
  .option('--days <n>', 'Window in days', parsePositiveInt, 30)
  .option('--limit <n>', 'Rows to show', parsePositiveInt, 20)
  .action(async (options: { days: number; limit: number }) => {
    await withHistory(loadConfig(), ({ catalog, snapshots }) => {
      const rising = createTrendAnalyzer({ catalog, snapshots }).risingProducts(options.days, options.limit);
      console.log(renderRisingProducts(rising, options.days));
    });
  });

program.parseAsync().catch((err: unknown) => {
  if (err instanceof MarketBalanceError) {
    console.error(`\n  \x1b[31mError:\x1b[0m ${err.message}\n`);
  } else {
    logger.error({ err }, 'Command failed');
  }
  process.exit(1);
});
