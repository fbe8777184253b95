/**
 * market-balance - demand/supply research for marketplace resale.
 *
 * Library entry point. The CLI lives in ./cli.
 */

export * from './types';

// Analytics
export * from './analytics/balance';
export * from './analytics/price-stats';
export * from './analytics/price-distribution';

// Persistence
export { createDatabase, MEMORY_PATH, type Database, type DatabaseOptions } from './db/index';
export { createMigrationRunner, getMigrations, openDatabase } from './db/migrations';
export { createProductCatalog, type ProductCatalog } from './products/catalog';
export {
  createSnapshotStore,
  diffSnapshots,
  type PriceChange,
  type SnapshotDiff,
  type SnapshotStore,
} from './snapshots/store';

// Research
export * from './research/trends';
export * from './research/report';

// Collaborators
export { parseSearchUrl, isActiveListingUrl, isSoldListingUrl, keywordFromUrl, type SearchParams } from './platforms/ebay/url-parser';
export { createMarketplaceClient, queryFromParams, type MarketplaceClient } from './platforms/ebay/client';
export type { SearchQuery } from './platforms/ebay/types';
export { createCatalogSheet, SHEET_HEADERS, type CatalogSheet, type CountsUpdate, type FullUpdate } from './sheets/catalog-sheet';
export { createExchangeRateClient, type ExchangeRateClient, type RateInfo } from './currency/exchange-rate';
export { runFetch, fetchProductData, type FetchDeps, type FetchOptions, type FetchSummary } from './jobs/fetch-runner';

// Utilities
export { loadConfig } from './utils/config';
export * from './utils/errors';
export { createLogger } from './utils/logger';
