/**
 * Shared domain types
 */

import type { HttpRateLimitConfig } from './utils/http';

// =============================================================================
// Catalog
// =============================================================================

/** One product row as read from the catalog spreadsheet. */
export interface CatalogRow {
  /** 1-based sheet row number; stable product key */
  rowNumber: number;
  no: string;
  category: string;
  maker: string;
  productName: string;
  activeUrl: string;
  soldUrl: string;
}

export interface Product {
  id: number;
  rowNumber: number;
  category: string | null;
  maker: string | null;
  productName: string;
  activeUrl: string | null;
  soldUrl: string | null;
  createdAt: Date;
  updatedAt: Date;
}

// =============================================================================
// Measurements
// =============================================================================

/** Values captured for one product during a fetch pass. */
export interface SnapshotMeasurement {
  activeCount: number | null;
  soldCount: number | null;
  balance: number | null;
  /** Source currency (USD) */
  avgPrice?: number | null;
  minPrice?: number | null;
  maxPrice?: number | null;
  /** Average price converted to the local currency, floored */
  avgPriceLocal?: number | null;
}

export interface Snapshot {
  id: number;
  productId: number;
  activeCount: number | null;
  soldCount: number | null;
  balance: number | null;
  avgPrice: number | null;
  minPrice: number | null;
  maxPrice: number | null;
  avgPriceLocal: number | null;
  recordedAt: Date;
}

// =============================================================================
// Config
// =============================================================================

export type EbayEnvironment = 'sandbox' | 'production';

export interface EbayCredentials {
  clientId: string;
  clientSecret: string;
  environment?: EbayEnvironment;
  marketplace?: string;
}

export interface Config {
  ebay: {
    clientId: string;
    clientSecret: string;
    environment: EbayEnvironment;
    marketplace: string;
    /** Two-letter item location filter applied to every search */
    locatedIn: string;
    /** Pause between marketplace calls */
    requestDelayMs: number;
  };
  catalog: {
    sheetPath: string;
  };
  currency: {
    source: string;
    local: string;
    apiKey?: string;
    cacheTtlMs: number;
  };
  database: {
    path: string;
  };
  fetch: {
    batchSize: number;
    flushEvery: number;
    priceSampleLimit: number;
  };
  http: HttpRateLimitConfig;
}
