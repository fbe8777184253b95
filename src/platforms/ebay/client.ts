/**
 * Marketplace client - counts and sold-price analytics for one search.
 *
 * Wraps the Browse and Marketplace Insights searches. Every upstream failure
 * is logged and degraded: counts to 0, samples to [], analyses to null.
 */

import {
  conditionFromId,
  summarizeByCondition,
  summarizePrices,
  type ItemCondition,
  type PriceObservation,
  type PriceSummary,
} from '../../analytics/price-stats';
import {
  analyzeDistribution,
  analyzePrices,
  type DetailedPriceAnalysis,
  type PriceDistributionReport,
  type PriceRange,
} from '../../analytics/price-distribution';
import type { EbayCredentials } from '../../types';
import { errorMessage } from '../../utils/errors';
import type { FetchFn } from '../../utils/http';
import { createLogger } from '../../utils/logger';
import { createEbayBrowseApi } from './browse';
import { createEbayInsightsApi } from './insights';
import type { EbaySoldItem, SearchQuery } from './types';
import type { SearchParams } from './url-parser';

const logger = createLogger('marketplace');

export const DEFAULT_SAMPLE_LIMIT = 100;

export interface MarketplaceClientOptions {
  credentials: EbayCredentials;
  /** Item location country filter; omitted means worldwide */
  locatedIn?: string;
  fetch?: FetchFn;
}

export interface MarketplaceClient {
  getActiveCount(query: SearchQuery): Promise<number>;
  getSoldCount(query: SearchQuery): Promise<number>;
  getSoldPrices(query: SearchQuery, limit?: number): Promise<PriceObservation[]>;
  getPriceStats(query: SearchQuery, limit?: number): Promise<PriceSummary | null>;
  getPriceDistribution(
    query: SearchQuery,
    options?: { ranges?: PriceRange[]; limit?: number },
  ): Promise<PriceDistributionReport | null>;
  getDetailedAnalysis(query: SearchQuery, limit?: number): Promise<DetailedPriceAnalysis | null>;
  getPriceByCondition(query: SearchQuery, limit?: number): Promise<Map<ItemCondition, PriceSummary>>;
  /** One cheap search; false when the token or the search fails */
  testConnection(keyword?: string): Promise<boolean>;
}

/**
 * Search criteria from parsed URL parameters. Null when the URL carries no
 * keyword, since neither API accepts an empty query.
 */
export function queryFromParams(params: SearchParams | null): SearchQuery | null {
  if (!params?.keyword) return null;
  return {
    keyword: params.keyword,
    categoryId: params.categoryId,
    conditionId: params.conditionId,
    buyItNow: params.buyItNow,
  };
}

/** Sold price of one sale; null unless it is a positive finite amount. */
export function soldPrice(item: EbaySoldItem): number | null {
  const raw = item.lastSoldPrice?.value;
  if (raw === undefined) return null;
  const price = Number.parseFloat(raw);
  return Number.isFinite(price) && price > 0 ? price : null;
}

export function createMarketplaceClient(options: MarketplaceClientOptions): MarketplaceClient {
  const apiOptions = { fetch: options.fetch, locatedIn: options.locatedIn };
  const browse = createEbayBrowseApi(options.credentials, apiOptions);
  const insights = createEbayInsightsApi(options.credentials, apiOptions);

  async function getSoldPrices(query: SearchQuery, limit = DEFAULT_SAMPLE_LIMIT): Promise<PriceObservation[]> {
    try {
      const { itemSales } = await insights.searchSold({ ...query, limit });
      const observations: PriceObservation[] = [];
      for (const item of itemSales) {
        const price = soldPrice(item);
        if (price !== null) observations.push({ price, condition: conditionFromId(item.conditionId) });
      }
      const dropped = itemSales.length - observations.length;
      if (dropped > 0) {
        logger.warn({ keyword: query.keyword, dropped }, 'Dropped sold items without a valid price');
      }
      return observations;
    } catch (err) {
      logger.error({ keyword: query.keyword, error: errorMessage(err) }, 'Failed to fetch sold prices');
      return [];
    }
  }

  async function soldPriceValues(query: SearchQuery, limit?: number): Promise<number[]> {
    return (await getSoldPrices(query, limit)).map((o) => o.price);
  }

  return {
    async getActiveCount(query) {
      try {
        const { total } = await browse.searchActive({ ...query, limit: 1 });
        logger.debug({ keyword: query.keyword, total }, 'Active listing count');
        return total;
      } catch (err) {
        logger.error({ keyword: query.keyword, error: errorMessage(err) }, 'Failed to fetch active count');
        return 0;
      }
    },

    async getSoldCount(query) {
      try {
        const { total } = await insights.searchSold({ ...query, limit: 1 });
        logger.debug({ keyword: query.keyword, total }, 'Sold item count');
        return total;
      } catch (err) {
        logger.error({ keyword: query.keyword, error: errorMessage(err) }, 'Failed to fetch sold count');
        return 0;
      }
    },

    getSoldPrices,

    async getPriceStats(query, limit) {
      return summarizePrices(await soldPriceValues(query, limit));
    },

    async getPriceDistribution(query, opts = {}) {
      const prices = await soldPriceValues(query, opts.limit);
      return opts.ranges ? analyzeDistribution(prices, opts.ranges) : analyzeDistribution(prices);
    },

    async getDetailedAnalysis(query, limit) {
      return analyzePrices(await soldPriceValues(query, limit));
    },

    async getPriceByCondition(query, limit) {
      return summarizeByCondition(await getSoldPrices(query, limit));
    },

    async testConnection(keyword = 'test') {
      try {
        await browse.searchActive({ keyword, limit: 1 });
        return true;
      } catch (err) {
        logger.error({ error: errorMessage(err) }, 'Marketplace connection test failed');
        return false;
      }
    },
  };
}
