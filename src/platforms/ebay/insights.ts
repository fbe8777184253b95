/**
 * eBay Marketplace Insights API: recently sold items
 *
 * Endpoints:
 * - GET /buy/marketplace_insights/v1_beta/item_sales/search (sold items, last 90 days)
 *
 * Returns actual sale prices, not just listing prices.
 */

import type { EbayCredentials } from '../../types';
import { MarketplaceApiError } from '../../utils/errors';
import type { FetchFn } from '../../utils/http';
import { createLogger } from '../../utils/logger';
import { API_BASE, getAccessToken } from './auth';
import { searchParams, type SearchApiOptions } from './browse';
import { parseSoldSearchResponse, type EbaySoldSearchResponse, type SearchQuery } from './types';

const logger = createLogger('ebay-insights');

/** Insights API page size ceiling */
export const MAX_SOLD_PAGE_SIZE = 200;

export interface EbayInsightsApi {
  searchSold(query: SearchQuery): Promise<EbaySoldSearchResponse>;
}

export function createEbayInsightsApi(credentials: EbayCredentials, options: SearchApiOptions = {}): EbayInsightsApi {
  const env = credentials.environment ?? 'production';
  const baseUrl = API_BASE[env];
  const fetchFn: FetchFn = options.fetch ?? ((input, init) => fetch(input, init));

  return {
    async searchSold(query) {
      const token = await getAccessToken(credentials, fetchFn);
      const limit = Math.min(Math.max(1, query.limit ?? 1), MAX_SOLD_PAGE_SIZE);
      const params = searchParams({ ...query, limit }, options.locatedIn);

      logger.debug({ query: query.keyword, params: params.toString() }, 'Searching sold items');

      const response = await fetchFn(
        `${baseUrl}/buy/marketplace_insights/v1_beta/item_sales/search?${params.toString()}`,
        {
          headers: {
            'Authorization': `Bearer ${token}`,
            'X-EBAY-C-MARKETPLACE-ID': credentials.marketplace ?? 'EBAY_US',
          },
        },
      );

      if (!response.ok) {
        const errorText = await response.text();
        logger.error({ status: response.status, query: query.keyword, error: errorText }, 'Failed to search sold items');
        throw new MarketplaceApiError(`eBay Insights search failed (${response.status})`, response.status);
      }

      return parseSoldSearchResponse(await response.json());
    },
  };
}
