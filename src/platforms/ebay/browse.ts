/**
 * eBay Browse API - active listing search
 *
 * Endpoints:
 * - GET /buy/browse/v1/item_summary/search
 *
 * `total` on the response is the active listing count for the query.
 */

import type { EbayCredentials } from '../../types';
import { MarketplaceApiError } from '../../utils/errors';
import type { FetchFn } from '../../utils/http';
import { createLogger } from '../../utils/logger';
import { API_BASE, getAccessToken } from './auth';
import { parseSearchResponse, type EbaySearchResponse, type SearchQuery } from './types';

const logger = createLogger('ebay-browse');

export interface SearchApiOptions {
  fetch?: FetchFn;
  /** Two-letter item location filter, e.g. "JP" */
  locatedIn?: string;
}

/**
 * Build the `filter` query value both search APIs accept.
 */
export function buildFilter(query: SearchQuery, locatedIn?: string): string | null {
  const filters: string[] = [];
  if (query.conditionId) filters.push(`conditionIds:{${query.conditionId}}`);
  if (query.buyItNow) filters.push('buyingOptions:{FIXED_PRICE}');
  if (locatedIn) filters.push(`itemLocationCountry:${locatedIn}`);
  return filters.length > 0 ? filters.join(',') : null;
}

export function searchParams(query: SearchQuery, locatedIn?: string): URLSearchParams {
  const params = new URLSearchParams({
    q: query.keyword,
    limit: String(query.limit ?? 1),
  });
  if (query.categoryId) params.set('category_ids', query.categoryId);
  const filter = buildFilter(query, locatedIn);
  if (filter) params.set('filter', filter);
  return params;
}

export interface EbayBrowseApi {
  searchActive(query: SearchQuery): Promise<EbaySearchResponse>;
}

export function createEbayBrowseApi(credentials: EbayCredentials, options: SearchApiOptions = {}): EbayBrowseApi {
  const env = credentials.environment ?? 'production';
  const baseUrl = API_BASE[env];
  const fetchFn: FetchFn = options.fetch ?? ((input, init) => fetch(input, init));

  return {
    async searchActive(query) {
      const accessToken = await getAccessToken(credentials, fetchFn);
      const params = searchParams(query, options.locatedIn);

      logger.debug({ query: query.keyword, params: params.toString() }, 'Searching active listings');

      const response = await fetchFn(`${baseUrl}/buy/browse/v1/item_summary/search?${params.toString()}`, {
        headers: {
          'Authorization': `Bearer ${accessToken}`,
          'X-EBAY-C-MARKETPLACE-ID': credentials.marketplace ?? 'EBAY_US',
          'Content-Type': 'application/json',
        },
      });

      if (!response.ok) {
        const errorText = await response.text();
        logger.error({ status: response.status, error: errorText }, 'eBay Browse API search failed');
        throw new MarketplaceApiError(`eBay Browse API search failed (${response.status})`, response.status);
      }

      return parseSearchResponse(await response.json());
    },
  };
}
