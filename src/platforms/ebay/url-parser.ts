/**
 * eBay search URL parser
 *
 * Turns a saved eBay search URL (https://www.ebay.com/sch/i.html?...) into
 * the parameters the Browse / Marketplace Insights searches need.
 */

import { createLogger } from '../../utils/logger';

const logger = createLogger('ebay-url');

export type PreferredLocation = 'US' | 'Worldwide' | 'NorthAmerica' | 'Asia';

export interface SearchParams {
  keyword: string | null;
  categoryId: string | null;
  buyItNow: boolean;
  location: PreferredLocation | null;
  /** Raw LH_ItemCondition value */
  conditionId: string | null;
  condition: string | null;
  soldOnly: boolean;
  completed: boolean;
  titleOnly: boolean;
}

const LOCATION_MAP: Record<string, PreferredLocation> = {
  '1': 'US',
  '2': 'Worldwide',
  '3': 'NorthAmerica',
  '98': 'Asia',
};

const CONDITION_MAP: Record<string, string> = {
  '1000': 'New',
  '1500': 'OpenBox',
  '2000': 'Refurbished',
  '2500': 'SellerRefurbished',
  '3000': 'Used',
  '7000': 'ForParts',
};

function nonEmpty(value: string | null): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

/**
 * Parse an eBay search URL. Returns null for an empty or unparsable URL, or a
 * URL without a query string.
 */
export function parseSearchUrl(url: string | null | undefined): SearchParams | null {
  if (!url || !url.trim()) return null;

  let parsed: URL;
  try {
    parsed = new URL(url.trim());
  } catch (err) {
    logger.warn({ url, err }, 'Invalid search URL');
    return null;
  }

  const query = parsed.searchParams;
  if (!parsed.search || [...query.keys()].length === 0) {
    logger.debug({ url }, 'Search URL has no query');
    return null;
  }

  const conditionId = nonEmpty(query.get('LH_ItemCondition'));
  const locationCode = query.get('LH_PrefLoc');

  return {
    // URLSearchParams already decodes %XX and '+'
    keyword: nonEmpty(query.get('_nkw')),
    categoryId: nonEmpty(query.get('_sacat')),
    buyItNow: query.get('LH_BIN') === '1',
    location: locationCode ? (LOCATION_MAP[locationCode] ?? null) : null,
    conditionId,
    condition: conditionId ? (CONDITION_MAP[conditionId] ?? null) : null,
    soldOnly: query.get('LH_Sold') === '1',
    completed: query.get('LH_Complete') === '1',
    titleOnly: query.get('LH_TitleDesc') === '0',
  };
}

export function isActiveListingUrl(url: string | null | undefined): boolean {
  const params = parseSearchUrl(url);
  return !!params && !params.soldOnly && !params.completed;
}

export function isSoldListingUrl(url: string | null | undefined): boolean {
  const params = parseSearchUrl(url);
  return !!params && params.soldOnly && params.completed;
}

export function keywordFromUrl(url: string | null | undefined): string | null {
  return parseSearchUrl(url)?.keyword ?? null;
}
