/**
 * Exchange rate client - converts source-currency prices (USD) to the local
 * currency (JPY by default) at a daily rate.
 *
 * The rate comes from open.er-api.com, or exchangerate-api.com when an API
 * key is configured, and is cached in a JSON file for 24 hours.
 */

import { existsSync, mkdirSync, readFileSync, renameSync, unlinkSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import { z } from 'zod';
import { errorMessage } from '../utils/errors';
import type { FetchFn } from '../utils/http';
import { createLogger } from '../utils/logger';

const logger = createLogger('exchange-rate');

export const DEFAULT_CACHE_TTL_MS = 24 * 60 * 60 * 1000;

export interface ExchangeRateOptions {
  /** JSON cache file location */
  cachePath: string;
  source?: string;
  target?: string;
  apiKey?: string;
  cacheTtlMs?: number;
  fetch?: FetchFn;
  now?: () => number;
}

export interface RateInfo {
  rate: number | null;
  fetchedAt: Date;
  origin: 'cache' | 'api';
}

const cachedRateSchema = z.object({
  source: z.string(),
  target: z.string(),
  rate: z.number(),
  fetchedAt: z.number(),
});

type CachedRate = z.infer<typeof cachedRateSchema>;

export interface ExchangeRateClient {
  readonly source: string;
  readonly target: string;
  /** Current rate; null when neither the cache nor the API has one */
  rate(useCache?: boolean): Promise<number | null>;
  /** Floored local amount; null for a null amount or an unavailable rate */
  convert(amount: number | null): Promise<number | null>;
  convertAll(amounts: readonly (number | null)[]): Promise<(number | null)[]>;
  currentRateInfo(): Promise<RateInfo>;
  /** Synchronous converter at the current rate, for report rendering */
  localPricing(): Promise<{ currency: string; convert(amount: number): number | null } | null>;
  clearCache(): void;
}

export function convertAt(amount: number, rate: number): number {
  return Math.floor(amount * rate);
}

export function rateApiUrl(source: string, apiKey?: string): string {
  return apiKey
    ? `https://v6.exchangerate-api.com/v6/${encodeURIComponent(apiKey)}/latest/${source}`
    : `https://open.er-api.com/v6/latest/${source}`;
}

const rateTableSchema = z.record(z.unknown()).optional().catch(undefined);

const ratePayloadSchema = z.object({
  result: z.unknown(),
  'error-type': z.unknown(),
  rates: rateTableSchema,
  conversion_rates: rateTableSchema,
});

const rateSchema = z.number().finite().positive();

/**
 * Pull one rate out of either provider's payload. open.er-api.com keys the
 * table as `rates`, exchangerate-api.com as `conversion_rates`.
 */
export function parseRatePayload(body: unknown, target: string): number | null {
  const parsed = ratePayloadSchema.safeParse(body);
  if (!parsed.success) return null;
  const payload = parsed.data;
  if (payload.result !== 'success') {
    logger.error({ errorType: payload['error-type'] }, 'Exchange rate API returned an error');
    return null;
  }
  const table = payload.rates ?? payload.conversion_rates;
  const rate = rateSchema.safeParse(table?.[target]);
  return rate.success ? rate.data : null;
}

export function createExchangeRateClient(options: ExchangeRateOptions): ExchangeRateClient {
  const source = (options.source ?? 'USD').toUpperCase();
  const target = (options.target ?? 'JPY').toUpperCase();
  const ttl = options.cacheTtlMs ?? DEFAULT_CACHE_TTL_MS;
  const fetchFn: FetchFn = options.fetch ?? ((input, init) => fetch(input, init));
  const now = options.now ?? Date.now;
  const cachePath = options.cachePath;

  function loadCache(): CachedRate | null {
    if (!existsSync(cachePath)) return null;
    try {
      const cached = cachedRateSchema.safeParse(JSON.parse(readFileSync(cachePath, 'utf-8')));
      if (!cached.success) {
        logger.warn({ cachePath }, 'Ignoring malformed exchange rate cache');
        return null;
      }
      return cached.data;
    } catch (err) {
      logger.warn({ cachePath, error: errorMessage(err) }, 'Failed to load exchange rate cache');
      return null;
    }
  }

  function isFresh(cached: CachedRate | null): cached is CachedRate {
    return (
      cached !== null &&
      cached.source === source &&
      cached.target === target &&
      now() - cached.fetchedAt < ttl
    );
  }

  function saveCache(rate: number): void {
    const data: CachedRate = { source, target, rate, fetchedAt: now() };
    const tmpPath = `${cachePath}.tmp`;
    try {
      mkdirSync(dirname(cachePath), { recursive: true });
      writeFileSync(tmpPath, JSON.stringify(data, null, 2));
      renameSync(tmpPath, cachePath);
      logger.debug({ rate }, 'Exchange rate cached');
    } catch (err) {
      logger.warn({ cachePath, error: errorMessage(err) }, 'Failed to save exchange rate cache');
    }
  }

  async function fetchRate(): Promise<number | null> {
    logger.info({ source, target }, 'Fetching exchange rate');
    try {
      const response = await fetchFn(rateApiUrl(source, options.apiKey));
      if (!response.ok) {
        logger.error({ status: response.status }, 'Failed to fetch exchange rate');
        return null;
      }
      const rate = parseRatePayload(await response.json(), target);
      if (rate === null) {
        logger.error({ target }, 'Exchange rate missing from response');
        return null;
      }
      logger.info({ source, target, rate }, 'Fetched exchange rate');
      return rate;
    } catch (err) {
      logger.error({ error: errorMessage(err) }, 'Exchange rate fetch error');
      return null;
    }
  }

  async function rate(useCache = true): Promise<number | null> {
    if (useCache) {
      const cached = loadCache();
      if (isFresh(cached)) return cached.rate;
    }
    const fetched = await fetchRate();
    if (fetched !== null) saveCache(fetched);
    return fetched;
  }

  return {
    source,
    target,
    rate,

    async convert(amount) {
      if (amount === null) return null;
      const current = await rate();
      return current === null ? null : convertAt(amount, current);
    },

    async convertAll(amounts) {
      const current = await rate();
      return amounts.map((amount) => (amount === null || current === null ? null : convertAt(amount, current)));
    },

    async currentRateInfo() {
      const cached = loadCache();
      if (isFresh(cached)) {
        return { rate: cached.rate, fetchedAt: new Date(cached.fetchedAt), origin: 'cache' };
      }
      const fetched = await fetchRate();
      if (fetched !== null) saveCache(fetched);
      return { rate: fetched, fetchedAt: new Date(now()), origin: 'api' };
    },

    async localPricing() {
      const current = await rate();
      if (current === null) return null;
      return { currency: target, convert: (amount: number) => convertAt(amount, current) };
    },

    clearCache() {
      if (existsSync(cachePath)) unlinkSync(cachePath);
      logger.info('Exchange rate cache cleared');
    },
  };
}
