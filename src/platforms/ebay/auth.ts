/**
 * eBay OAuth 2.0 - application token management
 *
 * client_credentials grant only: the Browse and Marketplace Insights APIs
 * need an application token, never a user token. Tokens are cached per
 * client id and environment and refreshed 5 minutes before expiry.
 */

import { z } from 'zod';
import type { EbayCredentials, EbayEnvironment } from '../../types';
import { MarketplaceApiError } from '../../utils/errors';
import type { FetchFn } from '../../utils/http';
import { createLogger } from '../../utils/logger';

const logger = createLogger('ebay-auth');

/** Buffer before expiry at which we proactively refresh (5 minutes). */
const EXPIRY_BUFFER_MS = 5 * 60 * 1000;

interface CachedToken {
  accessToken: string;
  expiresAt: number;
}

const ENDPOINTS: Record<EbayEnvironment, string> = {
  production: 'https://api.ebay.com/identity/v1/oauth2/token',
  sandbox: 'https://api.sandbox.ebay.com/identity/v1/oauth2/token',
};

export const API_BASE: Record<EbayEnvironment, string> = {
  production: 'https://api.ebay.com',
  sandbox: 'https://api.sandbox.ebay.com',
};

const APPLICATION_SCOPES = [
  'https://api.ebay.com/oauth/api_scope',
  'https://api.ebay.com/oauth/api_scope/buy.marketplace.insights',
].join(' ');

// key = clientId:env
const tokenCache = new Map<string, CachedToken>();

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number().finite().positive(),
});

export function parseTokenResponse(body: unknown): { accessToken: string; expiresIn: number } {
  const parsed = tokenResponseSchema.safeParse(body);
  if (!parsed.success) {
    throw new MarketplaceApiError('eBay OAuth returned an unexpected token payload', 200);
  }
  return { accessToken: parsed.data.access_token, expiresIn: parsed.data.expires_in };
}

/**
 * Get a valid application access token, requesting a new one when the cached
 * token is missing or about to expire.
 */
export async function getAccessToken(
  credentials: EbayCredentials,
  fetchFn: FetchFn = (input, init) => fetch(input, init),
): Promise<string> {
  const env = credentials.environment ?? 'production';
  const cacheKey = `${credentials.clientId}:${env}`;

  const cached = tokenCache.get(cacheKey);
  if (cached && Date.now() < cached.expiresAt - EXPIRY_BUFFER_MS) {
    return cached.accessToken;
  }

  const basicAuth = Buffer.from(`${credentials.clientId}:${credentials.clientSecret}`).toString('base64');
  const body = new URLSearchParams({
    grant_type: 'client_credentials',
    scope: APPLICATION_SCOPES,
  });

  const response = await fetchFn(ENDPOINTS[env], {
    method: 'POST',
    headers: {
      'Content-Type': 'application/x-www-form-urlencoded',
      'Authorization': `Basic ${basicAuth}`,
    },
    body: body.toString(),
  });

  if (!response.ok) {
    const errorText = await response.text();
    logger.error({ status: response.status, error: errorText }, 'eBay OAuth token request failed');
    throw new MarketplaceApiError(`eBay OAuth failed (${response.status}): ${errorText}`, response.status);
  }

  const { accessToken, expiresIn } = parseTokenResponse(await response.json());
  tokenCache.set(cacheKey, { accessToken, expiresAt: Date.now() + expiresIn * 1000 });
  logger.info({ env, expiresIn }, 'eBay access token obtained');

  return accessToken;
}

/**
 * Clear cached tokens (useful when credentials change).
 */
export function clearTokenCache(): void {
  tokenCache.clear();
}
