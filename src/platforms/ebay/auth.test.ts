import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { getAccessToken, clearTokenCache, parseTokenResponse } from './auth';
import { MarketplaceApiError } from '../../utils/errors';

// =============================================================================
// Mock fetch globally
// =============================================================================

const mockFetch = vi.fn();

beforeEach(() => {
  mockFetch.mockReset();
  vi.stubGlobal('fetch', mockFetch);
  clearTokenCache();
});

afterEach(() => {
  vi.unstubAllGlobals();
});

function mockSuccessResponse(accessToken: string, expiresIn: number = 7200) {
  return {
    ok: true,
    status: 200,
    json: vi.fn().mockResolvedValue({
      access_token: accessToken,
      expires_in: expiresIn,
    }),
    text: vi.fn().mockResolvedValue(''),
  };
}

function mockErrorResponse(status: number, body: string) {
  return {
    ok: false,
    status,
    json: vi.fn().mockResolvedValue({}),
    text: vi.fn().mockResolvedValue(body),
  };
}

const credentials = { clientId: 'test-client', clientSecret: 'test-secret' };

// =============================================================================
// Tests
// =============================================================================

describe('eBay Auth - getAccessToken', () => {
  it('fetches a new token on first call', async () => {
    mockFetch.mockResolvedValueOnce(mockSuccessResponse('token-abc'));

    const token = await getAccessToken(credentials);

    expect(token).toBe('token-abc');
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });

  it('returns cached token on second call', async () => {
    mockFetch.mockResolvedValueOnce(mockSuccessResponse('token-abc', 7200));

    const token1 = await getAccessToken(credentials);
    const token2 = await getAccessToken(credentials);

    expect(token1).toBe('token-abc');
    expect(token2).toBe('token-abc');
    // Second call served from cache
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });

  it('requests a new token when within the 5-minute expiry buffer', async () => {
    // 200s left is inside the 300s buffer
    mockFetch.mockResolvedValueOnce(mockSuccessResponse('token-old', 200));
    expect(await getAccessToken(credentials)).toBe('token-old');

    mockFetch.mockResolvedValueOnce(mockSuccessResponse('token-new', 7200));
    expect(await getAccessToken(credentials)).toBe('token-new');
    expect(mockFetch).toHaveBeenCalledTimes(2);
  });

  it('uses the client_credentials grant with the insights scope', async () => {
    mockFetch.mockResolvedValueOnce(mockSuccessResponse('token-cc'));

    await getAccessToken(credentials);

    const body = new URLSearchParams(String(mockFetch.mock.calls[0][1]?.body));
    expect(body.get('grant_type')).toBe('client_credentials');
    expect(body.get('scope')).toBe(
      'https://api.ebay.com/oauth/api_scope https://api.ebay.com/oauth/api_scope/buy.marketplace.insights',
    );
  });

  it('uses production endpoint by default', async () => {
    mockFetch.mockResolvedValueOnce(mockSuccessResponse('token-prod'));

    await getAccessToken(credentials);

    expect(mockFetch.mock.calls[0][0]).toBe('https://api.ebay.com/identity/v1/oauth2/token');
  });

  it('uses sandbox endpoint when specified', async () => {
    mockFetch.mockResolvedValueOnce(mockSuccessResponse('token-sandbox'));

    await getAccessToken({ ...credentials, environment: 'sandbox' });

    expect(mockFetch.mock.calls[0][0]).toBe('https://api.sandbox.ebay.com/identity/v1/oauth2/token');
  });

  it('throws a MarketplaceApiError on HTTP error', async () => {
    mockFetch.mockResolvedValueOnce(mockErrorResponse(401, 'Unauthorized'));

    const attempt = getAccessToken({ clientId: 'bad-client', clientSecret: 'bad-secret' });
    await expect(attempt).rejects.toBeInstanceOf(MarketplaceApiError);
    await expect(attempt).rejects.toThrow('eBay OAuth failed (401): Unauthorized');
  });

  it('rejects a malformed token payload', async () => {
    mockFetch.mockResolvedValueOnce({ ok: true, status: 200, json: vi.fn().mockResolvedValue({ token: 'x' }) });

    await expect(getAccessToken(credentials)).rejects.toThrow('unexpected token payload');
  });

  it('validates the token payload fields', () => {
    expect(parseTokenResponse({ access_token: 'tok', expires_in: 7200, token_type: 'Application Access Token' })).toEqual({
      accessToken: 'tok',
      expiresIn: 7200,
    });
    expect(() => parseTokenResponse({ access_token: 'tok', expires_in: '7200' })).toThrow(MarketplaceApiError);
    expect(() => parseTokenResponse({ access_token: '', expires_in: 7200 })).toThrow('unexpected token payload');
    expect(() => parseTokenResponse(null)).toThrow('unexpected token payload');
  });

  it('sends Basic auth header with base64-encoded credentials', async () => {
    mockFetch.mockResolvedValueOnce(mockSuccessResponse('token'));

    await getAccessToken({ clientId: 'my-id', clientSecret: 'my-secret' });

    const headers = mockFetch.mock.calls[0][1]?.headers;
    const expectedAuth = Buffer.from('my-id:my-secret').toString('base64');
    expect(headers).toMatchObject({ Authorization: `Basic ${expectedAuth}` });
  });

  it('caches per client id', async () => {
    mockFetch.mockResolvedValueOnce(mockSuccessResponse('token-a'));
    mockFetch.mockResolvedValueOnce(mockSuccessResponse('token-b'));

    const tokenA = await getAccessToken({ clientId: 'client-a', clientSecret: 'secret-a' });
    const tokenB = await getAccessToken({ clientId: 'client-b', clientSecret: 'secret-b' });

    expect(tokenA).toBe('token-a');
    expect(tokenB).toBe('token-b');
    expect(mockFetch).toHaveBeenCalledTimes(2);
  });

  it('clears cache properly', async () => {
    mockFetch.mockResolvedValueOnce(mockSuccessResponse('token-1'));
    await getAccessToken(credentials);

    clearTokenCache();

    mockFetch.mockResolvedValueOnce(mockSuccessResponse('token-2'));
    expect(await getAccessToken(credentials)).toBe('token-2');
  });

  it('uses an injected fetch instead of the global one', async () => {
    const injected = vi.fn().mockResolvedValue(mockSuccessResponse('token-injected'));

    expect(await getAccessToken(credentials, injected)).toBe('token-injected');
    expect(mockFetch).not.toHaveBeenCalled();
  });
});
