/**
 * HTTP client with per-host rate limiting + retry for marketplace and FX calls.
 *
 * `createHttpClient()` returns a fetch-compatible function; collaborators take
 * it as an injected dependency instead of patching the global.
 */

import { createLogger } from './logger';

const logger = createLogger('http');

// =============================================================================
// Types
// =============================================================================

export interface HttpRetryConfig {
  enabled?: boolean;
  maxAttempts?: number;
  minDelay?: number;
  maxDelay?: number;
  jitter?: number;
  backoffMultiplier?: number;
  methods?: string[];
}

export interface RateLimit {
  maxRequests: number;
  windowMs: number;
}

export interface HttpRateLimitConfig {
  enabled?: boolean;
  defaultRateLimit?: RateLimit;
  perHost?: Record<string, RateLimit>;
  retry?: HttpRetryConfig;
  /** Per-request timeout when the caller passes no AbortSignal */
  timeoutMs?: number;
}

export type FetchFn = (input: string | URL, init?: RequestInit) => Promise<Response>;

// =============================================================================
// Constants
// =============================================================================

const DEFAULT_RATE_LIMIT: RateLimit = {
  maxRequests: 60,
  windowMs: 60_000,
};

const DEFAULT_RETRY: Required<HttpRetryConfig> = {
  enabled: true,
  maxAttempts: 3,
  minDelay: 500,
  maxDelay: 30_000,
  jitter: 0.1,
  backoffMultiplier: 2,
  methods: ['GET', 'HEAD', 'OPTIONS'],
};

const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

// =============================================================================
// Helpers
// =============================================================================

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function backoffDelay(attempt: number, retry: Required<HttpRetryConfig>, random = Math.random): number {
  const base = retry.minDelay * Math.pow(retry.backoffMultiplier, attempt - 1);
  const capped = Math.min(base, retry.maxDelay);
  const jitterRange = capped * retry.jitter;
  const jitterValue = (random() * 2 - 1) * jitterRange;
  return Math.max(0, Math.round(capped + jitterValue));
}

export function parseRetryAfter(headerValue: string | null, now = Date.now()): number | null {
  if (!headerValue) return null;
  const seconds = Number.parseInt(headerValue, 10);
  if (Number.isFinite(seconds)) return seconds * 1000;
  const parsed = Date.parse(headerValue);
  if (!Number.isNaN(parsed)) {
    const delta = parsed - now;
    return delta > 0 ? delta : null;
  }
  return null;
}

function hostOf(input: string | URL): string | null {
  try {
    return new URL(input.toString()).host;
  } catch {
    return null;
  }
}

function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

// =============================================================================
// Client
// =============================================================================

export interface HttpClientOptions {
  /** Underlying transport; defaults to the global fetch at call time */
  transport?: FetchFn;
  /** Injected for tests */
  sleep?: (ms: number) => Promise<void>;
}

export function createHttpClient(config: HttpRateLimitConfig = {}, options: HttpClientOptions = {}): FetchFn {
  const transport: FetchFn = options.transport ?? ((input, init) => fetch(input, init));
  const wait = options.sleep ?? sleep;
  const retry: Required<HttpRetryConfig> = { ...DEFAULT_RETRY, ...(config.retry ?? {}) };
  const timeoutMs = config.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;

  // Fixed-window counter per host: the window opens on its first request
  const buckets = new Map<string, { count: number; resetAt: number }>();
  const cooldowns = new Map<string, number>();

  function rateLimitFor(host: string): RateLimit | null {
    if (config.enabled === false) return null;
    return config.perHost?.[host] ?? config.defaultRateLimit ?? DEFAULT_RATE_LIMIT;
  }

  async function throttle(host: string): Promise<void> {
    const until = cooldowns.get(host);
    if (until !== undefined) {
      cooldowns.delete(host);
      const delay = until - Date.now();
      if (delay > 0) {
        logger.warn({ host, delay }, 'HTTP cooldown active; waiting');
        await wait(delay);
      }
    }

    const limit = rateLimitFor(host);
    if (!limit) return;
    const now = Date.now();
    let bucket = buckets.get(host);
    if (!bucket || now >= bucket.resetAt) {
      bucket = { count: 0, resetAt: now + limit.windowMs };
      buckets.set(host, bucket);
    }
    bucket.count++;
    if (bucket.count > limit.maxRequests) {
      const waitMs = Math.max(0, bucket.resetAt - now);
      logger.warn({ host, waitMs }, 'HTTP rate limit hit; waiting');
      await wait(waitMs);
    }
  }

  return async function controlledFetch(input, init) {
    const host = hostOf(input);
    if (!host) return transport(input, init);

    await throttle(host);

    const method = (init?.method ?? 'GET').toUpperCase();
    const allowRetry = retry.enabled && retry.methods.includes(method);
    const maxAttempts = allowRetry ? Math.max(1, retry.maxAttempts) : 1;

    let lastError: unknown = null;
    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        const requestInit: RequestInit = init?.signal
          ? init
          : { ...init, signal: AbortSignal.timeout(timeoutMs) };
        const response = await transport(input, requestInit);
        if (!isRetryableStatus(response.status) || attempt >= maxAttempts) {
          return response;
        }

        // Drain the body so the connection is released before retrying
        await response.body?.cancel().catch((err: unknown) => {
          logger.debug({ host, err }, 'Failed to cancel response body');
        });

        const retryAfter = parseRetryAfter(response.headers.get('retry-after'));
        if (retryAfter) cooldowns.set(host, Date.now() + retryAfter);
        const delay = retryAfter ?? backoffDelay(attempt, retry);
        logger.warn({ host, status: response.status, attempt, delay }, 'HTTP retry scheduled');
        await wait(delay);
      } catch (error) {
        lastError = error;
        if (attempt >= maxAttempts) throw error;
        const delay = backoffDelay(attempt, retry);
        logger.warn({ host, attempt, delay, error }, 'HTTP request failed; retrying');
        await wait(delay);
      }
    }

    throw lastError ?? new Error(`HTTP request to ${host} failed`);
  };
}
