/**
 * Configuration loading and management
 *
 * Loads config from ~/.market-balance/.env and ~/.market-balance/config.json,
 * merged over built-in defaults. Environment variables win over the file.
 */

import { readFileSync, existsSync } from 'fs';
import { homedir } from 'os';
import { join, resolve } from 'path';
import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';
import type { Config, EbayEnvironment } from '../types';
import { ConfigError } from './errors';
import { createLogger } from './logger';

const logger = createLogger('config');

function resolveUserPath(input: string): string {
  const trimmed = input.trim();
  if (!trimmed) return trimmed;
  if (trimmed.startsWith('~')) {
    return resolve(trimmed.replace(/^~(?=$|[\\/])/, homedir()));
  }
  return resolve(trimmed);
}

export function resolveStateDir(env = process.env): string {
  const override = env.MARKET_BALANCE_STATE_DIR?.trim();
  if (override) return resolveUserPath(override);
  return join(homedir(), '.market-balance');
}

export function resolveConfigPath(env = process.env): string {
  const override = env.MARKET_BALANCE_CONFIG_PATH?.trim();
  if (override) return resolveUserPath(override);
  return join(resolveStateDir(env), 'config.json');
}

/** Load .env from the state dir first, then CWD (won't override existing vars). */
export function loadEnvFiles(env = process.env): void {
  dotenvConfig({ path: join(resolveStateDir(env), '.env') });
  dotenvConfig();
}

export function defaultConfig(env = process.env): Config {
  const stateDir = resolveStateDir(env);
  return {
    ebay: {
      clientId: '',
      clientSecret: '',
      environment: 'production',
      marketplace: 'EBAY_US',
      locatedIn: 'JP',
      requestDelayMs: 1000,
    },
    catalog: {
      sheetPath: join(stateDir, 'catalog.csv'),
    },
    currency: {
      source: 'USD',
      local: 'JPY',
      cacheTtlMs: 24 * 60 * 60 * 1000,
    },
    database: {
      path: join(stateDir, 'market-balance.db'),
    },
    fetch: {
      batchSize: 500,
      flushEvery: 50,
      priceSampleLimit: 100,
    },
    http: {
      enabled: true,
      defaultRateLimit: { maxRequests: 60, windowMs: 60_000 },
      perHost: {},
      retry: {
        enabled: true,
        maxAttempts: 3,
        minDelay: 1000,
        maxDelay: 30_000,
        jitter: 0.1,
        backoffMultiplier: 2,
        methods: ['GET', 'HEAD', 'OPTIONS'],
      },
    },
  };
}

// =============================================================================
// File schema
// =============================================================================

const text = z.string().optional();
const amount = z.number().finite().nonnegative().optional();

const fileConfigSchema = z.object({
  ebay: z
    .object({
      clientId: text,
      clientSecret: text,
      environment: text,
      marketplace: text,
      locatedIn: text,
      requestDelayMs: amount,
    })
    .default({}),
  catalog: z.object({ sheetPath: text }).default({}),
  currency: z
    .object({
      source: text,
      local: text,
      apiKey: text,
      cacheTtlMs: amount,
    })
    .default({}),
  database: z.object({ path: text }).default({}),
  fetch: z
    .object({
      batchSize: amount,
      flushEvery: amount,
      priceSampleLimit: amount,
    })
    .default({}),
  http: z
    .object({
      enabled: z.boolean().optional(),
      retry: z.object({ maxAttempts: amount }).default({}),
    })
    .default({}),
});

export type FileConfig = z.infer<typeof fileConfigSchema>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Substitute environment variables in config values.
 * Supports ${VAR_NAME} syntax.
 */
function substituteEnvVars(value: string, env: NodeJS.ProcessEnv): string {
  return value.replace(/\$\{([A-Z_][A-Z0-9_]*)\}/g, (_, varName: string) => {
    return env[varName] ?? '';
  });
}

function readEnvironment(value: string): EbayEnvironment {
  if (value === 'sandbox' || value === 'production') return value;
  throw new ConfigError(`Unknown eBay environment "${value}" (expected sandbox or production)`);
}

function readFileConfig(configPath: string): Record<string, unknown> {
  if (!existsSync(configPath)) return {};
  try {
    const parsed: unknown = JSON.parse(readFileSync(configPath, 'utf-8'));
    if (isRecord(parsed)) return parsed;
    logger.error({ configPath }, 'Config file is not a JSON object; ignoring');
  } catch (err) {
    logger.error({ configPath, error: err }, 'Failed to parse config file');
  }
  return {};
}

/** Validate the file's sections; a value of the wrong type is a ConfigError. */
export function parseFileConfig(raw: Record<string, unknown>): FileConfig {
  const result = fileConfigSchema.safeParse(raw);
  if (!result.success) {
    const problems = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid config file (${problems.join('; ')})`);
  }
  return result.data;
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Build a Config from defaults, an optional JSON file and the environment.
 */
export function loadConfig(customPath?: string, env = process.env): Config {
  const defaults = defaultConfig(env);
  const file = parseFileConfig(readFileConfig(customPath ?? resolveConfigPath(env)));
  const setting = (value: string | undefined, fallback: string): string =>
    value === undefined ? fallback : substituteEnvVars(value, env);

  const environment = readEnvironment(
    env.EBAY_ENVIRONMENT?.trim() || setting(file.ebay.environment, defaults.ebay.environment),
  );

  const apiKey = env.EXCHANGE_RATE_API_KEY?.trim() || setting(file.currency.apiKey, '');

  return {
    ebay: {
      clientId: env.EBAY_CLIENT_ID?.trim() || setting(file.ebay.clientId, defaults.ebay.clientId),
      clientSecret: env.EBAY_CLIENT_SECRET?.trim() || setting(file.ebay.clientSecret, defaults.ebay.clientSecret),
      environment,
      marketplace: setting(file.ebay.marketplace, defaults.ebay.marketplace),
      locatedIn: setting(file.ebay.locatedIn, defaults.ebay.locatedIn),
      requestDelayMs: file.ebay.requestDelayMs ?? defaults.ebay.requestDelayMs,
    },
    catalog: {
      sheetPath: resolveUserPath(
        env.CATALOG_SHEET_PATH?.trim() || setting(file.catalog.sheetPath, defaults.catalog.sheetPath),
      ),
    },
    currency: {
      source: setting(file.currency.source, defaults.currency.source).toUpperCase(),
      local: setting(file.currency.local, defaults.currency.local).toUpperCase(),
      apiKey: apiKey || undefined,
      cacheTtlMs: file.currency.cacheTtlMs ?? defaults.currency.cacheTtlMs,
    },
    database: {
      path: resolveUserPath(setting(file.database.path, defaults.database.path)),
    },
    fetch: {
      batchSize: file.fetch.batchSize ?? defaults.fetch.batchSize,
      flushEvery: file.fetch.flushEvery ?? defaults.fetch.flushEvery,
      priceSampleLimit: file.fetch.priceSampleLimit ?? defaults.fetch.priceSampleLimit,
    },
    http: {
      ...defaults.http,
      enabled: file.http.enabled ?? defaults.http.enabled,
      retry: {
        ...defaults.http.retry,
        maxAttempts: file.http.retry.maxAttempts ?? defaults.http.retry?.maxAttempts ?? 3,
      },
    },
  };
}

/** Fail fast when a command needs eBay credentials that are missing. */
export function requireEbayCredentials(config: Config): void {
  if (!config.ebay.clientId || !config.ebay.clientSecret) {
    throw new ConfigError('EBAY_CLIENT_ID and EBAY_CLIENT_SECRET must be set');
  }
}
