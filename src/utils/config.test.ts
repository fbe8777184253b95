import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { homedir, tmpdir } from 'os';
import { join } from 'path';
import { loadConfig, requireEbayCredentials, resolveConfigPath, resolveStateDir } from './config';
import { ConfigError } from './errors';

describe('config', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'market-balance-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function writeConfig(body: unknown): void {
    writeFileSync(join(dir, 'config.json'), JSON.stringify(body));
  }

  it('resolves the state dir and config path from the environment', () => {
    expect(resolveStateDir({ MARKET_BALANCE_STATE_DIR: '~/mb' })).toBe(join(homedir(), 'mb'));
    expect(resolveStateDir({})).toBe(join(homedir(), '.market-balance'));
    expect(resolveConfigPath({ MARKET_BALANCE_STATE_DIR: dir })).toBe(join(dir, 'config.json'));
  });

  it('falls back to defaults without a config file', () => {
    const config = loadConfig(undefined, { MARKET_BALANCE_STATE_DIR: dir });

    expect(config.ebay.locatedIn).toBe('JP');
    expect(config.ebay.environment).toBe('production');
    expect(config.ebay.requestDelayMs).toBe(1000);
    expect(config.catalog.sheetPath).toBe(join(dir, 'catalog.csv'));
    expect(config.database.path).toBe(join(dir, 'market-balance.db'));
    expect(config.fetch).toEqual({ batchSize: 500, flushEvery: 50, priceSampleLimit: 100 });
    expect(config.currency.apiKey).toBeUndefined();
  });

  it('reads file values and substitutes ${VAR} references', () => {
    writeConfig({
      ebay: { clientId: '${MY_CLIENT_ID}', locatedIn: 'US', requestDelayMs: 250 },
      currency: { local: 'eur' },
      fetch: { flushEvery: 10 },
    });

    const config = loadConfig(undefined, {
      MARKET_BALANCE_STATE_DIR: dir,
      MY_CLIENT_ID: 'test-client',
      EBAY_CLIENT_SECRET: 'test-secret',
    });

    expect(config.ebay.clientId).toBe('test-client');
    expect(config.ebay.clientSecret).toBe('test-secret');
    expect(config.ebay.locatedIn).toBe('US');
    expect(config.ebay.requestDelayMs).toBe(250);
    expect(config.currency.local).toBe('EUR');
    expect(config.fetch).toEqual({ batchSize: 500, flushEvery: 10, priceSampleLimit: 100 });
  });

  it('lets environment variables win over the file', () => {
    writeConfig({ ebay: { clientId: 'file-id' }, catalog: { sheetPath: '/tmp/file.csv' } });

    const config = loadConfig(undefined, {
      MARKET_BALANCE_STATE_DIR: dir,
      EBAY_CLIENT_ID: 'env-id',
      CATALOG_SHEET_PATH: join(dir, 'env.csv'),
    });

    expect(config.ebay.clientId).toBe('env-id');
    expect(config.catalog.sheetPath).toBe(join(dir, 'env.csv'));
  });

  it('rejects values of the wrong type', () => {
    writeConfig({ fetch: { batchSize: 'many' } });
    const load = () => loadConfig(undefined, { MARKET_BALANCE_STATE_DIR: dir });

    expect(load).toThrow(ConfigError);
    expect(load).toThrow(/fetch\.batchSize/);
  });

  it('rejects an unknown eBay environment', () => {
    expect(() => loadConfig(undefined, { MARKET_BALANCE_STATE_DIR: dir, EBAY_ENVIRONMENT: 'staging' })).toThrow(
      'Unknown eBay environment "staging"',
    );
  });

  it('ignores a config file that is not JSON', () => {
    writeFileSync(join(dir, 'config.json'), '{ not json');
    expect(loadConfig(undefined, { MARKET_BALANCE_STATE_DIR: dir }).ebay.locatedIn).toBe('JP');
  });

  it('requires eBay credentials on demand', () => {
    const config = loadConfig(undefined, { MARKET_BALANCE_STATE_DIR: dir });
    expect(() => requireEbayCredentials(config)).toThrow('EBAY_CLIENT_ID and EBAY_CLIENT_SECRET must be set');

    const withCredentials = loadConfig(undefined, {
      MARKET_BALANCE_STATE_DIR: dir,
      EBAY_CLIENT_ID: 'test-id',
      EBAY_CLIENT_SECRET: 'test-secret',
    });
    expect(() => requireEbayCredentials(withCredentials)).not.toThrow();
  });
});
