import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { createCatalogSheet, SHEET_HEADERS } from './catalog-sheet';

const HEADER = SHEET_HEADERS.join(',');
const ACTIVE = 'https://www.ebay.com/sch/i.html?_nkw=alpha';
const SOLD = 'https://www.ebay.com/sch/i.html?_nkw=alpha&LH_Sold=1&LH_Complete=1';

const SHEET = [
  HEADER,
  `1,Cameras,Canon,Alpha,${ACTIVE},${SOLD}`,
  `2,Watches,Seiko,"Beta, limited",,`,
  '',
  `4,Cameras,canon,Gamma,,`,
  ',Cameras,Nikon,No number,,',
  '',
].join('\n');

describe('CatalogSheet', () => {
  let dir: string;
  let path: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'market-balance-sheet-'));
    path = join(dir, 'catalog.csv');
    writeFileSync(path, SHEET);
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('reads product rows with their sheet row numbers', () => {
    const rows = createCatalogSheet(path).readAllProducts();

    expect(rows.map((r) => r.rowNumber)).toEqual([2, 3, 5]);
    expect(rows[0]).toEqual({
      rowNumber: 2,
      no: '1',
      category: 'Cameras',
      maker: 'Canon',
      productName: 'Alpha',
      activeUrl: ACTIVE,
      soldUrl: SOLD,
    });
    expect(rows[1].productName).toBe('Beta, limited');
  });

  it('reads an inclusive row range and never the header', () => {
    const sheet = createCatalogSheet(path);
    expect(sheet.readProducts(3, 5).map((r) => r.rowNumber)).toEqual([3, 5]);
    expect(sheet.readProducts(1, 2).map((r) => r.rowNumber)).toEqual([2]);
    expect(sheet.readProducts(50, 60)).toEqual([]);
  });

  it('filters by maker case-insensitively and by exact category', () => {
    const sheet = createCatalogSheet(path);
    expect(sheet.readProductsByMaker('CANON').map((r) => r.productName)).toEqual(['Alpha', 'Gamma']);
    expect(sheet.readProductsByCategory('Watches').map((r) => r.productName)).toEqual(['Beta, limited']);
    expect(sheet.readProductsByCategory('watches')).toEqual([]);
  });

  it('counts data rows up to the last numbered row', () => {
    expect(createCatalogSheet(path).totalRows()).toBe(4);
  });

  it('returns nothing for a missing file', () => {
    const sheet = createCatalogSheet(join(dir, 'missing.csv'));
    expect(sheet.readAllProducts()).toEqual([]);
    expect(sheet.totalRows()).toBe(0);
  });

  it('writes counts into columns G-I', () => {
    const sheet = createCatalogSheet(path);
    sheet.batchUpdateCounts([
      { rowNumber: 2, activeCount: 10, soldCount: 25, balance: 2.5 },
      { rowNumber: 3, activeCount: 0, soldCount: 4, balance: null },
    ]);

    const lines = readFileSync(path, 'utf-8').split('\n');
    expect(lines[1]).toBe(`1,Cameras,Canon,Alpha,${ACTIVE},${SOLD},10,25,2.5`);
    expect(lines[2]).toBe('2,Watches,Seiko,"Beta, limited",,,0,4,');
    expect(existsSync(`${path}.tmp`)).toBe(false);
  });

  it('writes counts, prices and a timestamp into columns G-N', () => {
    const sheet = createCatalogSheet(path);
    sheet.batchUpdateAll(
      [
        {
          rowNumber: 5,
          activeCount: 3,
          soldCount: 7,
          balance: 2.3333,
          avgPrice: 123.456,
          avgPriceLocal: 18518,
          minPrice: 99.999,
          maxPrice: 150,
        },
      ],
      new Date(2025, 0, 2, 3, 4),
    );

    const lines = readFileSync(path, 'utf-8').split('\n');
    expect(lines[4]).toBe('4,Cameras,canon,Gamma,,,3,7,2.33,123.46,18518,100,150,2025-01-02 03:04');
    // Untouched rows keep their cells
    expect(lines[1]).toBe(`1,Cameras,Canon,Alpha,${ACTIVE},${SOLD}`);
  });

  it('leaves price cells empty when no prices were fetched', () => {
    const sheet = createCatalogSheet(path);
    sheet.batchUpdateAll([{ rowNumber: 2, activeCount: 1, soldCount: 0, balance: 0 }], new Date(2025, 5, 1, 12, 0));

    const lines = readFileSync(path, 'utf-8').split('\n');
    expect(lines[1]).toBe(`1,Cameras,Canon,Alpha,${ACTIVE},${SOLD},1,0,0,,,,,2025-06-01 12:00`);
  });

  it('rejects writes to the header row', () => {
    const sheet = createCatalogSheet(path);
    expect(() => sheet.batchUpdateCounts([{ rowNumber: 1, activeCount: 1, soldCount: 1, balance: 1 }])).toThrow(
      'Invalid sheet row: 1',
    );
  });

  it('writes headers into a new sheet', () => {
    const fresh = join(dir, 'nested', 'new.csv');
    createCatalogSheet(fresh).setupHeaders();
    expect(readFileSync(fresh, 'utf-8')).toBe(`${HEADER}\n`);
  });

  it('replaces the header row of an existing sheet', () => {
    writeFileSync(path, 'old,head\n1,Cat,Maker,Name,,\n');
    createCatalogSheet(path).setupHeaders();

    const lines = readFileSync(path, 'utf-8').split('\n');
    expect(lines[0]).toBe(HEADER);
    expect(lines[1]).toBe('1,Cat,Maker,Name,,');
  });
});
