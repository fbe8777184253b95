/**
 * Catalog sheet - the product spreadsheet, stored as a CSV file.
 *
 * Layout: header on row 1, products from row 2, columns A-N:
 *
 *   A No | B Category | C Maker | D Product Name | E Active URL | F Sold URL |
 *   G Active Count | H Sold Count | I Balance | J Avg Price (USD) |
 *   K Avg Price (local) | L Min Price (USD) | M Max Price (USD) | N Updated At
 *
 * A-F are read; G-N are written back after a fetch pass. Every write replaces
 * the file through a temp file and rename.
 */

import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import { formatTimestamp, generateCSV } from '../export/formats';
import { cell, parseCsv } from '../import/csv-parser';
import type { CatalogRow } from '../types';
import { createLogger } from '../utils/logger';
import { round2 } from '../utils/math';

const logger = createLogger('catalog-sheet');

export const HEADER_ROW = 1;
export const DATA_START_ROW = 2;

export const SHEET_HEADERS = [
  'No',
  'Category',
  'Maker',
  'Product Name',
  'Active URL',
  'Sold URL',
  'Active Count',
  'Sold Count',
  'Balance',
  'Avg Price (USD)',
  'Avg Price (local)',
  'Min Price (USD)',
  'Max Price (USD)',
  'Updated At',
] as const;

/** Zero-based column indexes */
const COLUMN = {
  no: 0,
  category: 1,
  maker: 2,
  productName: 3,
  activeUrl: 4,
  soldUrl: 5,
  activeCount: 6,
  updatedAt: 13,
} as const;

export interface CountsUpdate {
  rowNumber: number;
  activeCount: number | null;
  soldCount: number | null;
  balance: number | null;
}

export interface FullUpdate extends CountsUpdate {
  avgPrice?: number | null;
  /** Local currency, already an integer */
  avgPriceLocal?: number | null;
  minPrice?: number | null;
  maxPrice?: number | null;
}

export interface CatalogSheet {
  readonly path: string;
  readAllProducts(): CatalogRow[];
  /** Rows start..end inclusive (sheet row numbers) */
  readProducts(startRow: number, endRow: number): CatalogRow[];
  readProductsByMaker(maker: string): CatalogRow[];
  readProductsByCategory(category: string): CatalogRow[];
  /** Data rows up to the last row with a value in column A */
  totalRows(): number;
  /** Write G-I for each row */
  batchUpdateCounts(updates: readonly CountsUpdate[]): void;
  /** Write G-N for each row, stamping the update time */
  batchUpdateAll(updates: readonly FullUpdate[], now?: Date): void;
  setupHeaders(): void;
}

function roundedOrNull(value: number | null | undefined): number | null {
  return value === null || value === undefined ? null : round2(value);
}

function parseRow(row: readonly string[], rowNumber: number): CatalogRow | null {
  const no = cell(row, COLUMN.no);
  if (!no) return null;
  return {
    rowNumber,
    no,
    category: cell(row, COLUMN.category),
    maker: cell(row, COLUMN.maker),
    productName: cell(row, COLUMN.productName),
    activeUrl: cell(row, COLUMN.activeUrl),
    soldUrl: cell(row, COLUMN.soldUrl),
  };
}

function assertDataRow(rowNumber: number): void {
  if (!Number.isInteger(rowNumber) || rowNumber < DATA_START_ROW) {
    throw new RangeError(`Invalid sheet row: ${rowNumber}`);
  }
}

export function createCatalogSheet(path: string): CatalogSheet {
  function readGrid(): string[][] {
    if (!existsSync(path)) {
      logger.warn({ path }, 'Catalog sheet not found');
      return [];
    }
    return parseCsv(readFileSync(path, 'utf-8'));
  }

  function writeGrid(grid: string[][]): void {
    mkdirSync(dirname(path), { recursive: true });
    const tmpPath = `${path}.tmp`;
    writeFileSync(tmpPath, generateCSV(grid));
    renameSync(tmpPath, path);
  }

  function rowsBetween(grid: readonly string[][], startRow: number, endRow: number): CatalogRow[] {
    const products: CatalogRow[] = [];
    const first = Math.max(startRow, DATA_START_ROW);
    const last = Math.min(endRow, grid.length);
    for (let rowNumber = first; rowNumber <= last; rowNumber++) {
      const product = parseRow(grid[rowNumber - 1], rowNumber);
      if (product) products.push(product);
    }
    return products;
  }

  /** Overwrite cells from `column` onward on one row, growing the grid as needed. */
  function writeCells(grid: string[][], rowNumber: number, column: number, values: ReadonlyArray<string | number | null>): void {
    assertDataRow(rowNumber);
    while (grid.length < rowNumber) grid.push([]);
    const row = grid[rowNumber - 1];
    while (row.length < column + values.length) row.push('');
    values.forEach((value, offset) => {
      row[column + offset] = value === null ? '' : String(value);
    });
  }

  function readAllProducts(): CatalogRow[] {
    const grid = readGrid();
    return rowsBetween(grid, DATA_START_ROW, grid.length);
  }

  return {
    path,

    readAllProducts,

    readProducts(startRow, endRow) {
      return rowsBetween(readGrid(), startRow, endRow);
    },

    readProductsByMaker(maker) {
      const wanted = maker.trim().toUpperCase();
      return readAllProducts().filter((p) => p.maker.toUpperCase() === wanted);
    },

    readProductsByCategory(category) {
      const wanted = category.trim();
      return readAllProducts().filter((p) => p.category === wanted);
    },

    totalRows() {
      const grid = readGrid();
      let last = grid.length;
      while (last > 0 && !cell(grid[last - 1], COLUMN.no)) last--;
      return Math.max(0, last - HEADER_ROW);
    },

    batchUpdateCounts(updates) {
      if (updates.length === 0) return;
      const grid = readGrid();
      for (const update of updates) {
        writeCells(grid, update.rowNumber, COLUMN.activeCount, [
          update.activeCount,
          update.soldCount,
          roundedOrNull(update.balance),
        ]);
      }
      writeGrid(grid);
      logger.info({ rows: updates.length }, 'Wrote counts to catalog sheet');
    },

    batchUpdateAll(updates, now = new Date()) {
      if (updates.length === 0) return;
      const grid = readGrid();
      const stamp = formatTimestamp(now);
      for (const update of updates) {
        writeCells(grid, update.rowNumber, COLUMN.activeCount, [
          update.activeCount,
          update.soldCount,
          roundedOrNull(update.balance),
          roundedOrNull(update.avgPrice),
          update.avgPriceLocal ?? null,
          roundedOrNull(update.minPrice),
          roundedOrNull(update.maxPrice),
          stamp,
        ]);
      }
      writeGrid(grid);
      logger.info({ rows: updates.length }, 'Wrote counts and prices to catalog sheet');
    },

    setupHeaders() {
      const grid = readGrid();
      const headers = [...SHEET_HEADERS];
      if (grid.length === 0) {
        grid.push(headers);
      } else {
        const existing = grid[HEADER_ROW - 1];
        grid[HEADER_ROW - 1] = [...headers, ...existing.slice(COLUMN.updatedAt + 1)];
      }
      writeGrid(grid);
      logger.info({ path }, 'Catalog sheet headers written');
    },
  };
}
