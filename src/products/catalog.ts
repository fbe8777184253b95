/**
 * Product Catalog - products keyed by their catalog sheet row number.
 */

import {
  columnDate,
  columnNullableString,
  columnNumber,
  columnString,
  type Database,
  type SqlRow,
} from '../db/index';
import type { CatalogRow, Product } from '../types';

export interface ProductCatalog {
  /** Insert or update by rowNumber */
  syncFromSheet(row: CatalogRow, now?: Date): Product;
  syncAll(rows: readonly CatalogRow[], now?: Date): Product[];
  get(id: number): Product | null;
  getByRowNumber(rowNumber: number): Product | null;
  list(): Product[];
  /** Case-insensitive substring match on the product name */
  searchByName(name: string): Product[];
  /** Case-insensitive exact maker match */
  byMaker(maker: string): Product[];
  count(): number;
}

function parseProduct(row: SqlRow): Product {
  return {
    id: columnNumber(row, 'id'),
    rowNumber: columnNumber(row, 'row_number'),
    category: columnNullableString(row, 'category'),
    maker: columnNullableString(row, 'maker'),
    productName: columnString(row, 'product_name'),
    activeUrl: columnNullableString(row, 'active_url'),
    soldUrl: columnNullableString(row, 'sold_url'),
    createdAt: columnDate(row, 'created_at'),
    updatedAt: columnDate(row, 'updated_at'),
  };
}

function blankToNull(value: string): string | null {
  const trimmed = value.trim();
  return trimmed ? trimmed : null;
}

function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

export function createProductCatalog(db: Database): ProductCatalog {
  function getByRowNumber(rowNumber: number): Product | null {
    const row = db.get('SELECT * FROM products WHERE row_number = ?', [rowNumber]);
    return row ? parseProduct(row) : null;
  }

  function syncFromSheet(sheetRow: CatalogRow, now = new Date()): Product {
    if (!Number.isInteger(sheetRow.rowNumber) || sheetRow.rowNumber < 1) {
      throw new RangeError(`Invalid row number: ${sheetRow.rowNumber}`);
    }

    const fields = [
      blankToNull(sheetRow.category),
      blankToNull(sheetRow.maker),
      sheetRow.productName.trim(),
      blankToNull(sheetRow.activeUrl),
      blankToNull(sheetRow.soldUrl),
    ];

    const existing = getByRowNumber(sheetRow.rowNumber);
    if (existing) {
      db.run(
        `UPDATE products
         SET category = ?, maker = ?, product_name = ?, active_url = ?, sold_url = ?, updated_at = ?
         WHERE id = ?`,
        [...fields, now.getTime(), existing.id],
      );
    } else {
      db.run(
        `INSERT INTO products
           (row_number, category, maker, product_name, active_url, sold_url, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
        [sheetRow.rowNumber, ...fields, now.getTime(), now.getTime()],
      );
    }

    const saved = getByRowNumber(sheetRow.rowNumber);
    if (!saved) {
      throw new Error(`Product for row ${sheetRow.rowNumber} vanished after upsert`);
    }
    return saved;
  }

  return {
    syncFromSheet,

    syncAll(rows, now = new Date()) {
      return db.transaction(() => rows.map((row) => syncFromSheet(row, now)));
    },

    get(id) {
      const row = db.get('SELECT * FROM products WHERE id = ?', [id]);
      return row ? parseProduct(row) : null;
    },

    getByRowNumber,

    list() {
      return db.query('SELECT * FROM products ORDER BY row_number').map(parseProduct);
    },

    searchByName(name) {
      return db
        .query("SELECT * FROM products WHERE product_name LIKE ? ESCAPE '\\' ORDER BY row_number", [
          `%${escapeLike(name)}%`,
        ])
        .map(parseProduct);
    },

    byMaker(maker) {
      return db
        .query('SELECT * FROM products WHERE lower(maker) = lower(?) ORDER BY row_number', [maker.trim()])
        .map(parseProduct);
    },

    count() {
      const row = db.get('SELECT COUNT(*) AS n FROM products');
      return row ? columnNumber(row, 'n') : 0;
    },
  };
}
