/**
 * Database - SQLite (sql.js WASM) for local persistence
 *
 * In-memory WASM database that saves to ~/.market-balance/market-balance.db
 * after mutations. Pass `path: ':memory:'` for a database that never touches
 * disk.
 */

import initSqlJs, { type Database as SqlJsDatabase, type SqlValue } from 'sql.js';
import { dirname } from 'path';
import { mkdirSync, existsSync, readFileSync, writeFileSync, renameSync } from 'fs';
import { createLogger } from '../utils/logger';

const logger = createLogger('db');

/**
 * Values that can be bound to SQL parameters.
 */
export type SqlBindValue = string | number | null;

export type SqlRow = Record<string, SqlValue>;

export const MEMORY_PATH = ':memory:';

// ---------------------------------------------------------------------------
// Database interface
// ---------------------------------------------------------------------------

export interface Database {
  readonly path: string;

  close(): void;
  save(): void;

  run(sql: string, params?: SqlBindValue[]): void;
  query(sql: string, params?: SqlBindValue[]): SqlRow[];
  get(sql: string, params?: SqlBindValue[]): SqlRow | undefined;

  /** Row id of the last successful INSERT */
  lastInsertId(): number;

  /** Run `fn` inside BEGIN/COMMIT, saving once at the end */
  transaction<T>(fn: () => T): T;
}

export interface DatabaseOptions {
  /** File path, or ':memory:' */
  path: string;
  /** Save to disk after every mutation outside a transaction (default true) */
  autoSave?: boolean;
}

// ---------------------------------------------------------------------------
// Row readers
// ---------------------------------------------------------------------------

function describe(value: SqlValue | undefined): string {
  return value instanceof Uint8Array ? 'blob' : typeof value;
}

export function columnNumber(row: SqlRow, column: string): number {
  const value = row[column];
  if (typeof value !== 'number') {
    throw new TypeError(`Column ${column}: expected number, got ${describe(value)}`);
  }
  return value;
}

export function columnNullableNumber(row: SqlRow, column: string): number | null {
  const value = row[column];
  if (value === null || value === undefined) return null;
  return columnNumber(row, column);
}

export function columnString(row: SqlRow, column: string): string {
  const value = row[column];
  if (typeof value !== 'string') {
    throw new TypeError(`Column ${column}: expected string, got ${describe(value)}`);
  }
  return value;
}

export function columnNullableString(row: SqlRow, column: string): string | null {
  const value = row[column];
  if (value === null || value === undefined) return null;
  return columnString(row, column);
}

/** Timestamps are stored as epoch milliseconds. */
export function columnDate(row: SqlRow, column: string): Date {
  return new Date(columnNumber(row, column));
}

// ---------------------------------------------------------------------------
// createDatabase
// ---------------------------------------------------------------------------

/**
 * Open (or create) the database file and return a Database handle.
 * Schema is managed by the migration runner in ./migrations.
 */
export async function createDatabase(options: DatabaseOptions): Promise<Database> {
  const { path } = options;
  const inMemory = path === MEMORY_PATH;
  const autoSave = !inMemory && options.autoSave !== false;

  const SQL = await initSqlJs();

  let db: SqlJsDatabase;
  if (!inMemory && existsSync(path)) {
    logger.info(`Opening database: ${path}`);
    db = new SQL.Database(readFileSync(path));
  } else {
    if (!inMemory) logger.info(`Creating database: ${path}`);
    db = new SQL.Database();
  }

  db.run('PRAGMA foreign_keys = ON');

  let inTransaction = false;
  let closed = false;

  function saveDb(): void {
    if (inMemory || closed) return;
    const dir = dirname(path);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
    const tmpPath = path + '.tmp';
    writeFileSync(tmpPath, Buffer.from(db.export()));
    renameSync(tmpPath, path);
  }

  function maybeSave(): void {
    if (autoSave && !inTransaction) saveDb();
  }

  function get(sql: string, params: SqlBindValue[] = []): SqlRow | undefined {
    const stmt = db.prepare(sql);
    try {
      stmt.bind(params);
      return stmt.step() ? stmt.getAsObject() : undefined;
    } finally {
      stmt.free();
    }
  }

  function query(sql: string, params: SqlBindValue[] = []): SqlRow[] {
    const stmt = db.prepare(sql);
    try {
      stmt.bind(params);
      const rows: SqlRow[] = [];
      while (stmt.step()) {
        rows.push(stmt.getAsObject());
      }
      return rows;
    } finally {
      stmt.free();
    }
  }

  return {
    path,

    run(sql, params = []) {
      db.run(sql, params);
      maybeSave();
    },

    query,
    get,

    lastInsertId() {
      const row = get('SELECT last_insert_rowid() AS id');
      return row ? columnNumber(row, 'id') : 0;
    },

    transaction(fn) {
      if (inTransaction) return fn();
      db.run('BEGIN');
      inTransaction = true;
      try {
        const result = fn();
        db.run('COMMIT');
        inTransaction = false;
        maybeSave();
        return result;
      } catch (error) {
        inTransaction = false;
        db.run('ROLLBACK');
        throw error;
      }
    },

    save() {
      saveDb();
    },

    close() {
      if (closed) return;
      saveDb();
      closed = true;
      db.close();
    },
  };
}
