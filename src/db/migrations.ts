/**
 * Database Migrations - Versioned schema management
 *
 * - Sequential migration execution
 * - Up/down migrations as SQL
 * - Migration tracking via _migrations table
 * - Rollback support (single, to-version, full reset)
 */

import {
  columnDate,
  columnNullableNumber,
  columnNumber,
  columnString,
  createDatabase,
  type Database,
} from './index';
import { createLogger } from '../utils/logger';

const logger = createLogger('migrations');

export interface Migration {
  /** Sequential number */
  version: number;
  name: string;
  up: string;
  down: string;
}

export interface MigrationStatus {
  version: number;
  name: string;
  appliedAt: Date;
}

/** All migrations in order */
const MIGRATIONS: Migration[] = [
  // ── Migration 1: products and their snapshots ─────────────────────────────
  {
    version: 1,
    name: 'create_products_and_snapshots',
    up: `
      CREATE TABLE IF NOT EXISTS products (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        row_number INTEGER NOT NULL UNIQUE,
        category TEXT,
        maker TEXT,
        product_name TEXT NOT NULL,
        active_url TEXT,
        sold_url TEXT,
        created_at INTEGER NOT NULL,
        updated_at INTEGER NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_products_maker ON products(maker);
      CREATE INDEX IF NOT EXISTS idx_products_category ON products(category);

      -- Append-only measurement log
      CREATE TABLE IF NOT EXISTS snapshots (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        product_id INTEGER NOT NULL REFERENCES products(id) ON DELETE CASCADE,
        active_count INTEGER,
        sold_count INTEGER,
        balance REAL,
        avg_price REAL,
        avg_price_local INTEGER,
        min_price REAL,
        max_price REAL,
        recorded_at INTEGER NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_snapshots_product_recorded ON snapshots(product_id, recorded_at);
      CREATE INDEX IF NOT EXISTS idx_snapshots_recorded ON snapshots(recorded_at);
    `,
    down: `
      DROP TABLE IF EXISTS snapshots;
      DROP TABLE IF EXISTS products;
    `,
  },
];

// =============================================================================
// Migration Runner
// =============================================================================

export interface MigrationRunner {
  /** Get current database version */
  getCurrentVersion(): number;

  /** Get all applied migrations */
  getAppliedMigrations(): MigrationStatus[];

  /** Get pending migrations */
  getPendingMigrations(): Migration[];

  /** Run all pending migrations; returns how many were applied */
  migrate(): number;

  /** Reset database (rollback all) */
  reset(): void;
}

function statements(sql: string): string[] {
  return sql
    .split(';')
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

export function createMigrationRunner(db: Database, migrations: readonly Migration[] = MIGRATIONS): MigrationRunner {
  db.run(`
    CREATE TABLE IF NOT EXISTS _migrations (
      version INTEGER PRIMARY KEY,
      name TEXT NOT NULL,
      applied_at INTEGER NOT NULL
    )
  `);

  function getCurrentVersion(): number {
    const row = db.get('SELECT MAX(version) AS version FROM _migrations');
    return (row && columnNullableNumber(row, 'version')) ?? 0;
  }

  function getAppliedMigrations(): MigrationStatus[] {
    return db.query('SELECT version, name, applied_at FROM _migrations ORDER BY version').map((row) => ({
      version: columnNumber(row, 'version'),
      name: columnString(row, 'name'),
      appliedAt: columnDate(row, 'applied_at'),
    }));
  }

  function getPendingMigrations(): Migration[] {
    const currentVersion = getCurrentVersion();
    return migrations.filter((m) => m.version > currentVersion);
  }

  function applyMigration(migration: Migration): void {
    logger.info({ version: migration.version, name: migration.name }, 'Applying migration');

    try {
      db.transaction(() => {
        for (const sql of statements(migration.up)) {
          db.run(sql);
        }
        db.run('INSERT INTO _migrations (version, name, applied_at) VALUES (?, ?, ?)', [
          migration.version,
          migration.name,
          Date.now(),
        ]);
      });
      logger.info({ version: migration.version }, 'Migration applied');
    } catch (error) {
      logger.error({ error, version: migration.version }, 'Migration failed');
      throw error;
    }
  }

  function revertMigration(migration: Migration): void {
    logger.info({ version: migration.version, name: migration.name }, 'Reverting migration');

    try {
      db.transaction(() => {
        for (const sql of statements(migration.down)) {
          db.run(sql);
        }
        db.run('DELETE FROM _migrations WHERE version = ?', [migration.version]);
      });
      logger.info({ version: migration.version }, 'Migration reverted');
    } catch (error) {
      logger.error({ error, version: migration.version }, 'Rollback failed');
      throw error;
    }
  }

  function rollbackTo(version: number): void {
    const current = getCurrentVersion();
    if (version >= current) {
      logger.info('Nothing to rollback');
      return;
    }

    const toRevert = migrations.filter((m) => m.version > version && m.version <= current).reverse();
    for (const migration of toRevert) {
      revertMigration(migration);
    }
  }

  return {
    getCurrentVersion,
    getAppliedMigrations,
    getPendingMigrations,

    migrate() {
      const pending = getPendingMigrations();

      if (pending.length === 0) {
        logger.info('Database is up to date');
        return 0;
      }

      logger.info({ count: pending.length }, 'Running migrations');
      for (const migration of pending) {
        applyMigration(migration);
      }
      logger.info({ version: getCurrentVersion() }, 'Migrations complete');
      return pending.length;
    },

    reset() {
      rollbackTo(0);
    },
  };
}

/** Get all defined migrations */
export function getMigrations(): Migration[] {
  return [...MIGRATIONS];
}

/** Open the database and bring its schema up to date. */
export async function openDatabase(path: string): Promise<Database> {
  const db = await createDatabase({ path });
  createMigrationRunner(db).migrate();
  return db;
}
