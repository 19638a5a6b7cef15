/**
 * Simple file-based migration runner
 *
 * Every `*.sql` file in the directory is applied once, in file name order,
 * inside its own transaction, and recorded in `_migrations`.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { noopLogger } from './connect.js';
import type { DbConnection, Logger } from './connect.js';

interface Migration {
  name: string;
  sql: string;
}

export interface MigrateOptions {
  logger?: Logger;
}

export interface MigrationResult {
  /** Names applied by this run, in order */
  applied: string[];
  /** Names that were already recorded */
  skipped: string[];
}

async function ensureMigrationsTable(db: DbConnection): Promise<void> {
  if (db.dbType === 'sqlite') {
    await db.exec(`
      CREATE TABLE IF NOT EXISTS _migrations (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        name TEXT NOT NULL UNIQUE,
        applied_at TEXT DEFAULT (datetime('now'))
      )
    `);
  } else {
    await db.exec(`
      CREATE TABLE IF NOT EXISTS _migrations (
        id BIGSERIAL PRIMARY KEY,
        name TEXT NOT NULL UNIQUE,
        applied_at TIMESTAMPTZ DEFAULT CURRENT_TIMESTAMP
      )
    `);
  }
}

/**
 * Names of recorded migrations, in the order they were applied
 */
export async function listAppliedMigrations(db: DbConnection): Promise<string[]> {
  await ensureMigrationsTable(db);
  const rows = await db.query<{ name: string }>('SELECT name FROM _migrations ORDER BY id');
  return rows.map((r) => r.name);
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function readMigrationFiles(migrationsDir: string): Migration[] {
  if (!fs.existsSync(migrationsDir)) {
    throw new Error(`Migrations directory not found: ${migrationsDir}`);
  }

  let files: string[];
  try {
    files = fs.readdirSync(migrationsDir);
  } catch (error) {
    throw new Error(`Failed to read migrations directory: ${migrationsDir}. Error: ${describe(error)}`);
  }

  const sqlFiles = files.filter((file) => file.endsWith('.sql')).sort();

  if (sqlFiles.length === 0) {
    throw new Error(`No .sql migration files found in: ${migrationsDir}`);
  }

  return sqlFiles.map((file) => {
    let sql: string;
    try {
      sql = fs.readFileSync(path.join(migrationsDir, file), 'utf-8');
    } catch (error) {
      throw new Error(`Failed to read migration file: ${file}. Error: ${describe(error)}`);
    }
    if (sql.trim().length === 0) {
      throw new Error(`Migration file is empty: ${file}`);
    }
    return { name: file, sql };
  });
}

async function applyMigration(db: DbConnection, migration: Migration, logger: Logger): Promise<void> {
  logger.info('Applying migration', { name: migration.name });

  await db.transaction(async (txDb) => {
    await txDb.exec(migration.sql);
    await txDb.exec('INSERT INTO _migrations (name) VALUES (?)', [migration.name]);
  });

  logger.info('Migration applied', { name: migration.name });
}

/**
 * Run migrations from a directory
 *
 * @param migrationsDir - Path to directory containing *.sql migration files
 *
 * @example
 * const db = await connect('sqlite::memory:')
 * await runMigrations(BAR_STORE_MIGRATIONS_DIR, db)
 */
export async function runMigrations(
  migrationsDir: string,
  db: DbConnection,
  options: MigrateOptions = {}
): Promise<MigrationResult> {
  const logger = options.logger ?? noopLogger;

  logger.info('Starting migrations', { dir: migrationsDir });

  const applied = new Set(await listAppliedMigrations(db));
  const migrations = readMigrationFiles(migrationsDir);
  const pending = migrations.filter((m) => !applied.has(m.name));
  const skipped = migrations.filter((m) => applied.has(m.name)).map((m) => m.name);

  if (pending.length === 0) {
    logger.info('No pending migrations');
    return { applied: [], skipped };
  }

  logger.info('Found pending migrations', { count: pending.length });

  for (const migration of pending) {
    await applyMigration(db, migration, logger);
  }

  logger.info('All migrations applied', { total: migrations.length, applied: pending.length });
  return { applied: pending.map((m) => m.name), skipped };
}
