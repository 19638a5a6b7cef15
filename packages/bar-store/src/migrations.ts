/**
 * Schema for the bars and anomalies tables.
 */

import { fileURLToPath } from 'node:url'
import { runMigrations } from '@barwatch/db-simple'
import type { DbConnection, Logger, MigrationResult } from '@barwatch/db-simple'

/**
 * Directory holding this package's *.sql migrations
 */
export const BAR_STORE_MIGRATIONS_DIR = fileURLToPath(new URL('../migrations', import.meta.url))

export function migrateBarStore(db: DbConnection, logger?: Logger): Promise<MigrationResult> {
  return runMigrations(BAR_STORE_MIGRATIONS_DIR, db, logger ? { logger } : {})
}
