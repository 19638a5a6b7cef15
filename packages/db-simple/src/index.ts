/**
 * @barwatch/db-simple
 *
 * Minimal database connection and migration runner for SQLite and PostgreSQL
 */

export {
  connect,
  withRetry,
  isRetryableError,
  toPositionalParams,
  parseConnectionString,
  noopLogger,
  type DbConnection,
  type ExecResult,
  type Logger,
  type ConnectOptions,
  type RetryOptions,
} from './connect.js'
export { runMigrations, listAppliedMigrations, type MigrateOptions, type MigrationResult } from './migrate.js'
