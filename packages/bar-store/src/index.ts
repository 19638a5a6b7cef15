/**
 * @barwatch/bar-store
 *
 * Bounded bar storage, the anomaly sink and the retention manager, on top of
 * @barwatch/db-simple.
 */

export { BarStore, BAR_ROW_BYTES, DEFAULT_DELETE_BATCH_SIZE, rowLimitFor } from './barStore.js'
export type { BarStoreOptions, BarStoreStats, WindowQueryOptions } from './barStore.js'

export { AnomalySink } from './anomalySink.js'
export type { AnomalySinkOptions, AnomalySinkStats } from './anomalySink.js'

export { StoreEventBus } from './events.js'
export type { BarFinalizedEvent, BarFinalizedListener, StoreEventType } from './events.js'

export { KeyedMutex, AsyncRwLock } from './locks.js'

export { RetentionManager, DEFAULT_RETENTION_POLICY, validateRetentionPolicy } from './retention.js'
export type {
  RetentionPolicy,
  RetentionStep,
  RetentionStepResult,
  RetentionSweepResult,
  RetentionManagerOptions,
} from './retention.js'

export { BAR_STORE_MIGRATIONS_DIR, migrateBarStore } from './migrations.js'
