/**
 * Database connection, schema and the stores built on it
 */

import type { Logger } from '@barwatch/logger';
import { connect } from '@barwatch/db-simple';
import type { DbConnection } from '@barwatch/db-simple';
import { AnomalySink, BarStore, StoreEventBus, migrateBarStore } from '@barwatch/bar-store';
import type { HealthStatus, Service } from '../container/types.js';

export interface StorageServiceConfig {
  logger: Logger;
  databaseUrl: string;
  deleteBatchSize?: number;
  now?: () => number;
}

export class StorageService implements Service {
  readonly name = 'StorageService';
  readonly dependencies: string[] = [];

  /** Finalized-bar notifications from the bar store */
  readonly events: StoreEventBus;

  private logger: Logger;
  private connection: DbConnection | null = null;
  private barStore: BarStore | null = null;
  private sink: AnomalySink | null = null;

  constructor(private config: StorageServiceConfig) {
    this.logger = config.logger;
    this.events = new StoreEventBus(config.logger);
  }

  async initialize(): Promise<void> {
    const db = await connect(this.config.databaseUrl, { logger: this.logger });
    const migrations = await migrateBarStore(db, this.logger);
    this.connection = db;
    this.barStore = new BarStore(db, {
      logger: this.logger,
      events: this.events,
      deleteBatchSize: this.config.deleteBatchSize,
      now: this.config.now,
    });
    this.sink = new AnomalySink(db, { deleteBatchSize: this.config.deleteBatchSize });
    this.logger.info('Storage ready', {
      database: db.dbType,
      migrations_applied: migrations.applied.length,
    });
  }

  get bars(): BarStore {
    if (this.barStore === null) {
      throw new Error('StorageService is not initialized');
    }
    return this.barStore;
  }

  get anomalies(): AnomalySink {
    if (this.sink === null) {
      throw new Error('StorageService is not initialized');
    }
    return this.sink;
  }

  async shutdown(): Promise<void> {
    this.events.removeAllListeners();
    if (this.connection !== null) {
      await this.connection.close();
      this.connection = null;
      this.barStore = null;
      this.sink = null;
      this.logger.info('Storage closed');
    }
  }

  async healthCheck(): Promise<HealthStatus> {
    if (this.barStore === null || this.sink === null) {
      return { healthy: false, message: 'Not connected' };
    }
    const [bars, anomalies] = await Promise.all([this.barStore.stats(), this.sink.stats()]);
    return {
      healthy: true,
      message: `${bars.rowCount} bars in ${bars.seriesCount} series`,
      details: {
        rowCount: bars.rowCount,
        seriesCount: bars.seriesCount,
        estimatedBytes: bars.estimatedBytes,
        anomalyRowCount: anomalies.rowCount,
      },
    };
  }
}
