/**
 * Universe refresh and live ingestion
 */

import type { Logger } from '@barwatch/logger';
import type { Interval, SeriesKey } from '@barwatch/contracts';
import { IngestionPipeline, Universe, UniverseSelector } from '@barwatch/ingestion';
import type {
  IngestionStats,
  MarketDataSource,
  UniverseRefreshResult,
  UniverseSelectorOptions,
} from '@barwatch/ingestion';
import type { HealthStatus, Service } from '../container/types.js';
import { PeriodicJob } from './periodic-job.js';
import type { StorageService } from './storage.service.js';

export interface IngestionServiceConfig {
  logger: Logger;
  source: MarketDataSource;
  storage: StorageService;
  intervals: readonly Interval[];
  windowSize: number;
  universe: Omit<UniverseSelectorOptions, 'logger'>;
  refreshIntervalMs: number;
  channelCapacity?: number;
  maxBackfillAttempts?: number;
  backfillTimeoutMs?: number;
}

export class IngestionService implements Service {
  readonly name = 'IngestionService';
  readonly dependencies = ['StorageService'];

  /** Shared with detection (24h volume) and health (size) */
  readonly universe = new Universe();

  private logger: Logger;
  private selector: UniverseSelector;
  private pipelineInstance: IngestionPipeline | null = null;
  private refreshJob: PeriodicJob;
  private lastRefresh: UniverseRefreshResult | null = null;

  constructor(private config: IngestionServiceConfig) {
    this.logger = config.logger;
    this.selector = new UniverseSelector(config.source, this.universe, {
      ...config.universe,
      logger: config.logger,
    });
    this.refreshJob = new PeriodicJob(
      'universe-refresh',
      config.refreshIntervalMs,
      () => this.refreshUniverse().then(() => undefined),
      config.logger
    );
  }

  async initialize(): Promise<void> {
    this.pipelineInstance = new IngestionPipeline(this.config.source, this.config.storage.bars, {
      intervals: this.config.intervals,
      windowSize: this.config.windowSize,
      channelCapacity: this.config.channelCapacity,
      maxBackfillAttempts: this.config.maxBackfillAttempts,
      backfillTimeoutMs: this.config.backfillTimeoutMs,
      logger: this.logger,
    });
    await this.refreshJob.runNow();
    this.refreshJob.start();
  }

  get pipeline(): IngestionPipeline {
    if (this.pipelineInstance === null) {
      throw new Error('IngestionService is not initialized');
    }
    return this.pipelineInstance;
  }

  /**
   * Refreshes the universe and applies the change to the pipeline. A failed
   * refresh leaves subscriptions as they are.
   */
  async refreshUniverse(): Promise<UniverseRefreshResult> {
    const result = await this.selector.refresh();
    this.lastRefresh = result;
    if (result.status === 'updated') {
      await this.pipeline.applyUniverse(result);
    } else {
      await this.pipeline.applyUniverse({ added: [], removed: [] });
    }
    return result;
  }

  isDegraded(instrument: string): boolean {
    return this.pipelineInstance?.isDegraded(instrument) ?? false;
  }

  activeSeries(): SeriesKey[] {
    return this.pipelineInstance?.activeSeries() ?? [];
  }

  stats(): IngestionStats | null {
    return this.pipelineInstance?.stats() ?? null;
  }

  async shutdown(): Promise<void> {
    await this.refreshJob.stop();
    if (this.pipelineInstance !== null) {
      await this.pipelineInstance.stop();
    }
  }

  healthCheck(): HealthStatus {
    const stats = this.stats();
    if (stats === null) {
      return { healthy: false, message: 'Not started' };
    }
    const degraded = stats.degradedInstruments.length;
    return {
      healthy: this.universe.size > 0 && degraded === 0,
      message:
        this.lastRefresh?.status === 'unavailable'
          ? `Universe refresh failed: ${this.lastRefresh.error.message}`
          : `${this.universe.size} instruments, ${stats.subscriptions} subscriptions`,
      details: {
        universeSize: this.universe.size,
        subscriptions: stats.subscriptions,
        degradedInstruments: stats.degradedInstruments,
        outcomes: stats.outcomes,
        reconnects: stats.reconnects,
        writeFailures: stats.writeFailures,
      },
    };
  }
}
