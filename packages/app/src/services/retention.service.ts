/**
 * Periodic retention sweeps
 */

import type { Logger } from '@barwatch/logger';
import { RetentionManager } from '@barwatch/bar-store';
import type { RetentionPolicy, RetentionSweepResult } from '@barwatch/bar-store';
import type { HealthStatus, Service } from '../container/types.js';
import { PeriodicJob } from './periodic-job.js';
import type { StorageService } from './storage.service.js';

export interface RetentionServiceConfig {
  logger: Logger;
  storage: StorageService;
  policy: RetentionPolicy;
  sweepIntervalMs: number;
  now?: () => number;
}

export class RetentionService implements Service {
  readonly name = 'RetentionService';
  readonly dependencies = ['StorageService'];

  private managerInstance: RetentionManager | null = null;
  private sweepJob: PeriodicJob;
  private now: () => number;

  constructor(private config: RetentionServiceConfig) {
    this.now = config.now ?? Date.now;
    this.sweepJob = new PeriodicJob(
      'retention-sweep',
      config.sweepIntervalMs,
      () => this.sweep().then(() => undefined),
      config.logger
    );
  }

  async initialize(): Promise<void> {
    this.managerInstance = new RetentionManager(this.config.storage.bars, this.config.storage.anomalies, this.config.policy, {
      logger: this.config.logger,
    });
    this.sweepJob.start();
  }

  get manager(): RetentionManager {
    if (this.managerInstance === null) {
      throw new Error('RetentionService is not initialized');
    }
    return this.managerInstance;
  }

  sweep(overrides: Partial<RetentionPolicy> = {}): Promise<RetentionSweepResult> {
    return this.manager.sweep(this.now(), overrides);
  }

  get lastSweepTime(): number | null {
    return this.managerInstance?.lastSweep?.startedAt ?? null;
  }

  get consecutiveFailures(): number {
    return this.managerInstance?.consecutiveFailures ?? 0;
  }

  async shutdown(): Promise<void> {
    await this.sweepJob.stop();
  }

  healthCheck(): HealthStatus {
    const last = this.managerInstance?.lastSweep ?? null;
    return {
      healthy: this.consecutiveFailures === 0,
      message:
        last === null
          ? 'No sweep yet'
          : `Last sweep deleted ${last.totalDeleted} rows with ${last.failures} failed steps`,
      details: {
        lastSweepTime: this.lastSweepTime,
        consecutiveFailures: this.consecutiveFailures,
      },
    };
  }
}
