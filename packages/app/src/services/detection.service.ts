/**
 * Anomaly scoring: event-driven for freshly finalized bars, plus a
 * periodic pass over the latest closed bar of every active series.
 */

import type { Logger } from '@barwatch/logger';
import { errorMessage, seriesId, withTimeout } from '@barwatch/contracts';
import type { StoredBar } from '@barwatch/contracts';
import { AnomalyScoringEngine, WindowManager } from '@barwatch/detector';
import type { DetectorConfig, ScoreOutcome, ScoringPassResult } from '@barwatch/detector';
import type { HealthStatus, Service } from '../container/types.js';
import { PeriodicJob } from './periodic-job.js';
import type { IngestionService } from './ingestion.service.js';
import type { StorageService } from './storage.service.js';

export interface DetectionServiceConfig {
  logger: Logger;
  storage: StorageService;
  ingestion: IngestionService;
  detector: DetectorConfig;
  passIntervalMs: number;
  now?: () => number;
}

export class DetectionService implements Service {
  readonly name = 'DetectionService';
  readonly dependencies = ['StorageService', 'IngestionService'];

  private logger: Logger;
  private engineInstance: AnomalyScoringEngine | null = null;
  private passJob: PeriodicJob;
  private unsubscribe: (() => void) | null = null;
  private inFlight = new Set<Promise<void>>();
  private lastPass: ScoringPassResult | null = null;
  private lastPassAt: number | null = null;
  private now: () => number;

  constructor(private config: DetectionServiceConfig) {
    this.logger = config.logger;
    this.now = config.now ?? Date.now;
    this.passJob = new PeriodicJob(
      'scoring-pass',
      config.passIntervalMs,
      () => this.runPass().then(() => undefined),
      config.logger
    );
  }

  async initialize(): Promise<void> {
    const { storage, ingestion, detector } = this.config;
    const windows = new WindowManager(storage.bars, {
      windowSize: detector.windowSize,
      volumeSource: detector.volumeSource,
    });
    this.engineInstance = new AnomalyScoringEngine(windows, storage.anomalies, storage.bars, detector, {
      logger: this.logger,
      isDegraded: (instrument) => ingestion.isDegraded(instrument),
      quoteVolume24h: (instrument) => ingestion.universe.quoteVolume24h(instrument),
      now: this.now,
    });

    this.unsubscribe = storage.events.on('finalized', ({ bar }) => this.scoreFinalized(bar));
    this.passJob.start();
  }

  get engine(): AnomalyScoringEngine {
    if (this.engineInstance === null) {
      throw new Error('DetectionService is not initialized');
    }
    return this.engineInstance;
  }

  /** When the last periodic pass finished, or null before the first */
  get lastPassTime(): number | null {
    return this.lastPassAt;
  }

  get lastPassResult(): ScoringPassResult | null {
    return this.lastPass;
  }

  async runPass(): Promise<ScoringPassResult> {
    const result = await this.engine.runPass(this.config.ingestion.activeSeries());
    this.lastPass = result;
    this.lastPassAt = this.now();
    return result;
  }

  /** Resolves once every event-driven scoring started so far has finished */
  async settle(): Promise<void> {
    await Promise.all([...this.inFlight]);
  }

  async shutdown(): Promise<void> {
    this.unsubscribe?.();
    this.unsubscribe = null;
    await this.passJob.stop();
    await this.settle();
  }

  healthCheck(): HealthStatus {
    return {
      healthy: this.engineInstance !== null,
      message:
        this.lastPass === null
          ? 'No scoring pass yet'
          : `Last pass scored ${this.lastPass.scored}, ${this.lastPass.anomalies} anomalous`,
      details: {
        lastPassTime: this.lastPassAt,
        lastPass: this.lastPass,
        pendingScores: this.inFlight.size,
      },
    };
  }

  private scoreFinalized(bar: StoredBar): Promise<void> {
    const engine = this.engine;
    const work = withTimeout(
      () => engine.scoreBar(bar),
      this.config.detector.scoringTimeoutMs,
      `scoring ${seriesId(bar)}`
    ).then(
      (outcome: ScoreOutcome) => {
        if (outcome.status === 'skipped') {
          this.logger.debug('Finalized bar not scored', { instrument: bar.instrument, reason: outcome.reason });
        }
      },
      (error: unknown) => {
        this.logger.warn('Scoring finalized bar failed', {
          instrument: bar.instrument,
          interval: bar.interval,
          series: seriesId(bar),
          error: errorMessage(error),
        });
      }
    );
    this.inFlight.add(work);
    void work.finally(() => this.inFlight.delete(work));
    return work;
  }
}
