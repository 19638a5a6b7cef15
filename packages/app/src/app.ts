/**
 * Service wiring and command dispatch
 */

import type { Logger } from '@barwatch/logger';
import type { MarketDataSource } from '@barwatch/ingestion';
import { Container } from './container/index.js';
import { TOKENS } from './container/tokens.js';
import type { AppServices } from './container/tokens.js';
import { toRetentionPolicy } from './config/index.js';
import type { Config } from './config/index.js';
import { StorageService } from './services/storage.service.js';
import { IngestionService } from './services/ingestion.service.js';
import { DetectionService } from './services/detection.service.js';
import { RetentionService } from './services/retention.service.js';
import { FixtureMarketSource } from './services/fixture-source.js';
import { buildHealthReport } from './health.js';
import { HealthCommand } from './commands/health.command.js';
import { SweepCommand } from './commands/sweep.command.js';
import { AnomaliesCommand } from './commands/anomalies.command.js';
import type { Command } from './commands/types.js';

/**
 * 'run' wires the full pipeline. 'storage' wires only the store and
 * retention, for one-shot commands against an existing database.
 */
export type AppMode = 'run' | 'storage';

export interface CreateAppOptions {
  mode: AppMode;
  /** Replaces the configured source */
  source?: MarketDataSource;
  now?: () => number;
}

export type AppContainer = Container<AppServices>;

export function createMarketDataSource(config: Config, now?: () => number): MarketDataSource {
  switch (config.source.type) {
    case 'fixture':
      return new FixtureMarketSource({
        seed: config.source.seed,
        instruments: config.source.instruments,
        tickMs: config.source.tickMs,
        now,
      });
  }
}

export function createApp(config: Config, logger: Logger, options: CreateAppOptions): AppContainer {
  const container = new Container<AppServices>({ logger: logger.child({ component: 'container' }) });
  const now = options.now;

  container.register(TOKENS.Logger, () => logger);
  container.register(TOKENS.Config, () => config);

  container.register(TOKENS.StorageService, () => {
    return new StorageService({
      logger: logger.child({ component: 'storage' }),
      databaseUrl: config.database.url,
      deleteBatchSize: config.retention.deleteBatchSize,
      now,
    });
  });

  container.register(
    TOKENS.RetentionService,
    (c) => {
      return new RetentionService({
        logger: logger.child({ component: 'retention' }),
        storage: c.resolve(TOKENS.StorageService),
        policy: toRetentionPolicy(config),
        sweepIntervalMs: config.retention.sweepIntervalMs,
        now,
      });
    },
    { dependencies: [TOKENS.StorageService] }
  );

  if (options.mode === 'storage') {
    return container;
  }

  container.register(TOKENS.MarketDataSource, () => options.source ?? createMarketDataSource(config, now));

  container.register(
    TOKENS.IngestionService,
    (c) => {
      const { universe, ingestion } = config;
      return new IngestionService({
        logger: logger.child({ component: 'ingestion' }),
        source: c.resolve(TOKENS.MarketDataSource),
        storage: c.resolve(TOKENS.StorageService),
        intervals: ingestion.intervals,
        windowSize: config.detector.windowSize,
        universe: {
          topN: universe.topN,
          minQuoteVolume: universe.minQuoteVolume,
          includeInstruments: universe.include,
          excludeInstruments: universe.exclude,
          quoteAsset: universe.quoteAsset,
        },
        refreshIntervalMs: universe.refreshIntervalMs,
        channelCapacity: ingestion.channelCapacity,
        maxBackfillAttempts: ingestion.maxBackfillAttempts,
        backfillTimeoutMs: ingestion.backfillTimeoutMs,
      });
    },
    { dependencies: [TOKENS.MarketDataSource, TOKENS.StorageService] }
  );

  container.register(
    TOKENS.DetectionService,
    (c) => {
      return new DetectionService({
        logger: logger.child({ component: 'detector' }),
        storage: c.resolve(TOKENS.StorageService),
        ingestion: c.resolve(TOKENS.IngestionService),
        detector: config.detector,
        passIntervalMs: config.scoring.passIntervalMs,
        now,
      });
    },
    { dependencies: [TOKENS.StorageService, TOKENS.IngestionService] }
  );

  return container;
}

/**
 * Health report from whatever the container has wired
 */
export function reportHealth(container: AppContainer, now?: () => number): ReturnType<typeof buildHealthReport> {
  return buildHealthReport({
    storage: container.resolve(TOKENS.StorageService),
    retention: container.resolve(TOKENS.RetentionService),
    ...(container.has(TOKENS.IngestionService) ? { ingestion: container.resolve(TOKENS.IngestionService) } : {}),
    ...(container.has(TOKENS.DetectionService) ? { detection: container.resolve(TOKENS.DetectionService) } : {}),
    ...(now !== undefined ? { now: now() } : {}),
  });
}

export function createCommands(container: AppContainer, logger: Logger, now?: () => number): Map<string, Command> {
  const storage = container.resolve(TOKENS.StorageService);
  const retention = container.resolve(TOKENS.RetentionService);

  const commands: Command[] = [
    new HealthCommand({ report: () => reportHealth(container, now), logger: logger.child({ command: 'health' }) }),
    new SweepCommand({ sweep: (overrides) => retention.sweep(overrides), logger: logger.child({ command: 'sweep' }) }),
    new AnomaliesCommand({
      anomalies: {
        query: (query) => storage.anomalies.query(query),
      },
      logger: logger.child({ command: 'anomalies' }),
      now,
    }),
  ];

  const byName = new Map<string, Command>();
  for (const command of commands) {
    byName.set(command.name, command);
    for (const alias of command.aliases ?? []) {
      byName.set(alias, command);
    }
  }
  return byName;
}
