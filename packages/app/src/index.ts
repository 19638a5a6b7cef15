/**
 * Main exports for @barwatch/app
 */

// Container exports
export { Container, isService } from './container/index.js';
export { TOKENS } from './container/tokens.js';
export type { AppServices, ServiceToken } from './container/tokens.js';
export type {
  Service,
  HealthStatus,
  IContainer,
  DependencyNode,
  ServiceFactory,
  ServiceRegistration,
} from './container/types.js';

// Configuration exports
export { loadConfig, getConfigSummary, toRetentionPolicy } from './config/index.js';
export type { Config, ConfigInput } from './config/schema.js';

// Services
export { StorageService } from './services/storage.service.js';
export { IngestionService } from './services/ingestion.service.js';
export { DetectionService } from './services/detection.service.js';
export { RetentionService } from './services/retention.service.js';
export { PeriodicJob } from './services/periodic-job.js';
export { FixtureMarketSource, fixtureInstrumentNames, seededRandom } from './services/fixture-source.js';

// Wiring and health
export { createApp, createCommands, createMarketDataSource, reportHealth } from './app.js';
export type { AppContainer, AppMode, CreateAppOptions } from './app.js';
export { buildHealthReport } from './health.js';
export type { HealthReport, HealthSources } from './health.js';

// Commands
export { HealthCommand } from './commands/health.command.js';
export { SweepCommand } from './commands/sweep.command.js';
export { AnomaliesCommand } from './commands/anomalies.command.js';
export { CommandError, CommandErrorCode } from './commands/errors.js';
export type { Command, CommandOptions, CommandResult, OutputFormat } from './commands/types.js';
