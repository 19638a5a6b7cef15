/**
 * @barwatch/ingestion
 *
 * Universe selection and live bar ingestion.
 */

export type { MarketDataSource } from './source.js';

export { computeBackoffDelay, DEFAULT_BACKOFF } from './backoff.js';
export type { BackoffOptions } from './backoff.js';

export { BoundedChannel } from './channel.js';

export { Universe, UniverseSelector, selectInstruments } from './universe.js';
export type { UniverseChange, UniverseRefreshResult, UniverseSelectorOptions } from './universe.js';

export { IngestionPipeline } from './pipeline.js';
export type {
  IngestionPipelineOptions,
  IngestionStats,
  IngestionStore,
  SubscriptionStats,
} from './pipeline.js';
