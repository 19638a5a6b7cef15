/**
 * Service tokens for dependency injection
 *
 * Each token is a key of AppServices, so resolve() returns the right type.
 */

import type { Logger } from '@barwatch/logger';
import type { MarketDataSource } from '@barwatch/ingestion';
import type { Config } from '../config/schema.js';
import type { StorageService } from '../services/storage.service.js';
import type { IngestionService } from '../services/ingestion.service.js';
import type { DetectionService } from '../services/detection.service.js';
import type { RetentionService } from '../services/retention.service.js';

export interface AppServices {
  Logger: Logger;
  Config: Config;
  MarketDataSource: MarketDataSource;
  StorageService: StorageService;
  IngestionService: IngestionService;
  DetectionService: DetectionService;
  RetentionService: RetentionService;
}

export const TOKENS = {
  Logger: 'Logger',
  Config: 'Config',
  MarketDataSource: 'MarketDataSource',
  StorageService: 'StorageService',
  IngestionService: 'IngestionService',
  DetectionService: 'DetectionService',
  RetentionService: 'RetentionService',
} as const satisfies { [K in keyof AppServices]: K };

export type ServiceToken = keyof AppServices;
