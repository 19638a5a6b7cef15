/**
 * @barwatch/detector
 *
 * Window statistics and anomaly scoring for closed bars.
 */

export { detectorConfigSchema, parseDetectorConfig, DEFAULT_DETECTOR_CONFIG } from './config.js';
export type { DetectorConfig, DetectorConfigInput } from './config.js';

export { WindowManager, volumeOf } from './windowManager.js';
export type {
  WindowSummary,
  WindowResult,
  WindowOptions,
  WindowManagerOptions,
  VolumeSource,
} from './windowManager.js';

export { AnomalyScoringEngine, scoreAgainstWindow } from './scoringEngine.js';
export type { ScoreOutcome, ScoringPassResult, ScoringEngineOptions, SkipReason } from './scoringEngine.js';
