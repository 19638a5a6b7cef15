/**
 * Detector configuration schema using Zod
 */

import { z } from 'zod';
import { ConfigValidationError } from '@barwatch/contracts';

export const detectorConfigSchema = z.object({
  /** Closed bars per rolling window (W) */
  windowSize: z.number().int().min(2).max(1000).default(16),

  priceZThreshold: z.number().positive().default(2.5),
  volumeZThreshold: z.number().positive().default(2.0),
  volatilityZThreshold: z.number().positive().default(2.0),

  /** The price dimension also needs |return| at or above this floor */
  minAbsReturn: z.number().min(0).default(0.005),

  weights: z
    .object({
      price: z.number().min(0).default(0.4),
      volume: z.number().min(0).default(0.3),
      volatility: z.number().min(0).default(0.3),
    })
    .default({}),

  /**
   * 'anomalous' writes records with a nonzero composite only;
   * 'all' writes every scored bar as an audit trail.
   */
  recordPolicy: z.enum(['anomalous', 'all']).default('anomalous'),

  /** Which bar field is the volume dimension */
  volumeSource: z.enum(['volume', 'quoteVolume']).default('quoteVolume'),

  /** Upper bound for scoring one bar, in a pass or on its finalized event */
  scoringTimeoutMs: z.number().int().positive().default(5000),
});

export type DetectorConfig = z.infer<typeof detectorConfigSchema>;
export type DetectorConfigInput = z.input<typeof detectorConfigSchema>;

/**
 * Validates detector settings, filling in defaults.
 *
 * @throws ConfigValidationError listing every invalid field
 */
export function parseDetectorConfig(input: DetectorConfigInput = {}): DetectorConfig {
  const result = detectorConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigValidationError(`Invalid detector configuration: ${issues.join('; ')}`, { issues });
  }
  return result.data;
}

export const DEFAULT_DETECTOR_CONFIG: DetectorConfig = detectorConfigSchema.parse({});
