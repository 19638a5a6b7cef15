/**
 * Manual retention sweep
 */

import type { Logger } from '@barwatch/logger';
import type { RetentionPolicy, RetentionSweepResult } from '@barwatch/bar-store';
import type { Command, CommandOptions, CommandResult } from './types.js';
import { formatSweepResult } from '../formatters/report-formatter.js';
import { toCommandError } from './errors.js';
import { parseFlags } from './args.js';

const HOUR_MS = 60 * 60 * 1000;

export interface SweepCommandConfig {
  sweep: (overrides: Partial<RetentionPolicy>) => Promise<RetentionSweepResult>;
  logger: Logger;
}

export class SweepCommand implements Command {
  name = 'sweep';
  description = 'Run one retention sweep, optionally with a different age limit';
  usage = 'sweep [--max-age-hours <hours>] [--json]';

  constructor(private config: SweepCommandConfig) {}

  async execute(args: string[], options: CommandOptions): Promise<CommandResult> {
    const startTime = Date.now();

    try {
      const flags = parseFlags(args, { values: ['max-age-hours'], switches: ['json'] });
      const format = flags.has('json') ? 'json' : (options.format ?? 'text');
      const maxAgeHours = flags.number('max-age-hours', { min: 0 });

      const overrides: Partial<RetentionPolicy> = {};
      if (maxAgeHours !== undefined) {
        overrides.maxAgeMs = maxAgeHours * HOUR_MS;
      }

      const result = await this.config.sweep(overrides);
      this.config.logger.info('Manual retention sweep', { totalDeleted: result.totalDeleted, failures: result.failures });

      return {
        success: result.failures === 0,
        output: formatSweepResult(result, format),
        duration: Date.now() - startTime,
        metadata: { totalDeleted: result.totalDeleted },
      };
    } catch (error) {
      const commandError = toCommandError(error);
      this.config.logger.error('Sweep command failed', { error: commandError.message, code: commandError.code });

      return {
        success: false,
        output: commandError.format(options.verbose),
        error: commandError,
        duration: Date.now() - startTime,
      };
    }
  }
}
