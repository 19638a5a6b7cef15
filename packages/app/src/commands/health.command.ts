/**
 * Health check command implementation
 */

import type { Logger } from '@barwatch/logger';
import type { Command, CommandOptions, CommandResult } from './types.js';
import type { HealthReport } from '../health.js';
import { formatHealthReport } from '../formatters/report-formatter.js';
import { toCommandError } from './errors.js';
import { parseFlags } from './args.js';

export interface HealthCommandConfig {
  report: () => Promise<HealthReport>;
  logger: Logger;
}

/**
 * health command - prints the storage and pipeline snapshot.
 * Fails (non-zero exit) when the report is degraded.
 */
export class HealthCommand implements Command {
  name = 'health';
  description = 'Show stored rows, universe size, last passes and degraded instruments';
  usage = 'health [--json]';
  aliases = ['status'];

  constructor(private config: HealthCommandConfig) {}

  async execute(args: string[], options: CommandOptions): Promise<CommandResult> {
    const startTime = Date.now();

    try {
      const flags = parseFlags(args, { switches: ['json'] });
      const format = flags.has('json') ? 'json' : (options.format ?? 'text');
      const report = await this.config.report();

      return {
        success: report.status === 'ok',
        output: formatHealthReport(report, format),
        duration: Date.now() - startTime,
        metadata: { status: report.status },
      };
    } catch (error) {
      const commandError = toCommandError(error);
      this.config.logger.error('Health command failed', { error: commandError.message, code: commandError.code });

      return {
        success: false,
        output: commandError.format(options.verbose),
        error: commandError,
        duration: Date.now() - startTime,
      };
    }
  }
}
