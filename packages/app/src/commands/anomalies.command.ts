/**
 * Query recorded anomalies
 */

import type { Logger } from '@barwatch/logger';
import type { AnomalySink } from '@barwatch/bar-store';
import type { AnomalyQuery } from '@barwatch/contracts';
import { errorMessage } from '@barwatch/contracts';
import { normalizeInterval } from '@barwatch/market-data-core';
import type { Command, CommandOptions, CommandResult } from './types.js';
import { formatAnomalies } from '../formatters/report-formatter.js';
import { CommandError, CommandErrorCode, toCommandError } from './errors.js';
import { parseFlags } from './args.js';
import type { ParsedFlags } from './args.js';

const DEFAULT_LIMIT = 20;
const HOUR_MS = 60 * 60 * 1000;

export interface AnomaliesCommandConfig {
  anomalies: Pick<AnomalySink, 'query'>;
  logger: Logger;
  now?: () => number;
}

export class AnomaliesCommand implements Command {
  name = 'anomalies';
  description = 'List recorded anomalies, newest first or by score';
  usage =
    'anomalies [--instrument <symbol>] [--interval <interval>] [--min-score <n>] [--since-hours <h>] [--limit <n>] [--by-score] [--all] [--json]';
  aliases = ['top'];

  constructor(private config: AnomaliesCommandConfig) {}

  async execute(args: string[], options: CommandOptions): Promise<CommandResult> {
    const startTime = Date.now();

    try {
      const flags = parseFlags(args, {
        values: ['instrument', 'interval', 'min-score', 'since-hours', 'limit'],
        switches: ['by-score', 'all', 'json'],
      });
      const format = flags.has('json') ? 'json' : (options.format ?? 'text');
      const query = this.buildQuery(flags);
      const records = await this.config.anomalies.query(query);

      return {
        success: true,
        output: formatAnomalies(records, format),
        duration: Date.now() - startTime,
        metadata: { count: records.length },
      };
    } catch (error) {
      const commandError = toCommandError(error);
      this.config.logger.error('Anomalies command failed', { error: commandError.message, code: commandError.code });

      return {
        success: false,
        output: commandError.format(options.verbose),
        error: commandError,
        duration: Date.now() - startTime,
      };
    }
  }

  private buildQuery(flags: ParsedFlags): AnomalyQuery {
    const query: AnomalyQuery = {
      limit: flags.number('limit', { min: 1, integer: true }) ?? DEFAULT_LIMIT,
      anomalyOnly: !flags.has('all'),
      orderBy: flags.has('by-score') ? 'score' : 'timestamp',
    };

    const instrument = flags.string('instrument');
    if (instrument !== undefined) {
      query.instrument = instrument.trim().toUpperCase();
    }

    const interval = flags.string('interval');
    if (interval !== undefined) {
      try {
        query.interval = normalizeInterval(interval);
      } catch (error) {
        throw new CommandError(CommandErrorCode.INVALID_ARGS, errorMessage(error), { flag: 'interval' });
      }
    }

    const minScore = flags.number('min-score', { min: 0 });
    if (minScore !== undefined) {
      query.minScore = minScore;
    }

    const sinceHours = flags.number('since-hours', { min: 0 });
    if (sinceHours !== undefined) {
      query.since = (this.config.now ?? Date.now)() - sinceHours * HOUR_MS;
    }

    return query;
  }
}
