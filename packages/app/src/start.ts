/**
 * Application startup
 *
 * `barwatch` (or `barwatch run`) starts ingestion, scoring and retention and
 * runs until SIGINT or SIGTERM. Any other command runs once against the
 * configured database and exits.
 */

import 'dotenv/config';

import { attachGlobalHandlers, createLogger, startTimer } from '@barwatch/logger';
import type { Logger } from '@barwatch/logger';
import { errorMessage, isConfigValidationError } from '@barwatch/contracts';
import { getConfigSummary, loadConfig } from './config/index.js';
import type { Config } from './config/index.js';
import { createApp, createCommands } from './app.js';
import type { AppContainer } from './app.js';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_CONFIG = 2;

interface GlobalFlags {
  help: boolean;
  version: boolean;
  verbose: boolean;
}

function splitGlobalFlags(argv: readonly string[]): { flags: GlobalFlags; rest: string[] } {
  const flags: GlobalFlags = { help: false, version: false, verbose: false };
  const rest: string[] = [];

  for (const arg of argv) {
    if (arg === '--help' || arg === '-h') flags.help = true;
    else if (arg === '--version') flags.version = true;
    else if (arg === '--verbose' || arg === '-v') flags.verbose = true;
    else rest.push(arg);
  }
  return { flags, rest };
}

/**
 * Runs one invocation and resolves with the process exit code
 */
export async function start(argv: readonly string[], env: NodeJS.ProcessEnv = process.env): Promise<number> {
  const { flags, rest } = splitGlobalFlags(argv);

  if (flags.help) {
    showHelp();
    return EXIT_OK;
  }

  let config: Config;
  try {
    config = loadConfig(env);
  } catch (error) {
    console.error(isConfigValidationError(error) ? error.message : `Failed to load configuration: ${errorMessage(error)}`);
    return EXIT_CONFIG;
  }

  if (flags.version) {
    console.log(`${config.app.name} v${config.app.version}`);
    return EXIT_OK;
  }

  const [commandName = 'run', ...commandArgs] = rest;
  const oneShot = commandName !== 'run';

  const logger = createLogger({
    // Keep stdout readable for one-shot output
    level: flags.verbose ? 'debug' : oneShot ? 'warn' : config.logging.level,
    json: config.logging.format === 'json',
    filePath: config.logging.filePath,
  });
  attachGlobalHandlers(logger);

  if (!oneShot) {
    return run(config, logger);
  }

  const container = createApp(config, logger, { mode: 'storage' });
  try {
    await container.initializeAll();
    const command = createCommands(container, logger).get(commandName);
    if (command === undefined) {
      console.error(`Unknown command: ${commandName}`);
      showHelp();
      return EXIT_FAILURE;
    }

    const result = await command.execute(commandArgs, { format: 'text', verbose: flags.verbose });
    if (result.output !== '') {
      console.log(result.output);
    }
    return result.success ? EXIT_OK : EXIT_FAILURE;
  } catch (error) {
    logger.error('Command failed', { command: commandName, error: errorMessage(error) });
    console.error(`Error: ${errorMessage(error)}`);
    return EXIT_FAILURE;
  } finally {
    await container.shutdownAll();
  }
}

async function run(config: Config, logger: Logger): Promise<number> {
  const startupTimer = startTimer();
  logger.info('Starting barwatch', { ...getConfigSummary(config), operation: 'app_startup' });

  const container: AppContainer = createApp(config, logger, { mode: 'run' });
  try {
    await container.initializeAll();
  } catch (error) {
    logger.error('Application startup failed', { error: errorMessage(error) });
    await container.shutdownAll();
    return EXIT_FAILURE;
  }

  logger.info('barwatch startup complete', { operation: 'app_startup', duration_ms: startupTimer.stop() });
  logger.debug('Service wiring', { graph: container.getWiringGraph() });

  const signal = await waitForShutdownSignal();
  logger.info('Shutting down', { signal });
  await container.shutdownAll();
  logger.info('Shutdown complete');
  return EXIT_OK;
}

function waitForShutdownSignal(): Promise<NodeJS.Signals> {
  return new Promise((resolve) => {
    const onSignal = (signal: NodeJS.Signals): void => {
      process.off('SIGINT', onSignal);
      process.off('SIGTERM', onSignal);
      resolve(signal);
    };
    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);
  });
}

function showHelp(): void {
  console.log(`
barwatch - streaming bar ingestion and anomaly detection

Usage: barwatch [command] [options]

Commands:
  run (default)       Ingest, score and enforce retention until interrupted
  health              Show stored rows, universe size and last passes
  sweep               Run one retention sweep
  anomalies           List recorded anomalies

Command options:
  sweep --max-age-hours <h>
  anomalies --instrument <symbol> --interval <interval> --min-score <n>
            --since-hours <h> --limit <n> --by-score --all
  --json              JSON output (health, sweep, anomalies)

Options:
  --verbose, -v       Debug logging
  --help, -h          Show this help message
  --version           Show version information

Environment Variables:
  DATABASE_URL        sqlite:<path>, sqlite::memory: or postgres://...
  LOG_LEVEL           error/warn/info/debug
  LOG_FORMAT          json/pretty
  INTERVALS           Comma-separated bar intervals, e.g. 15m,1h
  WINDOW_SIZE         Bars in the rolling window
  UNIVERSE_TOP_N      Instruments tracked, by 24h quote volume
  RETENTION_MAX_AGE_HOURS, RETENTION_MAX_STORAGE_MB
`);
}
