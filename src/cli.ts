import { resolve } from 'node:path';
import type { SyncConfig } from './config.js';
import { loadConfig } from './config.js';
import type { Logger } from './shared/logger.js';
import { createLogger } from './shared/logger.js';
import { toIsoTimestamp } from './shared/transform.js';
import { flagValue } from './shared/args.js';
import { runSync } from './sync/orchestrator.js';
import type { SyncDependencies, SyncReport } from './sync/orchestrator.js';
import { createDependencies } from './sync/dependencies.js';
import { ConfigurationError, DeliveryError, describeError } from './errors.js';

export const USAGE = `Usage: highlight-sync [options]

Sync new GoodLinks highlights to Readwise.

Options:
  --dry-run        Show what would be posted without posting or updating state
  --db <path>      GoodLinks database (default: $GOODLINKS_DB_PATH or the GoodLinks app container)
  --state <path>   Watermark file (default: $HIGHLIGHT_SYNC_STATE_FILE or ./last_sync.txt)
  --utc            Render highlighted_at in UTC instead of local time
  --help           Show this help

Environment:
  READWISE_API_TOKEN   Readwise access token (not needed with --dry-run)`;

export interface CliArgs {
  dryRun: boolean;
  help: boolean;
  utc: boolean;
  databasePath?: string;
  statePath?: string;
}

/** Parse `process.argv`-shaped input; unknown flags are ignored */
export function parseCliArgs(argv: string[]): CliArgs {
  return {
    dryRun: argv.includes('--dry-run'),
    help: argv.includes('--help') || argv.includes('-h'),
    utc: argv.includes('--utc'),
    databasePath: flagValue(argv, '--db'),
    statePath: flagValue(argv, '--state'),
  };
}

export function applyCliArgs(config: SyncConfig, args: CliArgs, cwd: string = process.cwd()): SyncConfig {
  return {
    ...config,
    databasePath: args.databasePath ? resolve(cwd, args.databasePath) : config.databasePath,
    statePath: args.statePath ? resolve(cwd, args.statePath) : config.statePath,
    timeZone: args.utc ? 'utc' : config.timeZone,
  };
}

export function printReport(report: SyncReport, config: Pick<SyncConfig, 'timeZone'>, logger: Logger): void {
  const time = (ts: number) => toIsoTimestamp(ts, config.timeZone);

  switch (report.state) {
    case 'up-to-date':
      logger.info('No new highlights found.');
      return;
    case 'preview': {
      const count = report.batch.highlights.length;
      logger.info(`Found ${count} new highlight(s) to sync.`);
      logger.info('');
      logger.info('Would post the following payload to Readwise:');
      logger.info(JSON.stringify(report.batch, null, 2));
      logger.info('');
      logger.info(`DRY RUN: Would sync ${count} highlight(s) to Readwise.`);
      logger.info(`DRY RUN: Would update last sync time to: ${time(report.nextWatermark)}`);
      return;
    }
    case 'committed':
      logger.info(`Successfully synced ${report.count} highlight(s) to Readwise.`);
      logger.info(`Last sync time updated to: ${time(report.watermark)}`);
      return;
    case 'failed':
      logger.error(`Error: ${describeError(report.error)}`);
      if (report.error instanceof DeliveryError && report.error.responseBody) {
        logger.error(`Response: ${report.error.responseBody}`);
      }
      return;
  }
}

export interface MainOptions {
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
  /** Override production bindings (tests) */
  dependencies?: (config: SyncConfig, logger: Logger) => SyncDependencies;
}

/** Run the CLI; resolves to the process exit code */
export async function main(argv: string[], options: MainOptions = {}): Promise<number> {
  const args = parseCliArgs(argv);
  if (args.help) {
    (options.logger ?? createLogger()).info(USAGE);
    return 0;
  }

  let config: SyncConfig;
  try {
    config = applyCliArgs(loadConfig(options.env ?? process.env), args);
  } catch (err) {
    if (err instanceof ConfigurationError) {
      (options.logger ?? createLogger()).error(`Error: ${err.message}`);
      return 1;
    }
    throw err;
  }

  const logger = options.logger ?? createLogger({ debug: config.debug });

  if (args.dryRun) {
    logger.info('DRY RUN MODE: No highlights will be posted and the last sync time will not be updated.');
    logger.info('');
  }

  const deps = (options.dependencies ?? createDependencies)(config, logger);

  const report = await runSync(deps, {
    preview: args.dryRun,
    token: config.token,
    timeZone: config.timeZone,
    onWatermarkLoaded: watermark => {
      if (watermark !== undefined) {
        logger.info(`Last sync time: ${toIsoTimestamp(watermark, config.timeZone)}`);
      } else {
        logger.info('No previous sync found. Processing all highlights.');
      }
    },
    onDeliver: count => logger.info(`Posting ${count} highlight(s) to Readwise...`),
  });
  printReport(report, config, logger);

  return report.state === 'failed' ? 1 : 0;
}
