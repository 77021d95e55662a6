#!/usr/bin/env node
import { parseArgs } from 'util';
import { EtlConfig, loadEtlConfig, parseAssetList, parseDayWindow } from '@/config/etl.config';
import { createContainer } from '@/config/dependencies';
import { closePool } from '@/config/database';
import { STORAGE_TYPES } from '@/constants/market';
import { AppError, ValidationError } from '@/errors';
import { logger } from '@/adapters/logging/LoggerFactory';

/**
 * CLI Entry Point
 * Runs one ETL pass and exits: 0 on success, 1 on any failure
 *
 * Usage:
 *   asset-metrics-etl [--assets bitcoin,ethereum] [--top 10]
 *                     [--days 365|max] [--from 2024-01-01 --to 2024-06-30]
 *                     [--vs usd]
 */

const USAGE =
  'Usage: asset-metrics-etl [--assets a,b] [--top N] [--days N|max] [--from ISO --to ISO] [--vs usd]';

export interface CliOptions {
  config: EtlConfig;
  top?: number;
}

/**
 * Apply command-line overrides on top of the environment configuration
 */
export function parseCliArgs(argv: string[], base: EtlConfig = loadEtlConfig()): CliOptions {
  const { values } = parseArgs({
    args: argv,
    options: {
      assets: { type: 'string' },
      top: { type: 'string' },
      days: { type: 'string' },
      from: { type: 'string' },
      to: { type: 'string' },
      vs: { type: 'string' },
    },
    strict: true,
  });

  const config: EtlConfig = { ...base };

  if (values.assets !== undefined) {
    config.assetIds = parseAssetList(values.assets);
  }
  if (values.vs !== undefined) {
    config.quoteCurrency = values.vs.trim().toLowerCase();
  }

  if (values.from !== undefined || values.to !== undefined) {
    if (values.days !== undefined) {
      throw new ValidationError('--days cannot be combined with --from/--to');
    }
    if (values.from === undefined || values.to === undefined) {
      throw new ValidationError('--from and --to must be given together');
    }
    config.window = { from: parseDate(values.from, '--from'), to: parseDate(values.to, '--to') };
  } else if (values.days !== undefined) {
    config.window = parseDayWindow(values.days);
  }

  let top: number | undefined;
  if (values.top !== undefined) {
    if (values.assets !== undefined) {
      throw new ValidationError('--top cannot be combined with --assets');
    }
    top = Number(values.top);
    if (!Number.isInteger(top) || top <= 0 || top > 250) {
      throw new ValidationError(`--top must be a whole number between 1 and 250, got "${values.top}"`);
    }
  }

  return { config, top };
}

function parseDate(value: string, flag: string): Date {
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new ValidationError(`${flag} is not a valid date: "${value}"`);
  }
  return date;
}

/**
 * Run the ETL once
 */
async function main(): Promise<number> {
  let options: CliOptions;
  try {
    options = parseCliArgs(process.argv.slice(2));
  } catch (error) {
    logger.error({ error: describeError(error) }, USAGE);
    return 1;
  }

  const { config } = options;
  const container = createContainer(config);

  try {
    if (options.top !== undefined) {
      config.assetIds = await container.marketListingService.topAssetsByMarketCap(
        options.top,
        config.quoteCurrency
      );
    }

    const summary = await container.orchestrator.run({
      assetIds: config.assetIds,
      quoteCurrency: config.quoteCurrency,
      window: config.window,
    });

    logger.info({ ...summary, storage: config.storageType }, 'ETL run complete');
    return 0;
  } catch (error) {
    logger.fatal({ error: describeError(error) }, 'ETL run failed');
    return 1;
  } finally {
    await container.metrics.flush();
    if (config.storageType === STORAGE_TYPES.POSTGRES) {
      await closePool();
    }
  }
}

function describeError(error: unknown): Record<string, unknown> {
  if (error instanceof AppError) {
    return {
      name: error.name,
      code: error.code,
      message: error.message,
      details: error instanceof ValidationError ? error.errors : undefined,
    };
  }
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  return { message: String(error) };
}

if (require.main === module) {
  process.on('unhandledRejection', (reason) => {
    logger.error({ reason }, 'Unhandled Promise Rejection');
  });

  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      logger.fatal({ error: describeError(error) }, 'Uncaught error');
      process.exitCode = 1;
    });
}
