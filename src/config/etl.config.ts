import { join } from 'path';
import { env } from './env';
import { ChartWindow } from '@/models';
import { STORAGE_TYPES, StorageType } from '@/constants/market';
import { ValidationError } from '@/errors';
import { dayWindowSchema } from '@/validators/etl.validator';

/**
 * Resolved run configuration
 * Built from the environment; the CLI may override individual fields
 */
export interface EtlConfig {
  assetIds: string[];
  quoteCurrency: string;
  window: ChartWindow;
  storageType: StorageType;
  pricesPath: string;
  metadataPath: string;
}

/**
 * Split a comma-separated asset list, dropping blanks
 */
export function parseAssetList(value: string): string[] {
  return value
    .split(',')
    .map((id) => id.trim().toLowerCase())
    .filter((id) => id.length > 0);
}

/**
 * Parse a day window ("365" or "max")
 */
export function parseDayWindow(value: string): ChartWindow {
  const parsed = dayWindowSchema.safeParse(value.trim());
  if (!parsed.success) {
    throw new ValidationError(`Invalid day window "${value}"`, parsed.error.flatten());
  }
  return parsed.data;
}

export function loadEtlConfig(): EtlConfig {
  return {
    assetIds: parseAssetList(env.ETL_ASSETS),
    quoteCurrency: env.ETL_QUOTE_CURRENCY.toLowerCase(),
    window: parseDayWindow(env.ETL_DAYS),
    storageType: env.STORAGE_TYPE === 'postgres' ? STORAGE_TYPES.POSTGRES : STORAGE_TYPES.CSV,
    pricesPath: join(env.OUTPUT_DIR, env.PRICES_FILE),
    metadataPath: join(env.OUTPUT_DIR, env.METADATA_FILE),
  };
}
