import { RetryingFetcher } from '@/clients/fetcher.client';
import { MARKET_ENDPOINTS } from '@/constants/market';
import { RATE_LIMIT_PAUSES } from '@/config/etlRules';
import { AssetMetadata } from '@/models';
import { ValidationError } from '@/errors';
import { IMetadataStore } from '@/repositories/interfaces';
import { marketListingResponseSchema } from '@/validators/marketApi.validator';
import { createLogger } from '@/adapters/logging/LoggerFactory';
import { sleep as defaultSleep } from '@/utils/sleep';

const logger = createLogger('MetadataCache');

export interface MetadataCacheOptions {
  quoteCurrency: string;
  pauseBeforeLookupMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Which side wins when both snapshots hold the same assetId
 */
export type MergePreference = 'prefer-existing' | 'prefer-incoming';

/**
 * Metadata Cache
 * Resolves asset reference data, reusing the persisted snapshot when possible
 *
 * Preference order: cached snapshot (when complete) → fresh lookup merged over
 * the snapshot → snapshot merged over synthesized placeholders.
 * resolve() never throws; metadata problems must not abort a run.
 */
export class MetadataCache {
  private readonly quoteCurrency: string;
  private readonly pauseBeforeLookupMs: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private fetcher: RetryingFetcher,
    private store: IMetadataStore,
    options: MetadataCacheOptions
  ) {
    this.quoteCurrency = options.quoteCurrency;
    this.pauseBeforeLookupMs =
      options.pauseBeforeLookupMs ?? RATE_LIMIT_PAUSES.BEFORE_METADATA_LOOKUP_MS;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Resolve metadata for the given asset ids
   *
   * @returns The merged snapshot; may contain assets beyond `assetIds` that an
   * earlier run persisted
   */
  async resolve(assetIds: string[]): Promise<AssetMetadata[]> {
    const snapshot = await this.loadSnapshot();

    if (snapshot) {
      const known = new Set(snapshot.map((m) => m.assetId));
      const missing = assetIds.filter((id) => !known.has(id));
      if (missing.length === 0) {
        logger.info({ assets: assetIds.length }, 'Metadata cache hit, skipping lookup');
        return snapshot;
      }
      logger.info({ missing }, 'Metadata cache incomplete, looking up');
    }

    try {
      await this.sleep(this.pauseBeforeLookupMs);
      const fresh = await this.lookup(assetIds);
      logger.info({ fetched: fresh.length }, 'Metadata fetched');
      return mergeMetadata(snapshot ?? [], fresh, 'prefer-incoming');
    } catch (error) {
      logger.warn(
        { error: error instanceof Error ? error.message : String(error) },
        'Metadata lookup failed, using placeholder records'
      );
      const placeholders = assetIds.map(placeholderMetadata);
      return mergeMetadata(snapshot ?? [], placeholders, 'prefer-existing');
    }
  }

  private async loadSnapshot(): Promise<AssetMetadata[] | null> {
    try {
      return await this.store.load();
    } catch (error) {
      logger.warn(
        { error: error instanceof Error ? error.message : String(error) },
        'Metadata snapshot unreadable, ignoring it'
      );
      return null;
    }
  }

  private async lookup(assetIds: string[]): Promise<AssetMetadata[]> {
    const body = await this.fetcher.fetch(MARKET_ENDPOINTS.markets(), {
      vs_currency: this.quoteCurrency,
      ids: assetIds.join(','),
    });

    const parsed = marketListingResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ValidationError('Unexpected markets payload', parsed.error.flatten());
    }

    return parsed.data.map((row) => ({
      assetId: row.id,
      symbol: row.symbol,
      displayName: row.name,
      marketCapRank: row.market_cap_rank ?? undefined,
    }));
  }
}

/**
 * Merge two metadata sets keyed by assetId
 *
 * Rows only in `existing` come first (in their order), followed by `incoming`
 * rows. On conflict the preferred side's record is kept.
 */
export function mergeMetadata(
  existing: AssetMetadata[],
  incoming: AssetMetadata[],
  preference: MergePreference
): AssetMetadata[] {
  if (preference === 'prefer-incoming') {
    const incomingIds = new Set(incoming.map((m) => m.assetId));
    return [...existing.filter((m) => !incomingIds.has(m.assetId)), ...dedupe(incoming)];
  }

  const existingIds = new Set(existing.map((m) => m.assetId));
  return [...existing, ...dedupe(incoming.filter((m) => !existingIds.has(m.assetId)))];
}

/**
 * Minimal record for an asset the API could not describe
 * e.g. "usd-coin" → { symbol: "USD-", displayName: "Usd Coin" }
 */
export function placeholderMetadata(assetId: string): AssetMetadata {
  return {
    assetId,
    symbol: assetId.slice(0, 4).toUpperCase(),
    displayName: humanizeAssetId(assetId),
  };
}

/**
 * "wrapped-bitcoin" → "Wrapped Bitcoin"
 */
export function humanizeAssetId(assetId: string): string {
  return assetId
    .replace(/-/g, ' ')
    .replace(/[A-Za-z]+/g, (word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase());
}

function dedupe(records: AssetMetadata[]): AssetMetadata[] {
  const byId = new Map<string, AssetMetadata>();
  for (const record of records) {
    byId.set(record.assetId, record);
  }
  return [...byId.values()];
}
