import { query, transaction } from '@/config/database';
import { AssetMetadata } from '@/models';
import { createLogger } from '@/adapters/logging/LoggerFactory';
import { IMetadataStore } from './interfaces/IMetadataStore';

const logger = createLogger('PgMetadataStore');

interface MetadataRow {
  assetId: string;
  symbol: string;
  displayName: string;
  marketCapRank: number | null;
}

/**
 * PostgreSQL Metadata Store
 * Rows are upserted and never deleted, so the table only grows or updates
 */
export class PgMetadataStore implements IMetadataStore {
  async load(): Promise<AssetMetadata[] | null> {
    const result = await query<MetadataRow>(
      `
      SELECT
        asset_id AS "assetId",
        symbol,
        display_name AS "displayName",
        market_cap_rank AS "marketCapRank"
      FROM asset_metadata
      ORDER BY asset_id
      `
    );

    if (result.rows.length === 0) return null;

    return result.rows.map((row) => ({
      assetId: row.assetId,
      symbol: row.symbol,
      displayName: row.displayName,
      marketCapRank: row.marketCapRank ?? undefined,
    }));
  }

  async save(snapshot: AssetMetadata[]): Promise<void> {
    await transaction(async (client) => {
      for (const record of snapshot) {
        await query(
          `
          INSERT INTO asset_metadata (asset_id, symbol, display_name, market_cap_rank)
          VALUES ($1, $2, $3, $4)
          ON CONFLICT (asset_id) DO UPDATE SET
            symbol = EXCLUDED.symbol,
            display_name = EXCLUDED.display_name,
            market_cap_rank = EXCLUDED.market_cap_rank,
            updated_at = NOW()
          `,
          [record.assetId, record.symbol, record.displayName, record.marketCapRank ?? null],
          client
        );
      }
    });

    logger.info({ records: snapshot.length }, 'Metadata snapshot upserted');
  }
}
