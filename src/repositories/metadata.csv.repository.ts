import { z } from 'zod';
import { AssetMetadata } from '@/models';
import { METADATA_COLUMNS } from '@/constants/market';
import { ValidationError } from '@/errors';
import { metadataRowSchema } from '@/validators/metadata.validator';
import { createLogger } from '@/adapters/logging/LoggerFactory';
import { IMetadataStore } from './interfaces/IMetadataStore';
import { readCsv, writeCsv } from './csvFile';

const logger = createLogger('CsvMetadataStore');

const metadataFileSchema = z.array(metadataRowSchema);

/**
 * CSV Metadata Store
 * Keeps the metadata snapshot in a flat file next to the price dataset
 */
export class CsvMetadataStore implements IMetadataStore {
  constructor(private readonly filePath: string) {}

  async load(): Promise<AssetMetadata[] | null> {
    const records = await readCsv(this.filePath);
    if (records === null) {
      logger.debug({ file: this.filePath }, 'No metadata snapshot on disk');
      return null;
    }

    const parsed = metadataFileSchema.safeParse(records);
    if (!parsed.success) {
      throw new ValidationError(
        `Malformed metadata snapshot ${this.filePath}`,
        parsed.error.flatten()
      );
    }

    return parsed.data.map((row) => ({
      assetId: row.asset_id,
      symbol: row.symbol,
      displayName: row.display_name,
      marketCapRank: row.market_cap_rank,
    }));
  }

  async save(snapshot: AssetMetadata[]): Promise<void> {
    await writeCsv(
      this.filePath,
      METADATA_COLUMNS,
      snapshot.map((m) => ({
        asset_id: m.assetId,
        symbol: m.symbol,
        display_name: m.displayName,
        market_cap_rank: m.marketCapRank,
      }))
    );
    logger.info({ file: this.filePath, records: snapshot.length }, 'Metadata snapshot saved');
  }
}
