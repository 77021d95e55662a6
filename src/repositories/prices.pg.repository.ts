import { query, transaction } from '@/config/database';
import { DB_QUERY_LIMITS } from '@/config/database.config';
import { PRICE_COLUMNS } from '@/constants/market';
import { PriceObservationWithMetrics } from '@/models';
import { createLogger } from '@/adapters/logging/LoggerFactory';
import { chunkArray } from '@/utils/collections';
import { IPriceDatasetRepository } from './interfaces/IPriceDatasetRepository';

const logger = createLogger('PgPriceDatasetRepository');

const UPDATABLE_COLUMNS = PRICE_COLUMNS.filter(
  (column) => column !== 'date' && column !== 'asset_id' && column !== 'quote_currency'
);

/**
 * PostgreSQL Price Dataset Repository
 * Upserts the rows of a run into asset_prices, keyed by (date, asset_id, quote_currency)
 */
export class PgPriceDatasetRepository implements IPriceDatasetRepository {
  async save(rows: PriceObservationWithMetrics[]): Promise<number> {
    if (rows.length === 0) return 0;

    const written = await transaction(async (client) => {
      let count = 0;
      for (const batch of chunkArray(rows, DB_QUERY_LIMITS.INSERT_BATCH_SIZE)) {
        const result = await query(buildUpsert(batch.length), batch.flatMap(toParams), client);
        count += result.rowCount ?? 0;
      }
      return count;
    });

    logger.info({ rows: written }, 'Price dataset upserted');
    return written;
  }
}

/**
 * INSERT ... VALUES ($1..$11), ($12..$22), ... ON CONFLICT DO UPDATE
 */
export function buildUpsert(rowCount: number): string {
  const width = PRICE_COLUMNS.length;
  const tuples = Array.from({ length: rowCount }, (_, row) => {
    const placeholders = PRICE_COLUMNS.map((_, col) => `$${row * width + col + 1}`);
    return `(${placeholders.join(', ')})`;
  });

  return `
    INSERT INTO asset_prices (${PRICE_COLUMNS.join(', ')})
    VALUES ${tuples.join(',\n      ')}
    ON CONFLICT (date, asset_id, quote_currency) DO UPDATE SET
      ${UPDATABLE_COLUMNS.map((column) => `${column} = EXCLUDED.${column}`).join(',\n      ')}
  `;
}

function toParams(row: PriceObservationWithMetrics): Array<string | number> {
  return [
    row.date,
    row.assetId,
    row.quoteCurrency,
    row.price,
    row.dailyReturn,
    row.pctChange,
    row.ma7,
    row.ma30,
    row.cumReturn,
    row.rollingMaxPrice,
    row.drawdown,
  ];
}
