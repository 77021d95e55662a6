import { PriceObservationWithMetrics } from '@/models';
import { PRICE_COLUMNS } from '@/constants/market';
import { createLogger } from '@/adapters/logging/LoggerFactory';
import { IPriceDatasetRepository } from './interfaces/IPriceDatasetRepository';
import { writeCsv } from './csvFile';

const logger = createLogger('CsvPriceDatasetRepository');

/**
 * CSV Price Dataset Repository
 * Writes the whole dataset of a run to one flat file, replacing the previous one
 */
export class CsvPriceDatasetRepository implements IPriceDatasetRepository {
  constructor(private readonly filePath: string) {}

  async save(rows: PriceObservationWithMetrics[]): Promise<number> {
    await writeCsv(this.filePath, PRICE_COLUMNS, rows.map(toCsvRecord));
    logger.info({ file: this.filePath, rows: rows.length }, 'Price dataset saved');
    return rows.length;
  }
}

export function toCsvRecord(
  row: PriceObservationWithMetrics
): Record<(typeof PRICE_COLUMNS)[number], string | number> {
  return {
    date: row.date,
    asset_id: row.assetId,
    quote_currency: row.quoteCurrency,
    price: row.price,
    daily_return: row.dailyReturn,
    pct_change: row.pctChange,
    ma_7: row.ma7,
    ma_30: row.ma30,
    cum_return: row.cumReturn,
    rolling_max_price: row.rollingMaxPrice,
    drawdown: row.drawdown,
  };
}
