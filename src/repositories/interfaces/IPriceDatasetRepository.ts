import { PriceObservationWithMetrics } from '@/models';

/**
 * Price Dataset Repository Interface
 * Persistence of the price + metrics dataset produced by a run
 */
export interface IPriceDatasetRepository {
  /**
   * Persist the rows of a run, keyed by (date, assetId, quoteCurrency)
   * @returns Number of rows written
   */
  save(rows: PriceObservationWithMetrics[]): Promise<number>;
}
