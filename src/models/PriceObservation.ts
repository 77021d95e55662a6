/**
 * One daily price point for an asset
 *
 * Invariants (enforced by MarketChartLoader, assumed by MetricsEngine):
 * - at most one observation per (assetId, date)
 * - sorted ascending by date within an asset
 * - price > 0
 */
export interface PriceObservation {
  date: string; // UTC calendar date, YYYY-MM-DD
  assetId: string;
  quoteCurrency: string;
  price: number;
}

/**
 * Price observation with derived time-series metrics
 * All metrics are per asset and never look ahead of `date`
 */
export interface PriceObservationWithMetrics extends PriceObservation {
  dailyReturn: number; // Fractional change vs previous date, 0 on the first date
  pctChange: number; // dailyReturn * 100
  ma7: number;
  ma30: number;
  cumReturn: number; // Compounded return since the first date
  rollingMaxPrice: number;
  drawdown: number; // (price - rollingMaxPrice) / rollingMaxPrice, always <= 0
}
