import Decimal from 'decimal.js';
import { PriceObservation, PriceObservationWithMetrics } from '@/models';
import { METRIC_WINDOWS } from '@/config/etlRules';
import { groupBy } from '@/utils/collections';

export interface MetricsEngineOptions {
  shortWindow?: number;
  longWindow?: number;
}

/**
 * Metrics Engine
 * Derives per-asset time-series metrics from daily price observations
 *
 * Each asset is processed on its own, oldest date first, with running
 * accumulators (window sums, running product, running max). Nothing ever looks
 * past the current row, so a later price cannot change an earlier row.
 *
 * Assumes well-formed input: price > 0, one observation per (assetId, date).
 * No guards against zero or negative prices.
 */
export class MetricsEngine {
  private readonly shortWindow: number;
  private readonly longWindow: number;

  constructor(options: MetricsEngineOptions = {}) {
    this.shortWindow = options.shortWindow ?? METRIC_WINDOWS.SHORT;
    this.longWindow = options.longWindow ?? METRIC_WINDOWS.LONG;
  }

  /**
   * Compute metrics for every asset in `observations`
   *
   * @returns Rows grouped by asset (in order of first appearance), each group
   * ascending by date
   */
  compute(observations: PriceObservation[]): PriceObservationWithMetrics[] {
    const byAsset = groupBy(observations, (o) => o.assetId);
    const rows: PriceObservationWithMetrics[] = [];

    for (const series of byAsset.values()) {
      rows.push(...this.computeSeries(series));
    }

    return rows;
  }

  /**
   * Compute metrics for a single asset's series
   */
  computeSeries(series: PriceObservation[]): PriceObservationWithMetrics[] {
    const sorted = [...series].sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));

    const shortMa = new TrailingMean(this.shortWindow);
    const longMa = new TrailingMean(this.longWindow);
    let growth = new Decimal(1);
    let rollingMax = -Infinity;
    let previousPrice: number | undefined;

    return sorted.map((observation) => {
      const { price } = observation;

      const dailyReturn = previousPrice === undefined ? 0 : price / previousPrice - 1;
      growth = growth.times(new Decimal(1).plus(dailyReturn));
      rollingMax = Math.max(rollingMax, price);
      previousPrice = price;

      return {
        ...observation,
        dailyReturn,
        pctChange: dailyReturn * 100,
        ma7: shortMa.push(price),
        ma30: longMa.push(price),
        cumReturn: growth.minus(1).toNumber(),
        rollingMaxPrice: rollingMax,
        drawdown: (price - rollingMax) / rollingMax,
      };
    });
  }
}

/**
 * Mean of the last `size` values pushed (fewer at the start of a series)
 * Sums are kept in Decimal so long series do not accumulate float drift
 */
class TrailingMean {
  private readonly values: number[] = [];
  private sum = new Decimal(0);

  constructor(private readonly size: number) {}

  push(value: number): number {
    this.values.push(value);
    this.sum = this.sum.plus(value);

    if (this.values.length > this.size) {
      const dropped = this.values.shift();
      if (dropped !== undefined) {
        this.sum = this.sum.minus(dropped);
      }
    }

    return this.sum.dividedBy(this.values.length).toNumber();
  }
}
