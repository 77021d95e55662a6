import { RetryingFetcher, QueryParams } from '@/clients/fetcher.client';
import { MARKET_ENDPOINTS } from '@/constants/market';
import { ChartWindow, PriceObservation, isChartRange } from '@/models';
import { ValidationError } from '@/errors';
import { marketChartResponseSchema } from '@/validators/marketApi.validator';
import { createLogger } from '@/adapters/logging/LoggerFactory';
import { toCalendarDate, toUnixSeconds } from '@/utils/dates';

const logger = createLogger('MarketChartLoader');

/**
 * Market Chart Loader
 * Pulls one asset's price series and normalizes it into daily observations
 */
export class MarketChartLoader {
  constructor(private fetcher: RetryingFetcher) {}

  /**
   * Load the daily series for an asset
   *
   * @returns Observations sorted ascending by date, one per date. Empty when the
   * API has no price points for the asset (not an error).
   * @throws TerminalFetchError when the request cannot be completed
   * @throws ValidationError when the payload does not look like a market chart
   */
  async load(
    assetId: string,
    quoteCurrency: string,
    window: ChartWindow
  ): Promise<PriceObservation[]> {
    const { endpoint, params } = this.buildRequest(assetId, quoteCurrency, window);
    const body = await this.fetcher.fetch(endpoint, params);

    const parsed = marketChartResponseSchema.safeParse(body);
    if (!parsed.success) {
      logger.error(
        { assetId, errors: parsed.error.flatten() },
        'Unexpected market chart payload'
      );
      throw new ValidationError(
        `Unexpected market chart payload for ${assetId}`,
        parsed.error.flatten()
      );
    }

    const points = parsed.data.prices;
    if (points.length === 0) {
      logger.debug({ assetId }, 'Market chart has no price points');
      return [];
    }

    const observations = points
      .map(([timestampMs, price]) => ({
        date: toCalendarDate(timestampMs),
        assetId,
        quoteCurrency,
        price,
      }))
      // Array.prototype.sort is stable, so same-day points keep their source order
      .sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));

    return dedupeKeepLast(observations);
  }

  private buildRequest(
    assetId: string,
    quoteCurrency: string,
    window: ChartWindow
  ): { endpoint: string; params: QueryParams } {
    if (isChartRange(window)) {
      return {
        endpoint: MARKET_ENDPOINTS.marketChartRange(assetId),
        params: {
          vs_currency: quoteCurrency,
          from: toUnixSeconds(window.from),
          to: toUnixSeconds(window.to),
        },
      };
    }

    return {
      endpoint: MARKET_ENDPOINTS.marketChart(assetId),
      params: {
        vs_currency: quoteCurrency,
        days: window,
        interval: 'daily',
      },
    };
  }
}

/**
 * Collapse observations sharing a date, keeping the last one
 * Input must already be sorted by date
 */
export function dedupeKeepLast(sorted: PriceObservation[]): PriceObservation[] {
  const result: PriceObservation[] = [];
  for (const observation of sorted) {
    const previous = result[result.length - 1];
    if (previous && previous.date === observation.date) {
      result[result.length - 1] = observation;
    } else {
      result.push(observation);
    }
  }
  return result;
}
