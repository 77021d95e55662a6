import { RetryingFetcher } from '@/clients/fetcher.client';
import { MARKET_ENDPOINTS } from '@/constants/market';
import { ValidationError } from '@/errors';
import { marketListingResponseSchema } from '@/validators/marketApi.validator';
import { createLogger } from '@/adapters/logging/LoggerFactory';

const logger = createLogger('MarketListingService');

/**
 * Market Listing Service
 * Picks the asset universe from the markets endpoint
 */
export class MarketListingService {
  constructor(private fetcher: RetryingFetcher) {}

  /**
   * Ids of the `count` largest assets by market cap, largest first
   */
  async topAssetsByMarketCap(count: number, quoteCurrency: string): Promise<string[]> {
    const body = await this.fetcher.fetch(MARKET_ENDPOINTS.markets(), {
      vs_currency: quoteCurrency,
      order: 'market_cap_desc',
      per_page: count,
      page: 1,
    });

    const parsed = marketListingResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ValidationError('Unexpected markets payload', parsed.error.flatten());
    }

    const ids = parsed.data.map((row) => row.id);
    logger.info({ count: ids.length, ids }, 'Resolved top assets by market cap');
    return ids;
  }
}
