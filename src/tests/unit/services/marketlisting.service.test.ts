import { RetryingFetcher } from '@/clients/fetcher.client';
import { MarketListingService } from '@/services/marketlisting.service';
import { ValidationError } from '@/errors';
import { ScriptedReply, createScriptedMarketApi } from '@/tests/utils/scriptedMarketApi';
import { createSleepSpy } from '@/tests/utils/mockRepositories';

function setup(replies: ScriptedReply[]) {
  const api = createScriptedMarketApi({ '/coins/markets': replies });
  const service = new MarketListingService(
    new RetryingFetcher(api.client, { sleep: createSleepSpy() })
  );
  return { api, service };
}

describe('MarketListingService', () => {
  describe('topAssetsByMarketCap', () => {
    it('should return ids in listing order', async () => {
      const { api, service } = setup([
        {
          status: 200,
          data: [
            { id: 'bitcoin', symbol: 'btc', name: 'Bitcoin', market_cap_rank: 1 },
            { id: 'ethereum', symbol: 'eth', name: 'Ethereum', market_cap_rank: 2 },
          ],
        },
      ]);

      await expect(service.topAssetsByMarketCap(2, 'usd')).resolves.toEqual([
        'bitcoin',
        'ethereum',
      ]);
      expect(api.requests[0]?.params).toEqual({
        vs_currency: 'usd',
        order: 'market_cap_desc',
        per_page: 2,
        page: 1,
      });
    });

    it('should reject a malformed listing', async () => {
      const { service } = setup([{ status: 200, data: [{ symbol: 'btc' }] }]);

      await expect(service.topAssetsByMarketCap(1, 'usd')).rejects.toBeInstanceOf(
        ValidationError
      );
    });
  });
});
