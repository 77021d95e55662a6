import { RetryingFetcher } from '@/clients/fetcher.client';
import { EtlOrchestrator } from '@/services/etl.service';
import { MarketChartLoader } from '@/services/marketchart.service';
import { MetricsEngine } from '@/services/pricemetrics.service';
import { MetadataCache } from '@/services/metadata.service';
import { NoOpMetrics } from '@/adapters/metrics/NoOpMetrics';
import { NoDataError, TerminalFetchError, ValidationError } from '@/errors';
import { IMetrics } from '@/interfaces/IMetrics';
import {
  ScriptedReply,
  chartPayload,
  createScriptedMarketApi,
} from '@/tests/utils/scriptedMarketApi';
import {
  InMemoryMetadataStore,
  InMemoryPriceDatasetRepository,
  createSleepSpy,
} from '@/tests/utils/mockRepositories';

const chart = (assetId: string) => `/coins/${assetId}/market_chart`;

const threeDays = chartPayload([
  ['2024-01-01T00:00:00Z', 10],
  ['2024-01-02T00:00:00Z', 20],
  ['2024-01-03T00:00:00Z', 10],
]);

function setup(routes: Record<string, ScriptedReply[]>, metrics: IMetrics = new NoOpMetrics()) {
  const api = createScriptedMarketApi(routes);
  const sleep = createSleepSpy();
  const fetcher = new RetryingFetcher(api.client, { sleep });
  const priceRepo = new InMemoryPriceDatasetRepository();
  const metadataStore = new InMemoryMetadataStore();
  const orchestrator = new EtlOrchestrator(
    new MarketChartLoader(fetcher),
    new MetricsEngine(),
    new MetadataCache(fetcher, metadataStore, { quoteCurrency: 'usd', sleep }),
    priceRepo,
    metadataStore,
    metrics,
    { sleep }
  );
  return { api, sleep, priceRepo, metadataStore, orchestrator };
}

describe('EtlOrchestrator', () => {
  describe('run', () => {
    it('should load, compute and persist prices then metadata', async () => {
      const { api, sleep, priceRepo, metadataStore, orchestrator } = setup({
        [chart('bitcoin')]: [{ status: 200, data: threeDays }],
        [chart('ghost')]: [{ status: 200, data: { prices: [] } }],
        '/coins/markets': [
          {
            status: 200,
            data: [{ id: 'bitcoin', symbol: 'btc', name: 'Bitcoin', market_cap_rank: 1 }],
          },
        ],
      });

      const summary = await orchestrator.run({
        assetIds: ['bitcoin', 'ghost'],
        quoteCurrency: 'usd',
        window: 3,
      });

      expect(summary).toEqual({
        assetsRequested: 2,
        assetsLoaded: ['bitcoin'],
        assetsSkipped: ['ghost'],
        rowsWritten: 3,
        metadataRecords: 1,
      });
      expect(api.endpoints()).toEqual([chart('bitcoin'), chart('ghost'), '/coins/markets']);
      expect(sleep.mock.calls).toEqual([[1100], [4000], [6000]]);
      expect(priceRepo.rows.map((r) => [r.date, r.price, r.drawdown])).toEqual([
        ['2024-01-01', 10, 0],
        ['2024-01-02', 20, 0],
        ['2024-01-03', 10, -0.5],
      ]);
      expect(metadataStore.saved).toEqual([
        [{ assetId: 'bitcoin', symbol: 'btc', displayName: 'Bitcoin', marketCapRank: 1 }],
      ]);
    });

    it('should resolve metadata for the distinct loaded ids in sorted order', async () => {
      const { api, orchestrator } = setup({
        [chart('solana')]: [{ status: 200, data: threeDays }],
        [chart('bitcoin')]: [{ status: 200, data: threeDays }],
        '/coins/markets': [{ status: 200, data: [] }],
      });

      await orchestrator.run({
        assetIds: ['solana', 'bitcoin', 'solana'],
        quoteCurrency: 'usd',
        window: 3,
      });

      expect(api.endpoints()).toEqual([chart('solana'), chart('bitcoin'), '/coins/markets']);
      expect(api.requests[2]?.params).toEqual({ vs_currency: 'usd', ids: 'bitcoin,solana' });
    });

    it('should normalise the quote currency', async () => {
      const { api, orchestrator } = setup({
        [chart('bitcoin')]: [{ status: 200, data: threeDays }],
      });

      await orchestrator.run({ assetIds: ['bitcoin'], quoteCurrency: ' EUR ', window: 3 });

      expect(api.requests[0]?.params).toEqual({ vs_currency: 'eur', days: 3, interval: 'daily' });
    });

    it('should fail with NoDataError when every asset is empty', async () => {
      const { priceRepo, metadataStore, orchestrator } = setup({
        [chart('ghost')]: [{ status: 200, data: { prices: [] } }],
        [chart('phantom')]: [{ status: 200, data: {} }],
      });

      const error = await orchestrator
        .run({ assetIds: ['ghost', 'phantom'], quoteCurrency: 'usd', window: 3 })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(NoDataError);
      expect(error).toHaveProperty('message', 'No price data returned for any of: ghost, phantom');
      expect(priceRepo.saveCalls).toBe(0);
      expect(metadataStore.saved).toHaveLength(0);
    });

    it('should abort without writing when a series cannot be fetched', async () => {
      const { priceRepo, orchestrator } = setup({
        [chart('bitcoin')]: [{ status: 200, data: threeDays }],
        [chart('missing')]: [{ status: 404 }],
      });

      await expect(
        orchestrator.run({ assetIds: ['bitcoin', 'missing'], quoteCurrency: 'usd', window: 3 })
      ).rejects.toBeInstanceOf(TerminalFetchError);
      expect(priceRepo.saveCalls).toBe(0);
    });

    it('should record the run duration when the run fails', async () => {
      const endTimer = jest.fn();
      const metrics: jest.Mocked<IMetrics> = {
        incrementCounter: jest.fn(),
        recordHistogram: jest.fn(),
        startTimer: jest.fn().mockReturnValue(endTimer),
        flush: jest.fn().mockResolvedValue(undefined),
      };
      const { orchestrator } = setup(
        { [chart('ghost')]: [{ status: 200, data: { prices: [] } }] },
        metrics
      );

      await expect(
        orchestrator.run({ assetIds: ['ghost'], quoteCurrency: 'usd', window: 3 })
      ).rejects.toBeInstanceOf(NoDataError);

      expect(metrics.startTimer).toHaveBeenCalledWith('etl.run.duration');
      expect(endTimer).toHaveBeenCalledTimes(1);
    });

    it('should record the run duration once on success', async () => {
      const endTimer = jest.fn();
      const metrics: jest.Mocked<IMetrics> = {
        incrementCounter: jest.fn(),
        recordHistogram: jest.fn(),
        startTimer: jest.fn().mockReturnValue(endTimer),
        flush: jest.fn().mockResolvedValue(undefined),
      };
      const { orchestrator } = setup({ [chart('bitcoin')]: [{ status: 200, data: threeDays }] }, metrics);

      await orchestrator.run({ assetIds: ['bitcoin'], quoteCurrency: 'usd', window: 3 });

      expect(endTimer).toHaveBeenCalledTimes(1);
      expect(metrics.incrementCounter).toHaveBeenCalledWith('etl.rows.written', 3);
    });

    it.each([
      ['no assets', { assetIds: [], quoteCurrency: 'usd', window: 3 }],
      ['a malformed asset id', { assetIds: ['Bit Coin'], quoteCurrency: 'usd', window: 3 }],
      ['a non-positive window', { assetIds: ['bitcoin'], quoteCurrency: 'usd', window: 0 }],
    ])('should reject %s before any request', async (_label, input) => {
      const { api, orchestrator } = setup({});

      await expect(orchestrator.run(input)).rejects.toBeInstanceOf(ValidationError);
      expect(api.requests).toHaveLength(0);
    });
  });
});
