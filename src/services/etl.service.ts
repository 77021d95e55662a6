import { ChartWindow, EtlRunInput, EtlRunSummary, PriceObservation } from '@/models';
import { NoDataError, ValidationError } from '@/errors';
import { RATE_LIMIT_PAUSES } from '@/config/etlRules';
import { IMetadataStore, IPriceDatasetRepository } from '@/repositories/interfaces';
import { IMetrics } from '@/interfaces/IMetrics';
import { etlRunInputSchema } from '@/validators/etl.validator';
import { createLogger } from '@/adapters/logging/LoggerFactory';
import { sleep as defaultSleep } from '@/utils/sleep';
import { MarketChartLoader } from './marketchart.service';
import { MetricsEngine } from './pricemetrics.service';
import { MetadataCache } from './metadata.service';

const logger = createLogger('EtlOrchestrator');

export interface EtlPauses {
  betweenAssetsMs: number;
  beforeMetadataMs: number;
}

export interface EtlOrchestratorOptions {
  pauses?: Partial<EtlPauses>;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * ETL Orchestrator
 * Sequences one run: load every series → compute metrics → persist prices →
 * resolve metadata → persist metadata
 *
 * Runs strictly one request at a time against a single rate-limited upstream.
 */
export class EtlOrchestrator {
  private readonly pauses: EtlPauses;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private chartLoader: MarketChartLoader,
    private metricsEngine: MetricsEngine,
    private metadataCache: MetadataCache,
    private priceRepo: IPriceDatasetRepository,
    private metadataStore: IMetadataStore,
    private metrics: IMetrics,
    options: EtlOrchestratorOptions = {}
  ) {
    this.pauses = {
      betweenAssetsMs: RATE_LIMIT_PAUSES.BETWEEN_ASSETS_MS,
      beforeMetadataMs: RATE_LIMIT_PAUSES.BEFORE_METADATA_MS,
      ...options.pauses,
    };
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Execute a full run
   *
   * @throws ValidationError when the run parameters are invalid
   * @throws TerminalFetchError when a price series cannot be fetched
   * @throws NoDataError when no asset returned any price point
   */
  async run(input: EtlRunInput): Promise<EtlRunSummary> {
    const validation = etlRunInputSchema.safeParse(input);
    if (!validation.success) {
      throw new ValidationError('Invalid ETL parameters', validation.error.flatten());
    }
    const { quoteCurrency, window } = validation.data;
    const assetIds = [...new Set(validation.data.assetIds)];

    const endTimer = this.metrics.startTimer('etl.run.duration');
    logger.info({ assetIds, quoteCurrency, window }, 'ETL run started');

    try {
      return await this.execute(assetIds, quoteCurrency, window);
    } finally {
      endTimer();
    }
  }

  private async execute(
    assetIds: string[],
    quoteCurrency: string,
    window: ChartWindow
  ): Promise<EtlRunSummary> {
    const series: PriceObservation[] = [];
    const loaded: string[] = [];
    const skipped: string[] = [];

    for (const assetId of assetIds) {
      logger.info({ assetId }, 'Loading price series');
      const observations = await this.chartLoader.load(assetId, quoteCurrency, window);

      if (observations.length === 0) {
        logger.warn({ assetId }, 'No price data for asset, skipping');
        this.metrics.incrementCounter('etl.assets.skipped', 1, { assetId });
        skipped.push(assetId);
        continue;
      }

      series.push(...observations);
      loaded.push(assetId);
      await this.sleep(this.pauses.betweenAssetsMs);
    }

    if (loaded.length === 0) {
      logger.error({ assetIds }, 'No asset returned data, aborting run');
      throw new NoDataError(assetIds);
    }

    const rows = this.metricsEngine.compute(series);
    const rowsWritten = await this.priceRepo.save(rows);
    this.metrics.incrementCounter('etl.rows.written', rowsWritten);
    logger.info({ rows: rowsWritten, assets: loaded.length }, 'Price dataset persisted');

    await this.sleep(this.pauses.beforeMetadataMs);

    const metadataIds = [...new Set(rows.map((row) => row.assetId))].sort();
    const metadata = await this.metadataCache.resolve(metadataIds);
    await this.metadataStore.save(metadata);
    logger.info({ records: metadata.length }, 'Metadata snapshot persisted');

    return {
      assetsRequested: assetIds.length,
      assetsLoaded: loaded,
      assetsSkipped: skipped,
      rowsWritten,
      metadataRecords: metadata.length,
    };
  }
}
