/**
 * Dependency Container
 * Instantiates and wires the fetch layer, stores and services of a run
 *
 * This is the single source of truth for dependency injection.
 * All concrete implementations are created here and injected into services.
 */

import { AxiosInstance } from 'axios';
import { EtlConfig } from '@/config/etl.config';
import { STORAGE_TYPES } from '@/constants/market';
import { IMetrics } from '@/interfaces/IMetrics';
import { createMetrics } from '@/adapters/metrics/MetricsFactory';

// Fetch layer
import { createMarketApiClient } from '@/clients/marketApi.client';
import { RetryingFetcher } from '@/clients/fetcher.client';

// Repository implementations
import { IMetadataStore, IPriceDatasetRepository } from '@/repositories/interfaces';
import { CsvPriceDatasetRepository } from '@/repositories/prices.csv.repository';
import { CsvMetadataStore } from '@/repositories/metadata.csv.repository';
import { PgPriceDatasetRepository } from '@/repositories/prices.pg.repository';
import { PgMetadataStore } from '@/repositories/metadata.pg.repository';

// Service implementations
import { MarketChartLoader } from '@/services/marketchart.service';
import { MetricsEngine } from '@/services/pricemetrics.service';
import { MetadataCache } from '@/services/metadata.service';
import { MarketListingService } from '@/services/marketlisting.service';
import { EtlOrchestrator } from '@/services/etl.service';

export interface EtlContainer {
  metrics: IMetrics;
  marketListingService: MarketListingService;
  orchestrator: EtlOrchestrator;
}

export interface ContainerOverrides {
  http?: AxiosInstance;
  metrics?: IMetrics;
  priceRepository?: IPriceDatasetRepository;
  metadataStore?: IMetadataStore;
  sleep?: (ms: number) => Promise<void>;
}

export function createContainer(
  config: EtlConfig,
  overrides: ContainerOverrides = {}
): EtlContainer {
  const metrics = overrides.metrics ?? createMetrics();

  // ==========================================================================
  // FETCH LAYER
  // ==========================================================================

  const fetcher = new RetryingFetcher(overrides.http ?? createMarketApiClient(), {
    metrics,
    sleep: overrides.sleep,
  });

  // ==========================================================================
  // REPOSITORIES
  // ==========================================================================

  const usePostgres = config.storageType === STORAGE_TYPES.POSTGRES;

  const priceRepository =
    overrides.priceRepository ??
    (usePostgres
      ? new PgPriceDatasetRepository()
      : new CsvPriceDatasetRepository(config.pricesPath));

  const metadataStore =
    overrides.metadataStore ??
    (usePostgres ? new PgMetadataStore() : new CsvMetadataStore(config.metadataPath));

  // ==========================================================================
  // SERVICES
  // ==========================================================================

  const metadataCache = new MetadataCache(fetcher, metadataStore, {
    quoteCurrency: config.quoteCurrency,
    sleep: overrides.sleep,
  });

  /**
   * ETL Orchestrator
   * One sequential run over all configured assets
   */
  const orchestrator = new EtlOrchestrator(
    new MarketChartLoader(fetcher),
    new MetricsEngine(),
    metadataCache,
    priceRepository,
    metadataStore,
    metrics,
    { sleep: overrides.sleep }
  );

  return {
    metrics,
    marketListingService: new MarketListingService(fetcher),
    orchestrator,
  };
}
