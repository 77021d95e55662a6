import { ChartWindow } from './MarketChart';

/**
 * Parameters for a single ETL run
 */
export interface EtlRunInput {
  assetIds: string[];
  quoteCurrency: string;
  window: ChartWindow;
}

/**
 * Outcome of a completed run
 */
export interface EtlRunSummary {
  assetsRequested: number;
  assetsLoaded: string[];
  assetsSkipped: string[];
  rowsWritten: number;
  metadataRecords: number;
}
