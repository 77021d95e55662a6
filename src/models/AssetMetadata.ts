/**
 * Asset reference data
 * Keyed by assetId; the persisted snapshot is merged across runs, never replaced
 */
export interface AssetMetadata {
  assetId: string;
  symbol: string;
  displayName: string;
  marketCapRank?: number;
}
