/**
 * Upstream endpoints (relative to MARKET_API_BASE_URL)
 */
export const MARKET_ENDPOINTS = {
  marketChart: (assetId: string) => `/coins/${encodeURIComponent(assetId)}/market_chart`,
  marketChartRange: (assetId: string) =>
    `/coins/${encodeURIComponent(assetId)}/market_chart/range`,
  markets: () => '/coins/markets',
} as const;

/**
 * Asset ids accepted by the upstream API (lowercase slug)
 */
export const ASSET_ID_PATTERN = /^[a-z0-9-]+$/;

/**
 * Storage back ends
 */
export const STORAGE_TYPES = {
  CSV: 'csv',
  POSTGRES: 'postgres',
} as const;

/**
 * Persisted column order for the price + metrics dataset
 */
export const PRICE_COLUMNS = [
  'date',
  'asset_id',
  'quote_currency',
  'price',
  'daily_return',
  'pct_change',
  'ma_7',
  'ma_30',
  'cum_return',
  'rolling_max_price',
  'drawdown',
] as const;

/**
 * Persisted column order for the metadata snapshot
 */
export const METADATA_COLUMNS = [
  'asset_id',
  'symbol',
  'display_name',
  'market_cap_rank',
] as const;

// Type exports
export type StorageType = (typeof STORAGE_TYPES)[keyof typeof STORAGE_TYPES];
