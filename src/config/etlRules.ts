/**
 * ETL Rules Configuration
 *
 * Centralized tunables for the fetch layer, rate-limit pauses and metric windows.
 * These values can be adjusted without touching service logic.
 *
 * IMPORTANT: the public market-data API rate limits aggressively. Shortening the
 * pauses or the backoff makes 429 responses (and exhausted retries) much more likely.
 */

/**
 * Retry policy for upstream requests
 *
 * wait(attempt) = max(MIN_WAIT_SECONDS, BACKOFF_BASE^attempt * uniform(JITTER_MIN, JITTER_MAX))
 */
export const FETCH_POLICY = {
  /**
   * Total attempts per request, first try included
   * With base 2 the last wait is around 2^6 = 64s, so a fully failing request
   * gives up after roughly two minutes of waiting
   */
  MAX_ATTEMPTS: 8,

  BACKOFF_BASE: 2,

  /**
   * Jitter multiplier bounds
   * Spreads retries of repeated runs so they do not hit the API in lockstep
   */
  JITTER_MIN: 0.5,
  JITTER_MAX: 1.5,

  MIN_WAIT_SECONDS: 1,

  /**
   * Per-request socket timeout
   */
  REQUEST_TIMEOUT_MS: 30_000,

  /**
   * Statuses retried with backoff. Any other non-200 status is fatal.
   */
  TRANSIENT_STATUSES: [429, 500, 502, 503, 504],
} as const;

/**
 * Fixed pauses between upstream calls
 *
 * The free API tier allows only a handful of calls per minute
 */
export const RATE_LIMIT_PAUSES = {
  /**
   * After each asset whose series came back non-empty
   */
  BETWEEN_ASSETS_MS: 1_100,

  /**
   * After persisting prices, before resolving metadata
   */
  BEFORE_METADATA_MS: 4_000,

  /**
   * Inside the metadata cache, right before the batched lookup
   */
  BEFORE_METADATA_LOOKUP_MS: 6_000,
} as const;

/**
 * Trailing simple moving average windows (observations, not calendar days)
 */
export const METRIC_WINDOWS = {
  SHORT: 7,
  LONG: 30,
} as const;

/**
 * Identifying client header sent on every request
 */
export const CLIENT_IDENTITY = {
  USER_AGENT: 'asset-metrics-etl/1.0',
} as const;
