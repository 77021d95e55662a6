/**
 * Database Connection Pool Configuration
 *
 * Settings for STORAGE_TYPE=postgres. The ETL is a single sequential batch
 * process, so the pool stays small: one connection does the work and a second
 * covers the transaction wrapper.
 */

import { env } from './env';

export const DATABASE_POOL_CONFIG = {
  /**
   * Maximum number of connections in pool
   * Value: From env.DB_MAX_CONNECTIONS (default: 4)
   */
  max: env.DB_MAX_CONNECTIONS,

  /**
   * Idle connection timeout (30 seconds)
   * A run finishes quickly; idle clients are released rather than kept warm
   */
  idleTimeoutMillis: 30_000,

  /**
   * Connection acquisition timeout (10 seconds)
   * Fail the run fast when the database is unreachable
   */
  connectionTimeoutMillis: 10_000,
} as const;

/**
 * Query limits
 */
export const DB_QUERY_LIMITS = {
  /**
   * Statement timeout (60 seconds)
   * Upserting a year of daily rows for a few assets takes well under a second
   */
  STATEMENT_TIMEOUT_MS: 60_000,

  /**
   * Rows per multi-row INSERT (11 parameters per price row keeps this well
   * under PostgreSQL's 65535 bind-parameter limit)
   */
  INSERT_BATCH_SIZE: 500,
} as const;
