import { Pool, PoolClient, QueryResult, QueryResultRow } from 'pg';
import { env } from '@/config/env';
import { createLogger } from '@/adapters/logging/LoggerFactory';
import { DATABASE_POOL_CONFIG, DB_QUERY_LIMITS } from '@/config/database.config';

const logger = createLogger('Database');

/**
 * PostgreSQL connection pool
 * Created on first use so CSV runs never open a connection
 */
let pool: Pool | null = null;

function getPool(): Pool {
  if (pool) return pool;

  pool = new Pool({
    host: env.DB_HOST,
    port: env.DB_PORT,
    database: env.DB_NAME,
    user: env.DB_USER,
    password: env.DB_PASSWORD,
    ssl: env.DB_SSL ? { rejectUnauthorized: false } : undefined,
    max: DATABASE_POOL_CONFIG.max,
    idleTimeoutMillis: DATABASE_POOL_CONFIG.idleTimeoutMillis,
    connectionTimeoutMillis: DATABASE_POOL_CONFIG.connectionTimeoutMillis,
    statement_timeout: DB_QUERY_LIMITS.STATEMENT_TIMEOUT_MS,
  });

  // Let pool handle client recycling - don't crash the process
  pool.on('error', (err) => {
    logger.error({ err }, 'Unexpected error on idle PostgreSQL client');
  });

  return pool;
}

/**
 * Execute a SQL query with parameters
 */
export async function query<T extends QueryResultRow = QueryResultRow>(
  text: string,
  params?: unknown[],
  client?: PoolClient
): Promise<QueryResult<T>> {
  const start = Date.now();
  try {
    const result = client
      ? await client.query<T>(text, params)
      : await getPool().query<T>(text, params);

    logger.debug(
      {
        duration: Date.now() - start,
        rows: result.rowCount,
      },
      'Executed SQL query'
    );

    return result;
  } catch (error) {
    logger.error(
      {
        error,
        query: text,
        paramCount: params?.length || 0,
      },
      'Database query error'
    );
    throw error;
  }
}

/**
 * Execute a function within a database transaction
 * Automatically handles commit/rollback
 */
export async function transaction<T>(
  callback: (client: PoolClient) => Promise<T>
): Promise<T> {
  const client = await getPool().connect();

  try {
    await client.query('BEGIN');
    const result = await callback(client);
    await client.query('COMMIT');
    logger.debug('Transaction committed');
    return result;
  } catch (error) {
    await client.query('ROLLBACK');
    logger.error({ error }, 'Transaction rolled back');
    throw error;
  } finally {
    client.release();
  }
}

/**
 * Close all connections in the pool
 * Called by the CLI once the run is over
 */
export async function closePool(): Promise<void> {
  if (!pool) return;
  await pool.end();
  pool = null;
  logger.info('Database pool closed');
}
