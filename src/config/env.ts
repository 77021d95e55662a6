import { cleanEnv, str, num, bool, url } from 'envalid';
import dotenv from 'dotenv';

// Load .env file
dotenv.config();

/**
 * Validated environment variables
 *
 * Using envalid for runtime validation and type safety:
 * - Validates types (string, number, boolean, url)
 * - Enforces choices for enums
 * - Provides defaults so a bare checkout runs against the public API
 * - Fails fast on startup if a value is malformed
 */
export const env = cleanEnv(process.env, {
  // ==========================================
  // Runtime
  // ==========================================
  NODE_ENV: str({
    choices: ['development', 'test', 'production'],
    default: 'development',
    desc: 'Application environment (affects log formatting)',
  }),

  // ==========================================
  // Upstream market-data API
  // ==========================================
  MARKET_API_BASE_URL: url({
    default: 'https://api.coingecko.com/api/v3',
    desc: 'Base URL of the CoinGecko-compatible market-data API',
  }),
  MARKET_API_KEY: str({
    default: '',
    desc: 'Optional API key, sent as x-cg-pro-api-key when set',
  }),

  // ==========================================
  // ETL run defaults (overridable from the CLI)
  // ==========================================
  ETL_ASSETS: str({
    default: 'bitcoin,ethereum,tether,binancecoin,solana',
    desc: 'Comma-separated asset ids to load',
  }),
  ETL_QUOTE_CURRENCY: str({
    default: 'usd',
    desc: 'Currency prices are quoted in',
  }),
  ETL_DAYS: str({
    default: '365',
    desc: 'Day window for the market chart (positive integer or "max")',
  }),

  // ==========================================
  // Storage
  // ==========================================
  STORAGE_TYPE: str({
    choices: ['csv', 'postgres'],
    default: 'csv',
    desc: 'Where the price and metadata datasets are persisted',
  }),
  OUTPUT_DIR: str({
    default: './data',
    desc: 'Directory for CSV outputs',
  }),
  PRICES_FILE: str({
    default: 'crypto_prices.csv',
    desc: 'File name of the price + metrics dataset',
  }),
  METADATA_FILE: str({
    default: 'coin_metadata.csv',
    desc: 'File name of the asset metadata snapshot',
  }),

  // ==========================================
  // Database Configuration (STORAGE_TYPE=postgres)
  // ==========================================
  DB_HOST: str({
    default: 'localhost',
    desc: 'PostgreSQL host',
  }),
  DB_PORT: num({
    default: 5432,
    desc: 'PostgreSQL port',
  }),
  DB_NAME: str({
    default: 'asset_metrics',
    desc: 'PostgreSQL database name',
  }),
  DB_USER: str({
    default: 'postgres',
    desc: 'PostgreSQL username',
  }),
  DB_PASSWORD: str({
    default: 'postgres', // Only for dev - production MUST set this explicitly
    desc: 'PostgreSQL password',
  }),
  DB_MAX_CONNECTIONS: num({
    default: 4,
    desc: 'Maximum database connection pool size',
  }),
  DB_SSL: bool({
    default: false,
    desc: 'Connect over TLS (managed databases such as RDS or Neon)',
  }),

  // ==========================================
  // Logging Configuration
  // ==========================================
  LOG_LEVEL: str({
    choices: ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'],
    default: 'info',
    desc: 'Minimum log level to output',
  }),
  LOG_PRETTY: bool({
    default: true,
    desc: 'Pretty-print logs in development (false for JSON logs)',
  }),
  LOGGER_TYPE: str({
    choices: ['console', 'cloudwatch'],
    default: 'console',
    desc: 'Logger adapter',
  }),

  // ==========================================
  // Metrics (Optional)
  // ==========================================
  METRICS_TYPE: str({
    choices: ['noop', 'cloudwatch'],
    default: 'noop',
    desc: 'Metrics adapter',
  }),
  AWS_REGION: str({
    default: 'us-east-1',
    desc: 'AWS region for CloudWatch',
  }),
  CLOUDWATCH_METRICS_NAMESPACE: str({
    default: 'AssetMetricsEtl',
    desc: 'CloudWatch Metrics namespace',
  }),
});
