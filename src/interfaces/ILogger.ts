/**
 * Logger Interface
 *
 * Abstraction for logging so the ETL can ship logs to stdout (Console) or
 * CloudWatch without changing service code.
 *
 * Design Pattern: Adapter Pattern
 * - Services depend on this interface (not concrete implementations)
 * - Different adapters implement this interface for different platforms
 * - LoggerFactory selects the adapter from LOGGER_TYPE
 */

/**
 * Log metadata - structured data attached to log entries
 */
export type LogMetadata = Record<string, unknown>;

/**
 * Logger interface following common logging patterns (pino, winston, etc.)
 */
export interface ILogger {
  /**
   * Debug level - Detailed diagnostic information
   * Example: "Request succeeded", "Metrics computed for asset"
   */
  debug(message: string): void;
  debug(metadata: LogMetadata, message: string): void;

  /**
   * Info level - Normal progress of a run
   * Example: "Loading asset", "Price dataset saved"
   */
  info(message: string): void;
  info(metadata: LogMetadata, message: string): void;

  /**
   * Warn level - Degraded but recoverable conditions
   * Example: "Transient failure, retrying", "Empty series, skipping asset"
   */
  warn(message: string): void;
  warn(metadata: LogMetadata, message: string): void;

  /**
   * Error level - Failed operations
   */
  error(message: string): void;
  error(metadata: LogMetadata, message: string): void;

  /**
   * Fatal level - The run is aborting
   */
  fatal(message: string): void;
  fatal(metadata: LogMetadata, message: string): void;
}

/**
 * Logger Factory Interface
 */
export interface ILoggerFactory {
  /**
   * Create a logger instance
   * @param context - Optional context name (e.g., "RetryingFetcher", "MetadataCache")
   */
  createLogger(context?: string): ILogger;
}
