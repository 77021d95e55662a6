/**
 * Metrics Interface
 *
 * Abstraction for operational metrics of a run (requests, retries, rows written).
 * Enables switching between monitoring platforms without changing service code.
 */

/**
 * Metric dimensions for filtering and grouping
 */
export type MetricDimensions = Record<string, string | number | boolean>;

export interface IMetrics {
  /**
   * Increment a counter metric
   *
   * @example
   * metrics.incrementCounter("fetch.retries", 1, { status: 429 });
   */
  incrementCounter(name: string, value?: number, dimensions?: MetricDimensions): void;

  /**
   * Record a duration in milliseconds
   */
  recordHistogram(name: string, value: number, dimensions?: MetricDimensions): void;

  /**
   * Start a timer for automatic duration tracking
   *
   * @returns Function to call when the operation completes
   *
   * @example
   * const endTimer = metrics.startTimer("etl.run.duration");
   * await orchestrator.run(input);
   * endTimer();
   */
  startTimer(name: string, dimensions?: MetricDimensions): () => void;

  /**
   * Flush buffered metrics to the backend
   * The CLI calls this once before the process exits
   */
  flush(): Promise<void>;
}

/**
 * Metrics Factory Interface
 */
export interface IMetricsFactory {
  createMetrics(namespace?: string): IMetrics;
}
