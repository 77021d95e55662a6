/**
 * Metrics Factory
 *
 * Selection Logic:
 * - METRICS_TYPE=cloudwatch → CloudWatchMetrics
 * - METRICS_TYPE=noop or unset → NoOpMetrics (default)
 */

import { IMetrics, IMetricsFactory } from '@/interfaces/IMetrics';
import { env } from '@/config/env';
import { NoOpMetrics } from './NoOpMetrics';
import { CloudWatchMetrics } from './CloudWatchMetrics';

export class MetricsFactory implements IMetricsFactory {
  constructor(private readonly metricsType: string = env.METRICS_TYPE) {}

  createMetrics(namespace?: string): IMetrics {
    switch (this.metricsType.toLowerCase()) {
      case 'cloudwatch':
        return new CloudWatchMetrics(namespace ?? env.CLOUDWATCH_METRICS_NAMESPACE);

      case 'noop':
      default:
        return new NoOpMetrics();
    }
  }
}

/**
 * Create named metrics for specific contexts
 */
export function createMetrics(namespace?: string): IMetrics {
  return new MetricsFactory().createMetrics(namespace);
}
