/**
 * AWS CloudWatch Metrics Adapter
 *
 * Buffers run metrics in memory and ships them with PutMetricData.
 * A batch run is short-lived, so the periodic flush timer is unref'd and the
 * CLI flushes explicitly before exit.
 *
 * Setup Requirements:
 * - IAM permission cloudwatch:PutMetricData on the configured namespace
 */

import {
  CloudWatchClient,
  PutMetricDataCommand,
  MetricDatum,
  StandardUnit,
} from '@aws-sdk/client-cloudwatch';
import { IMetrics, MetricDimensions } from '@/interfaces/IMetrics';
import { createLogger } from '@/adapters/logging/LoggerFactory';
import { env } from '@/config/env';
import { chunkArray } from '@/utils/collections';

const logger = createLogger('CloudWatchMetrics');

// PutMetricData accepts at most this many datums per call
const MAX_DATUMS_PER_REQUEST = 20;

export class CloudWatchMetrics implements IMetrics {
  private buffer: MetricDatum[] = [];

  constructor(
    private readonly namespace: string = env.CLOUDWATCH_METRICS_NAMESPACE,
    private readonly client: CloudWatchClient = new CloudWatchClient({
      region: env.AWS_REGION,
    })
  ) {
    const flushInterval = setInterval(() => {
      this.flush().catch((err: unknown) => {
        logger.error({ err }, 'Failed to flush CloudWatch metrics');
      });
    }, 60_000);
    flushInterval.unref();
  }

  incrementCounter(name: string, value: number = 1, dimensions?: MetricDimensions): void {
    this.push(name, value, StandardUnit.Count, dimensions);
  }

  recordHistogram(name: string, value: number, dimensions?: MetricDimensions): void {
    this.push(name, value, StandardUnit.Milliseconds, dimensions);
  }

  startTimer(name: string, dimensions?: MetricDimensions): () => void {
    const start = Date.now();
    return () => {
      this.recordHistogram(name, Date.now() - start, dimensions);
    };
  }

  async flush(): Promise<void> {
    if (this.buffer.length === 0) return;

    const metricsToSend = this.buffer.splice(0);

    try {
      for (const chunk of chunkArray(metricsToSend, MAX_DATUMS_PER_REQUEST)) {
        await this.client.send(
          new PutMetricDataCommand({
            Namespace: this.namespace,
            MetricData: chunk,
          })
        );
      }

      logger.debug(
        { count: metricsToSend.length, namespace: this.namespace },
        'Flushed metrics to CloudWatch'
      );
    } catch (error) {
      // Metrics are best effort; a CloudWatch outage must not fail the ETL run
      logger.error(
        { error, count: metricsToSend.length },
        'Failed to send metrics to CloudWatch'
      );
    }
  }

  private push(
    name: string,
    value: number,
    unit: StandardUnit,
    dimensions?: MetricDimensions
  ): void {
    this.buffer.push({
      MetricName: name,
      Value: value,
      Unit: unit,
      Timestamp: new Date(),
      Dimensions: formatDimensions(dimensions),
    });
  }
}

function formatDimensions(
  dimensions?: MetricDimensions
): Array<{ Name: string; Value: string }> {
  if (!dimensions) return [];

  return Object.entries(dimensions).map(([key, value]) => ({
    Name: key,
    Value: String(value),
  }));
}
