/**
 * AWS CloudWatch Logger Adapter
 *
 * Structured JSON to stdout with upper-cased levels and service metadata, for
 * runs scheduled on EC2/ECS where the CloudWatch agent or the awslogs driver
 * ships stdout to a log group. Queryable in CloudWatch Logs Insights:
 *
 *   fields @timestamp, context, msg | filter level = "WARN"
 */

import pino from 'pino';
import { env } from '@/config/env';
import { PinoLogger } from './PinoLogger';

let root: pino.Logger | null = null;

function rootLogger(): pino.Logger {
  root ??= pino({
    level: env.LOG_LEVEL,
    formatters: {
      level: (label) => ({ level: label.toUpperCase() }),
    },
    base: {
      env: env.NODE_ENV,
      region: env.AWS_REGION,
      service: 'asset-metrics-etl',
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
  return root;
}

export class CloudWatchLogger extends PinoLogger {
  constructor(context?: string) {
    super(rootLogger(), context);
  }
}
