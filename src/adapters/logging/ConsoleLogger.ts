/**
 * Console Logger Adapter
 *
 * pino logger writing to stdout. Pretty-printed in development when
 * LOG_PRETTY is set, JSON everywhere else so cron/CI log collectors can parse it.
 */

import pino from 'pino';
import { env } from '@/config/env';
import { PinoLogger } from './PinoLogger';

let root: pino.Logger | null = null;

function rootLogger(): pino.Logger {
  root ??= pino({
    name: 'asset-metrics-etl',
    level: env.LOG_LEVEL,
    transport:
      env.NODE_ENV === 'development' && env.LOG_PRETTY
        ? {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'SYS:standard',
              ignore: 'pid,hostname',
            },
          }
        : undefined,
    timestamp: pino.stdTimeFunctions.isoTime,
  });
  return root;
}

export class ConsoleLogger extends PinoLogger {
  constructor(context?: string) {
    super(rootLogger(), context);
  }
}
