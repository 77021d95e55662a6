/**
 * Logger Factory
 *
 * Selection Logic:
 * - LOGGER_TYPE=cloudwatch → CloudWatchLogger (scheduled runs on AWS)
 * - LOGGER_TYPE=console or unset → ConsoleLogger (default)
 *
 * Every module asks for its own context name; all of them share one pino root.
 */

import { ILogger, ILoggerFactory } from '@/interfaces/ILogger';
import { env } from '@/config/env';
import { ConsoleLogger } from './ConsoleLogger';
import { CloudWatchLogger } from './CloudWatchLogger';

export class LoggerFactory implements ILoggerFactory {
  constructor(private readonly loggerType: string = env.LOGGER_TYPE) {}

  createLogger(context?: string): ILogger {
    return this.loggerType.toLowerCase() === 'cloudwatch'
      ? new CloudWatchLogger(context)
      : new ConsoleLogger(context);
  }
}

const factory = new LoggerFactory();

/**
 * Process-level logger used by the CLI
 */
export const logger = factory.createLogger('cli');

export function createLogger(context: string): ILogger {
  return factory.createLogger(context);
}
