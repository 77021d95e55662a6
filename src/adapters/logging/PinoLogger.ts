import pino from 'pino';
import { ILogger, LogMetadata } from '@/interfaces/ILogger';

type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

/**
 * Base for the pino-backed adapters
 * Subclasses supply a root pino instance; each context logs through a child of
 * it bound to `{ context }`, so one process writes through one destination.
 */
export abstract class PinoLogger implements ILogger {
  private readonly logger: pino.Logger;

  protected constructor(root: pino.Logger, context?: string) {
    this.logger = context ? root.child({ context }) : root;
  }

  debug(messageOrMetadata: string | LogMetadata, message?: string): void {
    this.write('debug', messageOrMetadata, message);
  }

  info(messageOrMetadata: string | LogMetadata, message?: string): void {
    this.write('info', messageOrMetadata, message);
  }

  warn(messageOrMetadata: string | LogMetadata, message?: string): void {
    this.write('warn', messageOrMetadata, message);
  }

  error(messageOrMetadata: string | LogMetadata, message?: string): void {
    this.write('error', messageOrMetadata, message);
  }

  fatal(messageOrMetadata: string | LogMetadata, message?: string): void {
    this.write('fatal', messageOrMetadata, message);
  }

  private write(level: LogLevel, messageOrMetadata: string | LogMetadata, message?: string): void {
    if (typeof messageOrMetadata === 'string') {
      this.logger[level](messageOrMetadata);
    } else {
      this.logger[level](messageOrMetadata, message);
    }
  }
}
