import { setTimeout as delay } from 'timers/promises';

/**
 * Resolve after `ms` milliseconds
 */
export function sleep(ms: number): Promise<void> {
  return delay(ms);
}
