/**
 * Truncate an epoch-millisecond timestamp to its UTC calendar date (YYYY-MM-DD)
 */
export function toCalendarDate(epochMs: number): string {
  return new Date(epochMs).toISOString().slice(0, 10);
}

/**
 * Epoch seconds, as expected by the market_chart/range endpoint
 */
export function toUnixSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}
