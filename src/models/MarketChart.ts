/**
 * Window requested from the market-chart endpoints
 *
 * - number: trailing days
 * - 'max': full history
 * - range: explicit interval
 */
export type ChartWindow = number | 'max' | ChartRange;

export interface ChartRange {
  from: Date;
  to: Date;
}

export function isChartRange(window: ChartWindow): window is ChartRange {
  return typeof window === 'object';
}
