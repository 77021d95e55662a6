import { z } from 'zod';

/**
 * Upstream payload schemas
 *
 * Only the fields the ETL reads are declared; zod strips the rest.
 */

/**
 * GET /coins/{id}/market_chart and /market_chart/range
 * `prices` is a list of [epochMs, price] pairs; absent when the API has no data
 */
export const marketChartResponseSchema = z.object({
  prices: z.array(z.tuple([z.number(), z.number()])).default([]),
});

/**
 * One row of GET /coins/markets
 */
export const marketListingSchema = z.object({
  id: z.string().min(1),
  symbol: z.string(),
  name: z.string(),
  market_cap_rank: z.number().int().positive().nullish(),
});

export const marketListingResponseSchema = z.array(marketListingSchema);
