import { z } from 'zod';
import { ASSET_ID_PATTERN } from '@/constants/market';

/**
 * ETL run parameters
 *
 * - at least one asset id, lowercase slug form
 * - window is a positive whole number of days, 'max', or a range with from < to
 */
const chartRangeSchema = z
  .object({
    from: z.date(),
    to: z.date(),
  })
  .refine((range) => range.from.getTime() < range.to.getTime(), {
    message: '"from" must be before "to"',
    path: ['from'],
  });

export const chartWindowSchema = z.union([
  z.number().int().positive(),
  z.literal('max'),
  chartRangeSchema,
]);

export const etlRunInputSchema = z.object({
  assetIds: z
    .array(
      z.string().regex(ASSET_ID_PATTERN, {
        message: 'Asset ids are lowercase letters, digits and dashes',
      })
    )
    .min(1, { message: 'At least one asset id is required' }),
  quoteCurrency: z.string().trim().toLowerCase().min(1),
  window: chartWindowSchema,
});

/**
 * Parse a day window from config or the command line: "365" or "max"
 */
export const dayWindowSchema = z.union([
  z.literal('max'),
  z.coerce.number().int().positive(),
]);
