import { z } from 'zod';

/**
 * One persisted metadata row as read back from CSV (all cells are strings)
 * An empty rank cell means the rank is unknown
 */
export const metadataRowSchema = z.object({
  asset_id: z.string().min(1),
  symbol: z.string(),
  display_name: z.string(),
  market_cap_rank: z
    .string()
    .trim()
    .transform((value) => (value === '' ? undefined : Number(value)))
    .pipe(z.number().int().positive().optional()),
});
