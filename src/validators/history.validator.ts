import { z } from 'zod';
import { historyRangeQuerySchema, referenceSchema } from './common.validator';

/**
 * Global history validation schemas
 */

export const queryHistorySchema = z.object({
  query: historyRangeQuerySchema,
});

export const historyStatsSchema = z.object({
  query: historyRangeQuerySchema.omit({ limit: true }),
});

export const getBatchHistorySchema = z.object({
  params: z.object({
    batchId: referenceSchema('Batch ID'),
  }),
  query: historyRangeQuerySchema,
});
