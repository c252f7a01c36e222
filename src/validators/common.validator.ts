import { z } from 'zod';
import { MAX_HISTORY_LIMIT } from '../services/history-ledger';

/**
 * Shared validation pieces
 */

export const referenceSchema = (label: string) =>
  z
    .string({ required_error: `${label} is required` })
    .trim()
    .min(1, `${label} is required`)
    .max(255, `${label} must be at most 255 characters`);

export const notesSchema = z.string().trim().max(1000, 'Notes must be at most 1000 characters').optional();

export const quantitySchema = z
  .number({
    required_error: 'Quantity is required',
    invalid_type_error: 'Quantity must be a number',
  })
  .positive('Quantity must be positive')
  .finite('Quantity must be finite');

const isoDate = (label: string) =>
  z
    .string()
    .datetime({ offset: true, message: `${label} must be an ISO-8601 date-time` })
    .transform((value) => new Date(value));

// `?start=...&end=...&limit=...` on history endpoints
export const historyRangeQuerySchema = z.object({
  start: isoDate('start').optional(),
  end: isoDate('end').optional(),
  limit: z
    .string()
    .regex(/^\d+$/, 'Limit must be a whole number')
    .transform(Number)
    .refine((value) => value >= 1 && value <= MAX_HISTORY_LIMIT, {
      message: `Limit must be between 1 and ${MAX_HISTORY_LIMIT}`,
    })
    .optional(),
});

export type HistoryRangeQuery = z.infer<typeof historyRangeQuerySchema>;
