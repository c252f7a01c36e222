import { z } from 'zod';
import { historyRangeQuerySchema, referenceSchema } from './common.validator';
import { ItemKind, ToolStatus } from '../types/item.types';

/**
 * Item and staff lookup validation schemas
 */

// List items
export const listItemsSchema = z.object({
  query: z.object({
    kind: z.nativeEnum(ItemKind).optional(),
    status: z.union([z.nativeEnum(ToolStatus), z.literal('low_stock')]).optional(),
    search: z.string().trim().max(255).optional(),
  }),
});

// Get item by ID, uniqueId or scan code
export const getItemSchema = z.object({
  params: z.object({
    itemId: referenceSchema('Item ID'),
  }),
});

export const getItemHistorySchema = z.object({
  params: z.object({
    itemId: referenceSchema('Item ID'),
  }),
  query: historyRangeQuerySchema,
});

export const getItemHistoryStatsSchema = z.object({
  params: z.object({
    itemId: referenceSchema('Item ID'),
  }),
  query: historyRangeQuerySchema.omit({ limit: true }),
});

export const getStaffItemsSchema = z.object({
  params: z.object({
    staffUid: referenceSchema('Staff UID'),
  }),
});

export const getStaffHistorySchema = z.object({
  params: z.object({
    staffUid: referenceSchema('Staff UID'),
  }),
  query: historyRangeQuerySchema,
});

export type ListItemsRequest = z.infer<typeof listItemsSchema>;
