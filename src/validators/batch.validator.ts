import { z } from 'zod';
import { notesSchema, referenceSchema } from './common.validator';
import { BatchType } from '../types/batch.types';

/**
 * Batch validation schemas
 */

const batchParams = z.object({
  batchId: z.string().uuid('Invalid batch ID format'),
});

// Open a batch; only consumable batches name their type up front
export const createBatchSchema = z.object({
  body: z
    .object({
      type: z.nativeEnum(BatchType).optional(),
    })
    .default({}),
});

export const selectBatchTypeSchema = z.object({
  params: batchParams,
  body: z.object({
    type: z.nativeEnum(BatchType, {
      required_error: 'Batch type is required',
      invalid_type_error: 'Batch type must be consumable_usage or consumable_restock',
    }),
  }),
});

export const getBatchSchema = z.object({
  params: batchParams,
});

// Scan an item into a batch
export const scanBatchItemSchema = z.object({
  params: batchParams,
  body: z.object({
    item_id: referenceSchema('Item ID'),
    quantity: z
      .number({ invalid_type_error: 'Quantity must be a number' })
      .positive('Quantity must be positive')
      .finite('Quantity must be finite')
      .optional(),
  }),
});

export const submitBatchSchema = z.object({
  params: batchParams,
  body: z.object({
    acting_staff_uid: referenceSchema('Acting staff UID'),
    assign_to_staff_uid: referenceSchema('Assignee staff UID').optional(),
    notes: notesSchema,
  }),
});

export const discardBatchSchema = z.object({
  params: batchParams,
});

export type CreateBatchRequest = z.infer<typeof createBatchSchema>;
export type ScanBatchItemRequest = z.infer<typeof scanBatchItemSchema>;
export type SubmitBatchRequest = z.infer<typeof submitBatchSchema>;
