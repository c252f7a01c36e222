import { z } from 'zod';
import { notesSchema, quantitySchema, referenceSchema } from './common.validator';

/**
 * Custody operation validation schemas
 */

const itemParams = z.object({
  itemId: referenceSchema('Item ID'),
});

// Check out a tool
export const checkoutSchema = z.object({
  params: itemParams,
  body: z.object({
    staff_uid: referenceSchema('Staff UID'),
    acting_staff_uid: referenceSchema('Acting staff UID'),
    notes: notesSchema,
  }),
});

// Check a tool back in
export const checkinSchema = z.object({
  params: itemParams,
  body: z.object({
    acting_staff_uid: referenceSchema('Acting staff UID'),
    notes: notesSchema,
  }),
});

// Take stock out of a consumable
export const usageSchema = z.object({
  params: itemParams,
  body: z.object({
    quantity: quantitySchema,
    staff_uid: referenceSchema('Staff UID'),
    acting_staff_uid: referenceSchema('Acting staff UID'),
    notes: notesSchema,
  }),
});

// Put stock back into a consumable
export const restockSchema = z.object({
  params: itemParams,
  body: z.object({
    quantity: quantitySchema,
    acting_staff_uid: referenceSchema('Acting staff UID'),
    notes: notesSchema,
  }),
});

export type CheckoutRequest = z.infer<typeof checkoutSchema>;
export type CheckinRequest = z.infer<typeof checkinSchema>;
export type UsageRequest = z.infer<typeof usageSchema>;
export type RestockRequest = z.infer<typeof restockSchema>;
