import type { ErrorCategory, ErrorCode } from './error.types';
import type { ItemKind } from './item.types';

/**
 * Batch coordinator types
 */

export enum BatchType {
  CHECKOUT = 'checkout',
  CHECKIN = 'checkin',
  CONSUMABLE_USAGE = 'consumable_usage',
  CONSUMABLE_RESTOCK = 'consumable_restock',
}

export type BatchState = 'empty' | BatchType;

export interface BatchLine {
  itemId: string;
  uniqueId: string;
  kind: ItemKind;
  quantity: number | null;
}

export interface BatchSnapshot {
  id: string;
  state: BatchState;
  items: BatchLine[];
  submitting: boolean;
  updatedAt: Date;
}

export interface SubmitBatchInput {
  actingStaffUid: string;
  assignToStaffUid?: string;
  notes?: string;
}

export interface BatchItemSuccess {
  itemId: string;
  uniqueId: string;
  entryId: string;
}

export interface BatchItemFailure {
  itemId: string;
  uniqueId: string;
  code: ErrorCode;
  category: ErrorCategory;
  message: string;
}

export interface BatchReport {
  batchId: string;
  type: BatchType;
  status: 'completed' | 'partial' | 'failed';
  total: number;
  succeeded: BatchItemSuccess[];
  failed: BatchItemFailure[];
}
