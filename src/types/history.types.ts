import type { ItemKind } from './item.types';

/**
 * History ledger types
 */

export enum HistoryAction {
  CHECKOUT = 'checkout',
  CHECKIN = 'checkin',
  USAGE = 'usage',
  RESTOCK = 'restock',
}

// Names captured at write time so the entry stays readable after renames
export interface HistoryMetadata {
  staffName?: string;
  staffJobCode?: string;
  itemName?: string;
  itemBrand?: string;
  itemModel?: string;
  adminName?: string;
}

export interface QuantityChange {
  before: number;
  change: number;
  after: number;
}

export interface HistoryEntry {
  id: string;
  action: HistoryAction;
  itemId: string;
  itemUniqueId: string;
  itemKind: ItemKind;
  byStaffUid: string;
  assignedToStaffUid: string | null;
  batchId: string | null;
  notes: string | null;
  timestamp: Date;
  quantity: QuantityChange | null;
  metadata: HistoryMetadata;
}

export type HistoryScope = { kind: 'item'; itemId: string; itemKind: ItemKind } | { kind: 'global' };

export interface HistoryRange {
  startDate: Date;
  endDate: Date;
}

export interface HistoryQuery extends HistoryRange {
  limit: number;
}

export interface HistoryStats {
  total: number;
  checkout: number;
  checkin: number;
  usage: number;
  restock: number;
}

// Per-item figures over a range; staff counts follow the assignee
export interface ItemHistoryStats extends HistoryStats {
  uniqueStaff: number;
  batchOperations: number;
  mostActiveStaffUid: string | null;
}

export interface ItemHistoryReport {
  stats: ItemHistoryStats;
  lastEntry: HistoryEntry | null;
}

export const GLOBAL_HISTORY_COLLECTION = 'tool_history';
