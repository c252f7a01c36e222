/**
 * Item domain types (tools and consumables)
 */

export enum ItemKind {
  TOOL = 'tool',
  CONSUMABLE = 'consumable',
}

export enum ToolStatus {
  AVAILABLE = 'available',
  CHECKED_OUT = 'checked_out',
}

/**
 * Denormalized copy of the latest history entry, so status reads need no ledger lookup
 */
export interface InstantStatusFields {
  lastAssignedToName: string | null;
  lastAssignedToJobCode: string | null;
  lastAssignedByName: string | null;
  lastAssignedAt: Date | null;
  lastCheckinAt: Date | null;
  lastCheckinByName: string | null;
}

interface ItemBase extends InstantStatusFields {
  id: string;
  uniqueId: string;
  name: string;
  brand: string;
  updatedAt: Date | null;
}

export interface Tool extends ItemBase {
  kind: ItemKind.TOOL;
  model: string;
  status: ToolStatus;
  currentHolderUid: string | null;
}

export interface Consumable extends ItemBase {
  kind: ItemKind.CONSUMABLE;
  unit: string;
  currentQuantity: number;
  minQuantity: number;
}

export type Item = Tool | Consumable;

// Collection each kind lives in
export const ITEM_COLLECTIONS: Record<ItemKind, string> = {
  [ItemKind.TOOL]: 'tools',
  [ItemKind.CONSUMABLE]: 'consumables',
};

export interface ItemListFilter {
  kind?: ItemKind;
  status?: ToolStatus | 'low_stock';
  search?: string;
}
