import { z } from 'zod';
import {
  docRef,
  FieldValue,
  type DocumentData,
  type DocumentRef,
  type DocumentSnapshot,
  type DocumentStore,
  type TransactionContext,
} from './document-store';
import {
  ITEM_COLLECTIONS,
  ItemKind,
  ToolStatus,
  type Consumable,
  type Item,
  type Tool,
} from '../types/item.types';
import { AppError, ErrorCode } from '../types/error.types';
import { parseScanCode } from '../utils/scan-code';
import { logger } from '../config/logger';

const timestampField = z
  .string()
  .datetime({ offset: true })
  .nullable()
  .default(null)
  .transform((value) => (value ? new Date(value) : null));

const instantStatusShape = {
  lastAssignedToName: z.string().nullable().default(null),
  lastAssignedToJobCode: z.string().nullable().default(null),
  lastAssignedByName: z.string().nullable().default(null),
  lastAssignedAt: timestampField,
  lastCheckinAt: timestampField,
  lastCheckinByName: z.string().nullable().default(null),
};

const toolDocumentSchema = z.object({
  uniqueId: z.string().min(1),
  name: z.string(),
  brand: z.string().default(''),
  model: z.string().default(''),
  status: z.nativeEnum(ToolStatus),
  currentHolderUid: z.string().nullable().default(null),
  ...instantStatusShape,
  updatedAt: timestampField,
});

const consumableDocumentSchema = z.object({
  uniqueId: z.string().min(1),
  name: z.string(),
  brand: z.string().default(''),
  unit: z.string().default('pcs'),
  currentQuantity: z.number(),
  minQuantity: z.number().default(0),
  ...instantStatusShape,
  updatedAt: timestampField,
});

export interface AssignmentSnapshot {
  toName: string;
  toJobCode: string | null;
  byName: string;
}

/**
 * `brand model name`, skipping blanks
 */
export function itemDisplayName(item: Item): string {
  const parts = item.kind === ItemKind.TOOL ? [item.brand, item.model, item.name] : [item.brand, item.name];
  return parts.filter((part) => part.trim().length > 0).join(' ');
}

/**
 * Item Repository
 *
 * Maps tool and consumable documents to domain items and builds the
 * instant-status patches written by the transaction engine
 */
export class ItemRepository {
  constructor(private store: DocumentStore) {}

  ref(kind: ItemKind, id: string): DocumentRef {
    return docRef(ITEM_COLLECTIONS[kind], id);
  }

  async findById(kind: ItemKind, id: string): Promise<Item | null> {
    const snapshot = await this.store.get(this.ref(kind, id));
    return snapshot ? this.fromSnapshot(kind, snapshot) : null;
  }

  /**
   * Resolve a scanned code, internal id or uniqueId to an item
   *
   * Looks in the given kind only, or tools first then consumables.
   */
  async resolve(reference: string, kind?: ItemKind): Promise<Item | null> {
    const code = parseScanCode(reference);
    const kinds = kind ? [kind] : [ItemKind.TOOL, ItemKind.CONSUMABLE];

    for (const candidate of kinds) {
      const byId = await this.findById(candidate, code);
      if (byId) return byId;

      const byUniqueId = await this.store.findByField(ITEM_COLLECTIONS[candidate], 'uniqueId', code);
      const [first] = byUniqueId;
      if (first) {
        if (byUniqueId.length > 1) {
          logger.warn('Duplicate uniqueId, using first match', { uniqueId: code, kind: candidate });
        }
        return this.fromSnapshot(candidate, first);
      }
    }

    return null;
  }

  async list(kind: ItemKind): Promise<Item[]> {
    const snapshots = await this.store.list(ITEM_COLLECTIONS[kind]);
    return snapshots.map((snapshot) => this.fromSnapshot(kind, snapshot));
  }

  /**
   * Re-read a tool inside a transaction
   */
  async getToolInTransaction(txn: TransactionContext, id: string): Promise<Tool | null> {
    const snapshot = await txn.get(this.ref(ItemKind.TOOL, id));
    return snapshot ? this.toTool(snapshot) : null;
  }

  /**
   * Re-read a consumable inside a transaction
   */
  async getConsumableInTransaction(txn: TransactionContext, id: string): Promise<Consumable | null> {
    const snapshot = await txn.get(this.ref(ItemKind.CONSUMABLE, id));
    return snapshot ? this.toConsumable(snapshot) : null;
  }

  async save(item: Item): Promise<void> {
    await this.store.set(this.ref(item.kind, item.id), this.toDocument(item));
  }

  /**
   * Instant-status fields written when an item is handed to a staff member
   */
  assignmentPatch(assignment: AssignmentSnapshot): DocumentData {
    return {
      lastAssignedToName: assignment.toName,
      lastAssignedToJobCode: assignment.toJobCode,
      lastAssignedByName: assignment.byName,
      lastAssignedAt: FieldValue.serverTimestamp(),
      updatedAt: FieldValue.serverTimestamp(),
    };
  }

  /**
   * Instant-status fields written when an item comes back
   */
  checkinPatch(returnedByName: string): DocumentData {
    return {
      lastCheckinAt: FieldValue.serverTimestamp(),
      lastCheckinByName: returnedByName,
      updatedAt: FieldValue.serverTimestamp(),
    };
  }

  fromSnapshot(kind: ItemKind, snapshot: DocumentSnapshot): Item {
    return kind === ItemKind.TOOL ? this.toTool(snapshot) : this.toConsumable(snapshot);
  }

  private toTool(snapshot: DocumentSnapshot): Tool {
    const parsed = toolDocumentSchema.safeParse(snapshot.data);
    if (!parsed.success) {
      throw this.malformed(snapshot, parsed.error);
    }
    return { kind: ItemKind.TOOL, id: snapshot.ref.id, ...parsed.data };
  }

  private toConsumable(snapshot: DocumentSnapshot): Consumable {
    const parsed = consumableDocumentSchema.safeParse(snapshot.data);
    if (!parsed.success) {
      throw this.malformed(snapshot, parsed.error);
    }
    return { kind: ItemKind.CONSUMABLE, id: snapshot.ref.id, ...parsed.data };
  }

  private malformed(snapshot: DocumentSnapshot, error: z.ZodError): AppError {
    logger.error('Malformed item document', {
      collection: snapshot.ref.collection,
      id: snapshot.ref.id,
      issues: error.issues,
    });
    return new AppError(
      ErrorCode.DATABASE_ERROR,
      `Item document ${snapshot.ref.collection}/${snapshot.ref.id} is malformed`,
      500
    );
  }

  private toDocument(item: Item): DocumentData {
    const common: DocumentData = {
      uniqueId: item.uniqueId,
      name: item.name,
      brand: item.brand,
      lastAssignedToName: item.lastAssignedToName,
      lastAssignedToJobCode: item.lastAssignedToJobCode,
      lastAssignedByName: item.lastAssignedByName,
      lastAssignedAt: item.lastAssignedAt?.toISOString() ?? null,
      lastCheckinAt: item.lastCheckinAt?.toISOString() ?? null,
      lastCheckinByName: item.lastCheckinByName,
      updatedAt: FieldValue.serverTimestamp(),
    };

    if (item.kind === ItemKind.TOOL) {
      return {
        ...common,
        model: item.model,
        status: item.status,
        currentHolderUid: item.currentHolderUid,
      };
    }

    return {
      ...common,
      unit: item.unit,
      currentQuantity: item.currentQuantity,
      minQuantity: item.minQuantity,
    };
  }
}
