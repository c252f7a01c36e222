import { z } from 'zod';
import {
  FieldValue,
  jsonValueSchema,
  refPath,
  type DocumentData,
  type DocumentRef,
  type DocumentSnapshot,
  type DocumentStore,
  type JsonValue,
} from '../repositories/document-store';
import { HistoryAction, type HistoryEntry, type HistoryQuery, type HistoryRange } from '../types/history.types';
import { ItemKind } from '../types/item.types';
import { AppError, ErrorCode } from '../types/error.types';
import { KeyedQueue } from '../utils/keyed-queue';
import { logger } from '../config/logger';
import { env } from '../config/environment';

const DAY_MS = 24 * 60 * 60 * 1000;

export const MAX_HISTORY_LIMIT = 1000;

const historyEntrySchema = z.object({
  id: z.string(),
  action: z.nativeEnum(HistoryAction),
  itemId: z.string(),
  itemUniqueId: z.string(),
  itemKind: z.nativeEnum(ItemKind),
  byStaffUid: z.string(),
  assignedToStaffUid: z.string().nullable().default(null),
  batchId: z.string().nullable().default(null),
  notes: z.string().nullable().default(null),
  timestamp: z
    .string()
    .datetime({ offset: true })
    .transform((value) => new Date(value)),
  quantity: z
    .object({ before: z.number(), change: z.number(), after: z.number() })
    .nullable()
    .default(null),
  metadata: z
    .object({
      staffName: z.string().optional(),
      staffJobCode: z.string().optional(),
      itemName: z.string().optional(),
      itemBrand: z.string().optional(),
      itemModel: z.string().optional(),
      adminName: z.string().optional(),
    })
    .default({}),
});

export interface HistoryRangeInput {
  startDate?: Date;
  endDate?: Date;
  limit?: number;
}

/**
 * Fill in the default window (last HISTORY_DEFAULT_LOOKBACK_DAYS days) and limit
 */
export function resolveHistoryQuery(input: HistoryRangeInput, now: Date = new Date()): HistoryQuery {
  const endDate = input.endDate ?? now;
  const startDate = input.startDate ?? new Date(endDate.getTime() - env.HISTORY_DEFAULT_LOOKBACK_DAYS * DAY_MS);
  const limit = input.limit ?? env.HISTORY_DEFAULT_LIMIT;

  if (!Number.isInteger(limit) || limit < 1 || limit > MAX_HISTORY_LIMIT) {
    throw new AppError(ErrorCode.VALIDATION_ERROR, `Limit must be between 1 and ${MAX_HISTORY_LIMIT}`, 400, {
      limit,
      maxLimit: MAX_HISTORY_LIMIT,
    });
  }

  return { startDate, endDate, limit };
}

export function serializeEntry(entry: HistoryEntry): JsonValue {
  const metadata: Record<string, JsonValue> = {};
  for (const [key, value] of Object.entries(entry.metadata)) {
    if (typeof value === 'string') metadata[key] = value;
  }

  return {
    id: entry.id,
    action: entry.action,
    itemId: entry.itemId,
    itemUniqueId: entry.itemUniqueId,
    itemKind: entry.itemKind,
    byStaffUid: entry.byStaffUid,
    assignedToStaffUid: entry.assignedToStaffUid,
    batchId: entry.batchId,
    notes: entry.notes,
    timestamp: entry.timestamp.toISOString(),
    quantity: entry.quantity ? { ...entry.quantity } : null,
    metadata,
  };
}

/**
 * History Ledger
 *
 * Append-only buckets of history entries, one document per time partition,
 * each holding a `transactions` array. Subclasses choose the partitioning.
 *
 * Appends use the store's atomic array-append when it has one. Otherwise the
 * bucket is read, extended and written back with merge; those read-modify-write
 * cycles are serialized per bucket inside this process only.
 */
export abstract class HistoryLedger {
  private readonly bucketQueue = new KeyedQueue();

  constructor(protected store: DocumentStore) {}

  protected async appendToBucket(ref: DocumentRef, entry: HistoryEntry, bucketFields: DocumentData): Promise<void> {
    const serialized = serializeEntry(entry);
    const fields: DocumentData = { ...bucketFields, updatedAt: FieldValue.serverTimestamp() };

    if (this.store.supportsAtomicAppend) {
      await this.store.appendToArray(ref, 'transactions', [serialized], fields);
      return;
    }

    await this.bucketQueue.run(refPath(ref), async () => {
      const existing = await this.store.get(ref);
      const stored = z.array(jsonValueSchema).safeParse(existing?.data['transactions'] ?? []);

      if (!stored.success) {
        // Refuse to overwrite a bucket we cannot read back intact
        throw new Error(`Bucket ${refPath(ref)} has a malformed transactions array`);
      }

      await this.store.set(ref, { ...fields, transactions: [...stored.data, serialized] }, { merge: true });
    });
  }

  /**
   * Read buckets in parallel and flatten their entries, oldest bucket first.
   * Missing buckets are skipped.
   */
  protected async readBuckets(refs: DocumentRef[]): Promise<HistoryEntry[]> {
    return this.entriesOf(await Promise.all(refs.map((ref) => this.store.get(ref))));
  }

  protected entriesOf(snapshots: Array<DocumentSnapshot | null>): HistoryEntry[] {
    const entries: HistoryEntry[] = [];

    for (const snapshot of snapshots) {
      if (!snapshot) continue;

      const transactions = snapshot.data['transactions'];
      if (!Array.isArray(transactions)) continue;

      for (const raw of transactions) {
        const parsed = historyEntrySchema.safeParse(raw);
        if (parsed.success) {
          entries.push(parsed.data);
        } else {
          logger.warn('Skipping malformed history entry', {
            bucket: refPath(snapshot.ref),
            issues: parsed.error.issues,
          });
        }
      }
    }

    return entries;
  }

  /**
   * Keep entries inside the range, newest first; equal timestamps keep the later append first
   */
  protected inRangeNewestFirst(entries: HistoryEntry[], query: HistoryRange): HistoryEntry[] {
    const start = query.startDate.getTime();
    const end = query.endDate.getTime();

    return entries
      .map((entry, index) => ({ entry, index }))
      .filter(({ entry }) => entry.timestamp.getTime() >= start && entry.timestamp.getTime() <= end)
      .sort((a, b) => b.entry.timestamp.getTime() - a.entry.timestamp.getTime() || b.index - a.index)
      .map(({ entry }) => entry);
  }

  protected assertOrdered(query: HistoryRange): void {
    if (query.startDate.getTime() > query.endDate.getTime()) {
      throw new AppError(ErrorCode.VALIDATION_ERROR, 'startDate must not be after endDate', 400, {
        startDate: query.startDate.toISOString(),
        endDate: query.endDate.toISOString(),
      });
    }
  }
}
