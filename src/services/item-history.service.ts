import { docRef, type DocumentRef, type DocumentSnapshot } from '../repositories/document-store';
import { HistoryLedger } from './history-ledger';
import {
  HistoryAction,
  type HistoryEntry,
  type HistoryQuery,
  type HistoryRange,
  type ItemHistoryStats,
} from '../types/history.types';
import { ITEM_COLLECTIONS, type ItemKind } from '../types/item.types';
import { monthKey, monthKeyOrdinal, monthKeysInRange } from '../utils/partition-keys';
import { logger } from '../config/logger';

// Earliest and latest representable dates
const ALL_TIME: HistoryRange = { startDate: new Date(-8.64e15), endDate: new Date(8.64e15) };

/**
 * Per-Item History Service
 *
 * Month-partitioned ledger scoped to one item:
 * `tools/{itemId}/history/{MM-YYYY}` or `consumables/{itemId}/history/{MM-YYYY}`.
 * Answers "history of this item" by reading one bucket per month in range.
 */
export class ItemHistoryService extends HistoryLedger {
  historyCollection(itemKind: ItemKind, itemId: string): string {
    return `${ITEM_COLLECTIONS[itemKind]}/${itemId}/history`;
  }

  bucketRef(itemKind: ItemKind, itemId: string, partitionKey: string): DocumentRef {
    return docRef(this.historyCollection(itemKind, itemId), partitionKey);
  }

  partitionKeyFor(date: Date): string {
    return monthKey(date);
  }

  /**
   * Append an entry to the item's bucket for the given month
   */
  async appendEntry(partitionKey: string, entry: HistoryEntry): Promise<void> {
    await this.appendToBucket(this.bucketRef(entry.itemKind, entry.itemId, partitionKey), entry, {
      monthKey: partitionKey,
      itemId: entry.itemId,
      itemUniqueId: entry.itemUniqueId,
      itemKind: entry.itemKind,
    });

    logger.debug('Appended item history entry', {
      itemId: entry.itemId,
      monthKey: partitionKey,
      action: entry.action,
      batchId: entry.batchId,
    });
  }

  /**
   * Append to the bucket of the month the entry's timestamp falls in
   */
  async record(entry: HistoryEntry): Promise<void> {
    await this.appendEntry(this.partitionKeyFor(entry.timestamp), entry);
  }

  async query(itemKind: ItemKind, itemId: string, query: HistoryQuery): Promise<HistoryEntry[]> {
    return (await this.collect(itemKind, itemId, query)).slice(0, query.limit);
  }

  /**
   * Action counts, distinct assignees and batches over the range
   */
  async getStats(itemKind: ItemKind, itemId: string, range: HistoryRange): Promise<ItemHistoryStats> {
    const entries = await this.collect(itemKind, itemId, range);
    const stats: ItemHistoryStats = {
      total: entries.length,
      checkout: 0,
      checkin: 0,
      usage: 0,
      restock: 0,
      uniqueStaff: 0,
      batchOperations: 0,
      mostActiveStaffUid: null,
    };
    const staffCounts = new Map<string, number>();
    const batches = new Set<string>();

    for (const entry of entries) {
      switch (entry.action) {
        case HistoryAction.CHECKOUT:
          stats.checkout++;
          break;
        case HistoryAction.CHECKIN:
          stats.checkin++;
          break;
        case HistoryAction.USAGE:
          stats.usage++;
          break;
        case HistoryAction.RESTOCK:
          stats.restock++;
          break;
      }
      if (entry.assignedToStaffUid) {
        staffCounts.set(entry.assignedToStaffUid, (staffCounts.get(entry.assignedToStaffUid) ?? 0) + 1);
      }
      if (entry.batchId) {
        batches.add(entry.batchId);
      }
    }

    stats.uniqueStaff = staffCounts.size;
    stats.batchOperations = batches.size;

    // Ties go to the smaller uid
    let best = 0;
    for (const [uid, count] of [...staffCounts].sort(([a], [b]) => a.localeCompare(b))) {
      if (count > best) {
        best = count;
        stats.mostActiveStaffUid = uid;
      }
    }

    return stats;
  }

  /**
   * Newest entry in the item's ledger, whatever month it was written in
   */
  async getLastEntry(itemKind: ItemKind, itemId: string): Promise<HistoryEntry | null> {
    const buckets = await this.listBuckets(itemKind, itemId);

    for (const bucket of buckets) {
      const entries = this.entriesOf([bucket]);
      const [newest] = this.inRangeNewestFirst(entries, ALL_TIME);
      if (newest) return newest;
    }

    return null;
  }

  async hasHistory(itemKind: ItemKind, itemId: string): Promise<boolean> {
    return (await this.getLastEntry(itemKind, itemId)) !== null;
  }

  // Month buckets newest first; documents whose id is not a month key are ignored
  private async listBuckets(itemKind: ItemKind, itemId: string): Promise<DocumentSnapshot[]> {
    const keyed = (await this.store.list(this.historyCollection(itemKind, itemId))).flatMap((snapshot) => {
      const ordinal = monthKeyOrdinal(snapshot.ref.id);
      return ordinal === null ? [] : [{ snapshot, ordinal }];
    });

    return keyed.sort((a, b) => b.ordinal - a.ordinal).map(({ snapshot }) => snapshot);
  }

  private async collect(itemKind: ItemKind, itemId: string, range: HistoryRange): Promise<HistoryEntry[]> {
    this.assertOrdered(range);

    const refs = monthKeysInRange(range.startDate, range.endDate).map((key) =>
      this.bucketRef(itemKind, itemId, key)
    );

    return this.inRangeNewestFirst(await this.readBuckets(refs), range);
  }
}
