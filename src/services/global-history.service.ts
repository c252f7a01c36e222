import { docRef, type DocumentRef, type DocumentStore } from '../repositories/document-store';
import { HistoryLedger } from './history-ledger';
import { AppError, ErrorCode } from '../types/error.types';
import {
  GLOBAL_HISTORY_COLLECTION,
  HistoryAction,
  type HistoryEntry,
  type HistoryQuery,
  type HistoryStats,
} from '../types/history.types';
import { dayKey, dayKeysInRange } from '../utils/partition-keys';
import { logger } from '../config/logger';
import { env } from '../config/environment';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface GlobalHistoryOptions {
  maxRangeDays: number;
}

/**
 * Global History Service
 *
 * Day-partitioned ledger spanning every item: `tool_history/{YYYY/MM/DD}`.
 * Used for fleet-wide audit queries: recent activity, staff history, batches, stats.
 * A query reads one bucket per day, so its range is capped at `maxRangeDays`.
 */
export class GlobalHistoryService extends HistoryLedger {
  constructor(
    store: DocumentStore,
    private options: GlobalHistoryOptions = { maxRangeDays: env.HISTORY_MAX_RANGE_DAYS }
  ) {
    super(store);
  }

  bucketRef(partitionKey: string): DocumentRef {
    return docRef(GLOBAL_HISTORY_COLLECTION, partitionKey);
  }

  partitionKeyFor(date: Date): string {
    return dayKey(date);
  }

  async appendEntry(partitionKey: string, entry: HistoryEntry): Promise<void> {
    await this.appendToBucket(this.bucketRef(partitionKey), entry, {
      dayKey: partitionKey,
      date: partitionKey.replace(/\//g, '-'),
    });

    logger.debug('Appended global history entry', {
      dayKey: partitionKey,
      itemId: entry.itemId,
      action: entry.action,
      batchId: entry.batchId,
    });
  }

  async record(entry: HistoryEntry): Promise<void> {
    await this.appendEntry(this.partitionKeyFor(entry.timestamp), entry);
  }

  async query(query: HistoryQuery): Promise<HistoryEntry[]> {
    return (await this.collect(query)).slice(0, query.limit);
  }

  /**
   * Entries where the staff member acted or was the assignee
   */
  async queryStaffHistory(staffUid: string, query: HistoryQuery): Promise<HistoryEntry[]> {
    const entries = await this.collect(query);

    return entries
      .filter((entry) => entry.byStaffUid === staffUid || entry.assignedToStaffUid === staffUid)
      .slice(0, query.limit);
  }

  /**
   * Every entry written under one batch id, newest first
   */
  async getBatchEntries(batchId: string, query: HistoryQuery): Promise<HistoryEntry[]> {
    const entries = await this.collect(query);
    return entries.filter((entry) => entry.batchId === batchId).slice(0, query.limit);
  }

  async getStats(query: HistoryQuery): Promise<HistoryStats> {
    const entries = await this.collect(query);
    const stats: HistoryStats = { total: entries.length, checkout: 0, checkin: 0, usage: 0, restock: 0 };

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
    }

    return stats;
  }

  private async collect(query: HistoryQuery): Promise<HistoryEntry[]> {
    this.assertOrdered(query);

    const rangeDays = (query.endDate.getTime() - query.startDate.getTime()) / DAY_MS;
    if (rangeDays > this.options.maxRangeDays) {
      throw new AppError(
        ErrorCode.VALIDATION_ERROR,
        `History range of ${Math.ceil(rangeDays)} days exceeds the maximum of ${this.options.maxRangeDays}`,
        400,
        { maxRangeDays: this.options.maxRangeDays }
      );
    }

    const refs = dayKeysInRange(query.startDate, query.endDate).map((key) => this.bucketRef(key));
    return this.inRangeNewestFirst(await this.readBuckets(refs), query);
  }
}
