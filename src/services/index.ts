import type { DocumentStore } from '../repositories/document-store';
import { ItemRepository } from '../repositories/item.repository';
import { StaffRepository } from '../repositories/staff.repository';
import { ItemHistoryService } from './item-history.service';
import { GlobalHistoryService } from './global-history.service';
import { TransactionService } from './transaction.service';
import { BatchService } from './batch.service';
import { ItemStatusCache } from './item-status-cache';
import { ItemService } from './item.service';
import { StaffService } from './staff.service';
import { env, BATCH_IDLE_TIMEOUT_MS } from '../config/environment';

export interface Services {
  store: DocumentStore;
  transactions: TransactionService;
  batches: BatchService;
  items: ItemService;
  staff: StaffService;
  globalHistory: GlobalHistoryService;
  cache: ItemStatusCache;
}

export interface ServiceOptions {
  clock?: () => Date;
  maxRangeDays?: number;
  batchIdleTimeoutMs?: number;
  cacheMaxStalenessMs?: number;
}

/**
 * Wire repositories and services over one document store
 */
export function createServices(store: DocumentStore, options: ServiceOptions = {}): Services {
  const itemRepo = new ItemRepository(store);
  const staffRepo = new StaffRepository(store);

  const itemHistory = new ItemHistoryService(store);
  const globalHistory = new GlobalHistoryService(store, {
    maxRangeDays: options.maxRangeDays ?? env.HISTORY_MAX_RANGE_DAYS,
  });

  const transactions = new TransactionService(store, itemRepo, staffRepo, itemHistory, globalHistory);
  const batches = new BatchService(itemRepo, transactions, {
    idleTimeoutMs: options.batchIdleTimeoutMs ?? BATCH_IDLE_TIMEOUT_MS,
    clock: options.clock,
  });

  const clock = options.clock;
  const cache = new ItemStatusCache(store, itemRepo, {
    maxStalenessMs: options.cacheMaxStalenessMs ?? env.ITEM_CACHE_MAX_STALENESS_MS,
    now: clock ? () => clock().getTime() : undefined,
  });

  return {
    store,
    transactions,
    batches,
    items: new ItemService(cache, itemHistory),
    staff: new StaffService(staffRepo, itemRepo, globalHistory),
    globalHistory,
    cache,
  };
}
