import { ItemStatusCache } from './item-status-cache';
import { ItemHistoryService } from './item-history.service';
import { resolveHistoryQuery, type HistoryRangeInput } from './history-ledger';
import { ItemKind, type Item, type ItemListFilter } from '../types/item.types';
import type { HistoryEntry, ItemHistoryReport } from '../types/history.types';
import { AppError, ErrorCode } from '../types/error.types';
import { logger } from '../config/logger';

/**
 * Item Service
 *
 * Read side for items: instant status and listings come from the status cache,
 * never from the history ledgers.
 */
export class ItemService {
  constructor(
    private cache: ItemStatusCache,
    private itemHistory: ItemHistoryService
  ) {}

  /**
   * Current status of one item by internal id, uniqueId or scan code
   */
  async getItemStatus(reference: string): Promise<Item> {
    logger.debug('Getting item status', { reference });

    const item = await this.cache.find(reference);

    if (!item) {
      throw new AppError(ErrorCode.ITEM_NOT_FOUND, `Item ${reference} not found`, 404);
    }

    return item;
  }

  /**
   * List items, optionally narrowed by kind, status and a free-text search
   *
   * `low_stock` matches consumables at or below their minimum quantity.
   */
  async listItems(filter: ItemListFilter = {}): Promise<Item[]> {
    const kinds = filter.kind ? [filter.kind] : [ItemKind.TOOL, ItemKind.CONSUMABLE];
    const lists = await Promise.all(kinds.map((kind) => this.cache.list(kind)));
    const search = filter.search?.trim().toLowerCase();

    return lists
      .flat()
      .filter((item) => matchesStatus(item, filter.status))
      .filter((item) => !search || searchableText(item).includes(search))
      .sort((a, b) => a.uniqueId.localeCompare(b.uniqueId));
  }

  async getItemHistory(reference: string, range: HistoryRangeInput): Promise<HistoryEntry[]> {
    const item = await this.getItemStatus(reference);
    return this.itemHistory.query(item.kind, item.id, resolveHistoryQuery(range));
  }

  /**
   * Counts over the range, plus the newest entry the item has ever had
   */
  async getItemHistoryStats(reference: string, range: HistoryRangeInput): Promise<ItemHistoryReport> {
    const item = await this.getItemStatus(reference);
    const { startDate, endDate } = resolveHistoryQuery(range);

    const [stats, lastEntry] = await Promise.all([
      this.itemHistory.getStats(item.kind, item.id, { startDate, endDate }),
      this.itemHistory.getLastEntry(item.kind, item.id),
    ]);

    return { stats, lastEntry };
  }
}

function matchesStatus(item: Item, status: ItemListFilter['status']): boolean {
  if (!status) return true;

  if (status === 'low_stock') {
    return item.kind === ItemKind.CONSUMABLE && item.currentQuantity <= item.minQuantity;
  }

  return item.kind === ItemKind.TOOL && item.status === status;
}

function searchableText(item: Item): string {
  const model = item.kind === ItemKind.TOOL ? item.model : '';
  return [item.uniqueId, item.name, item.brand, model].join(' ').toLowerCase();
}
