import type { DocumentChange, DocumentStore, Unsubscribe } from '../repositories/document-store';
import { ItemRepository } from '../repositories/item.repository';
import { ITEM_COLLECTIONS, ItemKind, type Item } from '../types/item.types';
import { parseScanCode } from '../utils/scan-code';
import { errorMessage, logger } from '../config/logger';

export interface ItemStatusCacheOptions {
  maxStalenessMs: number;
  now?: () => number;
}

interface CollectionSnapshot {
  items: Map<string, Item>;
  refreshedAt: number;
}

const KINDS = [ItemKind.TOOL, ItemKind.CONSUMABLE] as const;

/**
 * Item Status Cache
 *
 * Holds a snapshot of the tools and consumables collections, kept current by the
 * store's change subscription. A snapshot that has seen neither a full load nor a
 * change event within `maxStalenessMs` is reloaded on the next read.
 *
 * A listing may be older than changes delivered while it was in flight, so those
 * changes are replayed onto it before it replaces the current snapshot.
 *
 * Before start() (or after stop()) every read goes to the store.
 */
export class ItemStatusCache {
  private readonly snapshots = new Map<ItemKind, CollectionSnapshot>();
  private readonly loads = new Map<ItemKind, Promise<CollectionSnapshot>>();
  // Changes seen while a load is in flight, replayed onto the loaded snapshot
  private readonly pendingChanges = new Map<ItemKind, DocumentChange[]>();
  private unsubscribers: Unsubscribe[] = [];
  private readonly now: () => number;

  constructor(
    private store: DocumentStore,
    private itemRepo: ItemRepository,
    private options: ItemStatusCacheOptions
  ) {
    this.now = options.now ?? Date.now;
  }

  get running(): boolean {
    return this.unsubscribers.length > 0;
  }

  async start(): Promise<void> {
    if (this.running) return;

    this.unsubscribers = KINDS.map((kind) =>
      this.store.subscribe(ITEM_COLLECTIONS[kind], (change) => this.apply(kind, change))
    );
    await Promise.all(KINDS.map((kind) => this.reload(kind)));

    logger.info('Item status cache started', {
      tools: this.snapshots.get(ItemKind.TOOL)?.items.size ?? 0,
      consumables: this.snapshots.get(ItemKind.CONSUMABLE)?.items.size ?? 0,
    });
  }

  stop(): void {
    for (const unsubscribe of this.unsubscribers) {
      unsubscribe();
    }
    this.unsubscribers = [];
    this.snapshots.clear();
  }

  async list(kind: ItemKind): Promise<Item[]> {
    if (!this.running) {
      return this.itemRepo.list(kind);
    }
    return [...(await this.current(kind)).items.values()];
  }

  /**
   * Look an item up by internal id or uniqueId (scan prefixes accepted)
   */
  async find(reference: string, kind?: ItemKind): Promise<Item | null> {
    if (!this.running) {
      return this.itemRepo.resolve(reference, kind);
    }

    const code = parseScanCode(reference);
    for (const candidate of kind ? [kind] : KINDS) {
      const { items } = await this.current(candidate);

      const byId = items.get(code);
      if (byId) return byId;

      for (const item of items.values()) {
        if (item.uniqueId === code) return item;
      }
    }

    return null;
  }

  private async current(kind: ItemKind): Promise<CollectionSnapshot> {
    const snapshot = this.snapshots.get(kind);
    if (snapshot && this.now() - snapshot.refreshedAt <= this.options.maxStalenessMs) {
      return snapshot;
    }
    return this.reload(kind);
  }

  private reload(kind: ItemKind): Promise<CollectionSnapshot> {
    const pending = this.loads.get(kind);
    if (pending) return pending;

    const changes: DocumentChange[] = [];
    this.pendingChanges.set(kind, changes);

    const load = this.itemRepo
      .list(kind)
      .then((items) => {
        const snapshot: CollectionSnapshot = {
          items: new Map(items.map((item) => [item.id, item])),
          refreshedAt: this.now(),
        };
        for (const change of changes) {
          this.applyTo(snapshot, kind, change);
        }
        if (this.running) {
          this.snapshots.set(kind, snapshot);
        }
        logger.debug('Item snapshot loaded', { kind, count: items.length, replayed: changes.length });
        return snapshot;
      })
      .finally(() => {
        this.loads.delete(kind);
        this.pendingChanges.delete(kind);
      });

    this.loads.set(kind, load);
    return load;
  }

  private apply(kind: ItemKind, change: DocumentChange): void {
    this.pendingChanges.get(kind)?.push(change);

    const snapshot = this.snapshots.get(kind);
    if (snapshot) {
      this.applyTo(snapshot, kind, change);
    }
  }

  private applyTo(snapshot: CollectionSnapshot, kind: ItemKind, change: DocumentChange): void {
    if (change.type === 'delete') {
      snapshot.items.delete(change.ref.id);
    } else {
      try {
        const item = this.itemRepo.fromSnapshot(kind, change.snapshot);
        snapshot.items.set(item.id, item);
      } catch (error) {
        snapshot.items.delete(change.snapshot.ref.id);
        logger.warn('Dropped unreadable item from cache', {
          kind,
          id: change.snapshot.ref.id,
          error: errorMessage(error),
        });
      }
    }

    snapshot.refreshedAt = this.now();
  }
}
