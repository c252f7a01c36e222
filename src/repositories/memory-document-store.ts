import {
  BufferedTransaction,
  refPath,
  resolveFields,
  runWithRetry,
  type DocumentChange,
  type DocumentChangeListener,
  type DocumentData,
  type DocumentRef,
  type DocumentSnapshot,
  type DocumentStore,
  type JsonValue,
  type PendingWrite,
  type SetOptions,
  type TransactionContext,
  type TransactionOutcome,
  type Unsubscribe,
} from './document-store';
import { errorMessage, logger } from '../config/logger';

interface StoredDocument {
  ref: DocumentRef;
  data: Record<string, JsonValue>;
  version: number;
}

export interface MemoryDocumentStoreOptions {
  maxAttempts?: number;
  retryBackoffMs?: number;
  // Source of "server" time; commit times are forced strictly increasing
  clock?: () => Date;
  atomicArrayAppend?: boolean;
}

/**
 * In-process Document Store
 *
 * Used by the `memory` store driver and by the test suite. Commits are applied
 * synchronously, so a commit is atomic with respect to every other operation;
 * interleaving only happens at the awaits inside a transaction callback.
 */
export class MemoryDocumentStore implements DocumentStore {
  readonly name = 'memory' as const;
  readonly supportsAtomicAppend: boolean;

  private readonly documents = new Map<string, StoredDocument>();
  private readonly listeners = new Map<string, Set<DocumentChangeListener>>();
  private readonly maxAttempts: number;
  private readonly retryBackoffMs: number;
  private readonly clock: () => Date;
  private lastCommitMs = 0;

  constructor(options: MemoryDocumentStoreOptions = {}) {
    this.maxAttempts = options.maxAttempts ?? 5;
    this.retryBackoffMs = options.retryBackoffMs ?? 0;
    this.clock = options.clock ?? (() => new Date());
    this.supportsAtomicAppend = options.atomicArrayAppend ?? true;
  }

  async runTransaction<T>(fn: (txn: TransactionContext) => Promise<T>): Promise<TransactionOutcome<T>> {
    return runWithRetry<T>(this.maxAttempts, this.retryBackoffMs, async () => {
      const txn = new BufferedTransaction((ref) => this.get(ref));
      const value = await fn(txn);

      for (const [path, read] of txn.reads) {
        const currentVersion = this.documents.get(path)?.version ?? 0;
        if (currentVersion !== read.version) {
          logger.debug('Transaction read is stale, retrying', { path });
          return { committed: false };
        }
      }

      const committedAt = this.nextCommitTime();
      this.applyWrites(txn.writes, committedAt);
      return { committed: true, value, committedAt };
    });
  }

  async get(ref: DocumentRef): Promise<DocumentSnapshot | null> {
    const stored = this.documents.get(refPath(ref));
    return stored ? this.toSnapshot(stored) : null;
  }

  async set(ref: DocumentRef, data: DocumentData, options: SetOptions = { merge: false }): Promise<void> {
    this.applyWrites([{ ref, data, mode: options.merge ? 'merge' : 'set' }], this.nextCommitTime());
  }

  async findByField(collection: string, field: string, value: string): Promise<DocumentSnapshot[]> {
    return (await this.list(collection)).filter((snapshot) => snapshot.data[field] === value);
  }

  async list(collection: string): Promise<DocumentSnapshot[]> {
    const snapshots: DocumentSnapshot[] = [];
    for (const stored of this.documents.values()) {
      if (stored.ref.collection === collection) {
        snapshots.push(this.toSnapshot(stored));
      }
    }
    return snapshots;
  }

  async appendToArray(ref: DocumentRef, field: string, values: JsonValue[], fields: DocumentData): Promise<void> {
    if (!this.supportsAtomicAppend) {
      throw new Error('Atomic array append is disabled for this store');
    }

    const committedAt = this.nextCommitTime();
    const path = refPath(ref);
    const existing = this.documents.get(path);
    const current = existing?.data[field];
    const merged: Record<string, JsonValue> = {
      ...(existing?.data ?? {}),
      ...resolveFields(fields, committedAt),
      [field]: [...(Array.isArray(current) ? current : []), ...values],
    };

    this.store(ref, merged, existing);
  }

  subscribe(collection: string, listener: DocumentChangeListener): Unsubscribe {
    const listeners = this.listeners.get(collection) ?? new Set<DocumentChangeListener>();
    listeners.add(listener);
    this.listeners.set(collection, listeners);

    return () => {
      listeners.delete(listener);
    };
  }

  async ping(): Promise<void> {
    return;
  }

  private applyWrites(writes: PendingWrite[], committedAt: Date): void {
    // Validate first so a failing update leaves nothing half-applied
    for (const write of writes) {
      if (write.mode === 'update' && !this.documents.has(refPath(write.ref))) {
        throw new Error(`No document to update: ${refPath(write.ref)}`);
      }
    }

    for (const write of writes) {
      const existing = this.documents.get(refPath(write.ref));
      const resolved = resolveFields(write.data, committedAt);
      const data = write.mode === 'set' ? resolved : { ...(existing?.data ?? {}), ...resolved };
      this.store(write.ref, data, existing);
    }
  }

  private store(ref: DocumentRef, data: Record<string, JsonValue>, existing: StoredDocument | undefined): void {
    const stored: StoredDocument = {
      ref: { ...ref },
      data: structuredClone(data),
      version: (existing?.version ?? 0) + 1,
    };
    this.documents.set(refPath(ref), stored);
    this.emit({ type: 'upsert', snapshot: this.toSnapshot(stored) });
  }

  private emit(change: DocumentChange): void {
    const collection = change.type === 'upsert' ? change.snapshot.ref.collection : change.ref.collection;
    for (const listener of this.listeners.get(collection) ?? []) {
      try {
        listener(change);
      } catch (error) {
        logger.warn('Document change listener failed', {
          collection,
          error: errorMessage(error),
        });
      }
    }
  }

  private nextCommitTime(): Date {
    const now = this.clock().getTime();
    this.lastCommitMs = now > this.lastCommitMs ? now : this.lastCommitMs + 1;
    return new Date(this.lastCommitMs);
  }

  private toSnapshot(stored: StoredDocument): DocumentSnapshot {
    return {
      ref: { ...stored.ref },
      data: structuredClone(stored.data),
      version: stored.version,
    };
  }
}
