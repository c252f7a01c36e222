import { z } from 'zod';

/**
 * Document Store
 *
 * Abstract transactional document database consumed by the repositories and ledgers.
 * Implementations: SupabaseDocumentStore (PostgreSQL via RPC) and MemoryDocumentStore.
 *
 * Contract:
 * - runTransaction() gives read/write handles over the documents touched inside it.
 *   Reads are version-checked at commit; a stale read aborts the attempt and the
 *   whole callback is retried, up to a bounded number of attempts.
 * - FieldValue.serverTimestamp() resolves to the commit time of the write it is part of.
 * - appendToArray() is the atomic array-append primitive, where the store has one.
 */

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValueSchema), z.record(jsonValueSchema)])
);

/**
 * Sentinel replaced by the store with the commit time (ISO-8601 string)
 */
export class ServerTimestamp {
  readonly kind = 'serverTimestamp' as const;
}

const SERVER_TIMESTAMP = new ServerTimestamp();

export const FieldValue = {
  serverTimestamp: (): ServerTimestamp => SERVER_TIMESTAMP,
};

export type FieldInput = JsonValue | ServerTimestamp;

export type DocumentData = { [field: string]: FieldInput };

export interface DocumentRef {
  collection: string;
  id: string;
}

export interface DocumentSnapshot {
  ref: DocumentRef;
  data: Record<string, unknown>;
  version: number;
}

export interface SetOptions {
  merge: boolean;
}

export interface TransactionContext {
  get(ref: DocumentRef): Promise<DocumentSnapshot | null>;
  set(ref: DocumentRef, data: DocumentData, options?: SetOptions): void;
  update(ref: DocumentRef, patch: DocumentData): void;
}

export interface TransactionOutcome<T> {
  value: T;
  committedAt: Date;
}

export type DocumentChange =
  | { type: 'upsert'; snapshot: DocumentSnapshot }
  | { type: 'delete'; ref: DocumentRef };

export type DocumentChangeListener = (change: DocumentChange) => void;

export type Unsubscribe = () => void;

export interface DocumentStore {
  readonly name: 'supabase' | 'memory';
  readonly supportsAtomicAppend: boolean;

  runTransaction<T>(fn: (txn: TransactionContext) => Promise<T>): Promise<TransactionOutcome<T>>;
  get(ref: DocumentRef): Promise<DocumentSnapshot | null>;
  set(ref: DocumentRef, data: DocumentData, options?: SetOptions): Promise<void>;
  findByField(collection: string, field: string, value: string): Promise<DocumentSnapshot[]>;
  list(collection: string): Promise<DocumentSnapshot[]>;
  appendToArray(ref: DocumentRef, field: string, values: JsonValue[], fields: DocumentData): Promise<void>;
  subscribe(collection: string, listener: DocumentChangeListener): Unsubscribe;
  ping(): Promise<void>;
}

/**
 * Raised when every attempt of a transaction lost an optimistic-lock race
 */
export class TransactionConflictError extends Error {
  constructor(public attempts: number) {
    super(`Transaction aborted after ${attempts} conflicting attempts`);
    this.name = 'TransactionConflictError';
  }
}

export function docRef(collection: string, id: string): DocumentRef {
  return { collection, id };
}

export function refPath(ref: DocumentRef): string {
  return `${ref.collection}/${ref.id}`;
}

export function isServerTimestamp(value: FieldInput): value is ServerTimestamp {
  return value instanceof ServerTimestamp;
}

/**
 * Replace server timestamp sentinels with the given commit time
 */
export function resolveFields(data: DocumentData, at: Date): Record<string, JsonValue> {
  const resolved: Record<string, JsonValue> = {};
  for (const [field, value] of Object.entries(data)) {
    resolved[field] = isServerTimestamp(value) ? at.toISOString() : value;
  }
  return resolved;
}

export type WriteMode = 'set' | 'merge' | 'update';

export interface PendingWrite {
  ref: DocumentRef;
  data: DocumentData;
  mode: WriteMode;
}

export interface RecordedRead {
  ref: DocumentRef;
  // 0 when the document did not exist
  version: number;
}

/**
 * Transaction handle shared by both stores: records read versions and buffers writes
 * until the store commits them in one step.
 */
export class BufferedTransaction implements TransactionContext {
  readonly reads = new Map<string, RecordedRead>();
  readonly writes: PendingWrite[] = [];

  constructor(private readonly load: (ref: DocumentRef) => Promise<DocumentSnapshot | null>) {}

  async get(ref: DocumentRef): Promise<DocumentSnapshot | null> {
    if (this.writes.length > 0) {
      throw new Error('Transactions require all reads to be executed before all writes');
    }

    const snapshot = await this.load(ref);
    this.reads.set(refPath(ref), { ref, version: snapshot?.version ?? 0 });
    return snapshot;
  }

  set(ref: DocumentRef, data: DocumentData, options: SetOptions = { merge: false }): void {
    this.writes.push({ ref, data, mode: options.merge ? 'merge' : 'set' });
  }

  update(ref: DocumentRef, patch: DocumentData): void {
    this.writes.push({ ref, data: patch, mode: 'update' });
  }
}

export type AttemptResult<T> = { committed: true; value: T; committedAt: Date } | { committed: false };

/**
 * Run one transaction attempt at a time until one commits
 *
 * Errors thrown by an attempt (including the callback's own precondition errors)
 * abort immediately and are not retried.
 */
export async function runWithRetry<T>(
  maxAttempts: number,
  backoffMs: number,
  attempt: (attemptNumber: number) => Promise<AttemptResult<T>>
): Promise<TransactionOutcome<T>> {
  for (let attemptNumber = 1; attemptNumber <= maxAttempts; attemptNumber++) {
    const result = await attempt(attemptNumber);

    if (result.committed) {
      return { value: result.value, committedAt: result.committedAt };
    }

    if (attemptNumber < maxAttempts && backoffMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, backoffMs * attemptNumber));
    }
  }

  throw new TransactionConflictError(maxAttempts);
}
