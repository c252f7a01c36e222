import type { RealtimePostgresChangesPayload, SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import {
  BufferedTransaction,
  isServerTimestamp,
  refPath,
  runWithRetry,
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

const TABLE = 'documents';
const PAGE_SIZE = 1000;

// Marker understood by resolve_field_values() in the migration
const SERVER_TIMESTAMP_MARKER = { __fieldValue: 'serverTimestamp' };

const documentRowSchema = z.object({
  collection: z.string(),
  id: z.string(),
  data: z.record(z.unknown()),
  version: z.number().int(),
});

const commitResultSchema = z.object({
  committed: z.boolean(),
  committed_at: z.string().nullable(),
});

type DocumentRow = z.infer<typeof documentRowSchema>;

export interface SupabaseDocumentStoreOptions {
  maxAttempts: number;
  retryBackoffMs?: number;
}

/**
 * Supabase Document Store
 *
 * Documents live in one `documents` table (collection, id, data jsonb, version).
 * Transactions are optimistic: reads record the row version, and the buffered
 * writes are committed by the commit_document_transaction() PostgreSQL function,
 * which locks every read row with SELECT ... FOR UPDATE, compares versions and
 * applies all writes in the same database transaction. A version mismatch returns
 * committed = false and the callback is retried.
 */
export class SupabaseDocumentStore implements DocumentStore {
  readonly name = 'supabase' as const;
  readonly supportsAtomicAppend = true;

  private readonly maxAttempts: number;
  private readonly retryBackoffMs: number;

  constructor(
    private client: SupabaseClient,
    options: SupabaseDocumentStoreOptions
  ) {
    this.maxAttempts = options.maxAttempts;
    this.retryBackoffMs = options.retryBackoffMs ?? 25;
  }

  async runTransaction<T>(fn: (txn: TransactionContext) => Promise<T>): Promise<TransactionOutcome<T>> {
    return runWithRetry<T>(this.maxAttempts, this.retryBackoffMs, async (attemptNumber) => {
      const txn = new BufferedTransaction((ref) => this.get(ref));
      const value = await fn(txn);

      const reads = [...txn.reads.values()].map((read) => ({
        collection: read.ref.collection,
        id: read.ref.id,
        version: read.version,
      }));

      const committedAt = await this.commit(reads, txn.writes);
      if (!committedAt) {
        logger.debug('Transaction conflict, retrying', { attempt: attemptNumber });
        return { committed: false };
      }

      return { committed: true, value, committedAt };
    });
  }

  async get(ref: DocumentRef): Promise<DocumentSnapshot | null> {
    const { data, error } = await this.client
      .from(TABLE)
      .select('collection, id, data, version')
      .eq('collection', ref.collection)
      .eq('id', ref.id)
      .maybeSingle();

    if (error) {
      logger.error('Failed to read document', { path: refPath(ref), error: error.message });
      throw new Error(`Failed to read document ${refPath(ref)}: ${error.message}`);
    }

    return data ? this.toSnapshot(documentRowSchema.parse(data)) : null;
  }

  async set(ref: DocumentRef, data: DocumentData, options: SetOptions = { merge: false }): Promise<void> {
    // A commit without reads can never conflict
    const committedAt = await this.commit([], [{ ref, data, mode: options.merge ? 'merge' : 'set' }]);
    if (!committedAt) {
      throw new Error(`Failed to write document ${refPath(ref)}`);
    }
  }

  async findByField(collection: string, field: string, value: string): Promise<DocumentSnapshot[]> {
    const { data, error } = await this.client
      .from(TABLE)
      .select('collection, id, data, version')
      .eq('collection', collection)
      .eq(`data->>${field}`, value);

    if (error) {
      logger.error('Failed to query documents', { collection, field, error: error.message });
      throw new Error(`Failed to query ${collection} by ${field}: ${error.message}`);
    }

    return z.array(documentRowSchema).parse(data ?? []).map((row) => this.toSnapshot(row));
  }

  async list(collection: string): Promise<DocumentSnapshot[]> {
    const snapshots: DocumentSnapshot[] = [];

    for (let offset = 0; ; offset += PAGE_SIZE) {
      const { data, error } = await this.client
        .from(TABLE)
        .select('collection, id, data, version')
        .eq('collection', collection)
        .order('id')
        .range(offset, offset + PAGE_SIZE - 1);

      if (error) {
        logger.error('Failed to list documents', { collection, error: error.message });
        throw new Error(`Failed to list ${collection}: ${error.message}`);
      }

      const rows = z.array(documentRowSchema).parse(data ?? []);
      snapshots.push(...rows.map((row) => this.toSnapshot(row)));

      if (rows.length < PAGE_SIZE) {
        return snapshots;
      }
    }
  }

  /**
   * Atomic append through append_to_document_array(): a single INSERT ... ON CONFLICT
   * that concatenates onto the stored array, so concurrent appends never lose entries
   */
  async appendToArray(ref: DocumentRef, field: string, values: JsonValue[], fields: DocumentData): Promise<void> {
    const { error } = await this.client.rpc('append_to_document_array', {
      p_collection: ref.collection,
      p_id: ref.id,
      p_field: field,
      p_values: values,
      p_fields: this.serialize(fields),
    });

    if (error) {
      logger.error('Failed to append to document array', { path: refPath(ref), field, error: error.message });
      throw new Error(`Failed to append to ${refPath(ref)}.${field}: ${error.message}`);
    }
  }

  subscribe(collection: string, listener: DocumentChangeListener): Unsubscribe {
    const channel = this.client
      .channel(`documents:${collection}`)
      .on(
        'postgres_changes',
        { event: '*', schema: 'public', table: TABLE, filter: `collection=eq.${collection}` },
        (payload: RealtimePostgresChangesPayload<Record<string, unknown>>) => {
          if (payload.eventType === 'DELETE') {
            const old = documentRowSchema.pick({ collection: true, id: true }).safeParse(payload.old);
            if (old.success) {
              listener({ type: 'delete', ref: { collection: old.data.collection, id: old.data.id } });
            }
            return;
          }

          const row = documentRowSchema.safeParse(payload.new);
          if (!row.success) {
            logger.warn('Ignoring malformed document change', { collection, issues: row.error.issues });
            return;
          }
          listener({ type: 'upsert', snapshot: this.toSnapshot(row.data) });
        }
      )
      .subscribe();

    logger.info('Subscribed to document changes', { collection });

    return () => {
      this.client.removeChannel(channel).catch((error: unknown) => {
        logger.warn('Failed to remove realtime channel', {
          collection,
          error: errorMessage(error),
        });
      });
    };
  }

  async ping(): Promise<void> {
    const { error } = await this.client.from(TABLE).select('id').limit(1);

    if (error) {
      throw new Error(`Database connection failed: ${error.message}`);
    }
  }

  /**
   * Commit buffered writes guarded by the recorded read versions
   *
   * Returns the commit time, or null when a read version no longer matches.
   */
  private async commit(
    reads: Array<{ collection: string; id: string; version: number }>,
    writes: PendingWrite[]
  ): Promise<Date | null> {
    const { data, error } = await this.client.rpc('commit_document_transaction', {
      p_reads: reads,
      p_writes: writes.map((write) => ({
        collection: write.ref.collection,
        id: write.ref.id,
        mode: write.mode,
        data: this.serialize(write.data),
      })),
    });

    if (error) {
      logger.error('Failed to commit document transaction', {
        error: error.message,
        code: error.code,
        details: error.details,
        hint: error.hint,
      });
      throw new Error(`Failed to commit transaction: ${error.message}`);
    }

    const result = commitResultSchema.parse(data);
    return result.committed && result.committed_at ? new Date(result.committed_at) : null;
  }

  private serialize(data: DocumentData): Record<string, JsonValue> {
    const serialized: Record<string, JsonValue> = {};
    for (const [field, value] of Object.entries(data)) {
      serialized[field] = isServerTimestamp(value) ? SERVER_TIMESTAMP_MARKER : value;
    }
    return serialized;
  }

  private toSnapshot(row: DocumentRow): DocumentSnapshot {
    return {
      ref: { collection: row.collection, id: row.id },
      data: row.data,
      version: row.version,
    };
  }
}
