import { describe, it, expect } from 'vitest';
import { MemoryDocumentStore } from '../src/repositories/memory-document-store';
import {
  docRef,
  FieldValue,
  TransactionConflictError,
  type DocumentChange,
} from '../src/repositories/document-store';
import { ManualClock } from './helpers/context';

const toolRef = docRef('tools', 'tool-1');

describe('MemoryDocumentStore', () => {
  it('should resolve server timestamps to the commit time', async () => {
    const clock = new ManualClock('2025-10-20T09:00:00.000Z');
    const store = new MemoryDocumentStore({ clock: clock.now });

    await store.set(toolRef, { status: 'available', updatedAt: FieldValue.serverTimestamp() });

    const snapshot = await store.get(toolRef);
    expect(snapshot?.data).toEqual({ status: 'available', updatedAt: '2025-10-20T09:00:00.000Z' });
    expect(snapshot?.version).toBe(1);
  });

  it('should hand out strictly increasing commit times when the clock stands still', async () => {
    const clock = new ManualClock('2025-10-20T09:00:00.000Z');
    const store = new MemoryDocumentStore({ clock: clock.now });

    const first = await store.runTransaction(async (txn) => {
      txn.set(toolRef, { n: 1 });
    });
    const second = await store.runTransaction(async (txn) => {
      txn.set(toolRef, { n: 2 });
    });

    expect(first.committedAt.toISOString()).toBe('2025-10-20T09:00:00.000Z');
    expect(second.committedAt.toISOString()).toBe('2025-10-20T09:00:00.001Z');
  });

  it('should merge and replace according to set options', async () => {
    const store = new MemoryDocumentStore();
    await store.set(toolRef, { a: 1, b: 2 });

    await store.set(toolRef, { b: 3 }, { merge: true });
    expect((await store.get(toolRef))?.data).toEqual({ a: 1, b: 3 });

    await store.set(toolRef, { c: 4 });
    expect((await store.get(toolRef))?.data).toEqual({ c: 4 });
  });

  it('should hand out copies, not live documents', async () => {
    const store = new MemoryDocumentStore();
    await store.set(toolRef, { tags: ['a'] });

    const snapshot = await store.get(toolRef);
    const tags = snapshot?.data['tags'];
    if (Array.isArray(tags)) tags.push('b');

    expect((await store.get(toolRef))?.data).toEqual({ tags: ['a'] });
  });

  describe('runTransaction', () => {
    it('should retry the whole callback when a read goes stale', async () => {
      const store = new MemoryDocumentStore();
      await store.set(toolRef, { count: 0 });
      let attempts = 0;

      const outcome = await store.runTransaction(async (txn) => {
        attempts++;
        const snapshot = await txn.get(toolRef);
        const count = Number(snapshot?.data['count'] ?? 0);

        if (attempts === 1) {
          // Concurrent writer lands between our read and our commit
          await store.set(toolRef, { count: 10 });
        }

        txn.update(toolRef, { count: count + 1 });
        return count;
      });

      expect(attempts).toBe(2);
      expect(outcome.value).toBe(10);
      expect((await store.get(toolRef))?.data).toEqual({ count: 11 });
    });

    it('should give up with TransactionConflictError after the last attempt', async () => {
      const store = new MemoryDocumentStore({ maxAttempts: 3 });
      await store.set(toolRef, { count: 0 });
      let attempts = 0;

      const run = store.runTransaction(async (txn) => {
        attempts++;
        await txn.get(toolRef);
        await store.set(toolRef, { count: attempts });
        txn.update(toolRef, { count: -1 });
      });

      await expect(run).rejects.toBeInstanceOf(TransactionConflictError);
      await expect(run).rejects.toMatchObject({ attempts: 3 });
      expect(attempts).toBe(3);
      expect((await store.get(toolRef))?.data).toEqual({ count: 3 });
    });

    it('should not retry errors thrown by the callback', async () => {
      const store = new MemoryDocumentStore();
      let attempts = 0;

      const run = store.runTransaction(async () => {
        attempts++;
        throw new Error('precondition failed');
      });

      await expect(run).rejects.toThrow('precondition failed');
      expect(attempts).toBe(1);
    });

    it('should treat a document created after a missing read as a conflict', async () => {
      const store = new MemoryDocumentStore({ maxAttempts: 1 });

      const run = store.runTransaction(async (txn) => {
        await txn.get(toolRef);
        await store.set(toolRef, { created: true });
        txn.set(toolRef, { created: false });
      });

      await expect(run).rejects.toBeInstanceOf(TransactionConflictError);
      expect((await store.get(toolRef))?.data).toEqual({ created: true });
    });

    it('should reject reads issued after a write', async () => {
      const store = new MemoryDocumentStore();

      const run = store.runTransaction(async (txn) => {
        txn.set(toolRef, { a: 1 });
        await txn.get(toolRef);
      });

      await expect(run).rejects.toThrow('Transactions require all reads to be executed before all writes');
    });

    it('should apply nothing when an update targets a missing document', async () => {
      const store = new MemoryDocumentStore();
      const staffRef = docRef('staff', 'ghost');

      const run = store.runTransaction(async (txn) => {
        txn.set(toolRef, { status: 'checked_out' });
        txn.update(staffRef, { assignedItemIds: ['tool-1'] });
      });

      await expect(run).rejects.toThrow('No document to update: staff/ghost');
      expect(await store.get(toolRef)).toBeNull();
    });
  });

  describe('appendToArray', () => {
    it('should append values and set fields on the bucket', async () => {
      const clock = new ManualClock('2025-10-20T09:00:00.000Z');
      const store = new MemoryDocumentStore({ clock: clock.now });
      const bucket = docRef('tool_history', '2025/10/20');

      await store.appendToArray(bucket, 'transactions', [{ id: 'a' }], { dayKey: '2025/10/20' });
      clock.advance(1000);
      await store.appendToArray(bucket, 'transactions', [{ id: 'b' }], {
        updatedAt: FieldValue.serverTimestamp(),
      });

      expect((await store.get(bucket))?.data).toEqual({
        dayKey: '2025/10/20',
        transactions: [{ id: 'a' }, { id: 'b' }],
        updatedAt: '2025-10-20T09:00:01.000Z',
      });
    });

    it('should refuse when the primitive is disabled', async () => {
      const store = new MemoryDocumentStore({ atomicArrayAppend: false });

      expect(store.supportsAtomicAppend).toBe(false);
      await expect(store.appendToArray(toolRef, 'transactions', [], {})).rejects.toThrow(
        'Atomic array append is disabled for this store'
      );
    });
  });

  describe('subscribe', () => {
    it('should deliver changes for the subscribed collection until unsubscribed', async () => {
      const store = new MemoryDocumentStore();
      const changes: DocumentChange[] = [];

      const unsubscribe = store.subscribe('tools', (change) => changes.push(change));
      await store.set(toolRef, { status: 'available' });
      await store.set(docRef('staff', 'w1'), { fullName: 'Walt' });
      unsubscribe();
      await store.set(toolRef, { status: 'checked_out' });

      expect(changes).toHaveLength(1);
      expect(changes[0]).toMatchObject({
        type: 'upsert',
        snapshot: { ref: { collection: 'tools', id: 'tool-1' }, data: { status: 'available' } },
      });
    });
  });

  it('should find documents by field value', async () => {
    const store = new MemoryDocumentStore();
    await store.set(docRef('staff', 'a'), { jobCode: 'W1' });
    await store.set(docRef('staff', 'b'), { jobCode: 'W2' });

    const matches = await store.findByField('staff', 'jobCode', 'W2');

    expect(matches.map((snapshot) => snapshot.ref.id)).toEqual(['b']);
  });
});
