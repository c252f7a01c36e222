import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { docRef } from '../src/repositories/document-store';
import { BatchType } from '../src/types/batch.types';
import { ErrorCategory, ErrorCode } from '../src/types/error.types';
import { ToolStatus } from '../src/types/item.types';
import { CONSUMABLES, createTestContext, deferred, ManualClock, STAFF, TOOLS, type TestContext } from './helpers/context';

const UNKNOWN_BATCH = '00000000-0000-4000-8000-000000000000';

const today = {
  startDate: new Date('2025-10-20T00:00:00.000Z'),
  endDate: new Date('2025-10-20T23:59:59.999Z'),
  limit: 100,
};

describe('Batches', () => {
  let clock: ManualClock;
  let ctx: TestContext;

  beforeEach(async () => {
    clock = new ManualClock('2025-10-20T08:00:00.000Z');
    ctx = await createTestContext({ clock: clock.now });
    clock.set('2025-10-20T09:00:00.000Z');
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  async function toolStatus(id: string): Promise<unknown> {
    return (await ctx.store.get(docRef('tools', id)))?.data['status'];
  }

  // ==========================================================================
  // Scanning
  // ==========================================================================
  describe('scan', () => {
    it('should infer checkout from the first available tool', async () => {
      const { id } = ctx.services.batches.createBatch();

      const line = await ctx.services.batches.scan(id, 'TOOL#T1234');

      expect(line).toEqual({ itemId: TOOLS.drill, uniqueId: 'T1234', kind: 'tool', quantity: null });
      expect(ctx.services.batches.getBatch(id)).toMatchObject({ state: BatchType.CHECKOUT, submitting: false });
    });

    it('should reject a tool in the opposite state and leave the batch unchanged', async () => {
      const { id } = ctx.services.batches.createBatch();
      await ctx.services.batches.scan(id, 'T1234');
      await ctx.services.transactions.performCheckout({ itemId: 'T1235', staffUid: 'W2', actingStaffUid: 'ADMIN1' });

      await expect(ctx.services.batches.scan(id, 'T1235')).rejects.toMatchObject({
        code: ErrorCode.BATCH_TYPE_MISMATCH,
        category: ErrorCategory.BATCH_VALIDATION_FAILED,
        statusCode: 422,
        message: 'Tool T1235 is checked_out; this batch is for checkout',
      });

      const batch = ctx.services.batches.getBatch(id);
      expect(batch.state).toBe(BatchType.CHECKOUT);
      expect(batch.items.map((line) => line.uniqueId)).toEqual(['T1234']);
    });

    it('should reject the same item twice, however it is scanned', async () => {
      const { id } = ctx.services.batches.createBatch();
      await ctx.services.batches.scan(id, 'T1234');

      await expect(ctx.services.batches.scan(id, 'TOOL#T1234')).rejects.toMatchObject({
        code: ErrorCode.ALREADY_IN_BATCH,
      });
      await expect(ctx.services.batches.scan(id, TOOLS.drill)).rejects.toMatchObject({
        code: ErrorCode.ALREADY_IN_BATCH,
      });
      expect(ctx.services.batches.getBatch(id).items).toHaveLength(1);
    });

    it('should reject unknown items', async () => {
      const { id } = ctx.services.batches.createBatch();

      await expect(ctx.services.batches.scan(id, 'T0000')).rejects.toMatchObject({
        code: ErrorCode.ITEM_NOT_FOUND,
        statusCode: 404,
      });
      expect(ctx.services.batches.getBatch(id).state).toBe('empty');
    });

    it('should require a consumable type before scanning consumables', async () => {
      const { id } = ctx.services.batches.createBatch();

      await expect(ctx.services.batches.scan(id, 'C0001', 1)).rejects.toMatchObject({
        code: ErrorCode.BATCH_TYPE_MISMATCH,
        message: 'Select usage or restock before scanning consumables',
      });
    });

    it('should keep tools and consumables apart', async () => {
      const tools = ctx.services.batches.createBatch();
      await ctx.services.batches.scan(tools.id, 'T1234');
      await expect(ctx.services.batches.scan(tools.id, 'C0001', 1)).rejects.toMatchObject({
        message: 'Consumable C0001 cannot join a checkout batch',
      });

      const usage = ctx.services.batches.createBatch(BatchType.CONSUMABLE_USAGE);
      await expect(ctx.services.batches.scan(usage.id, 'T1234')).rejects.toMatchObject({
        code: ErrorCode.BATCH_TYPE_MISMATCH,
        message: 'Tool T1234 cannot join a consumable_usage batch',
      });
    });

    it('should not let tool batches be selected up front', () => {
      expect(() => ctx.services.batches.createBatch(BatchType.CHECKOUT)).toThrow(
        'Tool batches take their type from the first scanned tool'
      );
    });

    it('should validate consumable quantities against the batch type', async () => {
      const usage = ctx.services.batches.createBatch(BatchType.CONSUMABLE_USAGE);

      await expect(ctx.services.batches.scan(usage.id, 'C0001')).rejects.toMatchObject({
        code: ErrorCode.VALIDATION_ERROR,
        statusCode: 400,
      });
      await expect(ctx.services.batches.scan(usage.id, 'C0001', 11)).rejects.toMatchObject({
        code: ErrorCode.INSUFFICIENT_QUANTITY,
        details: { requested: 11, available: 10 },
      });

      const line = await ctx.services.batches.scan(usage.id, 'C0001', 4);
      expect(line.quantity).toBe(4);

      // Restock has no stock ceiling
      const restock = ctx.services.batches.createBatch(BatchType.CONSUMABLE_RESTOCK);
      await expect(ctx.services.batches.scan(restock.id, 'C0001', 50)).resolves.toMatchObject({ quantity: 50 });
    });
  });

  // ==========================================================================
  // Submission
  // ==========================================================================
  describe('submit', () => {
    it('should report partial failure and keep the successful items', async () => {
      const { id } = ctx.services.batches.createBatch();
      await ctx.services.batches.scan(id, 'T1234');
      await ctx.services.batches.scan(id, 'T1235');
      await ctx.services.batches.scan(id, 'T1236');

      // Someone else takes the grinder before submission
      await ctx.services.transactions.performCheckout({ itemId: 'T1235', staffUid: 'W2', actingStaffUid: 'ADMIN1' });

      const report = await ctx.services.batches.submit(id, {
        actingStaffUid: 'ADMIN1',
        assignToStaffUid: 'W1',
      });

      expect(report).toMatchObject({ type: BatchType.CHECKOUT, status: 'partial', total: 3 });
      expect(report.batchId).toMatch(/^BATCH_[0-9a-f-]{36}$/);
      expect(report.succeeded.map((item) => item.uniqueId)).toEqual(['T1234', 'T1236']);
      expect(report.failed).toEqual([
        {
          itemId: TOOLS.grinder,
          uniqueId: 'T1235',
          code: ErrorCode.ALREADY_CHECKED_OUT,
          category: ErrorCategory.PRECONDITION_FAILED,
          message: 'Tool T1235 is already checked out',
        },
      ]);

      expect(await toolStatus(TOOLS.drill)).toBe(ToolStatus.CHECKED_OUT);
      expect(await toolStatus(TOOLS.wrench)).toBe(ToolStatus.CHECKED_OUT);
      expect((await ctx.store.get(docRef('tools', TOOLS.grinder)))?.data['currentHolderUid']).toBe(STAFF.w2);
      expect((await ctx.store.get(docRef('staff', STAFF.w1)))?.data['assignedItemIds']).toEqual([
        TOOLS.drill,
        TOOLS.wrench,
      ]);
    });

    it('should stamp every entry with the submission batch id', async () => {
      const { id } = ctx.services.batches.createBatch();
      await ctx.services.batches.scan(id, 'T1234');
      await ctx.services.batches.scan(id, 'T1235');

      const report = await ctx.services.batches.submit(id, { actingStaffUid: 'ADMIN1', assignToStaffUid: 'W1' });
      const entries = await ctx.services.globalHistory.getBatchEntries(report.batchId, today);

      expect(report.status).toBe('completed');
      expect(entries.map((entry) => entry.itemUniqueId)).toEqual(['T1235', 'T1234']);
      expect(entries.map((entry) => entry.id).sort()).toEqual(report.succeeded.map((item) => item.entryId).sort());
    });

    it('should reset to empty after submission, even when every item fails', async () => {
      const { id } = ctx.services.batches.createBatch();
      await ctx.services.batches.scan(id, 'T1234');
      await ctx.services.transactions.performCheckout({ itemId: 'T1234', staffUid: 'W2', actingStaffUid: 'ADMIN1' });

      const report = await ctx.services.batches.submit(id, { actingStaffUid: 'ADMIN1', assignToStaffUid: 'W1' });

      expect(report.status).toBe('failed');
      expect(ctx.services.batches.getBatch(id)).toMatchObject({ state: 'empty', items: [], submitting: false });
    });

    it('should check tools back in without an assignee', async () => {
      await ctx.services.transactions.performCheckout({ itemId: 'T1234', staffUid: 'W1', actingStaffUid: 'ADMIN1' });
      await ctx.services.transactions.performCheckout({ itemId: 'T1235', staffUid: 'W1', actingStaffUid: 'ADMIN1' });

      const { id } = ctx.services.batches.createBatch();
      await ctx.services.batches.scan(id, 'T1234');
      await ctx.services.batches.scan(id, 'T1235');
      expect(ctx.services.batches.getBatch(id).state).toBe(BatchType.CHECKIN);

      const report = await ctx.services.batches.submit(id, { actingStaffUid: 'ADMIN1' });

      expect(report).toMatchObject({ type: BatchType.CHECKIN, status: 'completed', total: 2 });
      expect(await toolStatus(TOOLS.drill)).toBe(ToolStatus.AVAILABLE);
      expect((await ctx.store.get(docRef('staff', STAFF.w1)))?.data['assignedItemIds']).toEqual([]);
    });

    it('should run usage and restock batches with the scanned quantities', async () => {
      const usage = ctx.services.batches.createBatch(BatchType.CONSUMABLE_USAGE);
      await ctx.services.batches.scan(usage.id, 'C0001', 4);
      await ctx.services.batches.scan(usage.id, 'C0002', 1);
      const usageReport = await ctx.services.batches.submit(usage.id, {
        actingStaffUid: 'ADMIN1',
        assignToStaffUid: 'W1',
      });

      const restock = ctx.services.batches.createBatch(BatchType.CONSUMABLE_RESTOCK);
      await ctx.services.batches.scan(restock.id, 'C0001', 20);
      const restockReport = await ctx.services.batches.submit(restock.id, { actingStaffUid: 'ADMIN1' });

      expect(usageReport.status).toBe('completed');
      expect(restockReport.status).toBe('completed');
      expect((await ctx.store.get(docRef('consumables', CONSUMABLES.ties)))?.data['currentQuantity']).toBe(26);
      expect((await ctx.store.get(docRef('consumables', CONSUMABLES.oil)))?.data['currentQuantity']).toBe(1.5);
    });

    it('should take a consumable type again once a submission has reset the batch', async () => {
      const { id } = ctx.services.batches.createBatch(BatchType.CONSUMABLE_USAGE);
      await ctx.services.batches.scan(id, 'C0001', 2);
      await ctx.services.batches.submit(id, { actingStaffUid: 'ADMIN1', assignToStaffUid: 'W1' });

      await expect(ctx.services.batches.scan(id, 'C0001', 5)).rejects.toMatchObject({
        code: ErrorCode.BATCH_TYPE_MISMATCH,
      });

      const selected = ctx.services.batches.selectType(id, BatchType.CONSUMABLE_RESTOCK);
      await ctx.services.batches.scan(id, 'C0001', 5);
      const report = await ctx.services.batches.submit(id, { actingStaffUid: 'ADMIN1' });

      expect(selected).toMatchObject({ state: BatchType.CONSUMABLE_RESTOCK, items: [] });
      expect(report).toMatchObject({ type: BatchType.CONSUMABLE_RESTOCK, status: 'completed' });
      expect((await ctx.store.get(docRef('consumables', CONSUMABLES.ties)))?.data['currentQuantity']).toBe(13);
    });

    it('should refuse an empty batch', async () => {
      const { id } = ctx.services.batches.createBatch();

      await expect(ctx.services.batches.submit(id, { actingStaffUid: 'ADMIN1' })).rejects.toMatchObject({
        code: ErrorCode.BATCH_EMPTY,
        statusCode: 422,
      });
    });

    it('should require an assignee for checkout batches and keep the items', async () => {
      const { id } = ctx.services.batches.createBatch();
      await ctx.services.batches.scan(id, 'T1234');

      await expect(ctx.services.batches.submit(id, { actingStaffUid: 'ADMIN1' })).rejects.toMatchObject({
        code: ErrorCode.VALIDATION_ERROR,
        message: 'assign_to_staff_uid is required for this batch',
      });
      expect(ctx.services.batches.getBatch(id).items).toHaveLength(1);
      expect(await toolStatus(TOOLS.drill)).toBe(ToolStatus.AVAILABLE);
    });

    it('should record unexpected engine errors as internal failures', async () => {
      vi.spyOn(ctx.services.transactions, 'performCheckout').mockRejectedValueOnce(new Error('socket hang up'));

      const { id } = ctx.services.batches.createBatch();
      await ctx.services.batches.scan(id, 'T1234');
      await ctx.services.batches.scan(id, 'T1235');

      const report = await ctx.services.batches.submit(id, { actingStaffUid: 'ADMIN1', assignToStaffUid: 'W1' });

      expect(report.status).toBe('partial');
      expect(report.failed).toEqual([
        {
          itemId: TOOLS.drill,
          uniqueId: 'T1234',
          code: ErrorCode.INTERNAL_ERROR,
          category: ErrorCategory.INTERNAL,
          message: 'socket hang up',
        },
      ]);
    });

    it('should lock the batch while it is being submitted', async () => {
      const gate = deferred();
      const engine = ctx.services.transactions;
      const performCheckout = engine.performCheckout.bind(engine);
      vi.spyOn(engine, 'performCheckout').mockImplementationOnce(async (input) => {
        await gate.promise;
        return performCheckout(input);
      });

      const { id } = ctx.services.batches.createBatch();
      await ctx.services.batches.scan(id, 'T1234');
      const submission = ctx.services.batches.submit(id, { actingStaffUid: 'ADMIN1', assignToStaffUid: 'W1' });

      await expect(ctx.services.batches.scan(id, 'T1235')).rejects.toMatchObject({
        code: ErrorCode.BATCH_SUBMITTING,
        statusCode: 409,
      });
      expect(() => ctx.services.batches.discard(id)).toThrow('Batch is being submitted');

      // Long-running submissions are never evicted
      clock.advance(31 * 60 * 1000);
      expect(ctx.services.batches.getBatch(id).submitting).toBe(true);

      gate.resolve();
      await expect(submission).resolves.toMatchObject({ status: 'completed' });
      expect(ctx.services.batches.getBatch(id).submitting).toBe(false);
    });
  });

  // ==========================================================================
  // Registry
  // ==========================================================================
  describe('registry', () => {
    it('should answer BATCH_NOT_FOUND for unknown ids', async () => {
      expect(() => ctx.services.batches.getBatch(UNKNOWN_BATCH)).toThrow(`Batch ${UNKNOWN_BATCH} not found`);
      await expect(ctx.services.batches.scan(UNKNOWN_BATCH, 'T1234')).rejects.toMatchObject({
        code: ErrorCode.BATCH_NOT_FOUND,
        statusCode: 404,
      });
    });

    it('should discard a batch and forget it', async () => {
      const { id } = ctx.services.batches.createBatch();
      await ctx.services.batches.scan(id, 'T1234');

      const cleared = ctx.services.batches.discard(id);

      expect(cleared).toMatchObject({ id, state: 'empty', items: [] });
      expect(ctx.services.batches.size).toBe(0);
      expect(() => ctx.services.batches.getBatch(id)).toThrow(`Batch ${id} not found`);
    });

    it('should evict batches idle past the timeout', async () => {
      const kept = ctx.services.batches.createBatch();
      const idle = ctx.services.batches.createBatch();

      clock.advance(20 * 60 * 1000);
      await ctx.services.batches.scan(kept.id, 'T1234');
      clock.advance(20 * 60 * 1000);

      expect(ctx.services.batches.getBatch(kept.id).items).toHaveLength(1);
      expect(() => ctx.services.batches.getBatch(idle.id)).toThrow(`Batch ${idle.id} not found`);
      expect(ctx.services.batches.size).toBe(1);
    });
  });
});
