import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { docRef, FieldValue, TransactionConflictError } from '../src/repositories/document-store';
import { ItemHistoryService } from '../src/services/item-history.service';
import { GlobalHistoryService } from '../src/services/global-history.service';
import { HistoryAction } from '../src/types/history.types';
import { ItemKind, ToolStatus } from '../src/types/item.types';
import { ErrorCategory, ErrorCode } from '../src/types/error.types';
import { CONSUMABLES, createTestContext, ManualClock, STAFF, TOOLS, type TestContext } from './helpers/context';

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

const october = {
  startDate: new Date('2025-10-01T00:00:00.000Z'),
  endDate: new Date('2025-10-31T23:59:59.999Z'),
};

async function assignedItemIds(ctx: TestContext, uid: string): Promise<unknown> {
  return (await ctx.store.get(docRef('staff', uid)))?.data['assignedItemIds'];
}

describe('TransactionService', () => {
  let clock: ManualClock;
  let ctx: TestContext;

  beforeEach(async () => {
    clock = new ManualClock('2025-10-20T08:00:00.000Z');
    ctx = await createTestContext({ clock: clock.now });
    clock.set('2025-10-20T09:00:00.000Z');
  });

  afterEach(() => {
    ctx.services.cache.stop();
    vi.restoreAllMocks();
  });

  // ==========================================================================
  // Checkout / checkin
  // ==========================================================================
  describe('performCheckout', () => {
    it('should check out T1234 to W1 and fill the instant-status fields', async () => {
      const { item, entry } = await ctx.services.transactions.performCheckout({
        itemId: 'T1234',
        staffUid: 'W1',
        actingStaffUid: 'ADMIN1',
      });

      expect(item).toMatchObject({
        id: TOOLS.drill,
        status: ToolStatus.CHECKED_OUT,
        currentHolderUid: STAFF.w1,
        lastAssignedToName: 'Walt Worker',
        lastAssignedToJobCode: 'W1',
        lastAssignedByName: 'Ada Admin',
        lastAssignedAt: new Date('2025-10-20T09:00:00.000Z'),
      });

      expect(entry).toMatchObject({
        action: HistoryAction.CHECKOUT,
        itemId: TOOLS.drill,
        itemUniqueId: 'T1234',
        itemKind: ItemKind.TOOL,
        byStaffUid: STAFF.admin,
        assignedToStaffUid: STAFF.w1,
        batchId: null,
        notes: null,
        quantity: null,
        timestamp: new Date('2025-10-20T09:00:00.000Z'),
        metadata: {
          staffName: 'Walt Worker',
          staffJobCode: 'W1',
          adminName: 'Ada Admin',
          itemName: 'Acme HD-1 Hammer Drill',
          itemBrand: 'Acme',
          itemModel: 'HD-1',
        },
      });
      expect(entry.id).toMatch(UUID_PATTERN);
    });

    it('should persist the item and the staff assignment together', async () => {
      await ctx.services.transactions.performCheckout({
        itemId: TOOLS.drill,
        staffUid: STAFF.w1,
        actingStaffUid: STAFF.admin,
      });

      const tool = await ctx.store.get(docRef('tools', TOOLS.drill));
      expect(tool?.data).toMatchObject({
        status: 'checked_out',
        currentHolderUid: STAFF.w1,
        lastAssignedAt: '2025-10-20T09:00:00.000Z',
        updatedAt: '2025-10-20T09:00:00.000Z',
      });
      expect(await assignedItemIds(ctx, STAFF.w1)).toEqual([TOOLS.drill]);
    });

    it('should accept a scanned QR payload', async () => {
      const { item } = await ctx.services.transactions.performCheckout({
        itemId: 'TOOL#T1235',
        staffUid: 'W2',
        actingStaffUid: 'ADMIN1',
      });

      expect(item.id).toBe(TOOLS.grinder);
    });

    it('should reject a second checkout without touching anything', async () => {
      await ctx.services.transactions.performCheckout({ itemId: 'T1234', staffUid: 'W1', actingStaffUid: 'ADMIN1' });
      const before = await ctx.store.get(docRef('tools', TOOLS.drill));

      const retry = ctx.services.transactions.performCheckout({
        itemId: 'T1234',
        staffUid: 'W2',
        actingStaffUid: 'ADMIN1',
      });

      await expect(retry).rejects.toMatchObject({
        code: ErrorCode.ALREADY_CHECKED_OUT,
        category: ErrorCategory.PRECONDITION_FAILED,
        statusCode: 409,
      });
      expect(await ctx.store.get(docRef('tools', TOOLS.drill))).toEqual(before);
      expect(await assignedItemIds(ctx, STAFF.w2)).toEqual([]);
    });

    it('should reject unknown items and staff', async () => {
      await expect(
        ctx.services.transactions.performCheckout({ itemId: 'T9999', staffUid: 'W1', actingStaffUid: 'ADMIN1' })
      ).rejects.toMatchObject({ code: ErrorCode.ITEM_NOT_FOUND, statusCode: 404 });

      await expect(
        ctx.services.transactions.performCheckout({ itemId: 'T1234', staffUid: 'W404', actingStaffUid: 'ADMIN1' })
      ).rejects.toMatchObject({ code: ErrorCode.STAFF_NOT_FOUND });

      await expect(
        ctx.services.transactions.performCheckout({ itemId: 'T1234', staffUid: 'W1', actingStaffUid: 'NOBODY' })
      ).rejects.toMatchObject({ code: ErrorCode.STAFF_NOT_FOUND });
    });

    it('should not treat a consumable as a tool', async () => {
      await expect(
        ctx.services.transactions.performCheckout({ itemId: 'C0001', staffUid: 'W1', actingStaffUid: 'ADMIN1' })
      ).rejects.toMatchObject({ code: ErrorCode.ITEM_NOT_FOUND });
    });

    it('should refuse inactive staff and leave the tool available', async () => {
      await expect(
        ctx.services.transactions.performCheckout({ itemId: 'T1234', staffUid: 'R9', actingStaffUid: 'ADMIN1' })
      ).rejects.toMatchObject({ code: ErrorCode.STAFF_INACTIVE, category: ErrorCategory.PRECONDITION_FAILED });

      expect((await ctx.store.get(docRef('tools', TOOLS.drill)))?.data['status']).toBe('available');
    });

    it('should let exactly one of two concurrent checkouts win', async () => {
      const results = await Promise.allSettled([
        ctx.services.transactions.performCheckout({ itemId: 'T1234', staffUid: 'W1', actingStaffUid: 'ADMIN1' }),
        ctx.services.transactions.performCheckout({ itemId: 'T1234', staffUid: 'W2', actingStaffUid: 'ADMIN1' }),
      ]);

      const fulfilled = results.filter((result) => result.status === 'fulfilled');
      const rejected = results.filter((result) => result.status === 'rejected');
      expect(fulfilled).toHaveLength(1);
      expect(rejected).toHaveLength(1);
      expect(rejected[0]).toMatchObject({ reason: { code: ErrorCode.ALREADY_CHECKED_OUT } });

      const holder = (await ctx.store.get(docRef('tools', TOOLS.drill)))?.data['currentHolderUid'];
      const loser = holder === STAFF.w1 ? STAFF.w2 : STAFF.w1;
      expect([STAFF.w1, STAFF.w2]).toContain(holder);
      expect(await assignedItemIds(ctx, loser)).toEqual([]);
    });

    it('should surface exhausted retries as a retryable conflict', async () => {
      vi.spyOn(ctx.store, 'runTransaction').mockRejectedValueOnce(new TransactionConflictError(5));

      const attempt = ctx.services.transactions.performCheckout({
        itemId: 'T1234',
        staffUid: 'W1',
        actingStaffUid: 'ADMIN1',
      });

      await expect(attempt).rejects.toMatchObject({
        code: ErrorCode.TRANSACTION_CONFLICT,
        category: ErrorCategory.TRANSACTION_CONFLICT,
        statusCode: 409,
        retryable: true,
        details: { attempts: 5, retryable: true },
      });
    });
  });

  describe('performCheckin', () => {
    it('should return the tool and record who brought it back', async () => {
      const checkout = await ctx.services.transactions.performCheckout({
        itemId: 'T1234',
        staffUid: 'W1',
        actingStaffUid: 'ADMIN1',
      });
      clock.set('2025-10-20T10:00:00.000Z');

      const { item, entry } = await ctx.services.transactions.performCheckin({
        itemId: 'T1234',
        actingStaffUid: 'ADMIN1',
        notes: 'Returned with dull bit',
      });

      expect(item).toMatchObject({
        status: ToolStatus.AVAILABLE,
        currentHolderUid: null,
        lastCheckinAt: new Date('2025-10-20T10:00:00.000Z'),
        lastCheckinByName: 'Walt Worker',
        lastAssignedToName: 'Walt Worker',
      });
      expect(entry).toMatchObject({
        action: HistoryAction.CHECKIN,
        byStaffUid: STAFF.admin,
        assignedToStaffUid: STAFF.w1,
        notes: 'Returned with dull bit',
        metadata: { staffName: 'Walt Worker', staffJobCode: 'W1', adminName: 'Ada Admin' },
      });
      expect(entry.timestamp.getTime()).toBeGreaterThanOrEqual(checkout.entry.timestamp.getTime());
      expect(await assignedItemIds(ctx, STAFF.w1)).toEqual([]);
    });

    it('should append exactly one checkin entry after the checkout', async () => {
      await ctx.services.transactions.performCheckout({ itemId: 'T1234', staffUid: 'W1', actingStaffUid: 'ADMIN1' });
      await ctx.services.transactions.performCheckin({ itemId: 'T1234', actingStaffUid: 'ADMIN1' });

      const history = await ctx.services.items.getItemHistory('T1234', october);

      expect(history.map((entry) => entry.action)).toEqual([HistoryAction.CHECKIN, HistoryAction.CHECKOUT]);
    });

    it('should reject a tool that is not checked out', async () => {
      await expect(
        ctx.services.transactions.performCheckin({ itemId: 'T1234', actingStaffUid: 'ADMIN1' })
      ).rejects.toMatchObject({ code: ErrorCode.NOT_CHECKED_OUT, category: ErrorCategory.PRECONDITION_FAILED });
    });

    it('should fall back to the acting staff name when the holder record is gone', async () => {
      await ctx.store.set(
        docRef('tools', TOOLS.wrench),
        { status: 'checked_out', currentHolderUid: 'staff-departed', updatedAt: FieldValue.serverTimestamp() },
        { merge: true }
      );

      const { item, entry } = await ctx.services.transactions.performCheckin({
        itemId: 'T1236',
        actingStaffUid: 'ADMIN1',
      });

      expect(item.lastCheckinByName).toBe('Ada Admin');
      expect(entry.assignedToStaffUid).toBe('staff-departed');
      expect(entry.metadata).toEqual({ staffName: 'Ada Admin', adminName: 'Ada Admin', itemName: 'Torque Wrench' });
    });
  });

  // ==========================================================================
  // History across partitions
  // ==========================================================================
  it('should return every alternating operation across month partitions, newest first', async () => {
    // Commit times never run backwards, so this history starts from a store seeded in August
    const summer = new ManualClock('2025-08-01T00:00:00.000Z');
    const { store, services } = await createTestContext({ clock: summer.now });
    const times = [
      '2025-08-30T10:00:00.000Z',
      '2025-09-02T10:00:00.000Z',
      '2025-09-15T10:00:00.000Z',
      '2025-10-01T10:00:00.000Z',
      '2025-10-02T10:00:00.000Z',
      '2025-10-03T10:00:00.000Z',
    ];

    for (const [index, time] of times.entries()) {
      summer.set(time);
      if (index % 2 === 0) {
        await services.transactions.performCheckout({ itemId: 'T1234', staffUid: 'W1', actingStaffUid: 'ADMIN1' });
      } else {
        await services.transactions.performCheckin({ itemId: 'T1234', actingStaffUid: 'ADMIN1' });
      }
    }

    const history = await services.items.getItemHistory('T1234', {
      startDate: new Date('2025-08-01T00:00:00.000Z'),
      endDate: new Date('2025-10-31T00:00:00.000Z'),
    });

    expect(history).toHaveLength(6);
    expect(history.map((entry) => entry.timestamp.toISOString())).toEqual([...times].reverse());
    expect(history[0]?.action).toBe(HistoryAction.CHECKIN);
    expect(await store.get(docRef(`tools/${TOOLS.drill}/history`, '09-2025'))).not.toBeNull();
  });

  // ==========================================================================
  // Best-effort ledgers
  // ==========================================================================
  describe('ledger failures', () => {
    it('should still succeed when the per-item ledger write throws', async () => {
      vi.spyOn(ItemHistoryService.prototype, 'appendEntry').mockRejectedValueOnce(new Error('bucket unavailable'));

      const { item } = await ctx.services.transactions.performCheckout({
        itemId: 'T1234',
        staffUid: 'W1',
        actingStaffUid: 'ADMIN1',
      });

      expect(item.status).toBe(ToolStatus.CHECKED_OUT);
      expect(await ctx.services.items.getItemHistory('T1234', october)).toEqual([]);

      const global = await ctx.services.globalHistory.query({ ...october, limit: 10 });
      expect(global).toHaveLength(1);
    });

    it('should still succeed when both ledgers fail', async () => {
      vi.spyOn(ItemHistoryService.prototype, 'appendEntry').mockRejectedValue(new Error('item ledger down'));
      vi.spyOn(GlobalHistoryService.prototype, 'appendEntry').mockRejectedValue(new Error('global ledger down'));

      await ctx.services.transactions.performCheckout({ itemId: 'T1234', staffUid: 'W1', actingStaffUid: 'ADMIN1' });
      const { item } = await ctx.services.transactions.performCheckin({ itemId: 'T1234', actingStaffUid: 'ADMIN1' });

      expect(item.status).toBe(ToolStatus.AVAILABLE);
      expect((await ctx.store.get(docRef('tools', TOOLS.drill)))?.data['status']).toBe('available');
    });
  });

  // ==========================================================================
  // Status reads
  // ==========================================================================
  it('should serve the post-checkout status from the cache without store reads', async () => {
    await ctx.services.cache.start();
    await ctx.services.transactions.performCheckout({ itemId: 'T1234', staffUid: 'W1', actingStaffUid: 'ADMIN1' });

    const getSpy = vi.spyOn(ctx.store, 'get');
    const listSpy = vi.spyOn(ctx.store, 'list');
    const findSpy = vi.spyOn(ctx.store, 'findByField');

    const item = await ctx.services.items.getItemStatus('T1234');

    expect(item).toMatchObject({
      status: ToolStatus.CHECKED_OUT,
      currentHolderUid: STAFF.w1,
      lastAssignedToName: 'Walt Worker',
      lastAssignedAt: new Date('2025-10-20T09:00:00.000Z'),
    });
    expect(getSpy).not.toHaveBeenCalled();
    expect(listSpy).not.toHaveBeenCalled();
    expect(findSpy).not.toHaveBeenCalled();
  });

  // ==========================================================================
  // Consumables
  // ==========================================================================
  describe('recordUsage', () => {
    it('should take stock out and record the quantity change', async () => {
      const { item, entry } = await ctx.services.transactions.recordUsage({
        itemId: 'C0001',
        quantity: 3,
        staffUid: 'W1',
        actingStaffUid: 'ADMIN1',
      });

      expect(item).toMatchObject({
        id: CONSUMABLES.ties,
        currentQuantity: 7,
        lastAssignedToName: 'Walt Worker',
        lastAssignedByName: 'Ada Admin',
        lastAssignedAt: new Date('2025-10-20T09:00:00.000Z'),
      });
      expect(entry).toMatchObject({
        action: HistoryAction.USAGE,
        itemKind: ItemKind.CONSUMABLE,
        assignedToStaffUid: STAFF.w1,
        quantity: { before: 10, change: -3, after: 7 },
      });
      expect((await ctx.store.get(docRef('consumables', CONSUMABLES.ties)))?.data['currentQuantity']).toBe(7);
    });

    it('should refuse more than is in stock and leave the quantity alone', async () => {
      await expect(
        ctx.services.transactions.recordUsage({ itemId: 'C0001', quantity: 11, staffUid: 'W1', actingStaffUid: 'ADMIN1' })
      ).rejects.toMatchObject({
        code: ErrorCode.INSUFFICIENT_QUANTITY,
        category: ErrorCategory.PRECONDITION_FAILED,
        details: { requested: 11, available: 10 },
      });

      expect((await ctx.store.get(docRef('consumables', CONSUMABLES.ties)))?.data['currentQuantity']).toBe(10);
    });

    it('should reject non-positive quantities', async () => {
      await expect(
        ctx.services.transactions.recordUsage({ itemId: 'C0001', quantity: 0, staffUid: 'W1', actingStaffUid: 'ADMIN1' })
      ).rejects.toMatchObject({ code: ErrorCode.VALIDATION_ERROR, statusCode: 400 });
    });

    it('should refuse inactive staff', async () => {
      await expect(
        ctx.services.transactions.recordUsage({ itemId: 'C0001', quantity: 1, staffUid: 'R9', actingStaffUid: 'ADMIN1' })
      ).rejects.toMatchObject({ code: ErrorCode.STAFF_INACTIVE });
    });
  });

  describe('recordRestock', () => {
    it('should add stock without floating point drift', async () => {
      const { item, entry } = await ctx.services.transactions.recordRestock({
        itemId: 'CONSUMABLE#C0002',
        quantity: 0.1,
        actingStaffUid: 'ADMIN1',
      });

      expect(item).toMatchObject({
        currentQuantity: 2.6,
        lastCheckinByName: 'Ada Admin',
        lastCheckinAt: new Date('2025-10-20T09:00:00.000Z'),
      });
      expect(entry).toMatchObject({
        action: HistoryAction.RESTOCK,
        assignedToStaffUid: null,
        quantity: { before: 2.5, change: 0.1, after: 2.6 },
        metadata: { adminName: 'Ada Admin', itemName: 'Cutting Oil' },
      });
    });

    it('should not restock a tool', async () => {
      await expect(
        ctx.services.transactions.recordRestock({ itemId: 'T1234', quantity: 1, actingStaffUid: 'ADMIN1' })
      ).rejects.toMatchObject({ code: ErrorCode.ITEM_NOT_FOUND });
    });
  });
});
