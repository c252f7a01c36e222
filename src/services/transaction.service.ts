import { v4 as uuidv4 } from 'uuid';
import {
  TransactionConflictError,
  type DocumentStore,
  type TransactionContext,
  type TransactionOutcome,
} from '../repositories/document-store';
import { ItemRepository, itemDisplayName } from '../repositories/item.repository';
import { StaffRepository } from '../repositories/staff.repository';
import { ItemHistoryService } from './item-history.service';
import { GlobalHistoryService } from './global-history.service';
import { ItemKind, ToolStatus, type Consumable, type Item, type Tool } from '../types/item.types';
import type { Staff } from '../types/staff.types';
import {
  HistoryAction,
  type HistoryEntry,
  type HistoryMetadata,
  type QuantityChange,
} from '../types/history.types';
import { AppError, ErrorCode } from '../types/error.types';
import { errorMessage, logger } from '../config/logger';

export interface CheckoutInput {
  itemId: string;
  staffUid: string;
  actingStaffUid: string;
  notes?: string;
  batchId?: string;
}

export interface CheckinInput {
  itemId: string;
  actingStaffUid: string;
  notes?: string;
  batchId?: string;
}

export interface ConsumableUsageInput {
  itemId: string;
  quantity: number;
  staffUid: string;
  actingStaffUid: string;
  notes?: string;
  batchId?: string;
}

export interface ConsumableRestockInput {
  itemId: string;
  quantity: number;
  actingStaffUid: string;
  notes?: string;
  batchId?: string;
}

/**
 * Post-state of the item and the history entry describing the change
 */
export interface CustodyChange<T extends Item = Item> {
  item: T;
  entry: HistoryEntry;
}

interface EntryDraft {
  action: HistoryAction;
  item: Item;
  byStaffUid: string;
  assignedToStaffUid: string | null;
  notes?: string;
  batchId?: string;
  timestamp: Date;
  quantity: QuantityChange | null;
  metadata: HistoryMetadata;
}

// Avoids 0.1 + 0.2 drift on fractional stock (litres, metres)
const roundQuantity = (value: number): number => Math.round(value * 1e6) / 1e6;

/**
 * Transaction Service
 *
 * Custody changes run in two phases:
 *
 * 1. Atomic phase: one store transaction over exactly the item document and the
 *    staff document. The item is re-read inside the transaction, so a concurrent
 *    checkout is caught by the status check (or by the store's version check, which
 *    retries the whole callback). Instant-status fields are written here.
 * 2. Best-effort phase, only after the commit: append the history entry to the
 *    per-item ledger, then to the global ledger. Each append is wrapped on its own;
 *    a failure is logged and never rolls back or fails the operation.
 *
 * The item and staff documents are the source of truth for custody. The ledgers
 * may lag or miss an entry without affecting current state.
 */
export class TransactionService {
  constructor(
    private store: DocumentStore,
    private itemRepo: ItemRepository,
    private staffRepo: StaffRepository,
    private itemHistory: ItemHistoryService,
    private globalHistory: GlobalHistoryService
  ) {}

  /**
   * Check a tool out to a staff member
   *
   * Errors: ITEM_NOT_FOUND, STAFF_NOT_FOUND, STAFF_INACTIVE, ALREADY_CHECKED_OUT,
   * TRANSACTION_CONFLICT
   */
  async performCheckout(input: CheckoutInput): Promise<CustodyChange<Tool>> {
    logger.info('Checking out tool', input);

    const tool = await this.requireTool(input.itemId);
    const actor = await this.requireStaff(input.actingStaffUid);
    const assignee = await this.requireStaff(input.staffUid);

    const { value, committedAt } = await this.atomically(async (txn) => {
      const current = await this.itemRepo.getToolInTransaction(txn, tool.id);
      if (!current) {
        throw this.itemNotFound(input.itemId);
      }

      if (current.status !== ToolStatus.AVAILABLE) {
        throw new AppError(ErrorCode.ALREADY_CHECKED_OUT, `Tool ${current.uniqueId} is already checked out`, 409, {
          uniqueId: current.uniqueId,
          currentHolderUid: current.currentHolderUid,
        });
      }

      const staff = await this.staffRepo.getInTransaction(txn, assignee.uid);
      if (!staff) {
        throw this.staffNotFound(assignee.uid);
      }
      this.assertActive(staff);

      txn.update(this.itemRepo.ref(ItemKind.TOOL, current.id), {
        status: ToolStatus.CHECKED_OUT,
        currentHolderUid: staff.uid,
        ...this.itemRepo.assignmentPatch({
          toName: staff.fullName,
          toJobCode: staff.jobCode,
          byName: actor.fullName,
        }),
      });

      const assigned = staff.assignedItemIds.includes(current.id)
        ? staff.assignedItemIds
        : [...staff.assignedItemIds, current.id];
      this.staffRepo.setAssignedItems(txn, staff, assigned);

      return { tool: current, staff };
    });

    const item: Tool = {
      ...value.tool,
      status: ToolStatus.CHECKED_OUT,
      currentHolderUid: value.staff.uid,
      lastAssignedToName: value.staff.fullName,
      lastAssignedToJobCode: value.staff.jobCode,
      lastAssignedByName: actor.fullName,
      lastAssignedAt: committedAt,
      updatedAt: committedAt,
    };

    const entry = this.buildEntry({
      action: HistoryAction.CHECKOUT,
      item,
      byStaffUid: actor.uid,
      assignedToStaffUid: value.staff.uid,
      notes: input.notes,
      batchId: input.batchId,
      timestamp: committedAt,
      quantity: null,
      metadata: {
        staffName: value.staff.fullName,
        staffJobCode: value.staff.jobCode,
        adminName: actor.fullName,
      },
    });

    await this.writeHistory(entry);

    logger.info('Tool checked out', {
      itemId: item.id,
      uniqueId: item.uniqueId,
      staffUid: value.staff.uid,
      batchId: input.batchId,
    });

    return { item, entry };
  }

  /**
   * Return a checked-out tool
   *
   * Errors: ITEM_NOT_FOUND, STAFF_NOT_FOUND (acting staff), NOT_CHECKED_OUT,
   * TRANSACTION_CONFLICT
   */
  async performCheckin(input: CheckinInput): Promise<CustodyChange<Tool>> {
    logger.info('Checking in tool', input);

    const tool = await this.requireTool(input.itemId);
    const actor = await this.requireStaff(input.actingStaffUid);

    const { value, committedAt } = await this.atomically(async (txn) => {
      const current = await this.itemRepo.getToolInTransaction(txn, tool.id);
      if (!current) {
        throw this.itemNotFound(input.itemId);
      }

      if (current.status !== ToolStatus.CHECKED_OUT) {
        throw new AppError(ErrorCode.NOT_CHECKED_OUT, `Tool ${current.uniqueId} is not checked out`, 409, {
          uniqueId: current.uniqueId,
        });
      }

      // The holder record may have been removed since checkout
      const holder = current.currentHolderUid
        ? await this.staffRepo.getInTransaction(txn, current.currentHolderUid)
        : null;
      const returnedByName = holder?.fullName ?? actor.fullName;

      txn.update(this.itemRepo.ref(ItemKind.TOOL, current.id), {
        status: ToolStatus.AVAILABLE,
        currentHolderUid: null,
        ...this.itemRepo.checkinPatch(returnedByName),
      });

      if (holder) {
        this.staffRepo.setAssignedItems(
          txn,
          holder,
          holder.assignedItemIds.filter((id) => id !== current.id)
        );
      } else if (current.currentHolderUid) {
        logger.warn('Holder record missing at checkin', {
          itemId: current.id,
          holderUid: current.currentHolderUid,
        });
      }

      return { tool: current, holder, returnedByName };
    });

    const item: Tool = {
      ...value.tool,
      status: ToolStatus.AVAILABLE,
      currentHolderUid: null,
      lastCheckinAt: committedAt,
      lastCheckinByName: value.returnedByName,
      updatedAt: committedAt,
    };

    const entry = this.buildEntry({
      action: HistoryAction.CHECKIN,
      item,
      byStaffUid: actor.uid,
      assignedToStaffUid: value.holder?.uid ?? value.tool.currentHolderUid,
      notes: input.notes,
      batchId: input.batchId,
      timestamp: committedAt,
      quantity: null,
      metadata: {
        staffName: value.returnedByName,
        ...(value.holder ? { staffJobCode: value.holder.jobCode } : {}),
        adminName: actor.fullName,
      },
    });

    await this.writeHistory(entry);

    logger.info('Tool checked in', {
      itemId: item.id,
      uniqueId: item.uniqueId,
      previousHolderUid: value.tool.currentHolderUid,
      batchId: input.batchId,
    });

    return { item, entry };
  }

  /**
   * Take stock out of a consumable for a staff member
   *
   * Errors: ITEM_NOT_FOUND, STAFF_NOT_FOUND, STAFF_INACTIVE, INSUFFICIENT_QUANTITY,
   * VALIDATION_ERROR, TRANSACTION_CONFLICT
   */
  async recordUsage(input: ConsumableUsageInput): Promise<CustodyChange<Consumable>> {
    logger.info('Recording consumable usage', input);

    this.assertQuantity(input.quantity);
    const consumable = await this.requireConsumable(input.itemId);
    const actor = await this.requireStaff(input.actingStaffUid);
    const assignee = await this.requireStaff(input.staffUid);
    this.assertActive(assignee);

    const { value, committedAt } = await this.atomically(async (txn) => {
      const current = await this.itemRepo.getConsumableInTransaction(txn, consumable.id);
      if (!current) {
        throw this.itemNotFound(input.itemId);
      }

      if (current.currentQuantity < input.quantity) {
        throw new AppError(
          ErrorCode.INSUFFICIENT_QUANTITY,
          `Cannot use ${input.quantity} ${current.unit} of ${current.uniqueId}. Only ${current.currentQuantity} available.`,
          409,
          { requested: input.quantity, available: current.currentQuantity }
        );
      }

      const after = roundQuantity(current.currentQuantity - input.quantity);

      txn.update(this.itemRepo.ref(ItemKind.CONSUMABLE, current.id), {
        currentQuantity: after,
        ...this.itemRepo.assignmentPatch({
          toName: assignee.fullName,
          toJobCode: assignee.jobCode,
          byName: actor.fullName,
        }),
      });

      return { consumable: current, after };
    });

    const item: Consumable = {
      ...value.consumable,
      currentQuantity: value.after,
      lastAssignedToName: assignee.fullName,
      lastAssignedToJobCode: assignee.jobCode,
      lastAssignedByName: actor.fullName,
      lastAssignedAt: committedAt,
      updatedAt: committedAt,
    };

    const entry = this.buildEntry({
      action: HistoryAction.USAGE,
      item,
      byStaffUid: actor.uid,
      assignedToStaffUid: assignee.uid,
      notes: input.notes,
      batchId: input.batchId,
      timestamp: committedAt,
      quantity: { before: value.consumable.currentQuantity, change: -input.quantity, after: value.after },
      metadata: {
        staffName: assignee.fullName,
        staffJobCode: assignee.jobCode,
        adminName: actor.fullName,
      },
    });

    await this.writeHistory(entry);

    logger.info('Consumable usage recorded', {
      itemId: item.id,
      uniqueId: item.uniqueId,
      quantity: input.quantity,
      remaining: value.after,
    });

    return { item, entry };
  }

  /**
   * Put stock back into a consumable
   *
   * Errors: ITEM_NOT_FOUND, STAFF_NOT_FOUND, VALIDATION_ERROR, TRANSACTION_CONFLICT
   */
  async recordRestock(input: ConsumableRestockInput): Promise<CustodyChange<Consumable>> {
    logger.info('Recording consumable restock', input);

    this.assertQuantity(input.quantity);
    const consumable = await this.requireConsumable(input.itemId);
    const actor = await this.requireStaff(input.actingStaffUid);

    const { value, committedAt } = await this.atomically(async (txn) => {
      const current = await this.itemRepo.getConsumableInTransaction(txn, consumable.id);
      if (!current) {
        throw this.itemNotFound(input.itemId);
      }

      const after = roundQuantity(current.currentQuantity + input.quantity);

      txn.update(this.itemRepo.ref(ItemKind.CONSUMABLE, current.id), {
        currentQuantity: after,
        ...this.itemRepo.checkinPatch(actor.fullName),
      });

      return { consumable: current, after };
    });

    const item: Consumable = {
      ...value.consumable,
      currentQuantity: value.after,
      lastCheckinAt: committedAt,
      lastCheckinByName: actor.fullName,
      updatedAt: committedAt,
    };

    const entry = this.buildEntry({
      action: HistoryAction.RESTOCK,
      item,
      byStaffUid: actor.uid,
      assignedToStaffUid: null,
      notes: input.notes,
      batchId: input.batchId,
      timestamp: committedAt,
      quantity: { before: value.consumable.currentQuantity, change: input.quantity, after: value.after },
      metadata: { adminName: actor.fullName },
    });

    await this.writeHistory(entry);

    logger.info('Consumable restocked', {
      itemId: item.id,
      uniqueId: item.uniqueId,
      quantity: input.quantity,
      remaining: value.after,
    });

    return { item, entry };
  }

  /**
   * Run the atomic phase; retry exhaustion becomes TRANSACTION_CONFLICT
   *
   * No abort signal is accepted: once started, the commit runs to completion even
   * if the caller has gone away.
   */
  private async atomically<T>(fn: (txn: TransactionContext) => Promise<T>): Promise<TransactionOutcome<T>> {
    try {
      return await this.store.runTransaction(fn);
    } catch (error) {
      if (error instanceof TransactionConflictError) {
        logger.warn('Transaction retries exhausted', { attempts: error.attempts });
        throw new AppError(
          ErrorCode.TRANSACTION_CONFLICT,
          'The item was modified concurrently; please retry',
          409,
          { attempts: error.attempts, retryable: true }
        );
      }
      throw error;
    }
  }

  /**
   * Best-effort ledger writes; failures are logged and swallowed
   */
  private async writeHistory(entry: HistoryEntry): Promise<void> {
    try {
      await this.itemHistory.record(entry);
    } catch (error) {
      this.logLedgerFailure('item', entry, error);
    }

    try {
      await this.globalHistory.record(entry);
    } catch (error) {
      this.logLedgerFailure('global', entry, error);
    }
  }

  private logLedgerFailure(ledger: 'item' | 'global', entry: HistoryEntry, error: unknown): void {
    logger.warn('History ledger write failed', {
      code: ErrorCode.LEDGER_WRITE_FAILED,
      ledger,
      entryId: entry.id,
      itemId: entry.itemId,
      action: entry.action,
      error: errorMessage(error),
    });
  }

  private buildEntry(draft: EntryDraft): HistoryEntry {
    const { item } = draft;

    return {
      id: uuidv4(),
      action: draft.action,
      itemId: item.id,
      itemUniqueId: item.uniqueId,
      itemKind: item.kind,
      byStaffUid: draft.byStaffUid,
      assignedToStaffUid: draft.assignedToStaffUid,
      batchId: draft.batchId ?? null,
      notes: draft.notes ?? null,
      timestamp: draft.timestamp,
      quantity: draft.quantity,
      metadata: {
        ...draft.metadata,
        itemName: itemDisplayName(item),
        ...(item.brand ? { itemBrand: item.brand } : {}),
        ...(item.kind === ItemKind.TOOL && item.model ? { itemModel: item.model } : {}),
      },
    };
  }

  private async requireTool(reference: string): Promise<Tool> {
    const item = await this.itemRepo.resolve(reference, ItemKind.TOOL);
    if (!item || item.kind !== ItemKind.TOOL) {
      throw this.itemNotFound(reference);
    }
    return item;
  }

  private async requireConsumable(reference: string): Promise<Consumable> {
    const item = await this.itemRepo.resolve(reference, ItemKind.CONSUMABLE);
    if (!item || item.kind !== ItemKind.CONSUMABLE) {
      throw this.itemNotFound(reference);
    }
    return item;
  }

  private async requireStaff(reference: string): Promise<Staff> {
    const staff = await this.staffRepo.resolve(reference);
    if (!staff) {
      throw this.staffNotFound(reference);
    }
    return staff;
  }

  private assertActive(staff: Staff): void {
    if (!staff.isActive) {
      throw new AppError(ErrorCode.STAFF_INACTIVE, `Staff member ${staff.jobCode} is not active`, 409, {
        staffUid: staff.uid,
      });
    }
  }

  private assertQuantity(quantity: number): void {
    if (!Number.isFinite(quantity) || quantity <= 0) {
      throw new AppError(ErrorCode.VALIDATION_ERROR, 'Quantity must be a positive number', 400, { quantity });
    }
  }

  private itemNotFound(reference: string): AppError {
    return new AppError(ErrorCode.ITEM_NOT_FOUND, `Item ${reference} not found`, 404);
  }

  private staffNotFound(reference: string): AppError {
    return new AppError(ErrorCode.STAFF_NOT_FOUND, `Staff member ${reference} not found`, 404);
  }
}
