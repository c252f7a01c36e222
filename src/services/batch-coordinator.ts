import { v4 as uuidv4 } from 'uuid';
import { ItemRepository } from '../repositories/item.repository';
import { TransactionService, type CustodyChange } from './transaction.service';
import { ItemKind, ToolStatus, type Item } from '../types/item.types';
import {
  BatchType,
  type BatchItemFailure,
  type BatchItemSuccess,
  type BatchLine,
  type BatchReport,
  type BatchSnapshot,
  type BatchState,
  type SubmitBatchInput,
} from '../types/batch.types';
import { AppError, ErrorCategory, ErrorCode } from '../types/error.types';
import { errorMessage, logger } from '../config/logger';

const CONSUMABLE_TYPES: ReadonlySet<BatchState> = new Set<BatchState>([
  BatchType.CONSUMABLE_USAGE,
  BatchType.CONSUMABLE_RESTOCK,
]);

export function isConsumableBatch(state: BatchState): boolean {
  return CONSUMABLE_TYPES.has(state);
}

/**
 * Batch Coordinator
 *
 * Groups scanned items into one homogeneous operation. The first tool scanned fixes
 * the type (checkout for an available tool, checkin for a checked-out one); consumable
 * batches are selected explicitly. A rejected scan changes nothing.
 *
 * Submission runs the transaction engine once per item, in scan order, under a single
 * batch id. One item failing does not stop the others; the report lists both.
 */
export class BatchCoordinator {
  private state: BatchState = 'empty';
  private lines: BatchLine[] = [];
  private submitting = false;
  private updatedAt: Date;

  constructor(
    readonly id: string,
    private itemRepo: ItemRepository,
    private engine: TransactionService,
    private clock: () => Date = () => new Date()
  ) {
    this.updatedAt = this.clock();
  }

  get lastActivityAt(): Date {
    return this.updatedAt;
  }

  get isSubmitting(): boolean {
    return this.submitting;
  }

  /**
   * Choose a consumable batch type before the first scan
   */
  selectType(type: BatchType): void {
    this.assertNotSubmitting();

    if (!isConsumableBatch(type)) {
      throw new AppError(
        ErrorCode.VALIDATION_ERROR,
        'Tool batches take their type from the first scanned tool',
        400,
        { type }
      );
    }

    if (this.state !== 'empty' && this.state !== type) {
      throw new AppError(ErrorCode.BATCH_TYPE_MISMATCH, `Batch is already a ${this.state} batch`, 422, {
        batchType: this.state,
        requested: type,
      });
    }

    this.state = type;
    this.touch();
  }

  /**
   * Add a scanned item to the batch
   *
   * Errors: ITEM_NOT_FOUND, ALREADY_IN_BATCH, BATCH_TYPE_MISMATCH, VALIDATION_ERROR,
   * INSUFFICIENT_QUANTITY, BATCH_SUBMITTING
   */
  async scan(reference: string, quantity?: number): Promise<BatchLine> {
    this.assertNotSubmitting();

    const item = await this.itemRepo.resolve(reference);
    if (!item) {
      throw new AppError(ErrorCode.ITEM_NOT_FOUND, `Item ${reference} not found`, 404);
    }

    // State may have moved while the item was loading
    this.assertNotSubmitting();

    if (this.lines.some((line) => line.itemId === item.id)) {
      throw new AppError(ErrorCode.ALREADY_IN_BATCH, `${item.uniqueId} is already in this batch`, 422, {
        uniqueId: item.uniqueId,
      });
    }

    const type = this.typeFor(item);
    const line: BatchLine = {
      itemId: item.id,
      uniqueId: item.uniqueId,
      kind: item.kind,
      quantity: item.kind === ItemKind.CONSUMABLE ? this.consumableQuantity(item.currentQuantity, type, quantity) : null,
    };

    this.state = type;
    this.lines.push(line);
    this.touch();

    logger.debug('Item added to batch', { batchId: this.id, uniqueId: item.uniqueId, type });

    return { ...line };
  }

  /**
   * Run the engine for every item, then reset the batch to empty
   */
  async submit(input: SubmitBatchInput): Promise<BatchReport> {
    this.assertNotSubmitting();

    const type = this.state;
    if (type === 'empty' || this.lines.length === 0) {
      throw new AppError(ErrorCode.BATCH_EMPTY, 'Batch has no items to submit', 422);
    }

    if (type === BatchType.CHECKOUT || type === BatchType.CONSUMABLE_USAGE) {
      this.requireAssignee(input);
    }

    const batchId = `BATCH_${uuidv4()}`;
    const lines = [...this.lines];
    const succeeded: BatchItemSuccess[] = [];
    const failed: BatchItemFailure[] = [];

    logger.info('Submitting batch', { batchId, type, total: lines.length });

    this.submitting = true;
    try {
      for (const line of lines) {
        try {
          const change = await this.runLine(type, line, input, batchId);
          succeeded.push({ itemId: line.itemId, uniqueId: line.uniqueId, entryId: change.entry.id });
        } catch (error) {
          failed.push(this.toFailure(batchId, line, error));
        }
      }
    } finally {
      this.submitting = false;
      this.reset();
    }

    const status = failed.length === 0 ? 'completed' : succeeded.length === 0 ? 'failed' : 'partial';

    logger.info('Batch submitted', {
      batchId,
      type,
      status,
      succeeded: succeeded.length,
      failed: failed.length,
    });

    return { batchId, type, status, total: lines.length, succeeded, failed };
  }

  clear(): void {
    this.assertNotSubmitting();
    this.reset();
  }

  snapshot(): BatchSnapshot {
    return {
      id: this.id,
      state: this.state,
      items: this.lines.map((line) => ({ ...line })),
      submitting: this.submitting,
      updatedAt: this.updatedAt,
    };
  }

  private typeFor(item: Item): BatchType {
    if (item.kind === ItemKind.TOOL) {
      const inferred = item.status === ToolStatus.AVAILABLE ? BatchType.CHECKOUT : BatchType.CHECKIN;

      if (this.state === 'empty' || this.state === inferred) {
        return inferred;
      }

      throw new AppError(
        ErrorCode.BATCH_TYPE_MISMATCH,
        isConsumableBatch(this.state)
          ? `Tool ${item.uniqueId} cannot join a ${this.state} batch`
          : `Tool ${item.uniqueId} is ${item.status}; this batch is for ${this.state}`,
        422,
        { batchType: this.state, uniqueId: item.uniqueId, status: item.status }
      );
    }

    if (this.state === BatchType.CONSUMABLE_USAGE || this.state === BatchType.CONSUMABLE_RESTOCK) {
      return this.state;
    }

    throw new AppError(
      ErrorCode.BATCH_TYPE_MISMATCH,
      this.state === 'empty'
        ? 'Select usage or restock before scanning consumables'
        : `Consumable ${item.uniqueId} cannot join a ${this.state} batch`,
      422,
      { batchType: this.state, uniqueId: item.uniqueId }
    );
  }

  private consumableQuantity(available: number, type: BatchType, quantity: number | undefined): number {
    if (quantity === undefined || !Number.isFinite(quantity) || quantity <= 0) {
      throw new AppError(ErrorCode.VALIDATION_ERROR, 'Consumable scans need a positive quantity', 400, {
        quantity: quantity ?? null,
      });
    }

    if (type === BatchType.CONSUMABLE_USAGE && quantity > available) {
      throw new AppError(
        ErrorCode.INSUFFICIENT_QUANTITY,
        `Cannot use ${quantity}. Only ${available} available.`,
        409,
        { requested: quantity, available }
      );
    }

    return quantity;
  }

  private runLine(
    type: BatchType,
    line: BatchLine,
    input: SubmitBatchInput,
    batchId: string
  ): Promise<CustodyChange> {
    const common = { itemId: line.itemId, actingStaffUid: input.actingStaffUid, notes: input.notes, batchId };

    switch (type) {
      case BatchType.CHECKOUT:
        return this.engine.performCheckout({ ...common, staffUid: this.requireAssignee(input) });
      case BatchType.CHECKIN:
        return this.engine.performCheckin(common);
      case BatchType.CONSUMABLE_USAGE:
        return this.engine.recordUsage({
          ...common,
          quantity: this.requireQuantity(line),
          staffUid: this.requireAssignee(input),
        });
      case BatchType.CONSUMABLE_RESTOCK:
        return this.engine.recordRestock({ ...common, quantity: this.requireQuantity(line) });
    }
  }

  private requireAssignee(input: SubmitBatchInput): string {
    if (!input.assignToStaffUid) {
      throw new AppError(ErrorCode.VALIDATION_ERROR, 'assign_to_staff_uid is required for this batch', 400);
    }
    return input.assignToStaffUid;
  }

  private requireQuantity(line: BatchLine): number {
    if (line.quantity === null) {
      throw new AppError(ErrorCode.VALIDATION_ERROR, `No quantity recorded for ${line.uniqueId}`, 400);
    }
    return line.quantity;
  }

  private toFailure(batchId: string, line: BatchLine, error: unknown): BatchItemFailure {
    if (error instanceof AppError) {
      logger.warn('Batch item failed', { batchId, uniqueId: line.uniqueId, code: error.code });
      return {
        itemId: line.itemId,
        uniqueId: line.uniqueId,
        code: error.code,
        category: error.category,
        message: error.message,
      };
    }

    const message = errorMessage(error);
    logger.error('Unexpected batch item failure', { batchId, uniqueId: line.uniqueId, error: message });
    return {
      itemId: line.itemId,
      uniqueId: line.uniqueId,
      code: ErrorCode.INTERNAL_ERROR,
      category: ErrorCategory.INTERNAL,
      message,
    };
  }

  private assertNotSubmitting(): void {
    if (this.submitting) {
      throw new AppError(ErrorCode.BATCH_SUBMITTING, 'Batch is being submitted', 409);
    }
  }

  private reset(): void {
    this.state = 'empty';
    this.lines = [];
    this.touch();
  }

  private touch(): void {
    this.updatedAt = this.clock();
  }
}
