import { v4 as uuidv4 } from 'uuid';
import { BatchCoordinator } from './batch-coordinator';
import { ItemRepository } from '../repositories/item.repository';
import { TransactionService } from './transaction.service';
import type { BatchLine, BatchReport, BatchSnapshot, BatchType, SubmitBatchInput } from '../types/batch.types';
import { AppError, ErrorCode } from '../types/error.types';
import { logger } from '../config/logger';

export interface BatchServiceOptions {
  idleTimeoutMs: number;
  clock?: () => Date;
}

/**
 * Batch Service
 *
 * Registry of open batches, one coordinator each. Batches left idle longer than
 * the timeout are discarded the next time the registry is touched; a batch in the
 * middle of a submission is never discarded.
 */
export class BatchService {
  private readonly batches = new Map<string, BatchCoordinator>();
  private readonly clock: () => Date;

  constructor(
    private itemRepo: ItemRepository,
    private engine: TransactionService,
    private options: BatchServiceOptions
  ) {
    this.clock = options.clock ?? (() => new Date());
  }

  createBatch(type?: BatchType): BatchSnapshot {
    this.evictIdle();

    const batch = new BatchCoordinator(uuidv4(), this.itemRepo, this.engine, this.clock);
    if (type) {
      batch.selectType(type);
    }
    this.batches.set(batch.id, batch);

    logger.info('Batch opened', { batch: batch.id, type: type ?? null });
    return batch.snapshot();
  }

  getBatch(id: string): BatchSnapshot {
    return this.require(id).snapshot();
  }

  /**
   * Name the consumable type of an empty batch, e.g. one reused after a submission
   */
  selectType(id: string, type: BatchType): BatchSnapshot {
    const batch = this.require(id);
    batch.selectType(type);

    logger.info('Batch type selected', { batch: id, type });
    return batch.snapshot();
  }

  async scan(id: string, reference: string, quantity?: number): Promise<BatchLine> {
    return this.require(id).scan(reference, quantity);
  }

  async submit(id: string, input: SubmitBatchInput): Promise<BatchReport> {
    return this.require(id).submit(input);
  }

  /**
   * Clear the batch and close it
   */
  discard(id: string): BatchSnapshot {
    const batch = this.require(id);
    batch.clear();
    this.batches.delete(id);

    logger.info('Batch discarded', { batch: id });
    return batch.snapshot();
  }

  get size(): number {
    return this.batches.size;
  }

  private require(id: string): BatchCoordinator {
    this.evictIdle();

    const batch = this.batches.get(id);
    if (!batch) {
      throw new AppError(ErrorCode.BATCH_NOT_FOUND, `Batch ${id} not found`, 404);
    }
    return batch;
  }

  private evictIdle(): void {
    const now = this.clock().getTime();

    for (const [id, batch] of this.batches) {
      if (batch.isSubmitting) continue;

      if (now - batch.lastActivityAt.getTime() > this.options.idleTimeoutMs) {
        this.batches.delete(id);
        logger.info('Idle batch discarded', { batch: id, items: batch.snapshot().items.length });
      }
    }
  }
}
