import { Request, Response } from 'express';
import { BatchService } from '../services/batch.service';
import {
  createBatchSchema,
  discardBatchSchema,
  getBatchSchema,
  scanBatchItemSchema,
  selectBatchTypeSchema,
  submitBatchSchema,
} from '../validators/batch.validator';
import { createSuccessResponse } from '../utils/response-factory';
import { asyncHandler } from '../utils/async-handler';

/**
 * Batch Controller
 *
 * HTTP request handlers for batch scanning and submission
 */
export class BatchController {
  constructor(private batchService: BatchService) {}

  /**
   * POST /v1/batches
   */
  createBatch = asyncHandler(async (req: Request, res: Response) => {
    const { body } = createBatchSchema.parse(req);

    const batch = this.batchService.createBatch(body.type);

    res.status(201).json(createSuccessResponse(batch));
  });

  /**
   * GET /v1/batches/:batchId
   */
  getBatch = asyncHandler(async (req: Request, res: Response) => {
    const { params } = getBatchSchema.parse(req);

    res.status(200).json(createSuccessResponse(this.batchService.getBatch(params.batchId)));
  });

  /**
   * PUT /v1/batches/:batchId/type
   */
  selectType = asyncHandler(async (req: Request, res: Response) => {
    const { params, body } = selectBatchTypeSchema.parse(req);

    res.status(200).json(createSuccessResponse(this.batchService.selectType(params.batchId, body.type)));
  });

  /**
   * POST /v1/batches/:batchId/items
   */
  scanItem = asyncHandler(async (req: Request, res: Response) => {
    const { params, body } = scanBatchItemSchema.parse(req);

    await this.batchService.scan(params.batchId, body.item_id, body.quantity);

    res.status(201).json(createSuccessResponse(this.batchService.getBatch(params.batchId)));
  });

  /**
   * POST /v1/batches/:batchId/submit
   * 200 when every item went through, 207 when some or all failed
   */
  submitBatch = asyncHandler(async (req: Request, res: Response) => {
    const { params, body } = submitBatchSchema.parse(req);

    const report = await this.batchService.submit(params.batchId, {
      actingStaffUid: body.acting_staff_uid,
      assignToStaffUid: body.assign_to_staff_uid,
      notes: body.notes,
    });

    const message = `${report.succeeded.length} of ${report.total} items processed`;
    res.status(report.status === 'completed' ? 200 : 207).json(createSuccessResponse(report, message));
  });

  /**
   * DELETE /v1/batches/:batchId
   */
  discardBatch = asyncHandler(async (req: Request, res: Response) => {
    const { params } = discardBatchSchema.parse(req);

    res.status(200).json(createSuccessResponse(this.batchService.discard(params.batchId), 'Batch cleared'));
  });
}
