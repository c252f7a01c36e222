import { Request, Response } from 'express';
import { TransactionService } from '../services/transaction.service';
import { checkinSchema, checkoutSchema, restockSchema, usageSchema } from '../validators/transaction.validator';
import { createSuccessResponse } from '../utils/response-factory';
import { asyncHandler } from '../utils/async-handler';

/**
 * Transaction Controller
 *
 * HTTP request handlers for custody operations
 */
export class TransactionController {
  constructor(private transactionService: TransactionService) {}

  /**
   * POST /v1/tools/:itemId/checkout
   */
  checkout = asyncHandler(async (req: Request, res: Response) => {
    const { params, body } = checkoutSchema.parse(req);

    const result = await this.transactionService.performCheckout({
      itemId: params.itemId,
      staffUid: body.staff_uid,
      actingStaffUid: body.acting_staff_uid,
      notes: body.notes,
    });

    res.status(200).json(createSuccessResponse(result, `${result.item.uniqueId} checked out`));
  });

  /**
   * POST /v1/tools/:itemId/checkin
   */
  checkin = asyncHandler(async (req: Request, res: Response) => {
    const { params, body } = checkinSchema.parse(req);

    const result = await this.transactionService.performCheckin({
      itemId: params.itemId,
      actingStaffUid: body.acting_staff_uid,
      notes: body.notes,
    });

    res.status(200).json(createSuccessResponse(result, `${result.item.uniqueId} checked in`));
  });

  /**
   * POST /v1/consumables/:itemId/usage
   */
  recordUsage = asyncHandler(async (req: Request, res: Response) => {
    const { params, body } = usageSchema.parse(req);

    const result = await this.transactionService.recordUsage({
      itemId: params.itemId,
      quantity: body.quantity,
      staffUid: body.staff_uid,
      actingStaffUid: body.acting_staff_uid,
      notes: body.notes,
    });

    res.status(200).json(createSuccessResponse(result));
  });

  /**
   * POST /v1/consumables/:itemId/restock
   */
  recordRestock = asyncHandler(async (req: Request, res: Response) => {
    const { params, body } = restockSchema.parse(req);

    const result = await this.transactionService.recordRestock({
      itemId: params.itemId,
      quantity: body.quantity,
      actingStaffUid: body.acting_staff_uid,
      notes: body.notes,
    });

    res.status(200).json(createSuccessResponse(result));
  });
}
