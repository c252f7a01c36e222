import { Request, Response } from 'express';
import { StaffService } from '../services/staff.service';
import { getStaffHistorySchema, getStaffItemsSchema } from '../validators/item.validator';
import { createSuccessResponse } from '../utils/response-factory';
import { asyncHandler } from '../utils/async-handler';

/**
 * Staff Controller
 */
export class StaffController {
  constructor(private staffService: StaffService) {}

  /**
   * GET /v1/staff/:staffUid/items
   */
  getAssignedItems = asyncHandler(async (req: Request, res: Response) => {
    const { params } = getStaffItemsSchema.parse(req);

    const assignments = await this.staffService.getAssignedItems(params.staffUid);

    res.status(200).json(createSuccessResponse(assignments));
  });

  /**
   * GET /v1/staff/:staffUid/history
   */
  getHistory = asyncHandler(async (req: Request, res: Response) => {
    const { params, query } = getStaffHistorySchema.parse(req);

    const entries = await this.staffService.getHistory(params.staffUid, {
      startDate: query.start,
      endDate: query.end,
      limit: query.limit,
    });

    res.status(200).json(createSuccessResponse(entries));
  });
}
