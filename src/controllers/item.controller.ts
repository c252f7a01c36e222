import { Request, Response } from 'express';
import { ItemService } from '../services/item.service';
import {
  getItemHistorySchema,
  getItemHistoryStatsSchema,
  getItemSchema,
  listItemsSchema,
} from '../validators/item.validator';
import { createSuccessResponse } from '../utils/response-factory';
import { asyncHandler } from '../utils/async-handler';

/**
 * Item Controller
 *
 * HTTP request handlers for item status endpoints
 */
export class ItemController {
  constructor(private itemService: ItemService) {}

  /**
   * GET /v1/items
   */
  listItems = asyncHandler(async (req: Request, res: Response) => {
    const { query } = listItemsSchema.parse(req);

    const items = await this.itemService.listItems(query);

    res.status(200).json(createSuccessResponse(items));
  });

  /**
   * GET /v1/items/:itemId
   */
  getItem = asyncHandler(async (req: Request, res: Response) => {
    const { params } = getItemSchema.parse(req);

    const item = await this.itemService.getItemStatus(params.itemId);

    res.status(200).json(createSuccessResponse(item));
  });

  /**
   * GET /v1/items/:itemId/history
   */
  getItemHistory = asyncHandler(async (req: Request, res: Response) => {
    const { params, query } = getItemHistorySchema.parse(req);

    const entries = await this.itemService.getItemHistory(params.itemId, {
      startDate: query.start,
      endDate: query.end,
      limit: query.limit,
    });

    res.status(200).json(createSuccessResponse(entries));
  });

  /**
   * GET /v1/items/:itemId/history/stats
   */
  getItemHistoryStats = asyncHandler(async (req: Request, res: Response) => {
    const { params, query } = getItemHistoryStatsSchema.parse(req);

    const report = await this.itemService.getItemHistoryStats(params.itemId, {
      startDate: query.start,
      endDate: query.end,
    });

    res.status(200).json(createSuccessResponse(report));
  });
}
