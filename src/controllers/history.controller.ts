import { Request, Response } from 'express';
import { GlobalHistoryService } from '../services/global-history.service';
import { resolveHistoryQuery } from '../services/history-ledger';
import { getBatchHistorySchema, historyStatsSchema, queryHistorySchema } from '../validators/history.validator';
import { createSuccessResponse } from '../utils/response-factory';
import { asyncHandler } from '../utils/async-handler';

/**
 * History Controller
 *
 * HTTP request handlers for fleet-wide audit queries
 */
export class HistoryController {
  constructor(private globalHistory: GlobalHistoryService) {}

  /**
   * GET /v1/history
   */
  queryHistory = asyncHandler(async (req: Request, res: Response) => {
    const { query } = queryHistorySchema.parse(req);

    const entries = await this.globalHistory.query(
      resolveHistoryQuery({ startDate: query.start, endDate: query.end, limit: query.limit })
    );

    res.status(200).json(createSuccessResponse(entries));
  });

  /**
   * GET /v1/history/stats
   */
  getStats = asyncHandler(async (req: Request, res: Response) => {
    const { query } = historyStatsSchema.parse(req);

    const stats = await this.globalHistory.getStats(
      resolveHistoryQuery({ startDate: query.start, endDate: query.end })
    );

    res.status(200).json(createSuccessResponse(stats));
  });

  /**
   * GET /v1/history/batches/:batchId
   */
  getBatchEntries = asyncHandler(async (req: Request, res: Response) => {
    const { params, query } = getBatchHistorySchema.parse(req);

    const entries = await this.globalHistory.getBatchEntries(
      params.batchId,
      resolveHistoryQuery({ startDate: query.start, endDate: query.end, limit: query.limit })
    );

    res.status(200).json(createSuccessResponse(entries));
  });
}
