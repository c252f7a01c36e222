import { Router } from 'express';
import { HistoryController } from '../../controllers/history.controller';
import { GlobalHistoryService } from '../../services/global-history.service';
import { validate } from '../../middleware/validation.middleware';
import { getBatchHistorySchema, historyStatsSchema, queryHistorySchema } from '../../validators/history.validator';

/**
 * Global history routes (v1)
 */
export function createHistoryRoutes(globalHistory: GlobalHistoryService): Router {
  const router = Router();
  const controller = new HistoryController(globalHistory);

  /**
   * @swagger
   * /v1/history:
   *   get:
   *     summary: Recent activity across all items, newest first
   *     tags: [History]
   *     parameters:
   *       - $ref: '#/components/parameters/HistoryStart'
   *       - $ref: '#/components/parameters/HistoryEnd'
   *       - $ref: '#/components/parameters/HistoryLimit'
   *     responses:
   *       200:
   *         description: History entries
   *         content:
   *           application/json:
   *             schema:
   *               type: array
   *               items:
   *                 $ref: '#/components/schemas/HistoryEntry'
   */
  router.get('/', validate(queryHistorySchema), controller.queryHistory);

  /**
   * @swagger
   * /v1/history/stats:
   *   get:
   *     summary: Entry counts per action over a range
   *     tags: [History]
   *     parameters:
   *       - $ref: '#/components/parameters/HistoryStart'
   *       - $ref: '#/components/parameters/HistoryEnd'
   *     responses:
   *       200:
   *         description: Counts
   */
  router.get('/stats', validate(historyStatsSchema), controller.getStats);

  /**
   * @swagger
   * /v1/history/batches/{batchId}:
   *   get:
   *     summary: Entries written by one batch submission
   *     tags: [History]
   *     parameters:
   *       - in: path
   *         name: batchId
   *         required: true
   *         schema:
   *           type: string
   *           example: BATCH_5f0c6a1e-2b7d-4c89-9a51-1c2f3e4d5a6b
   *       - $ref: '#/components/parameters/HistoryStart'
   *       - $ref: '#/components/parameters/HistoryEnd'
   *       - $ref: '#/components/parameters/HistoryLimit'
   *     responses:
   *       200:
   *         description: History entries
   */
  router.get('/batches/:batchId', validate(getBatchHistorySchema), controller.getBatchEntries);

  return router;
}
