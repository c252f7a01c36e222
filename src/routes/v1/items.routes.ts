import { Router } from 'express';
import { ItemController } from '../../controllers/item.controller';
import { ItemService } from '../../services/item.service';
import { validate } from '../../middleware/validation.middleware';
import {
  getItemHistorySchema,
  getItemHistoryStatsSchema,
  getItemSchema,
  listItemsSchema,
} from '../../validators/item.validator';

/**
 * Item routes (v1)
 */
export function createItemRoutes(itemService: ItemService): Router {
  const router = Router();
  const itemController = new ItemController(itemService);

  /**
   * @swagger
   * /v1/items:
   *   get:
   *     summary: List tools and consumables with their current status
   *     tags: [Items]
   *     parameters:
   *       - in: query
   *         name: kind
   *         schema:
   *           type: string
   *           enum: [tool, consumable]
   *       - in: query
   *         name: status
   *         schema:
   *           type: string
   *           enum: [available, checked_out, low_stock]
   *       - in: query
   *         name: search
   *         schema:
   *           type: string
   *     responses:
   *       200:
   *         description: Items retrieved successfully
   */
  router.get('/', validate(listItemsSchema), itemController.listItems);

  /**
   * @swagger
   * /v1/items/{itemId}:
   *   get:
   *     summary: Get the instant status of an item
   *     tags: [Items]
   *     parameters:
   *       - in: path
   *         name: itemId
   *         required: true
   *         schema:
   *           type: string
   *     responses:
   *       200:
   *         description: Item retrieved successfully
   *         content:
   *           application/json:
   *             schema:
   *               $ref: '#/components/schemas/Item'
   *       404:
   *         description: Item not found
   */
  router.get('/:itemId', validate(getItemSchema), itemController.getItem);

  /**
   * @swagger
   * /v1/items/{itemId}/history:
   *   get:
   *     summary: History of one item, newest first
   *     tags: [History]
   *     parameters:
   *       - in: path
   *         name: itemId
   *         required: true
   *         schema:
   *           type: string
   *       - $ref: '#/components/parameters/HistoryStart'
   *       - $ref: '#/components/parameters/HistoryEnd'
   *       - $ref: '#/components/parameters/HistoryLimit'
   *     responses:
   *       200:
   *         description: History entries
   *       400:
   *         description: Invalid range
   */
  router.get('/:itemId/history', validate(getItemHistorySchema), itemController.getItemHistory);

  /**
   * @swagger
   * /v1/items/{itemId}/history/stats:
   *   get:
   *     summary: Action counts, distinct assignees and batches for one item, with its latest entry
   *     tags: [History]
   *     parameters:
   *       - in: path
   *         name: itemId
   *         required: true
   *         schema:
   *           type: string
   *       - $ref: '#/components/parameters/HistoryStart'
   *       - $ref: '#/components/parameters/HistoryEnd'
   *     responses:
   *       200:
   *         description: Item history statistics
   *       404:
   *         description: Item not found
   */
  router.get('/:itemId/history/stats', validate(getItemHistoryStatsSchema), itemController.getItemHistoryStats);

  return router;
}
