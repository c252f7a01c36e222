import { Router } from 'express';
import { TransactionController } from '../../controllers/transaction.controller';
import { TransactionService } from '../../services/transaction.service';
import { validate } from '../../middleware/validation.middleware';
import { restockSchema, usageSchema } from '../../validators/transaction.validator';

/**
 * Consumable stock routes (v1)
 */
export function createConsumableRoutes(transactionService: TransactionService): Router {
  const router = Router();
  const controller = new TransactionController(transactionService);

  /**
   * @swagger
   * /v1/consumables/{itemId}/usage:
   *   post:
   *     summary: Record consumable usage by a staff member
   *     tags: [Custody]
   *     parameters:
   *       - in: path
   *         name: itemId
   *         required: true
   *         schema:
   *           type: string
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required:
   *               - quantity
   *               - staff_uid
   *               - acting_staff_uid
   *             properties:
   *               quantity:
   *                 type: number
   *                 exclusiveMinimum: 0
   *               staff_uid:
   *                 type: string
   *               acting_staff_uid:
   *                 type: string
   *               notes:
   *                 type: string
   *     responses:
   *       200:
   *         description: Usage recorded
   *       409:
   *         description: Insufficient quantity
   */
  router.post('/:itemId/usage', validate(usageSchema), controller.recordUsage);

  /**
   * @swagger
   * /v1/consumables/{itemId}/restock:
   *   post:
   *     summary: Restock a consumable
   *     tags: [Custody]
   *     parameters:
   *       - in: path
   *         name: itemId
   *         required: true
   *         schema:
   *           type: string
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required:
   *               - quantity
   *               - acting_staff_uid
   *             properties:
   *               quantity:
   *                 type: number
   *                 exclusiveMinimum: 0
   *               acting_staff_uid:
   *                 type: string
   *               notes:
   *                 type: string
   *     responses:
   *       200:
   *         description: Restock recorded
   */
  router.post('/:itemId/restock', validate(restockSchema), controller.recordRestock);

  return router;
}
