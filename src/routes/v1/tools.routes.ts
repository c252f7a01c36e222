import { Router } from 'express';
import { TransactionController } from '../../controllers/transaction.controller';
import { TransactionService } from '../../services/transaction.service';
import { validate } from '../../middleware/validation.middleware';
import { checkinSchema, checkoutSchema } from '../../validators/transaction.validator';

/**
 * Tool custody routes (v1)
 */
export function createToolRoutes(transactionService: TransactionService): Router {
  const router = Router();
  const controller = new TransactionController(transactionService);

  /**
   * @swagger
   * /v1/tools/{itemId}/checkout:
   *   post:
   *     summary: Check a tool out to a staff member
   *     tags: [Custody]
   *     parameters:
   *       - in: path
   *         name: itemId
   *         required: true
   *         description: Internal id, uniqueId or scanned code (TOOL#T1234)
   *         schema:
   *           type: string
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required:
   *               - staff_uid
   *               - acting_staff_uid
   *             properties:
   *               staff_uid:
   *                 type: string
   *                 description: Staff uid or job code receiving the tool
   *               acting_staff_uid:
   *                 type: string
   *                 description: Staff uid or job code performing the checkout
   *               notes:
   *                 type: string
   *     responses:
   *       200:
   *         description: Tool checked out
   *         content:
   *           application/json:
   *             schema:
   *               $ref: '#/components/schemas/CustodyChange'
   *       404:
   *         description: Tool or staff member not found
   *       409:
   *         description: Tool already checked out, staff inactive, or concurrent update
   */
  router.post('/:itemId/checkout', validate(checkoutSchema), controller.checkout);

  /**
   * @swagger
   * /v1/tools/{itemId}/checkin:
   *   post:
   *     summary: Check a tool back in
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
   *               - acting_staff_uid
   *             properties:
   *               acting_staff_uid:
   *                 type: string
   *               notes:
   *                 type: string
   *     responses:
   *       200:
   *         description: Tool checked in
   *       404:
   *         description: Tool or acting staff member not found
   *       409:
   *         description: Tool is not checked out
   */
  router.post('/:itemId/checkin', validate(checkinSchema), controller.checkin);

  return router;
}
