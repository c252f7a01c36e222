import { Router } from 'express';
import { BatchController } from '../../controllers/batch.controller';
import { BatchService } from '../../services/batch.service';
import { validate } from '../../middleware/validation.middleware';
import {
  createBatchSchema,
  discardBatchSchema,
  getBatchSchema,
  scanBatchItemSchema,
  selectBatchTypeSchema,
  submitBatchSchema,
} from '../../validators/batch.validator';

/**
 * Batch routes (v1)
 */
export function createBatchRoutes(batchService: BatchService): Router {
  const router = Router();
  const controller = new BatchController(batchService);

  /**
   * @swagger
   * /v1/batches:
   *   post:
   *     summary: Open a batch
   *     description: Tool batches take their type from the first scan; consumable batches name it here.
   *     tags: [Batches]
   *     requestBody:
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             properties:
   *               type:
   *                 type: string
   *                 enum: [consumable_usage, consumable_restock]
   *     responses:
   *       201:
   *         description: Batch opened
   *         content:
   *           application/json:
   *             schema:
   *               $ref: '#/components/schemas/Batch'
   */
  router.post('/', validate(createBatchSchema), controller.createBatch);

  /**
   * @swagger
   * /v1/batches/{batchId}:
   *   get:
   *     summary: Current state of a batch
   *     tags: [Batches]
   *     parameters:
   *       - in: path
   *         name: batchId
   *         required: true
   *         schema:
   *           type: string
   *           format: uuid
   *     responses:
   *       200:
   *         description: Batch state
   *       404:
   *         description: Batch not found or expired
   *   delete:
   *     summary: Clear and close a batch
   *     tags: [Batches]
   *     parameters:
   *       - in: path
   *         name: batchId
   *         required: true
   *         schema:
   *           type: string
   *           format: uuid
   *     responses:
   *       200:
   *         description: Batch cleared
   *       409:
   *         description: Batch is being submitted
   */
  router.get('/:batchId', validate(getBatchSchema), controller.getBatch);
  router.delete('/:batchId', validate(discardBatchSchema), controller.discardBatch);

  /**
   * @swagger
   * /v1/batches/{batchId}/type:
   *   put:
   *     summary: Select usage or restock for an empty batch
   *     tags: [Batches]
   *     parameters:
   *       - in: path
   *         name: batchId
   *         required: true
   *         schema:
   *           type: string
   *           format: uuid
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required: [type]
   *             properties:
   *               type:
   *                 type: string
   *                 enum: [consumable_usage, consumable_restock]
   *     responses:
   *       200:
   *         description: Batch type selected
   *       400:
   *         description: Tool batch types cannot be selected
   *       422:
   *         description: Batch already holds another type
   */
  router.put('/:batchId/type', validate(selectBatchTypeSchema), controller.selectType);

  /**
   * @swagger
   * /v1/batches/{batchId}/items:
   *   post:
   *     summary: Scan an item into a batch
   *     tags: [Batches]
   *     parameters:
   *       - in: path
   *         name: batchId
   *         required: true
   *         schema:
   *           type: string
   *           format: uuid
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required:
   *               - item_id
   *             properties:
   *               item_id:
   *                 type: string
   *               quantity:
   *                 type: number
   *                 description: Required for consumables
   *     responses:
   *       201:
   *         description: Item added; returns the batch
   *       422:
   *         description: Item does not fit the batch or is already in it
   */
  router.post('/:batchId/items', validate(scanBatchItemSchema), controller.scanItem);

  /**
   * @swagger
   * /v1/batches/{batchId}/submit:
   *   post:
   *     summary: Submit every item in the batch
   *     tags: [Batches]
   *     parameters:
   *       - in: path
   *         name: batchId
   *         required: true
   *         schema:
   *           type: string
   *           format: uuid
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
   *               assign_to_staff_uid:
   *                 type: string
   *                 description: Required for checkout and usage batches
   *               notes:
   *                 type: string
   *     responses:
   *       200:
   *         description: Every item processed
   *         content:
   *           application/json:
   *             schema:
   *               $ref: '#/components/schemas/BatchReport'
   *       207:
   *         description: Some or all items failed; see the report
   *       422:
   *         description: Batch is empty
   */
  router.post('/:batchId/submit', validate(submitBatchSchema), controller.submitBatch);

  return router;
}
