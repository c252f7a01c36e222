import { Router } from 'express';
import { StaffController } from '../../controllers/staff.controller';
import { StaffService } from '../../services/staff.service';
import { validate } from '../../middleware/validation.middleware';
import { getStaffHistorySchema, getStaffItemsSchema } from '../../validators/item.validator';

/**
 * Staff routes (v1)
 */
export function createStaffRoutes(staffService: StaffService): Router {
  const router = Router();
  const controller = new StaffController(staffService);

  /**
   * @swagger
   * /v1/staff/{staffUid}/items:
   *   get:
   *     summary: Tools currently held by a staff member
   *     tags: [Staff]
   *     parameters:
   *       - in: path
   *         name: staffUid
   *         required: true
   *         description: Staff uid or job code
   *         schema:
   *           type: string
   *     responses:
   *       200:
   *         description: Staff member and held tools
   *       404:
   *         description: Staff member not found
   */
  router.get('/:staffUid/items', validate(getStaffItemsSchema), controller.getAssignedItems);

  /**
   * @swagger
   * /v1/staff/{staffUid}/history:
   *   get:
   *     summary: Entries the staff member performed or received
   *     tags: [Staff, History]
   *     parameters:
   *       - in: path
   *         name: staffUid
   *         required: true
   *         schema:
   *           type: string
   *       - $ref: '#/components/parameters/HistoryStart'
   *       - $ref: '#/components/parameters/HistoryEnd'
   *       - $ref: '#/components/parameters/HistoryLimit'
   *     responses:
   *       200:
   *         description: History entries
   */
  router.get('/:staffUid/history', validate(getStaffHistorySchema), controller.getHistory);

  return router;
}
