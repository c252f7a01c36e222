import { Router } from 'express';
import type { Services } from '../services';
import { createToolRoutes } from './v1/tools.routes';
import { createConsumableRoutes } from './v1/consumables.routes';
import { createItemRoutes } from './v1/items.routes';
import { createHistoryRoutes } from './v1/history.routes';
import { createStaffRoutes } from './v1/staff.routes';
import { createBatchRoutes } from './v1/batches.routes';
import type { HealthCheckResponse } from '../types/api.types';
import { asyncHandler } from '../utils/async-handler';
import { errorMessage, logger } from '../config/logger';

/**
 * API Routes Aggregator
 */
export function createRoutes(services: Services): Router {
  const router = Router();

  // v1 routes
  router.use('/v1/tools', createToolRoutes(services.transactions));
  router.use('/v1/consumables', createConsumableRoutes(services.transactions));
  router.use('/v1/items', createItemRoutes(services.items));
  router.use('/v1/history', createHistoryRoutes(services.globalHistory));
  router.use('/v1/staff', createStaffRoutes(services.staff));
  router.use('/v1/batches', createBatchRoutes(services.batches));

  /**
   * @swagger
   * /health:
   *   get:
   *     summary: Health check, including a store round trip
   *     tags: [System]
   *     responses:
   *       200:
   *         description: Service and store reachable
   *       503:
   *         description: Store unreachable
   */
  router.get(
    '/health',
    asyncHandler(async (_req, res) => {
      let healthy = true;
      try {
        await services.store.ping();
      } catch (error) {
        healthy = false;
        logger.error('Health check failed', { error: errorMessage(error) });
      }

      const body: HealthCheckResponse = {
        status: healthy ? 'healthy' : 'unhealthy',
        timestamp: new Date().toISOString(),
        store: services.store.name,
        uptime: process.uptime(),
      };

      res.status(healthy ? 200 : 503).json(body);
    })
  );

  // API version info
  router.get('/v1', (_req, res) => {
    res.status(200).json({
      version: '1.0.0',
      api: 'Tool Custody API',
    });
  });

  return router;
}
