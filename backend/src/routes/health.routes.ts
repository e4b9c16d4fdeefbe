/**
 * Health Routes
 */

import { Router } from 'express';
import type { HealthController } from '../controllers/health.controller';
import { asyncHandler } from '../utils/async-handler';

export function createHealthRouter(controller: HealthController): Router {
  const router = Router();

  /**
   * @openapi
   * /health:
   *   get:
   *     tags: [Health]
   *     summary: Service health
   *     description: |
   *       Trip store and Redis status plus the active routing provider.
   *       Not rate limited.
   *     responses:
   *       200:
   *         description: Health report (`degraded` when a configured dependency is down)
   *         content:
   *           application/json:
   *             schema:
   *               allOf:
   *                 - $ref: '#/components/schemas/SuccessResponse'
   *                 - type: object
   *                   properties:
   *                     data:
   *                       $ref: '#/components/schemas/HealthCheck'
   */
  router.get('/', asyncHandler(controller.checkHealth.bind(controller)));

  return router;
}
