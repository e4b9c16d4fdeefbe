/**
 * HOS (Hours of Service) Routes
 */

import { Router } from 'express';
import type { HOSController } from '../controllers/hos.controller';
import { validateRequest } from '../middleware/validation';
import { RollingHoursBodySchema } from '../models/dtos/hos.dto';
import { asyncHandler } from '../utils/async-handler';

export function createHosRouter(controller: HOSController): Router {
  const router = Router();

  /**
   * @openapi
   * /api/v1/hos/rolling-hours:
   *   post:
   *     tags: [HOS]
   *     summary: Hours used in the trailing weekly window
   *     description: |
   *       Sums on-duty hours over the last 7 (60/7) or 8 (70/8) days of the
   *       supplied history. Entries with an unparseable date are skipped and
   *       counted in `skipped_entries`; a history with no usable entry is rejected.
   *
   *       Rate limited to 120 req/min per IP.
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             $ref: '#/components/schemas/RollingHoursRequest'
   *     responses:
   *       200:
   *         description: Rolling hours summary
   *         content:
   *           application/json:
   *             schema:
   *               allOf:
   *                 - $ref: '#/components/schemas/SuccessResponse'
   *                 - type: object
   *                   properties:
   *                     data:
   *                       $ref: '#/components/schemas/RollingHours'
   *       400:
   *         $ref: '#/components/responses/ValidationError'
   *       422:
   *         $ref: '#/components/responses/UnprocessableError'
   *       429:
   *         $ref: '#/components/responses/RateLimitError'
   */
  router.post(
    '/rolling-hours',
    validateRequest({ body: RollingHoursBodySchema }),
    asyncHandler(controller.getRollingHours.bind(controller))
  );

  return router;
}
