/**
 * Trip Routes
 *
 * Trip planning, stored trip lookup and log-sheet previews.
 */

import { Router, type RequestHandler } from 'express';
import type { TripController } from '../controllers/trip.controller';
import { validateRequest } from '../middleware/validation';
import { ListTripsQuerySchema, PlanTripBodySchema, TripIdParamsSchema } from '../models/dtos/trip.dto';
import { asyncHandler } from '../utils/async-handler';

export interface TripRouteLimiters {
  planning: RequestHandler;
  query: RequestHandler;
}

export function createTripRouter(controller: TripController, limiters: TripRouteLimiters): Router {
  const router = Router();

  /**
   * @openapi
   * /api/v1/trips/plan:
   *   post:
   *     tags: [Trips]
   *     summary: Plan a trip
   *     description: |
   *       Routes current location -> pickup -> dropoff, simulates the duty schedule
   *       under the HOS rules, splits it into daily logs and audits compliance.
   *       The plan is stored and returned with its trip id.
   *
   *       Without a routing key (or when routing fails) legs are estimated from
   *       straight-line distance at 55 mph and `route_data.fallback` is true.
   *       Unresolved place names are reported in `trip_plan.warnings`.
   *
   *       Rate limited to 30 req/min per IP.
   *     parameters:
   *       - $ref: '#/components/parameters/CorrelationIdHeader'
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             $ref: '#/components/schemas/PlanTripRequest'
   *     responses:
   *       201:
   *         description: Trip planned
   *         content:
   *           application/json:
   *             schema:
   *               allOf:
   *                 - $ref: '#/components/schemas/SuccessResponse'
   *                 - type: object
   *                   properties:
   *                     data:
   *                       $ref: '#/components/schemas/TripRecord'
   *       400:
   *         $ref: '#/components/responses/ValidationError'
   *       429:
   *         $ref: '#/components/responses/RateLimitError'
   */
  router.post(
    '/plan',
    limiters.planning,
    validateRequest({ body: PlanTripBodySchema }),
    asyncHandler(controller.planTrip.bind(controller))
  );

  /**
   * @openapi
   * /api/v1/trips:
   *   get:
   *     tags: [Trips]
   *     summary: List recent trips
   *     parameters:
   *       - name: limit
   *         in: query
   *         schema:
   *           type: integer
   *           minimum: 1
   *           maximum: 100
   *           default: 20
   *     responses:
   *       200:
   *         description: Trips, newest first
   *         content:
   *           application/json:
   *             schema:
   *               allOf:
   *                 - $ref: '#/components/schemas/SuccessResponse'
   *                 - type: object
   *                   properties:
   *                     data:
   *                       type: array
   *                       items:
   *                         $ref: '#/components/schemas/TripRecord'
   *       400:
   *         $ref: '#/components/responses/ValidationError'
   */
  router.get(
    '/',
    limiters.query,
    validateRequest({ query: ListTripsQuerySchema }),
    asyncHandler(controller.listTrips.bind(controller))
  );

  /**
   * @openapi
   * /api/v1/trips/{tripId}:
   *   get:
   *     tags: [Trips]
   *     summary: Get a stored trip
   *     parameters:
   *       - $ref: '#/components/parameters/TripId'
   *     responses:
   *       200:
   *         description: Trip record with its plan
   *         content:
   *           application/json:
   *             schema:
   *               allOf:
   *                 - $ref: '#/components/schemas/SuccessResponse'
   *                 - type: object
   *                   properties:
   *                     data:
   *                       $ref: '#/components/schemas/TripRecord'
   *       404:
   *         $ref: '#/components/responses/NotFoundError'
   */
  router.get(
    '/:tripId',
    limiters.query,
    validateRequest({ params: TripIdParamsSchema }),
    asyncHandler(controller.getTrip.bind(controller))
  );

  /**
   * @openapi
   * /api/v1/trips/{tripId}/log-sheets:
   *   get:
   *     tags: [Trips]
   *     summary: Log-sheet data for each day of a stored trip
   *     description: |
   *       24-hour grid segments and transitions, up to 15 remarks and the
   *       activity list for every daily log. Header fields are returned in `meta`.
   *     parameters:
   *       - $ref: '#/components/parameters/TripId'
   *     responses:
   *       200:
   *         description: One sheet per day
   *         content:
   *           application/json:
   *             schema:
   *               allOf:
   *                 - $ref: '#/components/schemas/SuccessResponse'
   *                 - type: object
   *                   properties:
   *                     data:
   *                       type: array
   *                       items:
   *                         $ref: '#/components/schemas/LogSheet'
   *       404:
   *         $ref: '#/components/responses/NotFoundError'
   *       422:
   *         $ref: '#/components/responses/UnprocessableError'
   */
  router.get(
    '/:tripId/log-sheets',
    limiters.query,
    validateRequest({ params: TripIdParamsSchema }),
    asyncHandler(controller.getLogSheets.bind(controller))
  );

  return router;
}
