/**
 * Trip Controller
 *
 * Handles trip planning, lookup and log-sheet endpoints.
 */

import type { Request, Response } from 'express';
import { BaseController } from './base.controller';
import type { PlanTripBody } from '../models/dtos/trip.dto';
import type { TripService } from '../services/trip.service';
import { logger } from '../utils/logger';

export class TripController extends BaseController {
  constructor(private readonly trips: TripService) {
    super();
  }

  /**
   * POST /api/v1/trips/plan
   * Plan a trip and store the result
   */
  async planTrip(req: Request, res: Response): Promise<Response> {
    const body: PlanTripBody = req.body;

    logger.info('Planning trip', {
      weeklyMode: body.weekly_mode,
      currentCycleUsed: body.current_cycle_used,
      routeOverride: body.route_legs !== undefined,
    });

    const record = await this.trips.planTrip(body);

    return this.created(res, record);
  }

  /**
   * GET /api/v1/trips
   * Most recent trips, newest first
   */
  async listTrips(req: Request, res: Response): Promise<Response> {
    const limit = Number(req.query.limit);

    const records = await this.trips.listTrips(limit);

    return this.success(res, records, { count: records.length, limit });
  }

  /**
   * GET /api/v1/trips/:tripId
   */
  async getTrip(req: Request, res: Response): Promise<Response> {
    const { tripId } = req.params;

    const record = await this.trips.getTrip(tripId);

    return this.success(res, record);
  }

  /**
   * GET /api/v1/trips/:tripId/log-sheets
   * Log-sheet preview data for each day of a stored trip
   */
  async getLogSheets(req: Request, res: Response): Promise<Response> {
    const { tripId } = req.params;

    const { record, sheets } = await this.trips.getLogSheets(tripId);

    logger.debug('Log sheets built', { tripId, days: sheets.length });

    return this.success(res, sheets, {
      tripId,
      driverName: record.driver_name,
      carrierName: record.carrier_name,
      mainOffice: record.main_office,
      vehicleNumber: record.vehicle_number,
    });
  }
}
