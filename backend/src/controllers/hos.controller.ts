/**
 * HOS (Hours of Service) Controller
 *
 * Handles the rolling weekly-hours endpoint.
 */

import type { Request, Response } from 'express';
import { BaseController } from './base.controller';
import { toRollingHoursResponse, type RollingHoursBody } from '../models/dtos/hos.dto';
import { calculateRollingHours } from '../services/rolling-hours.service';
import { logger } from '../utils/logger';

export class HOSController extends BaseController {
  /**
   * POST /api/v1/hos/rolling-hours
   * Hours used and available in the trailing weekly window
   */
  async getRollingHours(req: Request, res: Response): Promise<Response> {
    const body: RollingHoursBody = req.body;

    const summary = calculateRollingHours(
      body.history.map((entry) => ({ date: entry.date, onDutyHours: entry.on_duty_hours })),
      body.weekly_mode
    );

    logger.debug('Rolling hours calculated', {
      weeklyMode: summary.weeklyMode,
      hoursUsed: summary.hoursUsed,
      skippedEntries: summary.skippedEntries,
    });

    return this.success(res, toRollingHoursResponse(summary));
  }
}
