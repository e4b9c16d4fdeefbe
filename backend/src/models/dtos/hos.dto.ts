/**
 * HOS (Hours of Service) DTOs
 *
 * Request/response types for the rolling-hours endpoint.
 */

import type { z } from 'zod';
import { rollingHoursSchema, type RollingHoursSummary, type WeeklyMode } from '@hos-planner/shared';

/**
 * Body validation for POST /hos/rolling-hours
 */
export const RollingHoursBodySchema = rollingHoursSchema;

export type RollingHoursBody = z.infer<typeof RollingHoursBodySchema>;

/**
 * Rolling Hours Response
 */
export interface RollingHoursResponse {
  weekly_mode: WeeklyMode;
  hours_used: number;
  hours_available: number;
  window_days: number;
  days: Array<{ date: string; on_duty_hours: number }>;
  skipped_entries: number;
}

export function toRollingHoursResponse(summary: RollingHoursSummary): RollingHoursResponse {
  return {
    weekly_mode: summary.weeklyMode,
    hours_used: summary.hoursUsed,
    hours_available: summary.hoursAvailable,
    window_days: summary.days.length,
    days: summary.days.map((day) => ({ date: day.date, on_duty_hours: day.onDutyHours })),
    skipped_entries: summary.skippedEntries,
  };
}
