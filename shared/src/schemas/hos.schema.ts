import { z } from 'zod';
import { WEEKLY_MODES } from '../hos/limits';

/**
 * Dates stay plain strings here: a malformed date skips that entry instead of
 * rejecting the whole history.
 */
export const dailyHoursEntrySchema = z.object({
  date: z.string(),
  on_duty_hours: z.number().min(0).max(24),
});

export const rollingHoursSchema = z.object({
  weekly_mode: z.enum(WEEKLY_MODES).default('70/8'),
  history: z.array(dailyHoursEntrySchema).max(366).default([]),
});

export type DailyHoursEntryInput = z.infer<typeof dailyHoursEntrySchema>;
export type RollingHoursInput = z.infer<typeof rollingHoursSchema>;
