/**
 * Rolling Hours Service
 *
 * Hours used and still available in the trailing 7-day (60/7) or 8-day (70/8)
 * window, from a client-supplied per-day history.
 */

import {
  WEEKLY_CYCLES,
  parseDate,
  roundTo,
  toIsoDate,
  type DailyHoursEntry,
  type RollingHoursSummary,
  type WeeklyMode,
} from '@hos-planner/shared';
import { NoValidLogsError } from '../models/errors/api-error';
import { logger } from '../utils/logger';

interface DatedEntry {
  date: Date;
  onDutyHours: number;
}

export function calculateRollingHours(
  history: DailyHoursEntry[],
  weeklyMode: WeeklyMode
): RollingHoursSummary {
  const cycle = WEEKLY_CYCLES[weeklyMode];
  const valid: DatedEntry[] = [];
  let skippedEntries = 0;

  for (const entry of history) {
    const date = parseDate(entry.date);
    if (date === null || !Number.isFinite(entry.onDutyHours)) {
      skippedEntries += 1;
      logger.warn('Skipping malformed daily hours entry', { date: entry.date });
      continue;
    }
    valid.push({ date, onDutyHours: entry.onDutyHours });
  }

  if (history.length > 0 && valid.length === 0) {
    throw new NoValidLogsError('None of the supplied daily hours entries could be parsed', {
      skippedEntries,
    });
  }

  const window = valid
    .sort((a, b) => a.date.getTime() - b.date.getTime())
    .slice(-cycle.days);

  const hoursUsed = window.reduce((sum, entry) => sum + entry.onDutyHours, 0);

  return {
    hoursUsed: roundTo(hoursUsed, 2),
    hoursAvailable: roundTo(Math.max(0, cycle.maxHours - hoursUsed), 2),
    weeklyMode,
    days: window.map((entry) => ({ date: toIsoDate(entry.date), onDutyHours: entry.onDutyHours })),
    skippedEntries,
  };
}
