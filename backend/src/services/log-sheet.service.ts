/**
 * Log Sheet Service
 *
 * Data for a printable record-of-duty-status page: the 24-hour grid, duty
 * status transitions, remarks and totals for each day. Also parses daily logs
 * back out of a stored trip, skipping what cannot be recovered.
 */

import { z } from 'zod';
import {
  DUTY_STATUS_GRID_ROWS,
  DutyStatus,
  UNKNOWN_PLACE,
  formatClockTime,
  hoursBetween,
  parseDate,
  roundTo,
  startOfUtcDay,
  toIsoDate,
  type DailyLog,
  type DutyEvent,
  type DutyTotals,
} from '@hos-planner/shared';
import { NoValidLogsError } from '../models/errors/api-error';
import { logger } from '../utils/logger';
import { addToTotals, emptyTotals } from './daily-log.service';

export const MAX_REMARKS = 15;
export const MAX_REMARK_LENGTH = 120;

export interface GridSegment {
  status: DutyStatus;
  row: number;
  startHour: number;
  endHour: number;
}

export interface GridTransition {
  hour: number;
  fromRow: number;
  toRow: number;
}

export interface LogSheetActivity {
  time: string;
  activity: string;
  dutyStatus: DutyStatus;
  durationHours: number;
  description: string;
}

export interface LogSheetPreview {
  date: string;
  totalMiles: number;
  totals: DutyTotals;
  totalHours: number;
  segments: GridSegment[];
  transitions: GridTransition[];
  remarks: string[];
  activities: LogSheetActivity[];
}

// ============================================================================
// Preview
// ============================================================================

function buildGrid(log: DailyLog): { segments: GridSegment[]; transitions: GridTransition[] } {
  const segments: GridSegment[] = [];
  const transitions: GridTransition[] = [];

  for (const event of log.events) {
    const startHour = hoursBetween(log.date, event.startTime);
    if (startHour < 0) continue;
    if (startHour >= 24) break;

    const row = DUTY_STATUS_GRID_ROWS[event.dutyStatus];
    const previous = segments[segments.length - 1];
    if (previous !== undefined && previous.row !== row) {
      transitions.push({ hour: roundTo(startHour, 4), fromRow: previous.row, toRow: row });
    }

    segments.push({
      status: event.dutyStatus,
      row,
      startHour: roundTo(startHour, 4),
      endHour: roundTo(Math.min(startHour + event.durationHours, 24), 4),
    });
  }

  return { segments, transitions };
}

function isRemarkable(event: DutyEvent): boolean {
  return (
    event.dutyStatus === DutyStatus.DRIVING ||
    event.dutyStatus === DutyStatus.ON_DUTY_NOT_DRIVING ||
    event.activity.includes('Break')
  );
}

export function formatRemark(event: DutyEvent): string {
  const place = event.place ?? UNKNOWN_PLACE;
  const remark = `${formatClockTime(event.startTime)} - ${event.activity} (${place.city}, ${place.region})`;
  return remark.slice(0, MAX_REMARK_LENGTH);
}

export function buildLogSheetPreview(dailyLogs: DailyLog[]): LogSheetPreview[] {
  return dailyLogs.map((log) => {
    const { segments, transitions } = buildGrid(log);
    const totals: DutyTotals = {
      drivingHours: roundTo(log.totals.drivingHours, 1),
      onDutyNotDrivingHours: roundTo(log.totals.onDutyNotDrivingHours, 1),
      offDutyHours: roundTo(log.totals.offDutyHours, 1),
      sleeperBerthHours: roundTo(log.totals.sleeperBerthHours, 1),
    };

    return {
      date: toIsoDate(log.date),
      totalMiles: roundTo(log.totalMiles, 1),
      totals,
      totalHours: roundTo(
        log.totals.drivingHours +
          log.totals.onDutyNotDrivingHours +
          log.totals.offDutyHours +
          log.totals.sleeperBerthHours,
        1
      ),
      segments,
      transitions,
      remarks: log.events.filter(isRemarkable).map(formatRemark).slice(0, MAX_REMARKS),
      activities: log.events.map((event) => ({
        time: formatClockTime(event.startTime),
        activity: event.activity,
        dutyStatus: event.dutyStatus,
        durationHours: roundTo(event.durationHours, 2),
        description: event.description,
      })),
    };
  });
}

// ============================================================================
// Stored logs
// ============================================================================

const storedEventSchema = z.object({
  activity: z.string(),
  duty_status: z.nativeEnum(DutyStatus),
  start_time: z.unknown(),
  duration_hours: z.number().nonnegative(),
  distance_miles: z.number().nonnegative().optional(),
  location: z.object({ lat: z.number(), lon: z.number() }).optional(),
  place: z.object({ city: z.string(), region: z.string() }).optional(),
  description: z.string().default(''),
  start_offset_hours: z.number().optional(),
  end_offset_hours: z.number().optional(),
});

const storedLogSchema = z.object({
  date: z.unknown(),
  events: z.array(z.unknown()).default([]),
  total_miles: z.number().nonnegative().optional(),
});

function parseStoredEvent(raw: unknown, logDate: Date): DutyEvent | null {
  const parsed = storedEventSchema.safeParse(raw);
  if (!parsed.success) {
    logger.warn('Skipping malformed stored duty event', { issues: parsed.error.errors.length });
    return null;
  }

  const stored = parsed.data;
  const startTime = parseDate(stored.start_time) ?? new Date(logDate.getTime());
  const startOffsetHours = stored.start_offset_hours ?? 0;

  return {
    activity: stored.activity,
    dutyStatus: stored.duty_status,
    startTime,
    durationHours: stored.duration_hours,
    distanceMiles: stored.distance_miles,
    location: stored.location
      ? { latitude: stored.location.lat, longitude: stored.location.lon }
      : { latitude: 0, longitude: 0 },
    place: stored.place,
    description: stored.description,
    startOffsetHours,
    endOffsetHours: stored.end_offset_hours ?? startOffsetHours + stored.duration_hours,
  };
}

function totalsOf(events: DutyEvent[]): DutyTotals {
  const totals = emptyTotals();
  events.forEach((event) => addToTotals(totals, event));
  return totals;
}

/**
 * Rebuilds daily logs from their serialized form. A log without a usable date
 * is dropped; an event without a usable start time is placed at the start of
 * its log's day.
 */
export function parseStoredDailyLogs(raw: unknown): DailyLog[] {
  const entries: unknown[] = Array.isArray(raw) ? raw : [];
  const logs: DailyLog[] = [];

  for (const entry of entries) {
    const parsed = storedLogSchema.safeParse(entry);
    const date = parsed.success ? parseDate(parsed.data.date) : null;

    if (!parsed.success || date === null) {
      logger.warn('Skipping stored daily log with an invalid date');
      continue;
    }

    const logDate = startOfUtcDay(date);
    const events = parsed.data.events
      .map((event) => parseStoredEvent(event, logDate))
      .filter((event): event is DutyEvent => event !== null);

    logs.push({
      date: logDate,
      events,
      totals: totalsOf(events),
      totalMiles:
        parsed.data.total_miles ??
        events.reduce((sum, event) => sum + (event.distanceMiles ?? 0), 0),
    });
  }

  if (logs.length === 0) {
    throw new NoValidLogsError('No valid daily logs could be parsed from the stored trip', {
      entries: entries.length,
    });
  }

  return logs;
}
