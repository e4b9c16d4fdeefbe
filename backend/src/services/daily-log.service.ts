/**
 * Daily Log Service
 *
 * Buckets a duty timeline into UTC calendar days. An event crossing midnight is
 * attributed entirely to the day it starts on.
 */

import {
  DutyStatus,
  startOfUtcDay,
  type DailyLog,
  type DutyEvent,
  type DutyTotals,
} from '@hos-planner/shared';

export function emptyTotals(): DutyTotals {
  return {
    drivingHours: 0,
    onDutyNotDrivingHours: 0,
    offDutyHours: 0,
    sleeperBerthHours: 0,
  };
}

export function addToTotals(totals: DutyTotals, event: DutyEvent): void {
  switch (event.dutyStatus) {
    case DutyStatus.DRIVING:
      totals.drivingHours += event.durationHours;
      break;
    case DutyStatus.ON_DUTY_NOT_DRIVING:
      totals.onDutyNotDrivingHours += event.durationHours;
      break;
    case DutyStatus.OFF_DUTY:
      totals.offDutyHours += event.durationHours;
      break;
    case DutyStatus.SLEEPER_BERTH:
      totals.sleeperBerthHours += event.durationHours;
      break;
  }
}

export function aggregateDailyLogs(events: DutyEvent[]): DailyLog[] {
  const logs: DailyLog[] = [];
  let current: DailyLog | null = null;

  for (const event of events) {
    const day = startOfUtcDay(event.startTime);

    if (current === null || current.date.getTime() !== day.getTime()) {
      current = { date: day, events: [], totals: emptyTotals(), totalMiles: 0 };
      logs.push(current);
    }

    current.events.push(event);
    addToTotals(current.totals, event);
    if (event.dutyStatus === DutyStatus.DRIVING) {
      current.totalMiles += event.distanceMiles ?? 0;
    }
  }

  return logs;
}
