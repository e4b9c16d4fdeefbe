/**
 * Shared test fixtures
 */

import { DutyStatus, hoursBetween, type Coordinates, type DutyEvent, type RouteLeg } from '@hos-planner/shared';
import { DEFAULT_SCHEDULE_CONFIG, type ScheduleConfig } from '../../src/services/duty-schedule.service';
import { buildRouteLegs } from '../../src/services/route-leg.service';

export const CURRENT: Coordinates = { latitude: 41.88, longitude: -87.63 };
export const PICKUP: Coordinates = { latitude: 39.77, longitude: -86.16 };
export const DROPOFF: Coordinates = { latitude: 39.1, longitude: -84.51 };

export const START = new Date('2026-03-02T06:00:00.000Z');

export function legs(leg1Miles: number, leg2Miles: number): RouteLeg[] {
  return buildRouteLegs(CURRENT, PICKUP, DROPOFF, {
    leg1: { distanceMiles: leg1Miles, durationHours: leg1Miles / 60 },
    leg2: { distanceMiles: leg2Miles, durationHours: leg2Miles / 60 },
  });
}

export function scheduleConfig(overrides: Partial<ScheduleConfig> = {}): ScheduleConfig {
  return { ...DEFAULT_SCHEDULE_CONFIG, ...overrides };
}

export function dutyEvent(
  dutyStatus: DutyStatus,
  startTime: string,
  durationHours: number,
  overrides: Partial<DutyEvent> = {}
): DutyEvent {
  const start = new Date(startTime);
  const startOffsetHours = hoursBetween(START, start);
  return {
    activity: dutyStatus === DutyStatus.DRIVING ? 'Driving' : 'Activity',
    dutyStatus,
    startTime: start,
    durationHours,
    location: CURRENT,
    description: '',
    startOffsetHours,
    endOffsetHours: startOffsetHours + durationHours,
    ...overrides,
  };
}
