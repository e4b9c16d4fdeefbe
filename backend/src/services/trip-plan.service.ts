/**
 * Trip Plan Service
 *
 * Orchestrates a plan: legs → place resolution → duty schedule → daily logs,
 * compliance and summary.
 */

import {
  DutyStatus,
  addHours,
  roundTo,
  type Coordinates,
  type DutyEvent,
  type PlaceName,
  type PlanWarning,
  type RouteLeg,
  type RouteLegMetrics,
  type TripPlan,
  type TripSummary,
} from '@hos-planner/shared';
import { checkCompliance } from './compliance.service';
import { aggregateDailyLogs } from './daily-log.service';
import { DUTY_ACTIVITIES, simulateDutySchedule, type ScheduleConfig } from './duty-schedule.service';
import { resolvePlace, type LocationResolver } from './location-resolver.service';
import { buildRouteLegs } from './route-leg.service';
import { logHelpers } from '../utils/logger';

export interface TripPlanRequest {
  current: Coordinates;
  pickup: Coordinates;
  dropoff: Coordinates;
  routeLegs: RouteLegMetrics;
  startTime: Date;
  schedule: ScheduleConfig;
}

export interface TripPlanDependencies {
  locationResolver: LocationResolver;
  geocoderTimeoutMs: number;
}

function coordinateKey({ latitude, longitude }: Coordinates): string {
  return `${latitude},${longitude}`;
}

/**
 * Resolves every distinct leg endpoint once and stamps the places onto the legs.
 */
async function attachPlaces(
  legs: RouteLeg[],
  deps: TripPlanDependencies
): Promise<{ legs: RouteLeg[]; warnings: PlanWarning[] }> {
  const points = new Map<string, Coordinates>();
  for (const leg of legs) {
    points.set(coordinateKey(leg.start), leg.start);
    points.set(coordinateKey(leg.end), leg.end);
  }

  const places = new Map<string, PlaceName>();
  const warnings: PlanWarning[] = [];

  const resolutions = await Promise.all(
    [...points.entries()].map(async ([key, point]) => ({
      key,
      point,
      resolution: await resolvePlace(deps.locationResolver, point, deps.geocoderTimeoutMs),
    }))
  );

  for (const { key, point, resolution } of resolutions) {
    places.set(key, resolution.place);
    if (resolution.status === 'failed') {
      warnings.push({ code: 'LOCATION_UNRESOLVED', message: resolution.reason, location: point });
    }
  }

  return {
    legs: legs.map((leg) => ({
      ...leg,
      startPlace: places.get(coordinateKey(leg.start)),
      endPlace: places.get(coordinateKey(leg.end)),
    })),
    warnings,
  };
}

export function buildTripSummary(events: DutyEvent[]): TripSummary {
  const first = events[0];
  const last = events[events.length - 1];

  let drivingHours = 0;
  let onDutyHours = 0;
  let restHours = 0;
  let numberOfStops = 0;
  let restBreaks = 0;

  for (const event of events) {
    switch (event.dutyStatus) {
      case DutyStatus.DRIVING:
        drivingHours += event.durationHours;
        onDutyHours += event.durationHours;
        break;
      case DutyStatus.ON_DUTY_NOT_DRIVING:
        onDutyHours += event.durationHours;
        break;
      case DutyStatus.OFF_DUTY:
      case DutyStatus.SLEEPER_BERTH:
        restHours += event.durationHours;
        break;
    }

    if (event.activity === DUTY_ACTIVITIES.FUELING || event.activity === DUTY_ACTIVITIES.SHORT_BREAK) {
      numberOfStops += 1;
    }
    if (event.restBreak !== undefined) {
      restBreaks += 1;
    }
  }

  return {
    startTime: first.startTime,
    endTime: addHours(last.startTime, last.durationHours),
    totalDurationHours: roundTo(last.endOffsetHours, 2),
    totalDrivingHours: roundTo(drivingHours, 2),
    totalOnDutyHours: roundTo(onDutyHours, 2),
    totalRestHours: roundTo(restHours, 2),
    numberOfStops,
    restBreaks,
  };
}

export async function calculateTripPlan(
  request: TripPlanRequest,
  deps: TripPlanDependencies
): Promise<TripPlan> {
  const baseLegs = buildRouteLegs(request.current, request.pickup, request.dropoff, request.routeLegs);
  const { legs, warnings } = await attachPlaces(baseLegs, deps);

  const events = simulateDutySchedule(legs, request.startTime, request.schedule);
  const dailyLogs = aggregateDailyLogs(events);
  const compliance = checkCompliance(events);
  const summary = buildTripSummary(events);

  const plan: TripPlan = {
    totalDistanceMiles: roundTo(legs.reduce((sum, leg) => sum + leg.distanceMiles, 0), 1),
    totalDrivingHours: roundTo(legs.reduce((sum, leg) => sum + leg.durationHours, 0), 1),
    estimatedTotalHours: roundTo(events[events.length - 1].endOffsetHours, 2),
    events,
    dailyLogs,
    compliance,
    summary,
    warnings,
  };

  logHelpers.business('trip_planned', {
    legs: legs.length,
    distanceMiles: plan.totalDistanceMiles,
    days: dailyLogs.length,
    compliant: compliance.compliant,
    warnings: warnings.length,
  });

  return plan;
}
