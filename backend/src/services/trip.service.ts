/**
 * Trip Service
 *
 * Business logic behind the trip endpoints: route lookup, planning, persistence
 * and log-sheet previews of stored trips.
 */

import { parseDate, type Coordinates, type RouteLegMetrics } from '@hos-planner/shared';
import { NotFoundError } from '../models/errors/api-error';
import {
  toLogSheetResponse,
  toRouteDataResponse,
  toTripPlanResponse,
  type LocationResponse,
  type LogSheetResponse,
  type PlanTripBody,
  type RouteDataResponse,
} from '../models/dtos/trip.dto';
import type { TripRecord, TripStore } from '../repositories/trip.repository';
import { logger } from '../utils/logger';
import type { LocationResolver } from './location-resolver.service';
import { buildLogSheetPreview, parseStoredDailyLogs } from './log-sheet.service';
import type { RoutingProvider } from './routing.service';
import { calculateTripPlan } from './trip-plan.service';

export interface TripServiceDependencies {
  routing: RoutingProvider;
  locationResolver: LocationResolver;
  trips: TripStore;
  geocoderTimeoutMs: number;
  clock?: () => Date;
}

function toCoordinates(location: LocationResponse): Coordinates {
  return { latitude: location.lat, longitude: location.lon };
}

export class TripService {
  private readonly clock: () => Date;

  constructor(private readonly deps: TripServiceDependencies) {
    this.clock = deps.clock ?? (() => new Date());
  }

  /**
   * Plan a trip and store it. Route metrics come from the body when supplied,
   * otherwise from the routing provider.
   */
  async planTrip(body: PlanTripBody): Promise<TripRecord> {
    const current = toCoordinates(body.current_location);
    const pickup = toCoordinates(body.pickup_location);
    const dropoff = toCoordinates(body.dropoff_location);

    let routeLegs: RouteLegMetrics;
    let routeData: RouteDataResponse | null = null;

    if (body.route_legs) {
      routeLegs = {
        leg1: {
          distanceMiles: body.route_legs.leg1.distance_miles,
          durationHours: body.route_legs.leg1.duration_hours,
        },
        leg2: {
          distanceMiles: body.route_legs.leg2.distance_miles,
          durationHours: body.route_legs.leg2.duration_hours,
        },
      };
    } else {
      const route = await this.deps.routing.calculateMultiLegRoute(current, pickup, dropoff);
      routeLegs = { leg1: route.leg1, leg2: route.leg2 };
      routeData = toRouteDataResponse(route);
    }

    const startTime = parseDate(body.start_time) ?? this.clock();

    const plan = await calculateTripPlan(
      {
        current,
        pickup,
        dropoff,
        routeLegs,
        startTime,
        schedule: {
          weeklyMode: body.weekly_mode,
          currentCycleUsed: body.current_cycle_used,
          useSplitSleeper: body.use_split_sleeper,
          adverseConditions: body.use_adverse_conditions,
          airMileException: body.use_air_mile_exception,
          reportingLocationDwellDays: body.reporting_location_dwell_days,
        },
      },
      {
        locationResolver: this.deps.locationResolver,
        geocoderTimeoutMs: this.deps.geocoderTimeoutMs,
      }
    );

    const record = await this.deps.trips.save({
      current_location: body.current_location,
      pickup_location: body.pickup_location,
      dropoff_location: body.dropoff_location,
      current_cycle_used: body.current_cycle_used,
      weekly_mode: body.weekly_mode,
      driver_name: body.driver_name,
      carrier_name: body.carrier_name,
      main_office: body.main_office,
      vehicle_number: body.vehicle_number,
      trip_plan: toTripPlanResponse(plan),
      route_data: routeData,
    });

    logger.info('Trip planned', {
      tripId: record.id,
      distanceMiles: plan.totalDistanceMiles,
      routeFallback: routeData?.fallback ?? false,
    });

    return record;
  }

  async getTrip(tripId: string): Promise<TripRecord> {
    const record = await this.deps.trips.findById(tripId);
    if (record === null) {
      throw new NotFoundError('Trip');
    }
    return record;
  }

  async listTrips(limit: number): Promise<TripRecord[]> {
    return this.deps.trips.list(limit);
  }

  async getLogSheets(tripId: string): Promise<{ record: TripRecord; sheets: LogSheetResponse[] }> {
    const record = await this.getTrip(tripId);
    const dailyLogs = parseStoredDailyLogs(record.trip_plan.daily_logs);
    return { record, sheets: buildLogSheetPreview(dailyLogs).map(toLogSheetResponse) };
  }
}
