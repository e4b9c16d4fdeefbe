/**
 * Trip DTOs
 *
 * Request schemas and snake_case response shapes for the trip endpoints.
 * The serialized plan is also what gets persisted with a trip record.
 */

import { z } from 'zod';
import {
  planTripSchema,
  toIsoDate,
  type DailyLog,
  type DutyEvent,
  type DutyStatus,
  type PlanWarning,
  type RestBreakKind,
  type TripPlan,
} from '@hos-planner/shared';
import type { LogSheetPreview } from '../../services/log-sheet.service';
import type { RouteData } from '../../services/routing.service';

// ============================================================================
// Requests
// ============================================================================

export const PlanTripBodySchema = planTripSchema;

export type PlanTripBody = z.infer<typeof PlanTripBodySchema>;

export const TripIdParamsSchema = z.object({
  tripId: z.string().trim().min(1).max(64),
});

export type TripIdParams = z.infer<typeof TripIdParamsSchema>;

export const ListTripsQuerySchema = z.object({
  limit: z.coerce.number().int().positive().max(100).default(20),
});

export type ListTripsQuery = z.infer<typeof ListTripsQuerySchema>;

// ============================================================================
// Responses
// ============================================================================

export interface LocationResponse {
  lat: number;
  lon: number;
  address?: string;
}

export interface DutyEventResponse {
  activity: string;
  duty_status: DutyStatus;
  start_time: string;
  duration_hours: number;
  distance_miles?: number;
  location: { lat: number; lon: number };
  place?: { city: string; region: string };
  description: string;
  rest_break?: {
    kind: RestBreakKind;
    segment_id: string;
    paired_segment_id: string | null;
    excluded_from_window: boolean;
  };
  start_offset_hours: number;
  end_offset_hours: number;
}

export interface DailyLogResponse {
  date: string;
  events: DutyEventResponse[];
  total_driving: number;
  total_on_duty_not_driving: number;
  total_off_duty: number;
  total_sleeper: number;
  total_miles: number;
}

export interface TripPlanResponse {
  total_distance_miles: number;
  total_driving_hours: number;
  estimated_total_hours: number;
  events: DutyEventResponse[];
  daily_logs: DailyLogResponse[];
  compliance: {
    compliant: boolean;
    violations: string[];
    total_shifts: number;
  };
  summary: {
    start_time: string;
    end_time: string;
    total_duration_hours: number;
    total_driving_hours: number;
    total_on_duty_hours: number;
    total_rest_hours: number;
    number_of_stops: number;
    rest_breaks: number;
  };
  warnings: PlanWarningResponse[];
}

export interface PlanWarningResponse {
  code: PlanWarning['code'];
  message: string;
  location: { lat: number; lon: number };
}

export interface RouteDataResponse {
  leg1: { distance_miles: number; duration_hours: number; route_points: Array<{ lat: number; lon: number }> };
  leg2: { distance_miles: number; duration_hours: number; route_points: Array<{ lat: number; lon: number }> };
  total_distance_miles: number;
  total_duration_hours: number;
  fallback: boolean;
}

// ============================================================================
// Mappers
// ============================================================================

export function toDutyEventResponse(event: DutyEvent): DutyEventResponse {
  const response: DutyEventResponse = {
    activity: event.activity,
    duty_status: event.dutyStatus,
    start_time: event.startTime.toISOString(),
    duration_hours: event.durationHours,
    location: { lat: event.location.latitude, lon: event.location.longitude },
    description: event.description,
    start_offset_hours: event.startOffsetHours,
    end_offset_hours: event.endOffsetHours,
  };

  if (event.distanceMiles !== undefined) {
    response.distance_miles = event.distanceMiles;
  }
  if (event.place) {
    response.place = { city: event.place.city, region: event.place.region };
  }
  if (event.restBreak) {
    const { restBreak } = event;
    response.rest_break = {
      kind: restBreak.kind,
      segment_id: restBreak.segmentId,
      paired_segment_id: 'pairedSegmentId' in restBreak ? restBreak.pairedSegmentId : null,
      excluded_from_window: restBreak.excludedFromWindow,
    };
  }

  return response;
}

export function toDailyLogResponse(log: DailyLog): DailyLogResponse {
  return {
    date: toIsoDate(log.date),
    events: log.events.map(toDutyEventResponse),
    total_driving: log.totals.drivingHours,
    total_on_duty_not_driving: log.totals.onDutyNotDrivingHours,
    total_off_duty: log.totals.offDutyHours,
    total_sleeper: log.totals.sleeperBerthHours,
    total_miles: log.totalMiles,
  };
}

export function toTripPlanResponse(plan: TripPlan): TripPlanResponse {
  return {
    total_distance_miles: plan.totalDistanceMiles,
    total_driving_hours: plan.totalDrivingHours,
    estimated_total_hours: plan.estimatedTotalHours,
    events: plan.events.map(toDutyEventResponse),
    daily_logs: plan.dailyLogs.map(toDailyLogResponse),
    compliance: {
      compliant: plan.compliance.compliant,
      violations: plan.compliance.violations,
      total_shifts: plan.compliance.totalShifts,
    },
    summary: {
      start_time: plan.summary.startTime.toISOString(),
      end_time: plan.summary.endTime.toISOString(),
      total_duration_hours: plan.summary.totalDurationHours,
      total_driving_hours: plan.summary.totalDrivingHours,
      total_on_duty_hours: plan.summary.totalOnDutyHours,
      total_rest_hours: plan.summary.totalRestHours,
      number_of_stops: plan.summary.numberOfStops,
      rest_breaks: plan.summary.restBreaks,
    },
    warnings: plan.warnings.map((warning) => ({
      code: warning.code,
      message: warning.message,
      location: { lat: warning.location.latitude, lon: warning.location.longitude },
    })),
  };
}

export function toRouteDataResponse(route: RouteData): RouteDataResponse {
  const leg = (data: RouteData['leg1']) => ({
    distance_miles: data.distanceMiles,
    duration_hours: data.durationHours,
    route_points: data.routePoints.map((point) => ({ lat: point.latitude, lon: point.longitude })),
  });

  return {
    leg1: leg(route.leg1),
    leg2: leg(route.leg2),
    total_distance_miles: route.totalDistanceMiles,
    total_duration_hours: route.totalDurationHours,
    fallback: route.fallback,
  };
}

export interface LogSheetResponse {
  date: string;
  total_miles: number;
  total_driving: number;
  total_on_duty_not_driving: number;
  total_off_duty: number;
  total_sleeper: number;
  total_hours: number;
  grid: {
    segments: Array<{ status: DutyStatus; row: number; start_hour: number; end_hour: number }>;
    transitions: Array<{ hour: number; from_row: number; to_row: number }>;
  };
  remarks: string[];
  activities: Array<{
    time: string;
    activity: string;
    duty_status: DutyStatus;
    duration_hours: number;
    description: string;
  }>;
}

export function toLogSheetResponse(sheet: LogSheetPreview): LogSheetResponse {
  return {
    date: sheet.date,
    total_miles: sheet.totalMiles,
    total_driving: sheet.totals.drivingHours,
    total_on_duty_not_driving: sheet.totals.onDutyNotDrivingHours,
    total_off_duty: sheet.totals.offDutyHours,
    total_sleeper: sheet.totals.sleeperBerthHours,
    total_hours: sheet.totalHours,
    grid: {
      segments: sheet.segments.map((segment) => ({
        status: segment.status,
        row: segment.row,
        start_hour: segment.startHour,
        end_hour: segment.endHour,
      })),
      transitions: sheet.transitions.map((transition) => ({
        hour: transition.hour,
        from_row: transition.fromRow,
        to_row: transition.toRow,
      })),
    },
    remarks: sheet.remarks,
    activities: sheet.activities.map((activity) => ({
      time: activity.time,
      activity: activity.activity,
      duty_status: activity.dutyStatus,
      duration_hours: activity.durationHours,
      description: activity.description,
    })),
  };
}
