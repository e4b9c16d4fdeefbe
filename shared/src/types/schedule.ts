import type { DutyStatus, RestBreakKind, WeeklyMode } from '../hos';
import type { Coordinates, PlaceName } from './location';

export type RestBreak =
  | {
      kind: RestBreakKind.SPLIT_SLEEPER_SEGMENT_1;
      segmentId: string;
      /** Filled in once the completing segment is scheduled. */
      pairedSegmentId: string | null;
      excludedFromWindow: true;
    }
  | {
      kind: RestBreakKind.SPLIT_SLEEPER_SEGMENT_2;
      segmentId: string;
      pairedSegmentId: string;
      excludedFromWindow: false;
    }
  | {
      kind: RestBreakKind.FULL_RESTART | RestBreakKind.FULL_REST;
      segmentId: string;
      excludedFromWindow: false;
    };

export interface DutyEvent {
  activity: string;
  dutyStatus: DutyStatus;
  startTime: Date;
  durationHours: number;
  /** Present on driving events only. */
  distanceMiles?: number;
  location: Coordinates;
  place?: PlaceName;
  description: string;
  restBreak?: RestBreak;
  startOffsetHours: number;
  endOffsetHours: number;
}

export interface DutyTotals {
  drivingHours: number;
  onDutyNotDrivingHours: number;
  offDutyHours: number;
  sleeperBerthHours: number;
}

export interface DailyLog {
  /** UTC midnight of the log day. */
  date: Date;
  events: DutyEvent[];
  totals: DutyTotals;
  totalMiles: number;
}

export interface ComplianceReport {
  compliant: boolean;
  violations: string[];
  totalShifts: number;
}

export interface DailyHoursEntry {
  date: string;
  onDutyHours: number;
}

export interface RollingHoursSummary {
  hoursUsed: number;
  hoursAvailable: number;
  weeklyMode: WeeklyMode;
  days: Array<{ date: string; onDutyHours: number }>;
  skippedEntries: number;
}

export interface TripSummary {
  startTime: Date;
  endTime: Date;
  totalDurationHours: number;
  totalDrivingHours: number;
  totalOnDutyHours: number;
  totalRestHours: number;
  numberOfStops: number;
  restBreaks: number;
}

export interface PlanWarning {
  code: 'LOCATION_UNRESOLVED';
  message: string;
  location: Coordinates;
}

export interface TripPlan {
  totalDistanceMiles: number;
  totalDrivingHours: number;
  estimatedTotalHours: number;
  events: DutyEvent[];
  dailyLogs: DailyLog[];
  compliance: ComplianceReport;
  summary: TripSummary;
  warnings: PlanWarning[];
}
