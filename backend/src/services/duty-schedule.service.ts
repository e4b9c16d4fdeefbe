/**
 * Duty Schedule Service
 *
 * Turns an ordered list of route legs into a contiguous duty-event timeline that
 * respects the property-carrying HOS limits (49 CFR §395.3):
 *
 *   - 11 hours driving per shift (13 under adverse conditions)
 *   - 14-hour on-duty window (16 with the short-haul exception, once per cycle)
 *   - 30-minute break after 8 hours of continuous driving
 *   - 70/8 or 60/7 weekly cycle, 34-hour restart when the cycle runs low
 *   - 10-hour rest, or a 7 + 3 split sleeper-berth rest when enabled
 *
 * Operational overhead (inspections, pickup, dropoff, fueling every 1000 miles)
 * is interleaved with driving. The simulation is synchronous; place names must
 * already be resolved onto the legs.
 */

import {
  DutyStatus,
  HOS_LIMITS,
  RestBreakKind,
  TRIP_OPERATIONS,
  WEEKLY_CYCLES,
  addHours,
  type Coordinates,
  type DutyEvent,
  type PlaceName,
  type RouteLeg,
  type WeeklyMode,
} from '@hos-planner/shared';
import { InsufficientInputError } from '../models/errors/api-error';
import { logger } from '../utils/logger';

// ============================================================================
// Types
// ============================================================================

export interface ScheduleConfig {
  weeklyMode: WeeklyMode;
  /** On-duty hours already used in the current weekly cycle. */
  currentCycleUsed: number;
  useSplitSleeper: boolean;
  adverseConditions: boolean;
  airMileException: boolean;
  /** Consecutive days the driver has reported to the same work location. */
  reportingLocationDwellDays: number;
}

export const DEFAULT_SCHEDULE_CONFIG: ScheduleConfig = {
  weeklyMode: '70/8',
  currentCycleUsed: 0,
  useSplitSleeper: false,
  adverseConditions: false,
  airMileException: false,
  reportingLocationDwellDays: 0,
};

export const DUTY_ACTIVITIES = {
  PRE_TRIP: 'Pre-Trip Inspection',
  POST_TRIP: 'Post-Trip Inspection',
  PICKUP: 'Pickup',
  DROPOFF: 'Dropoff',
  DRIVING: 'Driving',
  FUELING: 'Fueling',
  SHORT_BREAK: '30-Minute Break',
  FULL_REST: '10-Hour Rest Break',
  RESTART: '34-Hour Restart',
  SPLIT_FIRST: 'Sleeper Berth (7h)',
  SPLIT_SECOND: 'Sleeper Berth (3h)',
} as const;

/**
 * Mutable bookkeeping for a single plan call.
 */
export interface SimulationState {
  clock: Date;
  shiftDrivingHours: number;
  shiftOnDutyHours: number;
  continuousDrivingHours: number;
  distanceDrivenMiles: number;
  fuelStopsMade: number;
  /** Always within [0, weeklyMaxHours]. */
  remainingWeeklyHours: number;
  readonly weeklyMaxHours: number;
  pendingSplitSegment: { segmentId: string; eventIndex: number } | null;
  workReportingLocation: Coordinates | null;
  shortHaulExceptionsUsed: number;
  readonly adverseConditionsActive: boolean;
  readonly airMileExceptionActive: boolean;
  restSequence: number;
}

type DraftEvent = Omit<DutyEvent, 'startOffsetHours' | 'endOffsetHours'>;

interface Simulation {
  readonly config: ScheduleConfig;
  readonly state: SimulationState;
  readonly events: DraftEvent[];
}

interface Stop {
  location: Coordinates;
  place?: PlaceName;
}

const EPSILON = 1e-9;

function reached(value: number, limit: number): boolean {
  return value >= limit - EPSILON;
}

// ============================================================================
// State
// ============================================================================

export function createSimulationState(startTime: Date, config: ScheduleConfig): SimulationState {
  const weeklyMaxHours = WEEKLY_CYCLES[config.weeklyMode].maxHours;
  const remaining = Math.min(Math.max(weeklyMaxHours - config.currentCycleUsed, 0), weeklyMaxHours);

  return {
    clock: new Date(startTime.getTime()),
    shiftDrivingHours: 0,
    shiftOnDutyHours: 0,
    continuousDrivingHours: 0,
    distanceDrivenMiles: 0,
    fuelStopsMade: 0,
    remainingWeeklyHours: remaining,
    weeklyMaxHours,
    pendingSplitSegment: null,
    workReportingLocation: null,
    shortHaulExceptionsUsed: 0,
    adverseConditionsActive: config.adverseConditions,
    airMileExceptionActive: config.airMileException,
    restSequence: 0,
  };
}

function isShortHaulEligible({ state, config }: Simulation): boolean {
  return (
    state.airMileExceptionActive &&
    state.workReportingLocation !== null &&
    config.reportingLocationDwellDays >= HOS_LIMITS.SHORT_HAUL_MIN_DWELL_DAYS &&
    state.shortHaulExceptionsUsed < HOS_LIMITS.SHORT_HAUL_USES_PER_CYCLE
  );
}

function onDutyCeiling(sim: Simulation): number {
  return isShortHaulEligible(sim)
    ? HOS_LIMITS.SHORT_HAUL_ON_DUTY_WINDOW_HOURS
    : HOS_LIMITS.MAX_ON_DUTY_WINDOW_HOURS;
}

function drivingCeiling(state: SimulationState): number {
  return state.adverseConditionsActive
    ? HOS_LIMITS.MAX_DRIVING_HOURS + HOS_LIMITS.ADVERSE_CONDITIONS_EXTENSION_HOURS
    : HOS_LIMITS.MAX_DRIVING_HOURS;
}

function needsRest(sim: Simulation): boolean {
  const { state } = sim;
  return (
    reached(state.shiftDrivingHours, drivingCeiling(state)) ||
    reached(state.shiftOnDutyHours, onDutyCeiling(sim)) ||
    state.remainingWeeklyHours <= EPSILON
  );
}

function restoreWeeklyHours(state: SimulationState, hours: number): void {
  state.remainingWeeklyHours = Math.min(state.weeklyMaxHours, state.remainingWeeklyHours + hours);
}

function chargeWeeklyHours(state: SimulationState, hours: number): void {
  state.remainingWeeklyHours = Math.max(0, state.remainingWeeklyHours - hours);
}

// ============================================================================
// Event emission
// ============================================================================

/**
 * Appends an event at the current clock and advances it. Returns the index.
 */
function emit(sim: Simulation, event: Omit<DraftEvent, 'startTime'>): number {
  const { state, events } = sim;
  events.push({ ...event, startTime: new Date(state.clock.getTime()) });
  state.clock = addHours(state.clock, event.durationHours);
  return events.length - 1;
}

function nextSegmentId(state: SimulationState): string {
  state.restSequence += 1;
  return `rest-${state.restSequence}`;
}

// ============================================================================
// Rests
// ============================================================================

/**
 * Schedules the first qualifying rest: split segment 1, split segment 2,
 * 34-hour restart, or a standard 10-hour sleeper-berth rest.
 */
function takeRest(sim: Simulation, stop: Stop): void {
  const { state, config } = sim;

  // Any shift that ran past the regular window spent the exception.
  if (isShortHaulEligible(sim) && state.shiftOnDutyHours > HOS_LIMITS.MAX_ON_DUTY_WINDOW_HOURS + EPSILON) {
    state.shortHaulExceptionsUsed += 1;
  }

  if (config.useSplitSleeper && state.pendingSplitSegment === null) {
    const segmentId = nextSegmentId(state);
    const eventIndex = emit(sim, {
      activity: DUTY_ACTIVITIES.SPLIT_FIRST,
      dutyStatus: DutyStatus.SLEEPER_BERTH,
      durationHours: HOS_LIMITS.SPLIT_SLEEPER_LONG_HOURS,
      location: stop.location,
      place: stop.place,
      description: 'Split sleeper berth, first segment (excluded from 14-hour window)',
      restBreak: {
        kind: RestBreakKind.SPLIT_SLEEPER_SEGMENT_1,
        segmentId,
        pairedSegmentId: null,
        excludedFromWindow: true,
      },
    });

    state.pendingSplitSegment = { segmentId, eventIndex };
    state.shiftDrivingHours = 0;
    state.continuousDrivingHours = 0;
    return;
  }

  if (state.pendingSplitSegment !== null) {
    const pending = state.pendingSplitSegment;
    const segmentId = nextSegmentId(state);

    emit(sim, {
      activity: DUTY_ACTIVITIES.SPLIT_SECOND,
      dutyStatus: DutyStatus.SLEEPER_BERTH,
      durationHours: HOS_LIMITS.SPLIT_SLEEPER_SHORT_HOURS,
      location: stop.location,
      place: stop.place,
      description: 'Split sleeper berth, second segment (completes the rest period)',
      restBreak: {
        kind: RestBreakKind.SPLIT_SLEEPER_SEGMENT_2,
        segmentId,
        pairedSegmentId: pending.segmentId,
        excludedFromWindow: false,
      },
    });

    const first = sim.events[pending.eventIndex];
    const firstBreak = first.restBreak;
    if (firstBreak?.kind !== RestBreakKind.SPLIT_SLEEPER_SEGMENT_1) {
      throw new Error(`Pending split segment ${pending.segmentId} does not point at a first segment`);
    }
    sim.events[pending.eventIndex] = {
      ...first,
      restBreak: { ...firstBreak, pairedSegmentId: segmentId },
    };

    state.pendingSplitSegment = null;
    state.shiftDrivingHours = 0;
    state.shiftOnDutyHours = 0;
    state.continuousDrivingHours = 0;
    restoreWeeklyHours(state, HOS_LIMITS.MIN_OFF_DUTY_HOURS);
    return;
  }

  if (state.remainingWeeklyHours < HOS_LIMITS.RESTART_THRESHOLD_HOURS) {
    const restartAt = new Date(state.clock.getTime());
    emit(sim, {
      activity: DUTY_ACTIVITIES.RESTART,
      dutyStatus: DutyStatus.OFF_DUTY,
      durationHours: HOS_LIMITS.RESTART_HOURS,
      location: stop.location,
      place: stop.place,
      description: '34-hour restart to reset the weekly cycle',
      restBreak: {
        kind: RestBreakKind.FULL_RESTART,
        segmentId: nextSegmentId(state),
        excludedFromWindow: false,
      },
    });

    state.shiftDrivingHours = 0;
    state.shiftOnDutyHours = 0;
    state.continuousDrivingHours = 0;
    state.remainingWeeklyHours = state.weeklyMaxHours;
    state.shortHaulExceptionsUsed = 0;

    logger.debug('Scheduled 34-hour restart', { at: restartAt.toISOString() });
    return;
  }

  emit(sim, {
    activity: DUTY_ACTIVITIES.FULL_REST,
    dutyStatus: DutyStatus.SLEEPER_BERTH,
    durationHours: HOS_LIMITS.MIN_OFF_DUTY_HOURS,
    location: stop.location,
    place: stop.place,
    description: 'Required 10-hour rest period',
    restBreak: {
      kind: RestBreakKind.FULL_REST,
      segmentId: nextSegmentId(state),
      excludedFromWindow: false,
    },
  });

  state.shiftDrivingHours = 0;
  state.shiftOnDutyHours = 0;
  state.continuousDrivingHours = 0;
  restoreWeeklyHours(state, HOS_LIMITS.MIN_OFF_DUTY_HOURS);
}

/**
 * Rests until `hours` more on-duty time fits inside the current window.
 */
function ensureOnDutyCapacity(sim: Simulation, hours: number, stop: Stop): void {
  while (sim.state.shiftOnDutyHours + hours > onDutyCeiling(sim) + EPSILON) {
    takeRest(sim, stop);
  }
}

function performOnDuty(
  sim: Simulation,
  activity: string,
  hours: number,
  stop: Stop,
  description: string,
  chargesWeekly = false
): void {
  ensureOnDutyCapacity(sim, hours, stop);

  emit(sim, {
    activity,
    dutyStatus: DutyStatus.ON_DUTY_NOT_DRIVING,
    durationHours: hours,
    location: stop.location,
    place: stop.place,
    description,
  });

  sim.state.shiftOnDutyHours += hours;
  if (chargesWeekly) {
    chargeWeeklyHours(sim.state, hours);
  }
}

// ============================================================================
// Driving
// ============================================================================

function driveLeg(sim: Simulation, leg: RouteLeg): void {
  const { state } = sim;
  const stop: Stop = { location: leg.start, place: leg.startPlace };
  let remainingMiles = leg.distanceMiles;

  while (remainingMiles > EPSILON) {
    if (reached(state.continuousDrivingHours, HOS_LIMITS.BREAK_REQUIRED_AFTER_HOURS)) {
      emit(sim, {
        activity: DUTY_ACTIVITIES.SHORT_BREAK,
        dutyStatus: DutyStatus.OFF_DUTY,
        durationHours: HOS_LIMITS.MIN_BREAK_HOURS,
        location: stop.location,
        place: stop.place,
        description: 'Required 30-minute break after 8 hours of driving',
      });
      state.continuousDrivingHours = 0;
    }

    if (needsRest(sim)) {
      takeRest(sim, stop);
      continue;
    }

    const drivableHours = Math.min(
      HOS_LIMITS.BREAK_REQUIRED_AFTER_HOURS - state.continuousDrivingHours,
      drivingCeiling(state) - state.shiftDrivingHours,
      onDutyCeiling(sim) - state.shiftOnDutyHours,
      state.remainingWeeklyHours
    );
    const nextFuelMile = (state.fuelStopsMade + 1) * TRIP_OPERATIONS.FUELING_INTERVAL_MILES;
    const miles = Math.min(
      remainingMiles,
      drivableHours * TRIP_OPERATIONS.AVERAGE_SPEED_MPH,
      nextFuelMile - state.distanceDrivenMiles
    );

    if (!(miles > 0)) {
      throw new Error(
        `Duty schedule made no progress at ${state.clock.toISOString()} (${remainingMiles} miles left)`
      );
    }

    const hours = miles / TRIP_OPERATIONS.AVERAGE_SPEED_MPH;
    emit(sim, {
      activity: DUTY_ACTIVITIES.DRIVING,
      dutyStatus: DutyStatus.DRIVING,
      durationHours: hours,
      distanceMiles: miles,
      location: stop.location,
      place: stop.place,
      description: `Driving - ${leg.description}`,
    });

    state.shiftDrivingHours += hours;
    state.shiftOnDutyHours += hours;
    state.continuousDrivingHours += hours;
    state.distanceDrivenMiles += miles;
    chargeWeeklyHours(state, hours);

    remainingMiles -= miles;
    if (remainingMiles <= EPSILON) {
      remainingMiles = 0;
    }

    if (reached(state.distanceDrivenMiles, nextFuelMile)) {
      state.fuelStopsMade += 1;
      performOnDuty(
        sim,
        DUTY_ACTIVITIES.FUELING,
        TRIP_OPERATIONS.FUELING_HOURS,
        stop,
        `Fuel stop after ${nextFuelMile} miles`,
        true
      );
    }
  }
}

// ============================================================================
// Entry point
// ============================================================================

/**
 * Simulate the full duty timeline for the given legs.
 *
 * Offsets are hours from `startTime` and contiguous: each event ends exactly
 * where the next one starts.
 */
export function simulateDutySchedule(
  legs: RouteLeg[],
  startTime: Date,
  config: ScheduleConfig = DEFAULT_SCHEDULE_CONFIG
): DutyEvent[] {
  if (legs.length === 0) {
    throw new InsufficientInputError('At least one route leg is required to build a schedule');
  }

  const sim: Simulation = {
    config,
    state: createSimulationState(startTime, config),
    events: [],
  };

  for (const leg of legs) {
    const stop: Stop = { location: leg.start, place: leg.startPlace };

    if (leg.kind === 'to_pickup') {
      if (sim.state.workReportingLocation === null) {
        sim.state.workReportingLocation = leg.start;
      }
      performOnDuty(
        sim,
        DUTY_ACTIVITIES.PRE_TRIP,
        TRIP_OPERATIONS.INSPECTION_HOURS,
        stop,
        'Pre-trip vehicle inspection'
      );
    } else {
      performOnDuty(
        sim,
        DUTY_ACTIVITIES.PICKUP,
        TRIP_OPERATIONS.PICKUP_DROPOFF_HOURS,
        stop,
        'Loading at pickup location'
      );
    }

    driveLeg(sim, leg);
  }

  const finalLeg = legs[legs.length - 1];
  const destination: Stop = { location: finalLeg.end, place: finalLeg.endPlace };
  performOnDuty(
    sim,
    DUTY_ACTIVITIES.DROPOFF,
    TRIP_OPERATIONS.PICKUP_DROPOFF_HOURS,
    destination,
    'Unloading at dropoff location'
  );
  performOnDuty(
    sim,
    DUTY_ACTIVITIES.POST_TRIP,
    TRIP_OPERATIONS.INSPECTION_HOURS,
    destination,
    'Post-trip vehicle inspection'
  );

  logger.debug('Duty schedule simulated', {
    legs: legs.length,
    events: sim.events.length,
    distanceMiles: sim.state.distanceDrivenMiles,
    fuelStops: sim.state.fuelStopsMade,
  });

  return assignOffsets(sim.events);
}

function assignOffsets(drafts: DraftEvent[]): DutyEvent[] {
  let offset = 0;
  return drafts.map((draft) => {
    const startOffsetHours = offset;
    offset += draft.durationHours;
    return { ...draft, startOffsetHours, endOffsetHours: offset };
  });
}
