/**
 * Duty Schedule Unit Tests
 */

import { describe, it, expect } from '@jest/globals';
import { DutyStatus, RestBreakKind, hoursBetween, type DutyEvent } from '@hos-planner/shared';
import {
  createSimulationState,
  simulateDutySchedule,
  type ScheduleConfig,
} from '../../src/services/duty-schedule.service';
import { InsufficientInputError } from '../../src/models/errors/api-error';
import { DROPOFF, START, legs, scheduleConfig } from '../helpers/fixtures';

const TOLERANCE = 1e-6;

function activities(events: DutyEvent[]): string[] {
  return events.map((event) => event.activity);
}

function drivingBeforeFirstRest(events: DutyEvent[]): number {
  let hours = 0;
  for (const event of events) {
    if (event.restBreak !== undefined) break;
    if (event.dutyStatus === DutyStatus.DRIVING) hours += event.durationHours;
  }
  return hours;
}

interface ShiftTotals {
  drivingHours: number;
  onDutyHours: number;
}

/**
 * Shift totals as the simulator tracks them: a full rest, a restart or the
 * second split segment ends a shift.
 */
function shiftTotals(events: DutyEvent[]): ShiftTotals[] {
  const shifts: ShiftTotals[] = [{ drivingHours: 0, onDutyHours: 0 }];
  for (const event of events) {
    const kind = event.restBreak?.kind;
    if (
      kind === RestBreakKind.FULL_REST ||
      kind === RestBreakKind.FULL_RESTART ||
      kind === RestBreakKind.SPLIT_SLEEPER_SEGMENT_2
    ) {
      shifts.push({ drivingHours: 0, onDutyHours: 0 });
      continue;
    }
    const current = shifts[shifts.length - 1];
    if (event.dutyStatus === DutyStatus.DRIVING) {
      current.drivingHours += event.durationHours;
      current.onDutyHours += event.durationHours;
    } else if (event.dutyStatus === DutyStatus.ON_DUTY_NOT_DRIVING) {
      current.onDutyHours += event.durationHours;
    }
  }
  return shifts;
}

/** Longest stretch of driving not interrupted by an off-duty or sleeper period. */
function longestContinuousDriving(events: DutyEvent[]): number {
  let longest = 0;
  let current = 0;
  for (const event of events) {
    if (event.dutyStatus === DutyStatus.DRIVING) {
      current += event.durationHours;
      longest = Math.max(longest, current);
    } else if (event.dutyStatus === DutyStatus.OFF_DUTY || event.dutyStatus === DutyStatus.SLEEPER_BERTH) {
      current = 0;
    }
  }
  return longest;
}

describe('simulateDutySchedule', () => {
  describe('short trip', () => {
    const events = simulateDutySchedule(legs(100, 100), START, scheduleConfig());

    it('should interleave inspections, pickup and dropoff with driving', () => {
      expect(activities(events)).toEqual([
        'Pre-Trip Inspection',
        'Driving',
        'Pickup',
        'Driving',
        'Dropoff',
        'Post-Trip Inspection',
      ]);
    });

    it('should drive at 60 mph', () => {
      expect(events[1].distanceMiles).toBe(100);
      expect(events[1].durationHours).toBeCloseTo(100 / 60, 9);
      expect(events[1].description).toBe('Driving - Current Location to Pickup');
      expect(events[3].description).toBe('Driving - Pickup to Dropoff');
    });

    it('should produce contiguous offsets', () => {
      expect(events[0].startOffsetHours).toBe(0);
      for (let i = 1; i < events.length; i++) {
        expect(events[i].startOffsetHours).toBe(events[i - 1].endOffsetHours);
      }
      expect(events[events.length - 1].endOffsetHours).toBeCloseTo(5.8333, 4);
    });

    it('should anchor start times to the offsets', () => {
      for (const event of events) {
        expect(hoursBetween(START, event.startTime)).toBeCloseTo(event.startOffsetHours, 5);
      }
    });

    it('should place the dropoff at the destination', () => {
      expect(events[4].location).toEqual(DROPOFF);
      expect(events[4].dutyStatus).toBe(DutyStatus.ON_DUTY_NOT_DRIVING);
      expect(events[4].durationHours).toBe(1);
    });
  });

  describe('long trip', () => {
    const events = simulateDutySchedule(legs(400, 600), START, scheduleConfig());

    it('should schedule a break, a 10-hour rest and a fuel stop', () => {
      expect(activities(events)).toEqual([
        'Pre-Trip Inspection',
        'Driving',
        'Pickup',
        'Driving',
        '30-Minute Break',
        'Driving',
        '10-Hour Rest Break',
        'Driving',
        'Fueling',
        'Dropoff',
        'Post-Trip Inspection',
      ]);
    });

    it('should take the 30-minute break after 8 hours of driving', () => {
      expect(events[3].distanceMiles).toBeCloseTo(80, 6);
      expect(events[4].dutyStatus).toBe(DutyStatus.OFF_DUTY);
      expect(events[4].durationHours).toBe(0.5);
      expect(events[4].startOffsetHours).toBeCloseTo(9.25, 6);
    });

    it('should rest after 11 hours of driving', () => {
      expect(drivingBeforeFirstRest(events)).toBeCloseTo(11, 6);

      const rest = events[6];
      expect(rest.dutyStatus).toBe(DutyStatus.SLEEPER_BERTH);
      expect(rest.durationHours).toBe(10);
      expect(rest.startOffsetHours).toBeCloseTo(12.75, 6);
      expect(rest.restBreak).toEqual({
        kind: RestBreakKind.FULL_REST,
        segmentId: 'rest-1',
        excludedFromWindow: false,
      });
    });

    it('should fuel after 1000 miles', () => {
      expect(events[7].distanceMiles).toBeCloseTo(340, 6);
      expect(events[8].description).toBe('Fuel stop after 1000 miles');
      expect(events[8].durationHours).toBe(0.5);
    });

    it('should cover the full distance', () => {
      const miles = events.reduce((sum, event) => sum + (event.distanceMiles ?? 0), 0);
      expect(miles).toBeCloseTo(1000, 6);
    });
  });

  describe('weekly cycle', () => {
    it('should take a 34-hour restart when the cycle is used up', () => {
      const events = simulateDutySchedule(
        legs(100, 100),
        START,
        scheduleConfig({ currentCycleUsed: 70 })
      );

      expect(events[0].activity).toBe('Pre-Trip Inspection');
      expect(events[1].activity).toBe('34-Hour Restart');
      expect(events[1].dutyStatus).toBe(DutyStatus.OFF_DUTY);
      expect(events[1].durationHours).toBe(34);
      expect(events[1].restBreak?.kind).toBe(RestBreakKind.FULL_RESTART);
      expect(events[2].activity).toBe('Driving');
    });

    it('should restart mid-trip once the 60/7 cycle runs out', () => {
      const events = simulateDutySchedule(
        legs(100, 400),
        START,
        scheduleConfig({ weeklyMode: '60/7', currentCycleUsed: 55 })
      );

      expect(activities(events).slice(0, 6)).toEqual([
        'Pre-Trip Inspection',
        'Driving',
        'Pickup',
        'Driving',
        '34-Hour Restart',
        'Driving',
      ]);
      expect(events[3].distanceMiles).toBeCloseTo(200, 6);
    });
  });

  describe('split sleeper berth', () => {
    const events = simulateDutySchedule(
      legs(10, 900),
      START,
      scheduleConfig({ useSplitSleeper: true })
    );

    it('should replace the 10-hour rest with a 7 + 3 split', () => {
      expect(activities(events)).toEqual([
        'Pre-Trip Inspection',
        'Driving',
        'Pickup',
        'Driving',
        '30-Minute Break',
        'Driving',
        'Sleeper Berth (7h)',
        'Driving',
        'Sleeper Berth (3h)',
        'Driving',
        'Dropoff',
        'Post-Trip Inspection',
      ]);
      expect(events[6].durationHours).toBe(7);
      expect(events[8].durationHours).toBe(3);
    });

    it('should pair the two segments', () => {
      expect(events[6].restBreak).toEqual({
        kind: RestBreakKind.SPLIT_SLEEPER_SEGMENT_1,
        segmentId: 'rest-1',
        pairedSegmentId: 'rest-2',
        excludedFromWindow: true,
      });
      expect(events[8].restBreak).toEqual({
        kind: RestBreakKind.SPLIT_SLEEPER_SEGMENT_2,
        segmentId: 'rest-2',
        pairedSegmentId: 'rest-1',
        excludedFromWindow: false,
      });
    });

    it('should keep the first segment out of the 14-hour window', () => {
      // 12.25 on-duty hours before the first segment leave 1.75 hours of driving
      expect(events[7].durationHours).toBeCloseTo(1.75, 6);
      expect(events[7].distanceMiles).toBeCloseTo(105, 6);
      expect(events[9].distanceMiles).toBeCloseTo(145, 6);
    });
  });

  describe('exceptions', () => {
    it('should allow 13 hours of driving under adverse conditions', () => {
      const events = simulateDutySchedule(
        legs(10, 780),
        START,
        scheduleConfig({ adverseConditions: true })
      );

      // the 14-hour window closes first
      expect(drivingBeforeFirstRest(events)).toBeCloseTo(12.75, 6);
    });

    it('should extend the window to 16 hours with the short-haul exception', () => {
      const events = simulateDutySchedule(
        legs(10, 780),
        START,
        scheduleConfig({ adverseConditions: true, airMileException: true, reportingLocationDwellDays: 5 })
      );

      expect(drivingBeforeFirstRest(events)).toBeCloseTo(13, 6);
    });

    it('should not apply the short-haul exception below the dwell requirement', () => {
      const events = simulateDutySchedule(
        legs(10, 780),
        START,
        scheduleConfig({ adverseConditions: true, airMileException: true, reportingLocationDwellDays: 4 })
      );

      expect(drivingBeforeFirstRest(events)).toBeCloseTo(12.75, 6);
    });

    it('should spend the short-haul exception when a shift ends on the driving limit', () => {
      const events = simulateDutySchedule(
        legs(10, 1550),
        START,
        scheduleConfig({ adverseConditions: true, airMileException: true, reportingLocationDwellDays: 5 })
      );

      const onDuty = shiftTotals(events).map((shift) => shift.onDutyHours);
      expect(onDuty).toHaveLength(3);
      // first shift ends on 13 hours of driving at 14.42 hours on duty
      expect(onDuty[0]).toBeCloseTo(14 + 5 / 12, 6);
      expect(onDuty[1]).toBeCloseTo(13.5, 6);
      expect(onDuty[2]).toBeCloseTo(1.25, 6);
      expect(onDuty.filter((hours) => hours > 14 + TOLERANCE)).toHaveLength(1);
    });
  });

  describe('createSimulationState', () => {
    it.each([
      ['70/8', 0, 70],
      ['70/8', 25.5, 44.5],
      ['70/8', 70, 0],
      ['60/7', 0, 60],
      ['60/7', 55, 5],
      ['60/7', 70, 0],
    ] as const)('should start a %s cycle with %d hours used at %d remaining', (weeklyMode, used, remaining) => {
      const state = createSimulationState(START, scheduleConfig({ weeklyMode, currentCycleUsed: used }));

      expect(state.remainingWeeklyHours).toBe(remaining);
      expect(state.remainingWeeklyHours).toBeGreaterThanOrEqual(0);
      expect(state.remainingWeeklyHours).toBeLessThanOrEqual(state.weeklyMaxHours);
      expect(state.weeklyMaxHours).toBe(weeklyMode === '70/8' ? 70 : 60);
    });
  });

  describe('timeline invariants', () => {
    const distances: Array<[number, number]> = [
      [50, 50],
      [300, 500],
      [10, 1550],
      [600, 1400],
      [1200, 1800],
    ];
    const configs: Array<[string, Partial<ScheduleConfig>]> = [
      ['default', {}],
      ['60/7 near the limit', { weeklyMode: '60/7', currentCycleUsed: 55 }],
      ['70/8 used up', { currentCycleUsed: 70 }],
      ['split sleeper', { useSplitSleeper: true }],
      ['adverse conditions', { adverseConditions: true }],
      ['short-haul', { airMileException: true, reportingLocationDwellDays: 5 }],
      [
        'every option',
        {
          weeklyMode: '60/7',
          currentCycleUsed: 40,
          useSplitSleeper: true,
          adverseConditions: true,
          airMileException: true,
          reportingLocationDwellDays: 5,
        },
      ],
    ];
    const cases = distances.flatMap(([leg1, leg2]) =>
      configs.map(([label, overrides]) => [leg1, leg2, label, overrides] as const)
    );

    it.each(cases)('%d + %d miles (%s)', (leg1, leg2, _label, overrides) => {
      const config = scheduleConfig(overrides);
      const events = simulateDutySchedule(legs(leg1, leg2), START, config);

      expect(events[0].startOffsetHours).toBe(0);
      for (let i = 1; i < events.length; i++) {
        expect(events[i].startOffsetHours).toBe(events[i - 1].endOffsetHours);
      }

      const miles = events.reduce((sum, event) => sum + (event.distanceMiles ?? 0), 0);
      expect(miles).toBeCloseTo(leg1 + leg2, 6);

      expect(longestContinuousDriving(events)).toBeLessThanOrEqual(8 + TOLERANCE);

      const shifts = shiftTotals(events);
      const baseline = !config.useSplitSleeper && !config.adverseConditions && !config.airMileException;
      if (baseline) {
        for (const shift of shifts) {
          expect(shift.drivingHours).toBeLessThanOrEqual(11 + TOLERANCE);
          expect(shift.onDutyHours).toBeLessThanOrEqual(14 + TOLERANCE);
        }
      }
      expect(shifts.filter((shift) => shift.onDutyHours > 14 + TOLERANCE).length).toBeLessThanOrEqual(
        config.airMileException ? 1 : config.useSplitSleeper ? shifts.length : 0
      );
    });
  });

  it('should reject an empty leg list', () => {
    expect(() => simulateDutySchedule([], START, scheduleConfig())).toThrow(InsufficientInputError);
  });
});
