/**
 * Compliance Service
 *
 * Audits a finished timeline against the baseline 11-hour driving and 14-hour
 * on-duty limits. Shifts are re-derived from the events: any off-duty or
 * sleeper-berth period of 10 hours or more closes the shift. Only closed shifts
 * are audited; activity after the last such rest is not. Exceptions the simulator may have
 * applied (adverse conditions, short-haul, split sleeper) are not re-applied
 * here, so a plan that used one can be reported as non-compliant.
 */

import {
  DutyStatus,
  HOS_LIMITS,
  isOnDutyStatus,
  type ComplianceReport,
  type DutyEvent,
} from '@hos-planner/shared';

const TOLERANCE = 1e-6;

interface ShiftTotals {
  drivingHours: number;
  onDutyHours: number;
}

function auditShift(shift: ShiftTotals, index: number, violations: string[]): void {
  if (shift.drivingHours > HOS_LIMITS.MAX_DRIVING_HOURS + TOLERANCE) {
    violations.push(`Shift ${index + 1}: Exceeded ${HOS_LIMITS.MAX_DRIVING_HOURS}-hour driving limit`);
  }
  if (shift.onDutyHours > HOS_LIMITS.MAX_ON_DUTY_WINDOW_HOURS + TOLERANCE) {
    violations.push(
      `Shift ${index + 1}: Exceeded ${HOS_LIMITS.MAX_ON_DUTY_WINDOW_HOURS}-hour on-duty limit`
    );
  }
}

export function checkCompliance(events: DutyEvent[]): ComplianceReport {
  const shifts: ShiftTotals[] = [];
  let current: ShiftTotals = { drivingHours: 0, onDutyHours: 0 };
  let hasActivity = false;

  for (const event of events) {
    if (isOnDutyStatus(event.dutyStatus)) {
      current.onDutyHours += event.durationHours;
      if (event.dutyStatus === DutyStatus.DRIVING) {
        current.drivingHours += event.durationHours;
      }
      hasActivity = true;
      continue;
    }

    if (event.durationHours >= HOS_LIMITS.MIN_OFF_DUTY_HOURS - TOLERANCE) {
      if (hasActivity) {
        shifts.push(current);
      }
      current = { drivingHours: 0, onDutyHours: 0 };
      hasActivity = false;
    }
  }

  const violations: string[] = [];
  shifts.forEach((shift, index) => auditShift(shift, index, violations));

  return {
    compliant: violations.length === 0,
    violations,
    totalShifts: shifts.length,
  };
}
