/**
 * Duty Status & Rest-Break Enumerations
 *
 * Source: 49 CFR §395.8 (record of duty status) and §395.1(g) (sleeper berth).
 */

// ─────────────────────────────────────────────────────────────────────────────
// DUTY STATUS
// ─────────────────────────────────────────────────────────────────────────────

/**
 * The four regulatory duty statuses. Exactly one applies to every duty event;
 * the free-text activity label ("Pickup", "Fueling") is separate.
 */
export enum DutyStatus {
  OFF_DUTY            = 'off_duty',
  SLEEPER_BERTH       = 'sleeper_berth',
  DRIVING             = 'driving',
  ON_DUTY_NOT_DRIVING = 'on_duty_not_driving',
}

/** Row index on the graph grid, top to bottom. */
export const DUTY_STATUS_GRID_ROWS: Record<DutyStatus, number> = {
  [DutyStatus.OFF_DUTY]:            0,
  [DutyStatus.SLEEPER_BERTH]:       1,
  [DutyStatus.DRIVING]:             2,
  [DutyStatus.ON_DUTY_NOT_DRIVING]: 3,
};

export function isOnDutyStatus(status: DutyStatus): boolean {
  return status === DutyStatus.DRIVING || status === DutyStatus.ON_DUTY_NOT_DRIVING;
}

// ─────────────────────────────────────────────────────────────────────────────
// REST BREAKS
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Kind of qualifying rest period a scheduled rest event represents.
 */
export enum RestBreakKind {
  /** Longer sleeper-berth period of a split rest (7h of 7/3). */
  SPLIT_SLEEPER_SEGMENT_1 = 'split_sleeper_segment_1',
  /** Shorter period that completes a split rest (3h of 7/3). */
  SPLIT_SLEEPER_SEGMENT_2 = 'split_sleeper_segment_2',
  /** 34 consecutive hours off duty; resets the weekly cycle. */
  FULL_RESTART            = 'full_restart',
  /** 10 consecutive hours in the sleeper berth. */
  FULL_REST               = 'full_rest',
}
