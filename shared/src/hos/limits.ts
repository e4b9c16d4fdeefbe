/**
 * HOS Limits for property-carrying CMV drivers (49 CFR §395.3, §395.1).
 *
 * All values are hours unless the name says otherwise.
 */

export const WEEKLY_MODES = ['70/8', '60/7'] as const;

export type WeeklyMode = (typeof WEEKLY_MODES)[number];

export interface WeeklyCycle {
  maxHours: number;
  days: number;
}

export const WEEKLY_CYCLES: Record<WeeklyMode, WeeklyCycle> = {
  '70/8': { maxHours: 70, days: 8 },
  '60/7': { maxHours: 60, days: 7 },
};

export const HOS_LIMITS = {
  MAX_DRIVING_HOURS: 11,
  /** §395.1(b)(1) adverse driving conditions */
  ADVERSE_CONDITIONS_EXTENSION_HOURS: 2,
  MAX_ON_DUTY_WINDOW_HOURS: 14,
  /** §395.1(o) 16-hour short-haul exception */
  SHORT_HAUL_ON_DUTY_WINDOW_HOURS: 16,
  SHORT_HAUL_MIN_DWELL_DAYS: 5,
  SHORT_HAUL_USES_PER_CYCLE: 1,
  MIN_OFF_DUTY_HOURS: 10,
  BREAK_REQUIRED_AFTER_HOURS: 8,
  MIN_BREAK_HOURS: 0.5,
  RESTART_HOURS: 34,
  /** Below this many weekly hours a rest becomes a full restart. */
  RESTART_THRESHOLD_HOURS: 14,
  SPLIT_SLEEPER_LONG_HOURS: 7,
  SPLIT_SLEEPER_SHORT_HOURS: 3,
} as const;

/** Operational assumptions used when planning a trip. */
export const TRIP_OPERATIONS = {
  AVERAGE_SPEED_MPH: 60,
  FUELING_INTERVAL_MILES: 1000,
  FUELING_HOURS: 0.5,
  PICKUP_DROPOFF_HOURS: 1,
  INSPECTION_HOURS: 0.25,
} as const;
