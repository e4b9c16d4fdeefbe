import { z } from 'zod';
import { WEEKLY_MODES } from '../hos/limits';
import { driverInfoSchema } from './driver.schema';

export const locationSchema = z.object({
  lat: z.number().min(-90).max(90),
  lon: z.number().min(-180).max(180),
  address: z.string().max(300).optional(),
});

export const legMetricsSchema = z.object({
  distance_miles: z.number().nonnegative(),
  duration_hours: z.number().nonnegative(),
});

export const planTripSchema = z
  .object({
    current_location: locationSchema,
    pickup_location: locationSchema,
    dropoff_location: locationSchema,
    current_cycle_used: z.number().min(0).max(70).default(0),
    weekly_mode: z.enum(WEEKLY_MODES).default('70/8'),
    use_split_sleeper: z.boolean().default(false),
    use_adverse_conditions: z.boolean().default(false),
    use_air_mile_exception: z.boolean().default(false),
    reporting_location_dwell_days: z.number().int().nonnegative().max(365).default(0),
    start_time: z.string().datetime({ offset: true }).optional(),
    /** Skips the routing provider when supplied. */
    route_legs: z
      .object({
        leg1: legMetricsSchema,
        leg2: legMetricsSchema,
      })
      .optional(),
  })
  .merge(driverInfoSchema);

export type LocationInput = z.infer<typeof locationSchema>;
export type LegMetricsInput = z.infer<typeof legMetricsSchema>;
export type PlanTripInput = z.infer<typeof planTripSchema>;
