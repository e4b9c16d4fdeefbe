/**
 * Route Leg Service
 *
 * Normalizes routing output (or a client-supplied override) plus the three trip
 * coordinates into the ordered legs the duty schedule consumes.
 */

import {
  legKindLabel,
  type Coordinates,
  type LegKind,
  type LegMetrics,
  type RouteLeg,
  type RouteLegMetrics,
} from '@hos-planner/shared';
import { InsufficientInputError, ValidationError } from '../models/errors/api-error';

function toLeg(
  kind: LegKind,
  start: Coordinates,
  end: Coordinates,
  metrics: LegMetrics
): RouteLeg {
  const { distanceMiles, durationHours } = metrics;

  if (!Number.isFinite(distanceMiles) || distanceMiles < 0) {
    throw new ValidationError(`Invalid distance for leg ${kind}`, { distanceMiles });
  }
  if (!Number.isFinite(durationHours) || durationHours < 0) {
    throw new ValidationError(`Invalid duration for leg ${kind}`, { durationHours });
  }

  return {
    start,
    end,
    distanceMiles,
    durationHours,
    kind,
    description: legKindLabel(kind),
  };
}

/**
 * Build legs current→pickup and pickup→dropoff, keeping only those with metrics.
 */
export function buildRouteLegs(
  current: Coordinates,
  pickup: Coordinates,
  dropoff: Coordinates,
  metrics: RouteLegMetrics
): RouteLeg[] {
  const legs: RouteLeg[] = [];

  if (metrics.leg1) {
    legs.push(toLeg('to_pickup', current, pickup, metrics.leg1));
  }
  if (metrics.leg2) {
    legs.push(toLeg('to_dropoff', pickup, dropoff, metrics.leg2));
  }

  if (legs.length === 0) {
    throw new InsufficientInputError('Route data contains no legs');
  }

  return legs;
}
