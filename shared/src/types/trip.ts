import type { Coordinates, PlaceName } from './location';

export type LegKind = 'to_pickup' | 'to_dropoff';

/** Distance and nominal duration of one leg, as reported by the routing provider. */
export interface LegMetrics {
  distanceMiles: number;
  durationHours: number;
}

export interface RouteLegMetrics {
  leg1?: LegMetrics;
  leg2?: LegMetrics;
}

export interface RouteLeg {
  start: Coordinates;
  end: Coordinates;
  distanceMiles: number;
  /** Informational; driving time is recomputed from distance and average speed. */
  durationHours: number;
  kind: LegKind;
  description: string;
  startPlace?: PlaceName;
  endPlace?: PlaceName;
}
