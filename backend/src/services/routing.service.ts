/**
 * Routing Service
 *
 * Distance and nominal duration for the current→pickup and pickup→dropoff legs.
 * The Azure Maps provider requests truck route directions and, on any failure,
 * falls back to straight-line distances at 55 mph. The straight-line provider
 * is used on its own when no subscription key is configured.
 */

import { z } from 'zod';
import {
  haversineDistanceMiles,
  roundTo,
  type Coordinates,
  type LegMetrics,
} from '@hos-planner/shared';
import type { AzureMapsConfig } from '../config/azure-maps';
import { InsufficientInputError } from '../models/errors/api-error';
import { logger } from '../utils/logger';
import { retryWithBackoff } from './retry.service';
import { AzureMapsClient, type FetchFn } from './azure-maps-client';

const METERS_TO_MILES = 0.000621371;
const FALLBACK_SPEED_MPH = 55;

export interface RouteResult {
  distanceMiles: number;
  durationHours: number;
  routePoints: Coordinates[];
  fallback: boolean;
}

export interface LegRoute extends LegMetrics {
  routePoints: Coordinates[];
}

export interface RouteData {
  leg1: LegRoute;
  leg2: LegRoute;
  totalDistanceMiles: number;
  totalDurationHours: number;
  /** True when any leg was estimated from straight-line distance. */
  fallback: boolean;
}

export type RoutingProviderName = 'azure-maps' | 'straight-line';

export interface RoutingProvider {
  readonly name: RoutingProviderName;
  calculateRoute(waypoints: Coordinates[]): Promise<RouteResult>;
  calculateMultiLegRoute(
    current: Coordinates,
    pickup: Coordinates,
    dropoff: Coordinates
  ): Promise<RouteData>;
}

function assertWaypoints(waypoints: Coordinates[]): void {
  if (waypoints.length < 2) {
    throw new InsufficientInputError('At least 2 waypoints are required to calculate a route', {
      waypoints: waypoints.length,
    });
  }
}

/**
 * Great-circle estimate over consecutive waypoints.
 */
export function straightLineRoute(waypoints: Coordinates[]): RouteResult {
  assertWaypoints(waypoints);

  let distance = 0;
  for (let i = 0; i < waypoints.length - 1; i++) {
    distance += haversineDistanceMiles(waypoints[i], waypoints[i + 1]);
  }

  return {
    distanceMiles: roundTo(distance, 1),
    durationHours: roundTo(distance / FALLBACK_SPEED_MPH, 2),
    routePoints: waypoints.map((point) => ({ ...point })),
    fallback: true,
  };
}

abstract class BaseRoutingProvider implements RoutingProvider {
  abstract readonly name: RoutingProviderName;

  abstract calculateRoute(waypoints: Coordinates[]): Promise<RouteResult>;

  async calculateMultiLegRoute(
    current: Coordinates,
    pickup: Coordinates,
    dropoff: Coordinates
  ): Promise<RouteData> {
    const [first, second] = await Promise.all([
      this.calculateRoute([current, pickup]),
      this.calculateRoute([pickup, dropoff]),
    ]);

    return {
      leg1: {
        distanceMiles: first.distanceMiles,
        durationHours: first.durationHours,
        routePoints: first.routePoints,
      },
      leg2: {
        distanceMiles: second.distanceMiles,
        durationHours: second.durationHours,
        routePoints: second.routePoints,
      },
      totalDistanceMiles: roundTo(first.distanceMiles + second.distanceMiles, 1),
      totalDurationHours: roundTo(first.durationHours + second.durationHours, 2),
      fallback: first.fallback || second.fallback,
    };
  }
}

export class StraightLineRoutingService extends BaseRoutingProvider {
  readonly name = 'straight-line';

  async calculateRoute(waypoints: Coordinates[]): Promise<RouteResult> {
    return straightLineRoute(waypoints);
  }
}

const routeDirectionsSchema = z.object({
  routes: z
    .array(
      z.object({
        summary: z.object({
          lengthInMeters: z.number().nonnegative(),
          travelTimeInSeconds: z.number().nonnegative(),
        }),
        legs: z
          .array(
            z.object({
              points: z
                .array(z.object({ latitude: z.number(), longitude: z.number() }))
                .optional(),
            })
          )
          .optional(),
      })
    )
    .min(1),
});

/**
 * Truck route directions: fastest route with traffic, sized for a typical
 * loaded tractor-trailer.
 */
const TRUCK_PARAMS: Record<string, string> = {
  travelMode: 'truck',
  vehicleWidth: '2.6',
  vehicleHeight: '4.0',
  vehicleLength: '20',
  vehicleWeight: '36000',
  computeBestOrder: 'false',
  routeType: 'fastest',
  traffic: 'true',
};

export class AzureMapsRoutingService extends BaseRoutingProvider {
  readonly name = 'azure-maps';
  private readonly client: AzureMapsClient;

  constructor(private readonly config: AzureMapsConfig, fetchImpl?: FetchFn) {
    super();
    this.client = new AzureMapsClient(config, fetchImpl);
  }

  async calculateRoute(waypoints: Coordinates[]): Promise<RouteResult> {
    assertWaypoints(waypoints);

    try {
      return await retryWithBackoff(() => this.requestRoute(waypoints), {
        context: 'azure-maps.route-directions',
      });
    } catch (error) {
      logger.warn('Route directions failed, using straight-line fallback', {
        waypoints: waypoints.length,
        error: error instanceof Error ? error.message : String(error),
      });
      return straightLineRoute(waypoints);
    }
  }

  private async requestRoute(waypoints: Coordinates[]): Promise<RouteResult> {
    const query = waypoints.map((point) => `${point.latitude},${point.longitude}`).join(':');

    const body = await this.client.get(
      '/route/directions/json',
      { ...TRUCK_PARAMS, query },
      routeDirectionsSchema,
      this.config.routingTimeoutMs
    );

    const [route] = body.routes;
    const routePoints = (route.legs ?? []).flatMap((leg) =>
      (leg.points ?? []).map((point) => ({ latitude: point.latitude, longitude: point.longitude }))
    );

    return {
      distanceMiles: roundTo(route.summary.lengthInMeters * METERS_TO_MILES, 1),
      durationHours: roundTo(route.summary.travelTimeInSeconds / 3600, 2),
      routePoints,
      fallback: false,
    };
  }
}

/**
 * Azure Maps when a key is configured, straight-line estimates otherwise.
 */
export function createRoutingProvider(config: AzureMapsConfig): RoutingProvider {
  if (config.subscriptionKey === undefined) {
    logger.info('Azure Maps key not configured, routing with straight-line distances');
    return new StraightLineRoutingService();
  }
  return new AzureMapsRoutingService(config);
}
