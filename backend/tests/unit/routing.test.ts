/**
 * Routing Service Unit Tests
 *
 * Azure Maps responses are served by a fake fetch.
 */

import { describe, it, expect, jest } from '@jest/globals';
import type { AzureMapsConfig } from '../../src/config/azure-maps';
import type { FetchFn } from '../../src/services/azure-maps-client';
import {
  AzureMapsRoutingService,
  StraightLineRoutingService,
  createRoutingProvider,
  straightLineRoute,
} from '../../src/services/routing.service';
import { InsufficientInputError } from '../../src/models/errors/api-error';

const CONFIG: AzureMapsConfig = {
  subscriptionKey: 'test-key',
  baseUrl: 'https://maps.test',
  routingTimeoutMs: 1000,
  geocoderTimeoutMs: 1000,
};

const ORIGIN = { latitude: 0, longitude: 0 };
const ONE_DEGREE_NORTH = { latitude: 1, longitude: 0 };
const TWO_DEGREES_NORTH = { latitude: 2, longitude: 0 };

function jsonFetch(status: number, body: unknown) {
  return jest.fn<FetchFn>(async () => new Response(JSON.stringify(body), { status }));
}

const ROUTE_BODY = {
  routes: [
    {
      summary: { lengthInMeters: 160934, travelTimeInSeconds: 7200 },
      legs: [
        {
          points: [
            { latitude: 0, longitude: 0 },
            { latitude: 0.5, longitude: 0 },
            { latitude: 1, longitude: 0 },
          ],
        },
      ],
    },
  ],
};

describe('straightLineRoute', () => {
  it('should estimate distance and 55 mph duration', () => {
    expect(straightLineRoute([ORIGIN, ONE_DEGREE_NORTH])).toEqual({
      distanceMiles: 69.1,
      durationHours: 1.26,
      routePoints: [ORIGIN, ONE_DEGREE_NORTH],
      fallback: true,
    });
  });

  it('should require two waypoints', () => {
    expect(() => straightLineRoute([ORIGIN])).toThrow(InsufficientInputError);
  });
});

describe('StraightLineRoutingService', () => {
  it('should total both legs', async () => {
    const route = await new StraightLineRoutingService().calculateMultiLegRoute(
      ORIGIN,
      ONE_DEGREE_NORTH,
      TWO_DEGREES_NORTH
    );

    expect(route.leg1.distanceMiles).toBe(69.1);
    expect(route.leg2.distanceMiles).toBe(69.1);
    expect(route.totalDistanceMiles).toBe(138.2);
    expect(route.totalDurationHours).toBe(2.52);
    expect(route.fallback).toBe(true);
  });
});

describe('AzureMapsRoutingService', () => {
  it('should request truck directions and convert units', async () => {
    const fetchImpl = jsonFetch(200, ROUTE_BODY);
    const service = new AzureMapsRoutingService(CONFIG, fetchImpl);

    const route = await service.calculateRoute([ORIGIN, ONE_DEGREE_NORTH]);

    expect(route.distanceMiles).toBe(100);
    expect(route.durationHours).toBe(2);
    expect(route.routePoints).toHaveLength(3);
    expect(route.fallback).toBe(false);

    expect(fetchImpl).toHaveBeenCalledTimes(1);
    const url = String(fetchImpl.mock.calls[0][0]);
    expect(url.startsWith('https://maps.test/route/directions/json?')).toBe(true);
    expect(url).toContain('travelMode=truck');
    expect(url).toContain('query=0%2C0%3A1%2C0');
    expect(url).toContain('subscription-key=test-key');
  });

  it('should fall back to straight-line distance on a rejected request', async () => {
    const fetchImpl = jsonFetch(400, { error: 'bad request' });
    const service = new AzureMapsRoutingService(CONFIG, fetchImpl);

    const route = await service.calculateRoute([ORIGIN, ONE_DEGREE_NORTH]);

    expect(fetchImpl).toHaveBeenCalledTimes(1);
    expect(route).toEqual(straightLineRoute([ORIGIN, ONE_DEGREE_NORTH]));
  });

  it('should fall back on an unexpected response body', async () => {
    const fetchImpl = jsonFetch(200, { routes: [] });
    const service = new AzureMapsRoutingService(CONFIG, fetchImpl);

    const route = await service.calculateRoute([ORIGIN, ONE_DEGREE_NORTH]);

    expect(fetchImpl).toHaveBeenCalledTimes(1);
    expect(route.fallback).toBe(true);
  });

  it('should retry an unavailable service before falling back', async () => {
    const fetchImpl = jsonFetch(503, {});
    const service = new AzureMapsRoutingService(CONFIG, fetchImpl);

    const route = await service.calculateRoute([ORIGIN, ONE_DEGREE_NORTH]);

    expect(fetchImpl).toHaveBeenCalledTimes(3);
    expect(route.fallback).toBe(true);
  });

  it('should flag the whole route as fallback when one leg falls back', async () => {
    const fetchImpl = jest.fn<FetchFn>(async (input) =>
      String(input).includes('query=0%2C0')
        ? new Response(JSON.stringify(ROUTE_BODY), { status: 200 })
        : new Response('{}', { status: 404 })
    );
    const service = new AzureMapsRoutingService(CONFIG, fetchImpl);

    const route = await service.calculateMultiLegRoute(ORIGIN, ONE_DEGREE_NORTH, TWO_DEGREES_NORTH);

    expect(route.leg1.distanceMiles).toBe(100);
    expect(route.leg2.distanceMiles).toBe(69.1);
    expect(route.totalDistanceMiles).toBe(169.1);
    expect(route.fallback).toBe(true);
  });
});

describe('createRoutingProvider', () => {
  it('should use straight-line routing without a subscription key', () => {
    const provider = createRoutingProvider({ ...CONFIG, subscriptionKey: undefined });
    expect(provider.name).toBe('straight-line');
  });

  it('should use Azure Maps with a subscription key', () => {
    expect(createRoutingProvider(CONFIG).name).toBe('azure-maps');
  });
});
