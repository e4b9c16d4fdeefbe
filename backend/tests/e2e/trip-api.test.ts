/**
 * Trip Planner API E2E Tests
 *
 * Runs the full middleware chain with in-process dependencies: straight-line
 * routing, no reverse geocoding and an in-memory trip store.
 */

import { describe, it, expect, beforeAll } from '@jest/globals';
import request from 'supertest';
import type { Express } from 'express';
import { createApp, type AppDependencies } from '../../src/app';
import { createRateLimiter } from '../../src/middleware/rate-limit';
import { InMemoryTripStore } from '../../src/repositories';
import { NoopLocationResolver } from '../../src/services/location-resolver.service';
import { StraightLineRoutingService, straightLineRoute } from '../../src/services/routing.service';
import { CURRENT, DROPOFF, PICKUP } from '../helpers/fixtures';

function buildApp(overrides: Partial<AppDependencies> = {}): Express {
  let id = 0;
  return createApp({
    routing: new StraightLineRoutingService(),
    locationResolver: new NoopLocationResolver(),
    trips: new InMemoryTripStore(undefined, () => `trip-${++id}`),
    supabase: null,
    geocoderTimeoutMs: 100,
    clock: () => new Date('2026-03-02T06:00:00.000Z'),
    ...overrides,
  });
}

const location = ({ latitude, longitude }: { latitude: number; longitude: number }) => ({
  lat: latitude,
  lon: longitude,
});

const PLAN_BODY = {
  current_location: location(CURRENT),
  pickup_location: location(PICKUP),
  dropoff_location: location(DROPOFF),
  current_cycle_used: 10,
  start_time: '2026-03-02T06:00:00Z',
  route_legs: {
    leg1: { distance_miles: 100, duration_hours: 1.8 },
    leg2: { distance_miles: 100, duration_hours: 1.8 },
  },
  driver_name: 'Test Driver',
};

describe('Trip Planner API', () => {
  let app: Express;

  beforeAll(() => {
    app = buildApp();
  });

  describe('GET /health', () => {
    it('should report in-memory storage and straight-line routing', async () => {
      const response = await request(app).get('/health').expect(200);

      expect(response.body.success).toBe(true);
      expect(response.body.data.status).toBe('healthy');
      expect(response.body.data.services).toEqual({
        tripStore: { status: 'up' },
        redis: { status: 'disabled' },
        routing: { provider: 'straight-line' },
      });
    });
  });

  describe('POST /api/v1/trips/plan', () => {
    it('should plan and store a trip', async () => {
      const response = await request(app).post('/api/v1/trips/plan').send(PLAN_BODY).expect(201);

      const trip = response.body.data;
      expect(trip.id).toBe('trip-1');
      expect(trip.driver_name).toBe('Test Driver');
      expect(trip.carrier_name).toBe('N/A');
      expect(trip.weekly_mode).toBe('70/8');
      expect(trip.route_data).toBeNull();

      expect(trip.trip_plan.total_distance_miles).toBe(200);
      expect(trip.trip_plan.total_driving_hours).toBe(3.6);
      expect(trip.trip_plan.estimated_total_hours).toBe(5.83);
      expect(trip.trip_plan.compliance).toEqual({ compliant: true, violations: [], total_shifts: 0 });
      expect(trip.trip_plan.daily_logs).toHaveLength(1);
      expect(trip.trip_plan.daily_logs[0].date).toBe('2026-03-02');

      const [preTrip] = trip.trip_plan.events;
      expect(preTrip).toEqual({
        activity: 'Pre-Trip Inspection',
        duty_status: 'on_duty_not_driving',
        start_time: '2026-03-02T06:00:00.000Z',
        duration_hours: 0.25,
        location: location(CURRENT),
        place: { city: 'Unknown', region: 'Unknown' },
        description: 'Pre-trip vehicle inspection',
        start_offset_hours: 0,
        end_offset_hours: 0.25,
      });
    });

    it('should route with the provider when no legs are supplied', async () => {
      const { route_legs: _omitted, start_time: _start, ...body } = PLAN_BODY;

      const response = await request(app).post('/api/v1/trips/plan').send(body).expect(201);

      const leg1 = straightLineRoute([CURRENT, PICKUP]);
      const leg2 = straightLineRoute([PICKUP, DROPOFF]);
      const { route_data: routeData, trip_plan: plan } = response.body.data;

      expect(routeData.fallback).toBe(true);
      expect(routeData.leg1.distance_miles).toBe(leg1.distanceMiles);
      expect(routeData.leg2.distance_miles).toBe(leg2.distanceMiles);
      expect(plan.total_distance_miles).toBe(routeData.total_distance_miles);
      expect(plan.summary.start_time).toBe('2026-03-02T06:00:00.000Z');
    });

    it('should reject out-of-range coordinates', async () => {
      const response = await request(app)
        .post('/api/v1/trips/plan')
        .send({ ...PLAN_BODY, current_location: { lat: 120, lon: 0 } })
        .expect(400);

      expect(response.body.success).toBe(false);
      expect(response.body.error.code).toBe('VALIDATION_ERROR');
      expect(response.body.error.details[0].path).toBe('current_location.lat');
    });

    it('should reject a malformed JSON body', async () => {
      const response = await request(app)
        .post('/api/v1/trips/plan')
        .set('Content-Type', 'application/json')
        .send('{"current_location":')
        .expect(400);

      expect(response.body.error).toEqual({
        code: 'VALIDATION_ERROR',
        message: 'Request body is not valid JSON',
      });
    });

    it('should echo the correlation ID', async () => {
      const response = await request(app)
        .post('/api/v1/trips/plan')
        .set('X-Correlation-Id', 'test-correlation')
        .send(PLAN_BODY)
        .expect(201);

      expect(response.headers['x-correlation-id']).toBe('test-correlation');
    });
  });

  describe('stored trips', () => {
    let tripId: string;

    beforeAll(async () => {
      const response = await request(app).post('/api/v1/trips/plan').send(PLAN_BODY).expect(201);
      tripId = response.body.data.id;
    });

    it('should list trips with a limit', async () => {
      const response = await request(app).get('/api/v1/trips?limit=1').expect(200);

      expect(response.body.data).toHaveLength(1);
      expect(response.body.meta).toEqual({ count: 1, limit: 1 });
    });

    it('should reject an invalid limit', async () => {
      await request(app).get('/api/v1/trips?limit=0').expect(400);
    });

    it('should fetch a trip by id', async () => {
      const response = await request(app).get(`/api/v1/trips/${tripId}`).expect(200);

      expect(response.body.data.id).toBe(tripId);
    });

    it('should return 404 for an unknown trip', async () => {
      const response = await request(app).get('/api/v1/trips/does-not-exist').expect(404);

      expect(response.body.error).toEqual({ code: 'NOT_FOUND', message: 'Trip not found' });
    });

    it('should build log sheets for a stored trip', async () => {
      const response = await request(app).get(`/api/v1/trips/${tripId}/log-sheets`).expect(200);

      const [sheet] = response.body.data;
      expect(response.body.data).toHaveLength(1);
      expect(sheet.date).toBe('2026-03-02');
      expect(sheet.total_miles).toBe(200);
      expect(sheet.remarks[0]).toBe('06:00 AM - Pre-Trip Inspection (Unknown, Unknown)');
      expect(sheet.grid.segments[0]).toEqual({
        status: 'on_duty_not_driving',
        row: 3,
        start_hour: 6,
        end_hour: 6.25,
      });
      expect(response.body.meta).toEqual({
        tripId,
        driverName: 'Test Driver',
        carrierName: 'N/A',
        mainOffice: 'N/A',
        vehicleNumber: 'N/A',
      });
    });
  });

  describe('POST /api/v1/hos/rolling-hours', () => {
    it('should summarize the weekly window', async () => {
      const response = await request(app)
        .post('/api/v1/hos/rolling-hours')
        .send({
          weekly_mode: '60/7',
          history: [
            { date: '2026-03-01', on_duty_hours: 10 },
            { date: '2026-03-02', on_duty_hours: 11.5 },
            { date: 'someday', on_duty_hours: 4 },
          ],
        })
        .expect(200);

      expect(response.body.data).toEqual({
        weekly_mode: '60/7',
        hours_used: 21.5,
        hours_available: 38.5,
        window_days: 2,
        days: [
          { date: '2026-03-01', on_duty_hours: 10 },
          { date: '2026-03-02', on_duty_hours: 11.5 },
        ],
        skipped_entries: 1,
      });
    });

    it('should return 422 when no entry is usable', async () => {
      const response = await request(app)
        .post('/api/v1/hos/rolling-hours')
        .send({ history: [{ date: 'someday', on_duty_hours: 4 }] })
        .expect(422);

      expect(response.body.error.code).toBe('NO_VALID_LOGS');
    });
  });

  it('should return 404 for unknown routes', async () => {
    const response = await request(app).get('/api/v1/unknown').expect(404);

    expect(response.body.error.code).toBe('NOT_FOUND');
  });
});

describe('rate limiting', () => {
  it('should reject planning requests over the limit', async () => {
    const app = buildApp({
      rateLimiters: {
        planning: createRateLimiter('planning-test', 1),
        query: createRateLimiter('query-test', 100),
      },
    });

    await request(app).post('/api/v1/trips/plan').send(PLAN_BODY).expect(201);
    const response = await request(app).post('/api/v1/trips/plan').send(PLAN_BODY).expect(429);

    expect(response.body.error.code).toBe('RATE_LIMIT_EXCEEDED');
    expect(response.body.error.details).toEqual({ retryAfter: 60 });
  });
});
