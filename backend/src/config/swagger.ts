/**
 * Swagger/OpenAPI Configuration
 *
 * API documentation using OpenAPI 3.0 specification
 */

import path from 'path';
import swaggerJsdoc from 'swagger-jsdoc';

const errorBody = (code: string, message: string) => ({
  success: false,
  error: { code, message },
});

const swaggerDefinition = {
  openapi: '3.0.0',
  info: {
    title: 'HOS Trip Planner API',
    version: '1.0.0',
    description: `
Plans a property-carrying truck trip (current location, pickup, dropoff) under the
FMCSA hours-of-service rules and returns the duty schedule, per-day log data and a
compliance audit.

## Features

- **Trip Planning** - 11-hour driving, 14-hour window, 30-minute break, 10-hour rest,
  60/7 and 70/8 weekly cycles with 34-hour restart
- **Optional Rules** - Split sleeper berth (7 + 3), adverse driving conditions,
  150 air-mile short-haul exception
- **Daily Logs** - Events bucketed by calendar day with duty-status totals
- **Log Sheets** - Grid segments, transitions and remarks for each day
- **Rolling Hours** - Hours used and available in the trailing weekly window
- **Rate Limiting** - Per-IP limits, shared through Redis when configured

## Rate Limits

- **Trip Planning**: 30 requests/minute per IP
- **Queries**: 120 requests/minute per IP

Standard \`RateLimit-*\` headers are included in rate-limited responses.

## Correlation IDs

All requests/responses include a \`X-Correlation-Id\` header for tracing.
    `,
    license: {
      name: 'MIT',
    },
  },
  servers: [
    {
      url: 'http://localhost:3000',
      description: 'Development server',
    },
  ],
  tags: [
    {
      name: 'Trips',
      description: 'Trip planning, stored trips and log sheets',
    },
    {
      name: 'HOS',
      description: 'Hours of Service calculations',
    },
    {
      name: 'Health',
      description: 'Service health',
    },
  ],
  components: {
    schemas: {
      Error: {
        type: 'object',
        properties: {
          success: { type: 'boolean', example: false },
          error: {
            type: 'object',
            properties: {
              code: { type: 'string', example: 'VALIDATION_ERROR' },
              message: { type: 'string', example: 'Request validation failed' },
              details: { description: 'Error-specific details' },
            },
            required: ['code', 'message'],
          },
        },
        required: ['success', 'error'],
      },
      SuccessResponse: {
        type: 'object',
        properties: {
          success: { type: 'boolean', example: true },
          data: { type: 'object', description: 'Response data (varies by endpoint)' },
          meta: { type: 'object' },
        },
        required: ['success', 'data'],
      },
      Location: {
        type: 'object',
        required: ['lat', 'lon'],
        properties: {
          lat: { type: 'number', minimum: -90, maximum: 90, example: 41.8781 },
          lon: { type: 'number', minimum: -180, maximum: 180, example: -87.6298 },
          address: { type: 'string', example: 'Chicago, IL' },
        },
      },
      LegMetrics: {
        type: 'object',
        required: ['distance_miles', 'duration_hours'],
        properties: {
          distance_miles: { type: 'number', minimum: 0, example: 400 },
          duration_hours: { type: 'number', minimum: 0, example: 6.67 },
        },
      },
      PlanTripRequest: {
        type: 'object',
        required: ['current_location', 'pickup_location', 'dropoff_location'],
        properties: {
          current_location: { $ref: '#/components/schemas/Location' },
          pickup_location: { $ref: '#/components/schemas/Location' },
          dropoff_location: { $ref: '#/components/schemas/Location' },
          current_cycle_used: { type: 'number', minimum: 0, maximum: 70, default: 0 },
          weekly_mode: { type: 'string', enum: ['60/7', '70/8'], default: '70/8' },
          use_split_sleeper: { type: 'boolean', default: false },
          use_adverse_conditions: { type: 'boolean', default: false },
          use_air_mile_exception: { type: 'boolean', default: false },
          reporting_location_dwell_days: { type: 'integer', minimum: 0, default: 0 },
          start_time: { type: 'string', format: 'date-time' },
          route_legs: {
            type: 'object',
            description: 'Leg metrics to use instead of calling the routing provider',
            properties: {
              leg1: { $ref: '#/components/schemas/LegMetrics' },
              leg2: { $ref: '#/components/schemas/LegMetrics' },
            },
          },
          driver_name: { type: 'string', default: 'N/A' },
          carrier_name: { type: 'string', default: 'N/A' },
          main_office: { type: 'string', default: 'N/A' },
          vehicle_number: { type: 'string', default: 'N/A' },
        },
      },
      DutyEvent: {
        type: 'object',
        properties: {
          activity: { type: 'string', example: 'Driving' },
          duty_status: {
            type: 'string',
            enum: ['off_duty', 'sleeper_berth', 'driving', 'on_duty_not_driving'],
          },
          start_time: { type: 'string', format: 'date-time' },
          duration_hours: { type: 'number' },
          distance_miles: { type: 'number' },
          location: {
            type: 'object',
            properties: { lat: { type: 'number' }, lon: { type: 'number' } },
          },
          place: {
            type: 'object',
            properties: { city: { type: 'string' }, region: { type: 'string' } },
          },
          description: { type: 'string' },
          rest_break: {
            type: 'object',
            properties: {
              kind: { type: 'string' },
              segment_id: { type: 'string' },
              paired_segment_id: { type: 'string', nullable: true },
              excluded_from_window: { type: 'boolean' },
            },
          },
          start_offset_hours: { type: 'number' },
          end_offset_hours: { type: 'number' },
        },
      },
      DailyLog: {
        type: 'object',
        properties: {
          date: { type: 'string', format: 'date' },
          events: { type: 'array', items: { $ref: '#/components/schemas/DutyEvent' } },
          total_driving: { type: 'number' },
          total_on_duty_not_driving: { type: 'number' },
          total_off_duty: { type: 'number' },
          total_sleeper: { type: 'number' },
          total_miles: { type: 'number' },
        },
      },
      TripPlan: {
        type: 'object',
        properties: {
          total_distance_miles: { type: 'number' },
          total_driving_hours: { type: 'number' },
          estimated_total_hours: { type: 'number' },
          events: { type: 'array', items: { $ref: '#/components/schemas/DutyEvent' } },
          daily_logs: { type: 'array', items: { $ref: '#/components/schemas/DailyLog' } },
          compliance: {
            type: 'object',
            properties: {
              compliant: { type: 'boolean' },
              violations: { type: 'array', items: { type: 'string' } },
              total_shifts: { type: 'integer' },
            },
          },
          summary: { type: 'object' },
          warnings: {
            type: 'array',
            items: {
              type: 'object',
              properties: {
                code: { type: 'string', example: 'LOCATION_UNRESOLVED' },
                message: { type: 'string' },
                location: { type: 'object' },
              },
            },
          },
        },
      },
      TripRecord: {
        type: 'object',
        properties: {
          id: { type: 'string' },
          created_at: { type: 'string', format: 'date-time' },
          current_location: { $ref: '#/components/schemas/Location' },
          pickup_location: { $ref: '#/components/schemas/Location' },
          dropoff_location: { $ref: '#/components/schemas/Location' },
          current_cycle_used: { type: 'number' },
          weekly_mode: { type: 'string', enum: ['60/7', '70/8'] },
          driver_name: { type: 'string' },
          carrier_name: { type: 'string' },
          main_office: { type: 'string' },
          vehicle_number: { type: 'string' },
          trip_plan: { $ref: '#/components/schemas/TripPlan' },
          route_data: { type: 'object', nullable: true },
        },
      },
      LogSheet: {
        type: 'object',
        properties: {
          date: { type: 'string', format: 'date' },
          total_miles: { type: 'number' },
          total_driving: { type: 'number' },
          total_on_duty_not_driving: { type: 'number' },
          total_off_duty: { type: 'number' },
          total_sleeper: { type: 'number' },
          total_hours: { type: 'number' },
          grid: {
            type: 'object',
            properties: {
              segments: { type: 'array', items: { type: 'object' } },
              transitions: { type: 'array', items: { type: 'object' } },
            },
          },
          remarks: { type: 'array', items: { type: 'string' }, example: ['06:00 AM - Pre-Trip Inspection (Chicago, IL)'] },
          activities: { type: 'array', items: { type: 'object' } },
        },
      },
      RollingHoursRequest: {
        type: 'object',
        properties: {
          weekly_mode: { type: 'string', enum: ['60/7', '70/8'], default: '70/8' },
          history: {
            type: 'array',
            items: {
              type: 'object',
              required: ['date', 'on_duty_hours'],
              properties: {
                date: { type: 'string', format: 'date', example: '2026-03-01' },
                on_duty_hours: { type: 'number', minimum: 0, maximum: 24, example: 9.5 },
              },
            },
          },
        },
      },
      RollingHours: {
        type: 'object',
        properties: {
          weekly_mode: { type: 'string', enum: ['60/7', '70/8'] },
          hours_used: { type: 'number' },
          hours_available: { type: 'number' },
          window_days: { type: 'integer' },
          days: { type: 'array', items: { type: 'object' } },
          skipped_entries: { type: 'integer' },
        },
      },
      HealthCheck: {
        type: 'object',
        properties: {
          status: { type: 'string', enum: ['healthy', 'degraded'] },
          timestamp: { type: 'string', format: 'date-time' },
          version: { type: 'string' },
          uptime: { type: 'number' },
          services: { type: 'object' },
        },
      },
    },
    responses: {
      NotFoundError: {
        description: 'Resource not found',
        content: {
          'application/json': {
            schema: { $ref: '#/components/schemas/Error' },
            example: errorBody('NOT_FOUND', 'Trip not found'),
          },
        },
      },
      ValidationError: {
        description: 'Invalid request data',
        content: {
          'application/json': {
            schema: { $ref: '#/components/schemas/Error' },
            example: errorBody('VALIDATION_ERROR', 'Request validation failed'),
          },
        },
      },
      UnprocessableError: {
        description: 'Stored or supplied log data could not be used',
        content: {
          'application/json': {
            schema: { $ref: '#/components/schemas/Error' },
            example: errorBody('NO_VALID_LOGS', 'No valid log entries found'),
          },
        },
      },
      RateLimitError: {
        description: 'Rate limit exceeded',
        headers: {
          'Retry-After': {
            schema: { type: 'integer' },
            description: 'Seconds to wait before retrying',
          },
          'RateLimit-Limit': { schema: { type: 'integer' } },
          'RateLimit-Remaining': { schema: { type: 'integer' } },
          'RateLimit-Reset': { schema: { type: 'integer' } },
        },
        content: {
          'application/json': {
            schema: { $ref: '#/components/schemas/Error' },
            example: errorBody('RATE_LIMIT_EXCEEDED', 'Rate limit exceeded. Please try again later.'),
          },
        },
      },
    },
    parameters: {
      CorrelationIdHeader: {
        name: 'X-Correlation-Id',
        in: 'header',
        description: 'Optional correlation ID for request tracing. If not provided, one will be generated.',
        required: false,
        schema: { type: 'string' },
      },
      TripId: {
        name: 'tripId',
        in: 'path',
        required: true,
        schema: { type: 'string' },
        description: 'Trip identifier',
      },
    },
  },
};

const options = {
  swaggerDefinition,
  apis: [path.join(__dirname, '../routes/*.{ts,js}')],
};

export const swaggerSpec = swaggerJsdoc(options);
