/**
 * Express Application
 *
 * Builds the API from its dependencies so the server entry point and the
 * tests wire the same middleware chain.
 */

import express, { type Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import swaggerUi from 'swagger-ui-express';
import type { SupabaseClient } from '@supabase/supabase-js';
import { errorHandler, notFoundHandler } from './middleware/error-handler';
import { correlationMiddleware } from './middleware/correlation';
import { createRateLimiters, type RateLimiters } from './middleware/rate-limit';
import { swaggerSpec } from './config/swagger';
import { HealthController } from './controllers/health.controller';
import { HOSController } from './controllers/hos.controller';
import { TripController } from './controllers/trip.controller';
import type { TripStore } from './repositories/trip.repository';
import { createHealthRouter } from './routes/health.routes';
import { createHosRouter } from './routes/hos.routes';
import { createTripRouter } from './routes/trip.routes';
import type { LocationResolver } from './services/location-resolver.service';
import type { RoutingProvider } from './services/routing.service';
import { TripService } from './services/trip.service';
import { stream } from './utils/logger';

export interface AppDependencies {
  routing: RoutingProvider;
  locationResolver: LocationResolver;
  trips: TripStore;
  /** Null when trips are kept in memory. */
  supabase: SupabaseClient | null;
  geocoderTimeoutMs: number;
  clock?: () => Date;
  rateLimiters?: RateLimiters;
}

export const API_VERSION = process.env.API_VERSION || 'v1';

export function createApp(deps: AppDependencies): Express {
  const app = express();

  const tripService = new TripService({
    routing: deps.routing,
    locationResolver: deps.locationResolver,
    trips: deps.trips,
    geocoderTimeoutMs: deps.geocoderTimeoutMs,
    clock: deps.clock,
  });
  const tripController = new TripController(tripService);
  const hosController = new HOSController();
  const healthController = new HealthController({
    supabase: deps.supabase,
    routingProvider: deps.routing.name,
  });
  const limiters = deps.rateLimiters ?? createRateLimiters();

  // Security middleware
  app.use(helmet());

  // Correlation ID middleware (must be early in chain for request tracing)
  app.use(correlationMiddleware);

  app.use(
    cors({
      origin: process.env.ALLOWED_ORIGINS?.split(',') || ['http://localhost:5173'],
    })
  );

  app.use(express.json({ limit: '1mb' }));

  // Detailed request/response logging is handled by the correlation middleware
  if (process.env.NODE_ENV !== 'test') {
    app.use(morgan('combined', { stream }));
  }

  // Health check endpoint (no rate limit)
  app.use('/health', createHealthRouter(healthController));

  // API Documentation (Swagger UI)
  app.use('/api-docs', swaggerUi.serve);
  app.get(
    '/api-docs',
    swaggerUi.setup(swaggerSpec, {
      customCss: '.swagger-ui .topbar { display: none }',
      customSiteTitle: 'HOS Trip Planner API Documentation',
    })
  );

  // OpenAPI JSON endpoint
  app.get('/api-docs.json', (_req, res) => {
    res.setHeader('Content-Type', 'application/json');
    res.send(swaggerSpec);
  });

  // Planning is limited per route; lookups share the query limiter
  app.use(`/api/${API_VERSION}/trips`, createTripRouter(tripController, limiters));
  app.use(`/api/${API_VERSION}/hos`, limiters.query, createHosRouter(hosController));

  app.use(notFoundHandler);

  // Global error handler (must be last)
  app.use(errorHandler);

  return app;
}
