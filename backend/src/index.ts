/**
 * HOS Trip Planner Server
 *
 * Loads configuration, connects optional backing services (Redis, Supabase,
 * Azure Maps) and starts the API.
 */

// Load environment variables before any module reads them
import 'dotenv/config';
import { API_VERSION, createApp } from './app';
import { loadAzureMapsConfig } from './config/azure-maps';
import { connectRedis, disconnectRedis } from './config/redis';
import { createSupabaseClient } from './config/supabase';
import { createTripStore } from './repositories';
import { createLocationResolver } from './services/location-resolver.service';
import { createRoutingProvider } from './services/routing.service';
import { logger } from './utils/logger';

const PORT = parseInt(process.env.PORT || '3000', 10);
const NODE_ENV = process.env.NODE_ENV || 'development';

async function start(): Promise<void> {
  // Redis backs the distributed rate-limit store; limiters are built after this
  try {
    await connectRedis();
  } catch (error) {
    logger.warn('Starting without Redis connection, using in-memory rate limiting', {
      error: error instanceof Error ? error.message : 'Unknown',
    });
  }

  const azureMaps = loadAzureMapsConfig();
  const supabase = createSupabaseClient();

  const app = createApp({
    routing: createRoutingProvider(azureMaps),
    locationResolver: createLocationResolver(azureMaps),
    trips: createTripStore(supabase),
    supabase,
    geocoderTimeoutMs: azureMaps.geocoderTimeoutMs,
  });

  const server = app.listen(PORT, () => {
    logger.info('HOS Trip Planner API started', {
      port: PORT,
      apiVersion: API_VERSION,
      environment: NODE_ENV,
      healthCheck: `http://localhost:${PORT}/health`,
      apiDocs: `http://localhost:${PORT}/api-docs`,
    });
  });

  const shutdown = (signal: string): void => {
    logger.info(`${signal} received, shutting down gracefully`);
    server.close(() => {
      disconnectRedis()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error('Shutdown failed', {
            error: error instanceof Error ? error.message : 'Unknown',
          });
          process.exit(1);
        });
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

start().catch((error: unknown) => {
  logger.error('Failed to start server', {
    error: error instanceof Error ? error.message : 'Unknown',
  });
  process.exit(1);
});
