/**
 * Redis Configuration
 *
 * Redis client backing the distributed rate-limit store. Redis is used only
 * when REDIS_URL is set and REDIS_ENABLED is not "false"; otherwise rate
 * limits are kept in process memory.
 */

import { createClient } from 'redis';
import { logger } from '../utils/logger';

export type RedisClient = ReturnType<typeof createClient>;

const MAX_RECONNECT_ATTEMPTS = 10;

let redisClient: RedisClient | null = null;
let isRedisConnected = false;
let isRedisConnecting = false;

function redisUrl(): string | undefined {
  return process.env.REDIS_URL;
}

function maskUrl(url: string): string {
  return url.replace(/:[^:]*@/, ':***@');
}

export function isRedisEnabled(): boolean {
  return process.env.REDIS_ENABLED !== 'false' && Boolean(redisUrl());
}

/**
 * Lazily created client; nothing connects until connectRedis() runs.
 */
export function getRedisClient(): RedisClient {
  if (redisClient !== null) {
    return redisClient;
  }

  const client = createClient({
    url: redisUrl(),
    socket: {
      reconnectStrategy: (retries) => {
        if (retries > MAX_RECONNECT_ATTEMPTS) {
          logger.error('Redis reconnection attempts exceeded', { retries });
          return new Error('Redis reconnection failed');
        }
        const delay = Math.min(retries * 100, 3000);
        logger.warn('Redis reconnecting', { retries, delay });
        return delay;
      },
    },
  });

  client.on('error', (error: Error) => {
    logger.error('Redis client error', { error: error.message });
  });

  client.on('ready', () => {
    isRedisConnected = true;
    logger.info('Redis client ready');
  });

  client.on('end', () => {
    isRedisConnected = false;
  });

  redisClient = client;
  return client;
}

export async function connectRedis(): Promise<void> {
  if (!isRedisEnabled()) {
    logger.info('Redis disabled, using in-memory rate limiting');
    return;
  }

  if (isRedisConnected || isRedisConnecting) {
    return;
  }

  const url = maskUrl(redisUrl() ?? '');

  try {
    isRedisConnecting = true;
    const client = getRedisClient();
    await client.connect();
    await client.ping();

    isRedisConnected = true;
    logger.info('Redis connected successfully', { url });
  } catch (error) {
    logger.error('Redis connection failed', {
      error: error instanceof Error ? error.message : 'Unknown error',
      url,
    });
    throw error;
  } finally {
    isRedisConnecting = false;
  }
}

export async function disconnectRedis(): Promise<void> {
  if (redisClient === null || !isRedisConnected) {
    return;
  }

  try {
    await redisClient.quit();
    logger.info('Redis connection closed');
  } catch (error) {
    logger.error('Error closing Redis connection', {
      error: error instanceof Error ? error.message : 'Unknown',
    });
  } finally {
    isRedisConnected = false;
  }
}

export function isRedisAvailable(): boolean {
  return redisClient !== null && isRedisConnected && redisClient.isReady;
}
