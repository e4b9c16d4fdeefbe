/**
 * Rate Limiting Middleware
 *
 * Per-IP limits, shared through Redis when it is connected and kept in memory
 * otherwise:
 * - Trip planning: 30 req/min (routing and geocoding calls per request)
 * - Queries: 120 req/min
 *
 * Returns 429 Too Many Requests with the standard RateLimit-* headers.
 */

import rateLimit, { type Options, type RateLimitRequestHandler } from 'express-rate-limit';
import RedisStore from 'rate-limit-redis';
import type { NextFunction, Request, Response } from 'express';
import { getRedisClient, isRedisAvailable } from '../config/redis';
import { logHelpers, logger } from '../utils/logger';

type RedisReply = boolean | number | string | Array<boolean | number | string>;

const WINDOW_MS = 60 * 1000;

export const RATE_LIMITS = {
  planning: parseInt(process.env.RATE_LIMIT_PLANNING || '30', 10),
  query: parseInt(process.env.RATE_LIMIT_QUERY || '120', 10),
};

function rateLimitExceededHandler(
  req: Request,
  res: Response,
  _next: NextFunction,
  options: Options
): void {
  const retryAfter = Math.ceil(options.windowMs / 1000);

  logHelpers.security('rate_limit_exceeded', 'medium', {
    path: req.path,
    method: req.method,
    ip: req.ip,
    retryAfter,
  });

  res.status(options.statusCode).json({
    success: false,
    error: {
      code: 'RATE_LIMIT_EXCEEDED',
      message: 'Rate limit exceeded. Please try again later.',
      details: { retryAfter },
    },
  });
}

function skipRateLimit(): boolean {
  return process.env.RATE_LIMIT_ENABLED === 'false';
}

/**
 * Builds a limiter; uses the Redis store when Redis is connected at creation.
 */
export function createRateLimiter(prefix: string, limit: number): RateLimitRequestHandler {
  const baseOptions: Partial<Options> = {
    windowMs: WINDOW_MS,
    limit,
    standardHeaders: true,
    legacyHeaders: false,
    skip: skipRateLimit,
    handler: rateLimitExceededHandler,
  };

  if (!isRedisAvailable()) {
    return rateLimit(baseOptions);
  }

  const client = getRedisClient();
  return rateLimit({
    ...baseOptions,
    store: new RedisStore({
      prefix: `ratelimit:${prefix}:`,
      sendCommand: (...args: string[]) => client.sendCommand<RedisReply>(args),
    }),
  });
}

export interface RateLimiters {
  planning: RateLimitRequestHandler;
  query: RateLimitRequestHandler;
}

export function createRateLimiters(): RateLimiters {
  const limiters = {
    planning: createRateLimiter('planning', RATE_LIMITS.planning),
    query: createRateLimiter('query', RATE_LIMITS.query),
  };

  logger.info('Rate limiting configured', {
    store: isRedisAvailable() ? 'redis' : 'memory',
    planning: `${RATE_LIMITS.planning}/min per IP`,
    query: `${RATE_LIMITS.query}/min per IP`,
  });

  return limiters;
}
