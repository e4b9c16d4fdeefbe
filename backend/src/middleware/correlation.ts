/**
 * Correlation ID Middleware
 *
 * Generates or extracts correlation IDs for request tracing.
 * Correlation IDs are automatically included in all log entries within the request scope.
 */

import type { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'crypto';
import { asyncLocalStorage, logHelpers } from '../utils/logger';

export const CORRELATION_ID_HEADER = 'x-correlation-id';

const MAX_CORRELATION_ID_LENGTH = 128;

function incomingCorrelationId(req: Request): string | undefined {
  const header = req.headers[CORRELATION_ID_HEADER];
  const value = Array.isArray(header) ? header[0] : header;
  if (!value || value.length > MAX_CORRELATION_ID_LENGTH) {
    return undefined;
  }
  return value;
}

/**
 * Middleware to generate/extract correlation ID and log the request lifecycle
 */
export function correlationMiddleware(req: Request, res: Response, next: NextFunction): void {
  const correlationId = incomingCorrelationId(req) ?? randomUUID();

  asyncLocalStorage.run({ correlationId }, () => {
    res.setHeader(CORRELATION_ID_HEADER, correlationId);

    const startTime = Date.now();

    logHelpers.apiRequest(req.method, req.path, {
      query: req.query,
      ip: req.ip,
      userAgent: req.headers['user-agent'],
    });

    res.on('finish', () => {
      asyncLocalStorage.run({ correlationId }, () => {
        logHelpers.apiResponse(req.method, req.path, res.statusCode, Date.now() - startTime);
      });
    });

    next();
  });
}

/**
 * Get correlation ID from current request context
 */
export function getCorrelationId(): string | undefined {
  return asyncLocalStorage.getStore()?.correlationId;
}
