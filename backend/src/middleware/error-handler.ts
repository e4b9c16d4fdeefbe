/**
 * Error Handler Middleware
 *
 * Global error handling with structured logging and standardized responses.
 */

import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { ApiError, ValidationError } from '../models/errors/api-error';
import { formatZodIssues } from './validation';
import { errorResponse } from '../utils/response';
import { logger } from '../utils/logger';

/**
 * body-parser marks JSON syntax errors with `type: 'entity.parse.failed'`
 */
function isMalformedJsonError(err: Error): boolean {
  return err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed';
}

/**
 * Global error handler middleware
 * Transforms all errors into consistent API responses
 */
export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  next: NextFunction
): void {
  if (err instanceof ZodError) {
    const validationError = new ValidationError('Request validation failed', formatZodIssues(err));

    logger.warn('Validation error', {
      path: req.path,
      method: req.method,
      errors: validationError.details,
    });

    errorResponse(res, validationError);
    return;
  }

  if (isMalformedJsonError(err)) {
    logger.warn('Malformed JSON body', { path: req.path, method: req.method });
    errorResponse(res, new ValidationError('Request body is not valid JSON'));
    return;
  }

  if (err instanceof ApiError) {
    const meta = {
      code: err.code,
      message: err.message,
      statusCode: err.statusCode,
      path: req.path,
      method: req.method,
    };

    if (err.statusCode >= 500) {
      logger.error('API error', { ...meta, stack: err.stack });
    } else {
      logger.warn('API error', meta);
    }

    errorResponse(res, err);
    return;
  }

  logger.error('Unexpected error', {
    message: err.message,
    stack: err.stack,
    path: req.path,
    method: req.method,
  });

  // Don't expose internal error details in production
  const isDevelopment = process.env.NODE_ENV !== 'production';

  res.status(500).json({
    success: false,
    error: {
      code: 'INTERNAL_SERVER_ERROR',
      message: isDevelopment ? err.message : 'Internal server error',
    },
  });
}

/**
 * 404 handler for unknown routes
 */
export function notFoundHandler(req: Request, res: Response): void {
  logger.warn('Route not found', {
    path: req.path,
    method: req.method,
  });

  res.status(404).json({
    success: false,
    error: {
      code: 'NOT_FOUND',
      message: 'Route not found',
      details: { path: req.path },
    },
  });
}
