/**
 * API Error Hierarchy
 *
 * Typed errors for planner failures. Fatal input problems are thrown as one of
 * these; degraded lookups (place names, routing fallback) are returned as values.
 */

export class ApiError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly details?: unknown;

  constructor(message: string, statusCode: number, code?: string, details?: unknown) {
    super(message);
    this.name = this.constructor.name;
    this.statusCode = statusCode;
    this.code = code || this.name;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

export class ValidationError extends ApiError {
  constructor(message: string, details?: unknown) {
    super(message, 400, 'VALIDATION_ERROR', details);
  }
}

/**
 * Not enough input to plan anything (no legs, fewer than two waypoints).
 */
export class InsufficientInputError extends ApiError {
  constructor(message: string, details?: unknown) {
    super(message, 400, 'INSUFFICIENT_INPUT', details);
  }
}

export class NotFoundError extends ApiError {
  constructor(resource: string) {
    super(`${resource} not found`, 404, 'NOT_FOUND');
  }
}

/**
 * Every supplied log or history entry was malformed.
 */
export class NoValidLogsError extends ApiError {
  constructor(message = 'No valid log entries found', details?: unknown) {
    super(message, 422, 'NO_VALID_LOGS', details);
  }
}

export class DatabaseError extends ApiError {
  constructor(message: string, details?: unknown) {
    super(message, 500, 'DATABASE_ERROR', details);
  }
}

export class ExternalServiceError extends ApiError {
  public readonly service: string;

  constructor(service: string, message?: string) {
    super(message || `External service error: ${service}`, 502, 'EXTERNAL_SERVICE_ERROR');
    this.service = service;
  }
}
