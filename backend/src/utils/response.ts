/**
 * Response Helpers
 *
 * Standardized `{ success, data, meta? }` and `{ success: false, error }` bodies.
 */

import type { Response } from 'express';
import type { ApiResponse, ApiErrorResponse } from '../models/dtos/common.dto';
import type { ApiError } from '../models/errors/api-error';

/**
 * Send successful response
 */
export function successResponse<T>(
  res: Response,
  data: T,
  meta?: Record<string, unknown>,
  statusCode = 200
): Response<ApiResponse<T>> {
  const response: ApiResponse<T> = {
    success: true,
    data,
  };

  if (meta) {
    response.meta = meta;
  }

  return res.status(statusCode).json(response);
}

/**
 * Send error response
 */
export function errorResponse(res: Response, error: ApiError): Response<ApiErrorResponse> {
  const body: ApiErrorResponse = {
    success: false,
    error: {
      code: error.code,
      message: error.message,
    },
  };

  if (error.details !== undefined) {
    body.error.details = error.details;
  }

  return res.status(error.statusCode).json(body);
}

/**
 * Send created response (201)
 */
export function createdResponse<T>(
  res: Response,
  data: T,
  meta?: Record<string, unknown>
): Response<ApiResponse<T>> {
  return successResponse(res, data, meta, 201);
}
