/**
 * Base Controller
 *
 * Response helpers shared by all controllers.
 */

import type { Response } from 'express';
import { successResponse, createdResponse } from '../utils/response';

export class BaseController {
  /**
   * Send successful response with data
   */
  protected success<T>(res: Response, data: T, meta?: Record<string, unknown>) {
    return successResponse(res, data, meta);
  }

  /**
   * Send created response (201)
   */
  protected created<T>(res: Response, data: T, meta?: Record<string, unknown>) {
    return createdResponse(res, data, meta);
  }
}
