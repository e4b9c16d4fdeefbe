/**
 * Validation Middleware
 *
 * Zod schema validation for request body, query, and params. Parsed values
 * replace the raw ones so controllers read defaults and coerced numbers.
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { ZodError, type ZodTypeAny } from 'zod';
import { ValidationError } from '../models/errors/api-error';

interface ValidationSchemas {
  body?: ZodTypeAny;
  query?: ZodTypeAny;
  params?: ZodTypeAny;
}

export interface ValidationIssue {
  path: string;
  message: string;
  code: string;
}

export function formatZodIssues(error: ZodError): ValidationIssue[] {
  return error.errors.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Validate request using Zod schemas
 */
export function validateRequest(schemas: ValidationSchemas): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction) => {
    try {
      if (schemas.body) {
        req.body = schemas.body.parse(req.body);
      }

      if (schemas.query) {
        req.query = schemas.query.parse(req.query);
      }

      if (schemas.params) {
        req.params = schemas.params.parse(req.params);
      }

      next();
    } catch (error) {
      if (error instanceof ZodError) {
        next(new ValidationError('Request validation failed', formatZodIssues(error)));
      } else {
        next(error);
      }
    }
  };
}
