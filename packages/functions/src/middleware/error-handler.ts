import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { error as logError } from 'firebase-functions/logger';
import type { ApiError } from '../types/api.js';
import { AppError } from '../types/errors.js';

export { AppError, NotFoundError, ValidationError } from '../types/errors.js';

export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  logError('http:request_failed', {
    method: req.method,
    path: req.path,
    error_name: err.name,
    error: err.message,
  });

  if (err instanceof ZodError) {
    const response: ApiError = {
      success: false,
      error: {
        code: 'VALIDATION_ERROR',
        message: 'Invalid request data',
        details: err.errors,
      },
    };
    res.status(400).json(response);
    return;
  }

  if (err instanceof AppError) {
    const response: ApiError = {
      success: false,
      error: {
        code: err.code,
        message: err.message,
        details: err.details,
      },
    };
    res.status(err.statusCode).json(response);
    return;
  }

  const response: ApiError = {
    success: false,
    error: {
      code: 'INTERNAL_ERROR',
      message: 'An unexpected error occurred',
    },
  };
  res.status(500).json(response);
}
