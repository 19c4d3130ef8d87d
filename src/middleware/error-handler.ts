/**
 * Error Handling Middleware
 */

import { Request, Response, NextFunction, RequestHandler } from 'express';
import { env } from '../config/env';
import { NoContentError, ValidationError } from '../lib/scraping/errors';

/**
 * Error with an HTTP status, thrown from controllers
 */
export class ApiError extends Error {
  readonly statusCode: number;
  readonly details?: string[];

  constructor(statusCode: number, message: string, details?: string[]) {
    super(message);
    this.name = 'ApiError';
    this.statusCode = statusCode;
    this.details = details;
  }
}

/**
 * Forward rejections from async handlers to the error middleware
 */
export const asyncHandler =
  (handler: (req: Request, res: Response, next: NextFunction) => Promise<void>): RequestHandler =>
  (req, res, next) => {
    handler(req, res, next).catch(next);
  };

function isBodyParseError(error: unknown): boolean {
  return error instanceof SyntaxError && 'type' in error && error.type === 'entity.parse.failed';
}

function toApiError(error: unknown): ApiError {
  if (error instanceof ApiError) {
    return error;
  }
  if (error instanceof ValidationError) {
    return new ApiError(400, error.message, error.reasons);
  }
  if (error instanceof NoContentError) {
    return new ApiError(422, error.message);
  }
  if (isBodyParseError(error)) {
    return new ApiError(400, 'Malformed JSON body');
  }
  return new ApiError(500, error instanceof Error ? error.message : 'Internal server error');
}

/**
 * Final error handler. Express recognizes it by its four parameters.
 */
export const errorHandler = (error: unknown, req: Request, res: Response, _next: NextFunction): void => {
  const apiError = toApiError(error);

  if (apiError.statusCode >= 500) {
    console.error(`❌ ${req.method} ${req.path}:`, error);
  }

  res.status(apiError.statusCode).json({
    success: false,
    error: apiError.statusCode >= 500 && env.NODE_ENV === 'production' ? 'Internal server error' : apiError.message,
    ...(apiError.details && apiError.details.length > 0 ? { details: apiError.details } : {}),
  });
};
