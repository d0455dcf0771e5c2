/**
 * Standardized Error Handling Middleware
 *
 * Provides consistent error responses across all endpoints. Integration
 * errors that escape a route are mapped onto HTTP statuses by kind.
 *
 * @module middleware/error-handler
 */

import { Request, Response, NextFunction, ErrorRequestHandler } from 'express';
import { ZodError } from 'zod';
import { logger } from '../utils/logger';
import { IntegrationError } from '../core/errors';
import type { IntegrationErrorKind } from '../core/errors';

export interface ApiError {
  error: string;
  message: string;
  statusCode: number;
  details?: unknown;
  timestamp: number;
  path: string;
}

/**
 * Standard error codes
 */
export enum ErrorCode {
  INVALID_REQUEST = 'invalid_request',
  VALIDATION_ERROR = 'validation_error',
  NOT_FOUND = 'not_found',
  CONFLICT = 'conflict',
  UNAUTHORIZED = 'unauthorized',
  FORBIDDEN = 'forbidden',
  RATE_LIMIT_EXCEEDED = 'rate_limit_exceeded',
  INTERNAL_ERROR = 'internal_error',
  SERVICE_UNAVAILABLE = 'service_unavailable',
  TIMEOUT = 'timeout',
  DEPENDENCY_ERROR = 'dependency_error'
}

/**
 * Custom application error class
 */
export class AppError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly statusCode: number = 500,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }
}

const INTEGRATION_STATUS: Record<IntegrationErrorKind, { code: ErrorCode; statusCode: number }> = {
  validation: { code: ErrorCode.VALIDATION_ERROR, statusCode: 400 },
  not_found: { code: ErrorCode.NOT_FOUND, statusCode: 404 },
  duplicate: { code: ErrorCode.CONFLICT, statusCode: 409 },
  rate_limited: { code: ErrorCode.RATE_LIMIT_EXCEEDED, statusCode: 429 },
  authentication: { code: ErrorCode.DEPENDENCY_ERROR, statusCode: 502 },
  network: { code: ErrorCode.DEPENDENCY_ERROR, statusCode: 503 },
  circuit_open: { code: ErrorCode.SERVICE_UNAVAILABLE, statusCode: 503 },
  unknown: { code: ErrorCode.INTERNAL_ERROR, statusCode: 500 }
};

/**
 * Format error response
 */
function formatErrorResponse(
  error: Error,
  req: Request
): ApiError {
  // Handle Zod validation errors
  if (error instanceof ZodError) {
    return {
      error: ErrorCode.VALIDATION_ERROR,
      message: 'Request validation failed',
      statusCode: 400,
      details: error.flatten(),
      timestamp: Date.now(),
      path: req.path
    };
  }

  // Handle custom AppError
  if (error instanceof AppError) {
    return {
      error: error.code,
      message: error.message,
      statusCode: error.statusCode,
      details: error.details,
      timestamp: Date.now(),
      path: req.path
    };
  }

  if (error instanceof IntegrationError) {
    const mapped = INTEGRATION_STATUS[error.kind];
    return {
      error: mapped.code,
      message: error.message,
      statusCode: mapped.statusCode,
      details: error.details,
      timestamp: Date.now(),
      path: req.path
    };
  }

  // Handle generic errors (body-parser sets statusCode/status on its errors)
  const statusCode = readStatusCode(error) ?? 500;
  const message = error.message || 'An unexpected error occurred';

  return {
    error: statusCode < 500 ? ErrorCode.INVALID_REQUEST : ErrorCode.INTERNAL_ERROR,
    message,
    statusCode,
    timestamp: Date.now(),
    path: req.path
  };
}

function readStatusCode(error: Error): number | undefined {
  const candidate: unknown = 'statusCode' in error ? error.statusCode : 'status' in error ? error.status : undefined;
  return typeof candidate === 'number' && candidate >= 400 && candidate < 600 ? candidate : undefined;
}

/**
 * Global error handler middleware
 */
export const errorHandler: ErrorRequestHandler = (
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void => {
  const errorResponse = formatErrorResponse(err, req);

  // Log error with appropriate level
  if (errorResponse.statusCode >= 500) {
    logger.error('Server error', {
      error: err.message,
      stack: err.stack,
      path: req.path,
      method: req.method,
      statusCode: errorResponse.statusCode
    });
  } else if (errorResponse.statusCode >= 400) {
    logger.warn('Client error', {
      error: err.message,
      path: req.path,
      method: req.method,
      statusCode: errorResponse.statusCode
    });
  }

  // Send error response
  res.status(errorResponse.statusCode).json(errorResponse);
};

/**
 * Async handler wrapper - catches async errors and passes to error middleware
 */
export function asyncHandler<T>(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<T>
) {
  return (req: Request, res: Response, next: NextFunction): void => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}

/**
 * 404 handler for undefined routes
 */
export function notFoundHandler(req: Request, res: Response): void {
  const error: ApiError = {
    error: ErrorCode.NOT_FOUND,
    message: `Route ${req.method} ${req.path} not found`,
    statusCode: 404,
    timestamp: Date.now(),
    path: req.path
  };

  logger.warn('Route not found', {
    path: req.path,
    method: req.method
  });

  res.status(404).json(error);
}
