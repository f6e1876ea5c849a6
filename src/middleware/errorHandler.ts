/**
 * Express error handling middleware
 */

import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { ServiceError, ServiceErrorType } from '../services/types.js';
import type { FieldError } from '../validation/rules/index.js';
import logger from '../utils/logger.js';
import { getRequestId } from './requestLogger.js';

/**
 * Standard error response format
 */
interface ErrorResponse {
  error: string;
  message: string;
  /** Rejected fields of a business rule violation */
  errors?: FieldError[];
  details?: unknown;
  timestamp: string;
}

/**
 * Map service error types to HTTP status codes
 */
export function getStatusCodeForServiceError(
  errorType: ServiceErrorType
): number {
  switch (errorType) {
    case ServiceErrorType.VALIDATION_ERROR:
      return 400;
    case ServiceErrorType.NOT_FOUND:
      return 404;
    case ServiceErrorType.DUPLICATE_ENTRY:
      return 409;
    case ServiceErrorType.BUSINESS_RULE_VIOLATION:
      return 422;
    case ServiceErrorType.DATABASE_ERROR:
    case ServiceErrorType.INTERNAL_ERROR:
    default:
      return 500;
  }
}

/**
 * Format Zod validation errors into a more readable structure
 */
function formatZodError(error: ZodError): {
  error: string;
  message: string;
  details: {
    issues: Array<{
      path: string;
      message: string;
    }>;
  };
} {
  const issues = error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));

  return {
    error: 'Validation Error',
    message: 'Invalid request data',
    details: { issues },
  };
}

function isServiceError(err: unknown): err is ServiceError {
  return (
    typeof err === 'object' &&
    err !== null &&
    !(err instanceof Error) &&
    'type' in err &&
    typeof err.type === 'string' &&
    err.type in ServiceErrorType &&
    'message' in err
  );
}

/**
 * Custom error class for API errors
 */
export class ApiError extends Error {
  constructor(
    public statusCode: number,
    public error: string,
    message: string,
    public details?: unknown,
    public fieldErrors?: FieldError[]
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

/**
 * Express error handling middleware
 * Handles different error types and returns consistent error responses
 */
export function errorHandler(
  err: Error | ApiError | ServiceError,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const isDevelopment = process.env.NODE_ENV === 'development';

  // Log error with request context
  const errorInfo: Record<string, unknown> = {
    error: err.message,
    requestId: getRequestId(req),
    method: req.method,
    path: req.path,
    ip: req.ip,
    userAgent: req.get('user-agent'),
  };
  if (err instanceof Error) {
    errorInfo.name = err.name;
    errorInfo.stack = err.stack;
  }

  logger.error('Request error', errorInfo);

  const timestamp = new Date().toISOString();

  // Handle Zod validation errors
  if (err instanceof ZodError) {
    const formatted = formatZodError(err);
    res.status(400).json({
      ...formatted,
      timestamp,
    });
    return;
  }

  // Handle custom API errors
  if (err instanceof ApiError) {
    const response: ErrorResponse = {
      error: err.error,
      message: err.message,
      timestamp,
    };
    if (err.fieldErrors) {
      response.errors = err.fieldErrors;
    }
    // Only include details in development mode
    if (err.details && isDevelopment) {
      response.details = err.details;
    }
    res.status(err.statusCode).json(response);
    return;
  }

  // Handle service errors passed straight to next()
  if (isServiceError(err)) {
    const statusCode = getStatusCodeForServiceError(err.type);
    let message = err.message;

    if (!isDevelopment) {
      // Map to generic messages based on error type
      switch (err.type) {
        case ServiceErrorType.VALIDATION_ERROR:
          message = 'Invalid request data.';
          break;
        case ServiceErrorType.NOT_FOUND:
          message = 'Resource not found.';
          break;
        case ServiceErrorType.DUPLICATE_ENTRY:
          message = 'Resource already exists.';
          break;
        case ServiceErrorType.BUSINESS_RULE_VIOLATION:
          // Rule messages are meant for the admin user
          break;
        case ServiceErrorType.DATABASE_ERROR:
        case ServiceErrorType.INTERNAL_ERROR:
        default:
          message = 'An error occurred. Please try again.';
          break;
      }
    }

    const response: ErrorResponse = {
      error: err.type.replace(/_/g, ' ').toLowerCase(),
      message,
      timestamp,
    };
    if (err.fieldErrors) {
      response.errors = err.fieldErrors;
    }
    if (err.details && isDevelopment) {
      response.details = err.details;
    }

    res.status(statusCode).json(response);
    return;
  }

  // Handle database errors
  if (err.message.includes('duplicate key')) {
    res.status(409).json({
      error: 'Duplicate Entry',
      message: 'Resource already exists.',
      timestamp,
    });
    return;
  }

  if (err.message.includes('violates foreign key')) {
    res.status(400).json({
      error: 'Invalid Reference',
      message: 'Invalid request data.',
      timestamp,
    });
    return;
  }

  // Default error response for unhandled errors
  const response: ErrorResponse = {
    error: 'Internal Server Error',
    message: isDevelopment
      ? err.message
      : 'An error occurred. Please try again.',
    timestamp,
  };

  if (isDevelopment && err instanceof Error && err.stack) {
    response.details = { stack: err.stack };
  }

  res.status(500).json(response);
}

/**
 * Async error wrapper for route handlers
 * Catches async errors and passes them to the error handler
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
) {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}
