import { ApiError, getStatusCodeForServiceError } from '../middleware/index.js';
import type { ServiceError, ServiceResult } from '../services/types.js';
import { ServiceErrorType } from '../services/types.js';

const ERROR_LABELS: Record<ServiceErrorType, string> = {
  [ServiceErrorType.VALIDATION_ERROR]: 'Validation Error',
  [ServiceErrorType.NOT_FOUND]: 'Not Found',
  [ServiceErrorType.DUPLICATE_ENTRY]: 'Duplicate Entry',
  [ServiceErrorType.BUSINESS_RULE_VIOLATION]: 'Unprocessable Entity',
  [ServiceErrorType.DATABASE_ERROR]: 'Internal Server Error',
  [ServiceErrorType.INTERNAL_ERROR]: 'Internal Server Error',
};

/**
 * Translate a service error into the API error thrown from a route
 */
export function toApiError(error: ServiceError): ApiError {
  return new ApiError(
    getStatusCodeForServiceError(error.type),
    ERROR_LABELS[error.type],
    error.message,
    error.details,
    error.fieldErrors
  );
}

/**
 * Unwrap a service result, throwing the mapped API error on failure
 */
export function unwrap<T>(result: ServiceResult<T>): T {
  if (!result.success) {
    throw toApiError(result.error);
  }
  return result.data;
}

