/**
 * Service layer type definitions
 */

import type {
  PaginationOptions,
  PaginatedResult,
} from '../repositories/types.js';
import type { FieldError } from '../validation/rules/index.js';

/**
 * Service operation result type
 */
export type ServiceResult<T> =
  | {
      success: true;
      data: T;
    }
  | {
      success: false;
      error: ServiceError;
    };

/**
 * Service error types
 */
export enum ServiceErrorType {
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  NOT_FOUND = 'NOT_FOUND',
  DUPLICATE_ENTRY = 'DUPLICATE_ENTRY',
  DATABASE_ERROR = 'DATABASE_ERROR',
  BUSINESS_RULE_VIOLATION = 'BUSINESS_RULE_VIOLATION',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

/**
 * Service error interface
 */
export interface ServiceError {
  type: ServiceErrorType;
  message: string;
  code?: string;
  details?: unknown;
  /** Rejected fields, set for business rule violations */
  fieldErrors?: FieldError[];
}

/**
 * Source of the current time, injectable for tests
 */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

/**
 * Base CRUD service interface
 */
export interface BaseCrudService<
  T,
  CreateInput,
  UpdateInput,
  TSort extends string = string,
> {
  /**
   * Find all entities with optional pagination
   */
  findAll(
    pagination?: PaginationOptions<TSort>
  ): Promise<ServiceResult<PaginatedResult<T>>>;

  /**
   * Find entity by ID
   */
  findById(id: string): Promise<ServiceResult<T>>;

  /**
   * Create a new entity
   */
  create(data: CreateInput): Promise<ServiceResult<T>>;

  /**
   * Update an existing entity
   */
  update(id: string, data: UpdateInput): Promise<ServiceResult<T>>;

  /**
   * Delete an entity
   */
  delete(id: string): Promise<ServiceResult<boolean>>;
}

/**
 * Create a service error helper
 */
export function createServiceError(
  type: ServiceErrorType,
  message: string,
  details?: unknown
): ServiceError {
  return { type, message, details };
}

/**
 * Create a business rule violation carrying the rejected fields
 * The first field error's message doubles as the error message
 */
export function createRuleViolation(fieldErrors: FieldError[]): ServiceError {
  return {
    type: ServiceErrorType.BUSINESS_RULE_VIOLATION,
    message: fieldErrors[0]?.message ?? 'Business rule violated',
    fieldErrors,
  };
}

/**
 * Rejection for a reference that does not resolve to a stored record
 */
export function invalidChoiceError(field: string): FieldError {
  return {
    field,
    message: 'Select a valid choice. That choice is not one of the available choices.',
  };
}

/**
 * Create a success result helper
 */
export function createSuccessResult<T>(data: T): ServiceResult<T> {
  return { success: true, data };
}

/**
 * Create an error result helper
 */
export function createErrorResult<T>(error: ServiceError): ServiceResult<T> {
  return { success: false, error };
}
