/**
 * Abstract base CRUD service implementation
 */

import { z } from 'zod';
import type {
  BaseCrudRepository,
  PaginatedResult,
  PaginationOptions,
} from '../repositories/types.js';
import type { FieldError } from '../validation/rules/index.js';
import logger from '../utils/logger.js';
import type { ServiceResult } from './types.js';
import {
  ServiceErrorType,
  createRuleViolation,
  createServiceError,
  createSuccessResult,
  createErrorResult,
} from './types.js';

/**
 * Abstract base implementation for CRUD services
 * Provides lookups, deletion and repository error translation; concrete
 * services validate their input and then persist through createEntity and
 * updateEntity
 */
export abstract class BaseCrudServiceImpl<
  T,
  CreateData,
  UpdateData,
  TSort extends string = string,
> {
  constructor(
    protected readonly repository: BaseCrudRepository<
      T,
      CreateData,
      UpdateData,
      TSort
    >,
    protected readonly entityName: string
  ) {}

  /**
   * Find all entities with optional pagination
   */
  async findAll(
    pagination?: PaginationOptions<TSort>
  ): Promise<ServiceResult<PaginatedResult<T>>> {
    try {
      const result = await this.repository.findAll(pagination);
      return createSuccessResult(result);
    } catch (error) {
      return this.handleRepositoryError(error);
    }
  }

  /**
   * Find entity by ID
   */
  async findById(id: string): Promise<ServiceResult<T>> {
    try {
      const entity = await this.repository.findById(id);
      if (!entity) {
        return this.notFound(id);
      }
      return createSuccessResult(entity);
    } catch (error) {
      return this.handleRepositoryError(error);
    }
  }

  /**
   * Delete an entity
   */
  async delete(id: string): Promise<ServiceResult<boolean>> {
    try {
      const deleted = await this.repository.delete(id);
      if (!deleted) {
        return this.notFound(id);
      }
      return createSuccessResult(true);
    } catch (error) {
      return this.handleRepositoryError(error);
    }
  }

  /**
   * Persist a validated entity
   */
  protected async createEntity(data: CreateData): Promise<ServiceResult<T>> {
    try {
      const entity = await this.repository.create(data);
      return createSuccessResult(entity);
    } catch (error) {
      return this.handleRepositoryError(error);
    }
  }

  /**
   * Persist validated changes to an existing entity
   */
  protected async updateEntity(
    id: string,
    data: UpdateData
  ): Promise<ServiceResult<T>> {
    try {
      const updated = await this.repository.update(id, data);
      if (!updated) {
        return this.notFound(id);
      }
      return createSuccessResult(updated);
    } catch (error) {
      return this.handleRepositoryError(error);
    }
  }

  protected notFound<R>(id: string): ServiceResult<R> {
    return createErrorResult(
      createServiceError(
        ServiceErrorType.NOT_FOUND,
        `${this.entityName} with ID ${id} not found`
      )
    );
  }

  /**
   * Reject a submission that failed a business rule
   */
  protected ruleViolation<R>(
    fieldErrors: FieldError[],
    context: Record<string, unknown> = {}
  ): ServiceResult<R> {
    logger.warn(`${this.entityName} submission rejected`, {
      ...context,
      fieldErrors,
    });
    return createErrorResult(createRuleViolation(fieldErrors));
  }

  /**
   * Convert a Zod error into a validation error result
   */
  protected validationError<R>(error: z.ZodError): ServiceResult<R> {
    return createErrorResult(
      createServiceError(
        ServiceErrorType.VALIDATION_ERROR,
        formatZodError(error),
        {
          issues: error.issues.map((issue) => ({
            path: issue.path.join('.'),
            message: issue.message,
          })),
        }
      )
    );
  }

  /**
   * Handle repository errors and convert to service errors
   */
  protected handleRepositoryError<R>(error: unknown): ServiceResult<R> {
    if (error instanceof z.ZodError) {
      return this.validationError(error);
    }

    // Check for database constraint violations
    if (error instanceof Error) {
      const message = error.message.toLowerCase();

      // PostgreSQL unique constraint violation
      if (
        message.includes('duplicate key') ||
        message.includes('unique constraint')
      ) {
        return createErrorResult(
          createServiceError(
            ServiceErrorType.DUPLICATE_ENTRY,
            'A record with this value already exists',
            error.message
          )
        );
      }

      // PostgreSQL foreign key violation
      if (message.includes('foreign key')) {
        return createErrorResult(
          createServiceError(
            ServiceErrorType.BUSINESS_RULE_VIOLATION,
            'Operation violates referential integrity',
            error.message
          )
        );
      }

      // Generic database error
      if (message.includes('database') || message.includes('connection')) {
        return createErrorResult(
          createServiceError(
            ServiceErrorType.DATABASE_ERROR,
            'Database operation failed',
            error.message
          )
        );
      }
    }

    // Default to internal error
    return createErrorResult(
      createServiceError(
        ServiceErrorType.INTERNAL_ERROR,
        'An unexpected error occurred',
        error
      )
    );
  }
}

/**
 * Format Zod validation errors into a readable message
 */
export function formatZodError(error: z.ZodError): string {
  const issues = error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
  return issues.join('; ');
}
