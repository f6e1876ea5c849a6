/**
 * Zod building blocks shared by the entity schemas
 */

import { z } from 'zod';

const blankToNull = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? null : value;

/**
 * Optional text identifier; blank input is stored as null
 */
export function optionalIdentifier(maxLength: number, label: string) {
  return z
    .preprocess(
      blankToNull,
      z
        .string()
        .trim()
        .max(maxLength, `${label} must not exceed ${maxLength} characters`)
        .nullable()
    )
    .optional();
}

/**
 * Optional UUID reference; blank input is stored as null
 */
export function optionalUuid(label: string) {
  return z
    .preprocess(
      blankToNull,
      z.string().uuid(`${label} must be a valid UUID`).nullable()
    )
    .optional();
}

/**
 * Validation schema for route ID parameters
 */
export function uuidParam(label: string) {
  return z.string().uuid(`Invalid ${label} ID format`);
}

/**
 * Validation schema for a title or name
 */
export function requiredText(maxLength: number, label: string) {
  return z
    .string()
    .trim()
    .min(1, `${label} is required`)
    .max(maxLength, `${label} must not exceed ${maxLength} characters`);
}

export const SortOrderSchema = z.enum(['asc', 'desc']).optional().default('desc');
export const PageSchema = z.coerce.number().int().positive().optional().default(1);
export const LimitSchema = z.coerce
  .number()
  .int()
  .positive()
  .max(100)
  .optional()
  .default(10);
