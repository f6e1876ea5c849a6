/**
 * Zod validation schemas for product operations
 */

import { z } from 'zod';
import { optionalIdentifier, requiredText } from '../common.js';

const NetsuiteIdSchema = z
  .number()
  .int('NetSuite ID must be a whole number')
  .positive('NetSuite ID must be positive')
  .nullable()
  .optional();

export const CreateProductSchema = z.object({
  name: requiredText(255, 'Name'),
  description: z
    .string()
    .trim()
    .max(1000, 'Description must not exceed 1000 characters')
    .optional(),
  netsuiteId: NetsuiteIdSchema,
  salesforceProductId: optionalIdentifier(18, 'Salesforce product ID'),
  planTypeId: z.string().uuid('Plan type ID must be a valid UUID'),
});

export const UpdateProductSchema = CreateProductSchema.partial();

export type CreateProductInput = z.input<typeof CreateProductSchema>;
export type UpdateProductInput = z.input<typeof UpdateProductSchema>;
