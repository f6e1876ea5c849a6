/**
 * Zod validation schemas for plan type operations
 */

import { z } from 'zod';
import { requiredText } from '../common.js';

/**
 * Schema for creating a new plan type
 * Flags default to false, except isPaidSubscription which defaults to true
 */
export const CreatePlanTypeSchema = z.object({
  label: requiredText(128, 'Label'),
  description: z
    .string()
    .trim()
    .max(1000, 'Description must not exceed 1000 characters')
    .optional(),
  sfIdRequired: z.boolean().optional(),
  nsIdRequired: z.boolean().optional(),
  isPaidSubscription: z.boolean().optional(),
});

/**
 * Schema for updating an existing plan type
 */
export const UpdatePlanTypeSchema = CreatePlanTypeSchema.partial();

export type CreatePlanTypeInput = z.input<typeof CreatePlanTypeSchema>;
export type UpdatePlanTypeInput = z.input<typeof UpdatePlanTypeSchema>;
