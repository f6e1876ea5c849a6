/**
 * Zod validation schemas for customer agreement operations
 */

import { z } from 'zod';
import { optionalUuid, requiredText } from '../common.js';

/**
 * Enterprise customer slug
 * - Lowercase letters, numbers and hyphens
 * - Cannot start or end with a hyphen
 */
const SlugSchema = z
  .string()
  .min(1, 'Enterprise customer slug is required')
  .max(128, 'Enterprise customer slug must not exceed 128 characters')
  .regex(
    /^[a-z0-9]+(?:-[a-z0-9]+)*$/,
    'Slug must contain only lowercase letters, numbers, and hyphens (cannot start or end with hyphen)'
  );

/**
 * Whole days; stored as the purge window of the agreement's licenses
 */
const LicenseDurationSchema = z
  .number()
  .int('License duration before purge must be a whole number of days')
  .positive('License duration before purge must be at least one day');

export const CreateCustomerAgreementSchema = z.object({
  enterpriseCustomerUuid: z
    .string()
    .uuid('Enterprise customer UUID must be a valid UUID'),
  enterpriseCustomerSlug: SlugSchema,
  enterpriseCustomerName: requiredText(255, 'Enterprise customer name'),
  defaultEnterpriseCatalogUuid: optionalUuid('Default enterprise catalog UUID'),
  disableExpirationNotifications: z.boolean().optional(),
  licenseDurationBeforePurgeDays: LicenseDurationSchema.optional(),
});

export const UpdateCustomerAgreementSchema =
  CreateCustomerAgreementSchema.partial();

/**
 * Selection of the plan licenses are auto-applied from; '' clears it
 */
export const AutoApplySubscriptionSchema = z.object({
  subscriptionPlanId: z.string().trim(),
});

export type CreateCustomerAgreementInput = z.input<
  typeof CreateCustomerAgreementSchema
>;
export type UpdateCustomerAgreementInput = z.input<
  typeof UpdateCustomerAgreementSchema
>;
export type AutoApplySubscriptionInput = z.input<
  typeof AutoApplySubscriptionSchema
>;
