/**
 * Zod validation schemas for subscription plan operations
 *
 * These are the field-level checks that run before the plan validator's
 * business rules.
 */

import { z } from 'zod';
import type { LicensingConfig } from '../../config/licensing.js';
import { optionalIdentifier, optionalUuid, requiredText } from '../common.js';

export const CHANGE_REASONS = [
  'new',
  'renewal',
  'expansion',
  'manual_changes',
  'other',
] as const;

export const ChangeReasonSchema = z.enum(CHANGE_REASONS, {
  message: `Reason for change must be one of: ${CHANGE_REASONS.join(', ')}`,
});

export const PLAN_DATE_ORDER_MESSAGE =
  'A subscription can not expire before it starts.';

/**
 * Build the plan schemas for the configured minimum license count
 */
export function createSubscriptionPlanSchemas(
  licensing: Pick<LicensingConfig, 'minNumLicenses'>
) {
  const NumLicensesSchema = z
    .number()
    .int('Number of licenses must be a whole number')
    .min(
      licensing.minNumLicenses,
      `Number of licenses must be at least ${licensing.minNumLicenses}`
    );

  // Upper bound is a business rule, checked only with the cap enabled
  const RevokeMaxPercentageSchema = z
    .number()
    .int('Revoke max percentage must be a whole number')
    .min(0, 'Must be a valid percentage (0-100).');

  const fields = {
    title: requiredText(128, 'Title'),
    customerAgreementId: z
      .string()
      .uuid('Customer agreement ID must be a valid UUID'),
    productId: optionalUuid('Product ID'),
    enterpriseCatalogUuid: optionalUuid('Enterprise catalog UUID'),
    salesforceOpportunityId: optionalIdentifier(18, 'Salesforce opportunity ID'),
    startDate: z.coerce.date(),
    expirationDate: z.coerce.date(),
    isActive: z.boolean().optional(),
    forInternalUseOnly: z.boolean().optional(),
    isRevocationCapEnabled: z.boolean().optional(),
    revokeMaxPercentage: RevokeMaxPercentageSchema.optional(),
    numLicenses: NumLicensesSchema,
  };

  const CreateSubscriptionPlanSchema = z
    .object({ ...fields, changeReason: ChangeReasonSchema })
    .refine(
      (plan) => plan.startDate.getTime() <= plan.expirationDate.getTime(),
      {
        message: PLAN_DATE_ORDER_MESSAGE,
        path: ['expirationDate'],
      }
    );

  // Dates of a partial update are ordered against the stored plan by the service
  const UpdateSubscriptionPlanSchema = z.object({
    ...z.object(fields).partial().shape,
    changeReason: ChangeReasonSchema,
  });

  return { CreateSubscriptionPlanSchema, UpdateSubscriptionPlanSchema };
}

export type SubscriptionPlanSchemas = ReturnType<
  typeof createSubscriptionPlanSchemas
>;

export type CreateSubscriptionPlanInput = z.input<
  SubscriptionPlanSchemas['CreateSubscriptionPlanSchema']
>;
export type UpdateSubscriptionPlanInput = z.input<
  SubscriptionPlanSchemas['UpdateSubscriptionPlanSchema']
>;
