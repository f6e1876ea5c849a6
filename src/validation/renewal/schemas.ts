/**
 * Zod validation schemas for subscription plan renewal operations
 */

import { z } from 'zod';
import { optionalIdentifier } from '../common.js';

export const CreateRenewalSchema = z.object({
  priorSubscriptionPlanId: z
    .string()
    .uuid('Prior subscription plan ID must be a valid UUID'),
  effectiveDate: z.coerce.date(),
  renewedExpirationDate: z.coerce.date(),
  numberOfLicenses: z
    .number()
    .int('Number of licenses must be a whole number')
    .nonnegative('Number of licenses must not be negative'),
  salesforceOpportunityId: optionalIdentifier(18, 'Salesforce opportunity ID'),
  renewedPlanTitle: optionalIdentifier(128, 'Renewed plan title'),
});

export const UpdateRenewalSchema = CreateRenewalSchema.partial();

export type CreateRenewalInput = z.input<typeof CreateRenewalSchema>;
export type UpdateRenewalInput = z.input<typeof UpdateRenewalSchema>;
