import type { LicensingConfig } from '../../config/licensing.js';
import type { Rule, SubscriptionPlanRuleContext } from './types.js';

export const MAX_REVOKE_PERCENTAGE = 100;

/**
 * Rules checked before a subscription plan is committed, in evaluation order
 */
export function createSubscriptionPlanRules(
  licensing: Pick<LicensingConfig, 'maxNumLicenses'>
): readonly Rule<SubscriptionPlanRuleContext>[] {
  return [
    {
      // Only checked when the agreement link is new; existing plans keep
      // whatever catalog they were created with
      field: 'enterprise_catalog_uuid',
      message:
        'The subscription must have an enterprise catalog uuid from itself or its customer agreement',
      violates: ({ candidate, isNewAgreementLink }) =>
        isNewAgreementLink &&
        !candidate.enterpriseCatalogUuid &&
        !candidate.customerAgreement?.defaultEnterpriseCatalogUuid,
    },
    {
      field: 'num_licenses',
      message: `Non-test subscriptions may not have more than ${licensing.maxNumLicenses} licenses`,
      violates: ({ candidate }) =>
        candidate.numLicenses > licensing.maxNumLicenses &&
        !candidate.forInternalUseOnly,
    },
    {
      field: 'revoke_max_percentage',
      message: 'Must be a valid percentage (0-100).',
      violates: ({ candidate }) =>
        candidate.isRevocationCapEnabled &&
        candidate.revokeMaxPercentage > MAX_REVOKE_PERCENTAGE,
    },
    {
      field: 'product',
      message: 'You must specify a product.',
      violates: ({ candidate }) => candidate.product === null,
    },
    {
      field: 'salesforce_opportunity_id',
      message: 'You must specify Salesforce ID for selected product.',
      violates: ({ candidate }) =>
        candidate.product !== null &&
        candidate.product.planType.sfIdRequired &&
        candidate.salesforceOpportunityId === null,
    },
  ];
}
