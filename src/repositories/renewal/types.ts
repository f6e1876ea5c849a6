/**
 * Domain types for subscription plan renewal repository
 */

export interface SubscriptionPlanRenewal {
  id: string;
  priorSubscriptionPlanId: string;
  /** Filled once the renewal has been processed into a new plan */
  renewedSubscriptionPlanId: string | null;
  effectiveDate: Date;
  renewedExpirationDate: Date;
  numberOfLicenses: number;
  salesforceOpportunityId: string | null;
  renewedPlanTitle: string | null;
  processed: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export interface CreateRenewalData {
  priorSubscriptionPlanId: string;
  effectiveDate: Date;
  renewedExpirationDate: Date;
  numberOfLicenses: number;
  salesforceOpportunityId?: string | null;
  renewedPlanTitle?: string | null;
}

export type UpdateRenewalData = Partial<CreateRenewalData>;

export type RenewalSortColumn = 'created_at' | 'updated_at' | 'effective_date';
