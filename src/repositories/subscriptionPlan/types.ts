/**
 * Domain types for subscription plan repository
 */

import type { ChangeReason } from '../../database/types.js';

/**
 * Subscription plan entity with camelCase properties for domain layer
 */
export interface SubscriptionPlan {
  id: string;
  title: string;
  customerAgreementId: string;
  productId: string | null;
  enterpriseCatalogUuid: string | null;
  salesforceOpportunityId: string | null;
  startDate: Date;
  expirationDate: Date;
  isActive: boolean;
  forInternalUseOnly: boolean;
  isRevocationCapEnabled: boolean;
  revokeMaxPercentage: number;
  numRevocationsApplied: number;
  /** Derived from the cap; null while the cap is disabled */
  numRevocationsRemaining: number | null;
  numLicenses: number;
  shouldAutoApplyLicenses: boolean;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Data required to create a plan; every write records a change reason
 */
export interface CreateSubscriptionPlanData {
  title: string;
  customerAgreementId: string;
  productId: string | null;
  enterpriseCatalogUuid?: string | null;
  salesforceOpportunityId?: string | null;
  startDate: Date;
  expirationDate: Date;
  isActive?: boolean;
  forInternalUseOnly?: boolean;
  isRevocationCapEnabled?: boolean;
  revokeMaxPercentage?: number;
  numLicenses: number;
  changeReason: ChangeReason;
}

export type UpdateSubscriptionPlanData = Partial<
  Omit<CreateSubscriptionPlanData, 'changeReason'>
> & {
  changeReason: ChangeReason;
};

/**
 * One recorded change of a subscription plan
 */
export interface SubscriptionPlanHistoryEntry {
  id: string;
  subscriptionPlanId: string;
  changeReason: ChangeReason;
  snapshot: Record<string, unknown>;
  changedAt: Date;
}

export type SubscriptionPlanSortColumn =
  | 'created_at'
  | 'updated_at'
  | 'title'
  | 'start_date'
  | 'expiration_date';
