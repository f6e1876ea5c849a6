/**
 * Domain types for customer agreement repository
 */

/**
 * Reference to the plan licenses are auto-applied from
 */
export interface AutoApplicableSubscriptionRef {
  id: string;
  title: string;
}

export interface CustomerAgreement {
  id: string;
  enterpriseCustomerUuid: string;
  enterpriseCustomerSlug: string;
  enterpriseCustomerName: string;
  defaultEnterpriseCatalogUuid: string | null;
  disableExpirationNotifications: boolean;
  /**
   * Days after which unclaimed, revoked or expired licenses have their user
   * data retired and return to unassigned
   */
  licenseDurationBeforePurgeDays: number;
  /** Derived from the flagged plan of this agreement */
  autoApplicableSubscription: AutoApplicableSubscriptionRef | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface CreateCustomerAgreementData {
  enterpriseCustomerUuid: string;
  enterpriseCustomerSlug: string;
  enterpriseCustomerName: string;
  defaultEnterpriseCatalogUuid?: string | null;
  disableExpirationNotifications?: boolean;
  licenseDurationBeforePurgeDays: number;
}

export type UpdateCustomerAgreementData = Partial<CreateCustomerAgreementData>;

export type CustomerAgreementSortColumn =
  | 'created_at'
  | 'updated_at'
  | 'enterprise_customer_name';
