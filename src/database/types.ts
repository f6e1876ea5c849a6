import type {
  ColumnType,
  Generated,
  Selectable,
  Insertable,
  Updateable,
} from 'kysely';

/**
 * Database table types for the subscription administration schema
 */

// Reasons recorded with every subscription plan change
export type ChangeReason =
  | 'new'
  | 'renewal'
  | 'expansion'
  | 'manual_changes'
  | 'other';

// Timestamps with automatic management
type CreatedAt = ColumnType<Date, string | undefined, never>;
type UpdatedAt = ColumnType<Date, string | undefined, string>;

// Business dates are written as Date or ISO string and read back as Date
type Timestamp = ColumnType<Date, Date | string, Date | string>;

/**
 * Contractual parent of one or more subscription plans
 */
export interface CustomerAgreementsTable {
  id: Generated<string>;
  enterprise_customer_uuid: string;
  enterprise_customer_slug: string;
  enterprise_customer_name: string;
  // Catalog used by plans that do not set their own
  default_enterprise_catalog_uuid: string | null;
  disable_expiration_notifications: Generated<boolean>;
  license_duration_before_purge_days: number;
  created_at: CreatedAt;
  updated_at: UpdatedAt;
}

/**
 * Plan type flags gate which external identifiers are required
 */
export interface PlanTypesTable {
  id: Generated<string>;
  label: string;
  description: string;
  sf_id_required: Generated<boolean>;
  ns_id_required: Generated<boolean>;
  is_paid_subscription: Generated<boolean>;
  created_at: CreatedAt;
  updated_at: UpdatedAt;
}

export interface ProductsTable {
  id: Generated<string>;
  name: string;
  description: string;
  netsuite_id: number | null;
  salesforce_product_id: string | null;
  plan_type_id: string;
  created_at: CreatedAt;
  updated_at: UpdatedAt;
}

export interface SubscriptionPlansTable {
  id: Generated<string>;
  title: string;
  customer_agreement_id: string;
  product_id: string | null;
  enterprise_catalog_uuid: string | null;
  salesforce_opportunity_id: string | null;
  start_date: Timestamp;
  expiration_date: Timestamp;
  is_active: Generated<boolean>;
  for_internal_use_only: Generated<boolean>;
  is_revocation_cap_enabled: Generated<boolean>;
  revoke_max_percentage: Generated<number>;
  num_revocations_applied: Generated<number>;
  num_licenses: number;
  // At most one plan per agreement carries this flag
  should_auto_apply_licenses: Generated<boolean>;
  created_at: CreatedAt;
  updated_at: UpdatedAt;
}

export interface SubscriptionPlanRenewalsTable {
  id: Generated<string>;
  prior_subscription_plan_id: string;
  renewed_subscription_plan_id: string | null;
  effective_date: Timestamp;
  renewed_expiration_date: Timestamp;
  number_of_licenses: number;
  salesforce_opportunity_id: string | null;
  renewed_plan_title: string | null;
  processed: Generated<boolean>;
  created_at: CreatedAt;
  updated_at: UpdatedAt;
}

export interface SubscriptionPlanHistoryTable {
  id: Generated<string>;
  subscription_plan_id: string;
  change_reason: ChangeReason;
  // jsonb snapshot of the committed plan row
  snapshot: ColumnType<Record<string, unknown>, string, never>;
  changed_at: CreatedAt;
}

/**
 * Database schema interface
 */
export interface Database {
  customer_agreements: CustomerAgreementsTable;
  plan_types: PlanTypesTable;
  products: ProductsTable;
  subscription_plans: SubscriptionPlansTable;
  subscription_plan_renewals: SubscriptionPlanRenewalsTable;
  subscription_plan_history: SubscriptionPlanHistoryTable;
}

/**
 * Row type helpers
 */
export type CustomerAgreementRow = Selectable<CustomerAgreementsTable>;
export type NewCustomerAgreementRow = Insertable<CustomerAgreementsTable>;
export type CustomerAgreementRowUpdate = Updateable<CustomerAgreementsTable>;

export type PlanTypeRow = Selectable<PlanTypesTable>;
export type NewPlanTypeRow = Insertable<PlanTypesTable>;
export type PlanTypeRowUpdate = Updateable<PlanTypesTable>;

export type ProductRow = Selectable<ProductsTable>;
export type NewProductRow = Insertable<ProductsTable>;
export type ProductRowUpdate = Updateable<ProductsTable>;

export type SubscriptionPlanRow = Selectable<SubscriptionPlansTable>;
export type NewSubscriptionPlanRow = Insertable<SubscriptionPlansTable>;
export type SubscriptionPlanRowUpdate = Updateable<SubscriptionPlansTable>;

export type SubscriptionPlanRenewalRow = Selectable<SubscriptionPlanRenewalsTable>;
export type NewSubscriptionPlanRenewalRow =
  Insertable<SubscriptionPlanRenewalsTable>;
export type SubscriptionPlanRenewalRowUpdate =
  Updateable<SubscriptionPlanRenewalsTable>;

export type SubscriptionPlanHistoryRow = Selectable<SubscriptionPlanHistoryTable>;
