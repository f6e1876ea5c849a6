/**
 * Types for the plan validation rule engine
 */

/**
 * A rejected field with a human-readable message
 */
export interface FieldError {
  field: string;
  message: string;
}

/**
 * Outcome of evaluating a rule list against a candidate
 */
export type ValidationVerdict =
  | { accepted: true }
  | { accepted: false; errors: FieldError[] };

/**
 * A single business rule. `violates` is a pure predicate over the context;
 * when it returns true the rule rejects `field` with `message`.
 */
export interface Rule<TContext> {
  field: string;
  message: string;
  violates: (context: TContext) => boolean;
}

export interface PlanTypeFlags {
  sfIdRequired: boolean;
  nsIdRequired: boolean;
}

export interface CustomerAgreementSnapshot {
  defaultEnterpriseCatalogUuid: string | null;
}

export interface ProductCandidate {
  netsuiteId: number | null;
  planType: PlanTypeFlags;
}

/**
 * A subscription plan as submitted, with its relations resolved
 */
export interface SubscriptionPlanCandidate {
  enterpriseCatalogUuid: string | null;
  numLicenses: number;
  forInternalUseOnly: boolean;
  isRevocationCapEnabled: boolean;
  revokeMaxPercentage: number;
  salesforceOpportunityId: string | null;
  customerAgreement: CustomerAgreementSnapshot | null;
  product: ProductCandidate | null;
}

export interface RenewalCandidate {
  effectiveDate: Date;
  renewedExpirationDate: Date;
}

export interface PriorPlanSnapshot {
  expirationDate: Date;
}

export interface SubscriptionPlanRuleContext {
  candidate: SubscriptionPlanCandidate;
  /** True when the customer agreement link was set by this submission */
  isNewAgreementLink: boolean;
  now: Date;
}

export interface RenewalRuleContext {
  candidate: RenewalCandidate;
  priorPlan: PriorPlanSnapshot;
  now: Date;
}

export interface ProductRuleContext {
  candidate: ProductCandidate;
}
