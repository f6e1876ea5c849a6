/**
 * Domain types for plan type repository
 */

/**
 * Plan type entity with camelCase properties for domain layer
 */
export interface PlanType {
  id: string;
  label: string;
  description: string;
  /** Plans of products with this type need a Salesforce opportunity id */
  sfIdRequired: boolean;
  /** Products of this type need a NetSuite id */
  nsIdRequired: boolean;
  isPaidSubscription: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export interface CreatePlanTypeData {
  label: string;
  description?: string;
  sfIdRequired?: boolean;
  nsIdRequired?: boolean;
  isPaidSubscription?: boolean;
}

export type UpdatePlanTypeData = Partial<CreatePlanTypeData>;

export type PlanTypeSortColumn = 'created_at' | 'updated_at' | 'label';
