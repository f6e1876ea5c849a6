import type { BaseCrudRepository } from '../types.js';
import type {
  SubscriptionPlan,
  CreateSubscriptionPlanData,
  UpdateSubscriptionPlanData,
  SubscriptionPlanHistoryEntry,
  SubscriptionPlanSortColumn,
} from './types.js';

/**
 * Repository interface for subscription plan database operations
 */
export interface SubscriptionPlanRepository
  extends BaseCrudRepository<
    SubscriptionPlan,
    CreateSubscriptionPlanData,
    UpdateSubscriptionPlanData,
    SubscriptionPlanSortColumn
  > {
  /**
   * Plans of an agreement that are active and whose term contains `now`
   * @param customerAgreementId - Parent agreement
   * @param now - Point in time the term must contain (inclusive on both ends)
   */
  findActiveForAgreement(
    customerAgreementId: string,
    now: Date
  ): Promise<SubscriptionPlan[]>;

  /**
   * Move the auto-apply flag of an agreement to a single plan, or clear it
   * @param subscriptionPlanId - Plan to flag, or null to clear
   */
  setAutoApplicableSubscription(
    customerAgreementId: string,
    subscriptionPlanId: string | null
  ): Promise<void>;

  /**
   * Recorded changes of a plan, newest first
   */
  findHistory(subscriptionPlanId: string): Promise<SubscriptionPlanHistoryEntry[]>;
}
