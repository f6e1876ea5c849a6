import type { BaseCrudService, ServiceResult } from '../types.js';
import type {
  SubscriptionPlan,
  SubscriptionPlanHistoryEntry,
  SubscriptionPlanSortColumn,
} from '../../repositories/subscriptionPlan/types.js';
import type {
  CreateSubscriptionPlanInput,
  UpdateSubscriptionPlanInput,
} from '../../validation/subscriptionPlan/index.js';

/**
 * Service interface for subscription plan operations
 */
export interface SubscriptionPlanService
  extends BaseCrudService<
    SubscriptionPlan,
    CreateSubscriptionPlanInput,
    UpdateSubscriptionPlanInput,
    SubscriptionPlanSortColumn
  > {
  /**
   * Recorded changes of a plan, newest first
   */
  getHistory(id: string): Promise<ServiceResult<SubscriptionPlanHistoryEntry[]>>;
}
