import type { BaseCrudRepository } from '../types.js';
import type {
  SubscriptionPlanRenewal,
  CreateRenewalData,
  UpdateRenewalData,
  RenewalSortColumn,
} from './types.js';

/**
 * Repository interface for subscription plan renewals
 */
export type RenewalRepository = BaseCrudRepository<
  SubscriptionPlanRenewal,
  CreateRenewalData,
  UpdateRenewalData,
  RenewalSortColumn
>;
