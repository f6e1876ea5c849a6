import type { BaseCrudService } from '../types.js';
import type {
  SubscriptionPlanRenewal,
  RenewalSortColumn,
} from '../../repositories/renewal/types.js';
import type {
  CreateRenewalInput,
  UpdateRenewalInput,
} from '../../validation/renewal/index.js';

/**
 * Service interface for subscription plan renewals
 */
export type RenewalService = BaseCrudService<
  SubscriptionPlanRenewal,
  CreateRenewalInput,
  UpdateRenewalInput,
  RenewalSortColumn
>;
