export type { SubscriptionPlanRepository } from './SubscriptionPlanRepository.js';
export {
  SubscriptionPlanRepositoryImpl,
  mapSubscriptionPlanRow,
} from './SubscriptionPlanRepositoryImpl.js';
export {
  computeRevocationsRemaining,
  DEFAULT_REVOKE_MAX_PERCENTAGE,
} from './revocations.js';
export * from './types.js';
