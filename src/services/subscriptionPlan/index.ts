export type { SubscriptionPlanService } from './SubscriptionPlanService.js';
export { SubscriptionPlanServiceImpl } from './SubscriptionPlanServiceImpl.js';
