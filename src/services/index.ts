/**
 * Service layer exports and wiring
 */

import type { Kysely } from 'kysely';
import type { Database } from '../database/types.js';
import type { LicensingConfig } from '../config/licensing.js';
import { PlanValidator } from '../validation/rules/index.js';
import { CustomerAgreementRepositoryImpl } from '../repositories/customerAgreement/index.js';
import { PlanTypeRepositoryImpl } from '../repositories/planType/index.js';
import { ProductRepositoryImpl } from '../repositories/product/index.js';
import { RenewalRepositoryImpl } from '../repositories/renewal/index.js';
import { SubscriptionPlanRepositoryImpl } from '../repositories/subscriptionPlan/index.js';
import type { CustomerAgreementRepository } from '../repositories/customerAgreement/index.js';
import type { PlanTypeRepository } from '../repositories/planType/index.js';
import type { ProductRepository } from '../repositories/product/index.js';
import type { RenewalRepository } from '../repositories/renewal/index.js';
import type { SubscriptionPlanRepository } from '../repositories/subscriptionPlan/index.js';
import { CustomerAgreementServiceImpl } from './customerAgreement/index.js';
import type { CustomerAgreementService } from './customerAgreement/index.js';
import { PlanTypeServiceImpl } from './planType/index.js';
import type { PlanTypeService } from './planType/index.js';
import { ProductServiceImpl } from './product/index.js';
import type { ProductService } from './product/index.js';
import { RenewalServiceImpl } from './renewal/index.js';
import type { RenewalService } from './renewal/index.js';
import { SubscriptionPlanServiceImpl } from './subscriptionPlan/index.js';
import type { SubscriptionPlanService } from './subscriptionPlan/index.js';
import type { Clock } from './types.js';
import { systemClock } from './types.js';

export { BaseCrudServiceImpl, formatZodError } from './BaseCrudService.js';
export type {
  BaseCrudService,
  Clock,
  ServiceResult,
  ServiceError,
} from './types.js';
export {
  ServiceErrorType,
  createServiceError,
  createRuleViolation,
  createSuccessResult,
  createErrorResult,
  invalidChoiceError,
  systemClock,
} from './types.js';

export interface AppRepositories {
  customerAgreements: CustomerAgreementRepository;
  planTypes: PlanTypeRepository;
  products: ProductRepository;
  subscriptionPlans: SubscriptionPlanRepository;
  renewals: RenewalRepository;
}

export interface AppServices {
  customerAgreements: CustomerAgreementService;
  planTypes: PlanTypeService;
  products: ProductService;
  subscriptionPlans: SubscriptionPlanService;
  renewals: RenewalService;
}

export function createRepositories(database: Kysely<Database>): AppRepositories {
  return {
    customerAgreements: new CustomerAgreementRepositoryImpl(database),
    planTypes: new PlanTypeRepositoryImpl(database),
    products: new ProductRepositoryImpl(database),
    subscriptionPlans: new SubscriptionPlanRepositoryImpl(database),
    renewals: new RenewalRepositoryImpl(database),
  };
}

/**
 * Build every service over one set of repositories and one validator
 */
export function createServices(
  repositories: AppRepositories,
  licensing: LicensingConfig,
  clock: Clock = systemClock
): AppServices {
  const validator = new PlanValidator(licensing);

  return {
    customerAgreements: new CustomerAgreementServiceImpl(
      repositories.customerAgreements,
      repositories.subscriptionPlans,
      licensing,
      clock
    ),
    planTypes: new PlanTypeServiceImpl(repositories.planTypes),
    products: new ProductServiceImpl(
      repositories.products,
      repositories.planTypes,
      validator
    ),
    subscriptionPlans: new SubscriptionPlanServiceImpl(
      repositories.subscriptionPlans,
      repositories.customerAgreements,
      repositories.products,
      validator,
      licensing,
      clock
    ),
    renewals: new RenewalServiceImpl(
      repositories.renewals,
      repositories.subscriptionPlans,
      validator,
      clock
    ),
  };
}
