/**
 * Seed helpers for service and route tests
 * Records are written straight through the in-memory repositories, so they
 * skip the business rules under test.
 */

import type { AppRepositories } from '../services/index.js';
import type { LicensingConfig } from '../config/licensing.js';
import type { CustomerAgreement } from '../repositories/customerAgreement/index.js';
import type { PlanType } from '../repositories/planType/index.js';
import type { Product } from '../repositories/product/index.js';
import type {
  CreateSubscriptionPlanData,
  SubscriptionPlan,
} from '../repositories/subscriptionPlan/index.js';

export const TEST_NOW = new Date('2026-03-15T12:00:00Z');
export const testClock = (): Date => TEST_NOW;

export const TEST_LICENSING: LicensingConfig = {
  minNumLicenses: 1,
  maxNumLicenses: 500,
  defaultLicenseDurationBeforePurgeDays: 90,
};

export const CATALOG_UUID = 'a1b2c3d4-0000-4000-8000-00000000c001';
export const UNKNOWN_ID = 'a1b2c3d4-0000-4000-8000-00000000ffff';

export interface SeededRecords {
  planType: PlanType;
  product: Product;
  agreement: CustomerAgreement;
}

export async function seedPlanType(
  repositories: AppRepositories,
  flags: { sfIdRequired?: boolean; nsIdRequired?: boolean } = {}
): Promise<PlanType> {
  return repositories.planTypes.create({
    label: flags.sfIdRequired ? 'Standard Paid' : 'Trial',
    description: 'Seeded plan type',
    ...flags,
  });
}

export async function seedAgreement(
  repositories: AppRepositories,
  overrides: Partial<{
    enterpriseCustomerUuid: string;
    enterpriseCustomerSlug: string;
    defaultEnterpriseCatalogUuid: string | null;
  }> = {}
): Promise<CustomerAgreement> {
  return repositories.customerAgreements.create({
    enterpriseCustomerUuid: 'a1b2c3d4-0000-4000-8000-00000000e001',
    enterpriseCustomerSlug: 'test-enterprise',
    enterpriseCustomerName: 'Test Enterprise',
    defaultEnterpriseCatalogUuid: null,
    licenseDurationBeforePurgeDays: 90,
    ...overrides,
  });
}

/**
 * Plan type, product and agreement that together satisfy every plan rule
 */
export async function seedBasics(
  repositories: AppRepositories
): Promise<SeededRecords> {
  const planType = await seedPlanType(repositories);
  const product = await repositories.products.create({
    name: 'Business subscription',
    planTypeId: planType.id,
    netsuiteId: 106,
  });
  const agreement = await seedAgreement(repositories, {
    defaultEnterpriseCatalogUuid: CATALOG_UUID,
  });

  return { planType, product, agreement };
}

export async function seedPlan(
  repositories: AppRepositories,
  records: Pick<SeededRecords, 'agreement' | 'product'>,
  overrides: Partial<CreateSubscriptionPlanData> = {}
): Promise<SubscriptionPlan> {
  return repositories.subscriptionPlans.create({
    title: 'Current term',
    customerAgreementId: records.agreement.id,
    productId: records.product.id,
    startDate: new Date('2026-01-01T00:00:00Z'),
    expirationDate: new Date('2026-12-31T00:00:00Z'),
    isActive: true,
    numLicenses: 50,
    changeReason: 'new',
    ...overrides,
  });
}
