/**
 * In-process stand-ins for the Kysely repositories
 *
 * They share one store so that hydration (product → plan type, agreement →
 * auto-applied plan) and referential checks behave like the database.
 */

import { v4 as uuidv4 } from 'uuid';
import type { AppRepositories } from '../services/index.js';
import type {
  PaginatedResult,
  PaginationOptions,
} from '../repositories/types.js';
import type {
  CustomerAgreement,
  CreateCustomerAgreementData,
  CustomerAgreementRepository,
  UpdateCustomerAgreementData,
} from '../repositories/customerAgreement/index.js';
import type {
  CreatePlanTypeData,
  PlanType,
  PlanTypeRepository,
  UpdatePlanTypeData,
} from '../repositories/planType/index.js';
import type {
  CreateProductData,
  Product,
  ProductRepository,
  UpdateProductData,
} from '../repositories/product/index.js';
import type {
  CreateRenewalData,
  RenewalRepository,
  SubscriptionPlanRenewal,
  UpdateRenewalData,
} from '../repositories/renewal/index.js';
import type {
  CreateSubscriptionPlanData,
  SubscriptionPlan,
  SubscriptionPlanHistoryEntry,
  SubscriptionPlanRepository,
  UpdateSubscriptionPlanData,
} from '../repositories/subscriptionPlan/index.js';
import {
  computeRevocationsRemaining,
  DEFAULT_REVOKE_MAX_PERCENTAGE,
} from '../repositories/subscriptionPlan/index.js';

type StoredProduct = Omit<Product, 'planType'>;
type StoredPlan = Omit<SubscriptionPlan, 'numRevocationsRemaining'>;
type StoredAgreement = Omit<CustomerAgreement, 'autoApplicableSubscription'>;

export interface InMemoryStore {
  planTypes: Map<string, PlanType>;
  products: Map<string, StoredProduct>;
  customerAgreements: Map<string, StoredAgreement>;
  subscriptionPlans: Map<string, StoredPlan>;
  renewals: Map<string, SubscriptionPlanRenewal>;
  history: SubscriptionPlanHistoryEntry[];
}

export function createInMemoryStore(): InMemoryStore {
  return {
    planTypes: new Map(),
    products: new Map(),
    customerAgreements: new Map(),
    subscriptionPlans: new Map(),
    renewals: new Map(),
    history: [],
  };
}

function foreignKeyViolation(table: string): Error {
  return new Error(
    `insert or update on table "${table}" violates foreign key constraint`
  );
}

function paginate<T>(
  items: T[],
  pagination?: PaginationOptions
): PaginatedResult<T> {
  const { page = 1, limit = 10 } = pagination || {};
  const offset = (page - 1) * limit;

  return {
    data: items.slice(offset, offset + limit),
    pagination: {
      page,
      limit,
      total: items.length,
      totalPages: Math.ceil(items.length / limit),
    },
  };
}

// Keeps only the keys that were actually submitted
function definedEntries<T extends object>(data: T): Partial<T> {
  const result: Partial<T> = { ...data };
  for (const key in result) {
    if (result[key] === undefined) {
      delete result[key];
    }
  }
  return result;
}

export class InMemoryPlanTypeRepository implements PlanTypeRepository {
  constructor(private readonly store: InMemoryStore) {}

  async findAll(pagination?: PaginationOptions): Promise<PaginatedResult<PlanType>> {
    return paginate([...this.store.planTypes.values()], pagination);
  }

  async findById(id: string): Promise<PlanType | null> {
    return this.store.planTypes.get(id) ?? null;
  }

  async create(data: CreatePlanTypeData): Promise<PlanType> {
    const now = new Date();
    const planType: PlanType = {
      id: uuidv4(),
      label: data.label,
      description: data.description ?? '',
      sfIdRequired: data.sfIdRequired ?? false,
      nsIdRequired: data.nsIdRequired ?? false,
      isPaidSubscription: data.isPaidSubscription ?? true,
      createdAt: now,
      updatedAt: now,
    };
    this.store.planTypes.set(planType.id, planType);
    return planType;
  }

  async update(id: string, data: UpdatePlanTypeData): Promise<PlanType | null> {
    const existing = this.store.planTypes.get(id);
    if (!existing) {
      return null;
    }
    const updated = { ...existing, ...definedEntries(data), updatedAt: new Date() };
    this.store.planTypes.set(id, updated);
    return updated;
  }

  async delete(id: string): Promise<boolean> {
    const inUse = [...this.store.products.values()].some(
      (product) => product.planTypeId === id
    );
    if (inUse) {
      throw foreignKeyViolation('products');
    }
    return this.store.planTypes.delete(id);
  }
}

export class InMemoryProductRepository implements ProductRepository {
  constructor(private readonly store: InMemoryStore) {}

  async findAll(pagination?: PaginationOptions): Promise<PaginatedResult<Product>> {
    const products = [...this.store.products.values()].map((product) =>
      this.hydrate(product)
    );
    return paginate(products, pagination);
  }

  async findById(id: string): Promise<Product | null> {
    const product = this.store.products.get(id);
    return product ? this.hydrate(product) : null;
  }

  async create(data: CreateProductData): Promise<Product> {
    if (!this.store.planTypes.has(data.planTypeId)) {
      throw foreignKeyViolation('products');
    }
    const now = new Date();
    const product: StoredProduct = {
      id: uuidv4(),
      name: data.name,
      description: data.description ?? '',
      netsuiteId: data.netsuiteId ?? null,
      salesforceProductId: data.salesforceProductId ?? null,
      planTypeId: data.planTypeId,
      createdAt: now,
      updatedAt: now,
    };
    this.store.products.set(product.id, product);
    return this.hydrate(product);
  }

  async update(id: string, data: UpdateProductData): Promise<Product | null> {
    const existing = this.store.products.get(id);
    if (!existing) {
      return null;
    }
    const updated = { ...existing, ...definedEntries(data), updatedAt: new Date() };
    this.store.products.set(id, updated);
    return this.hydrate(updated);
  }

  async delete(id: string): Promise<boolean> {
    return this.store.products.delete(id);
  }

  private hydrate(product: StoredProduct): Product {
    const planType = this.store.planTypes.get(product.planTypeId);
    if (!planType) {
      throw foreignKeyViolation('products');
    }
    return { ...product, planType };
  }
}

export class InMemorySubscriptionPlanRepository
  implements SubscriptionPlanRepository
{
  constructor(private readonly store: InMemoryStore) {}

  async findAll(
    pagination?: PaginationOptions
  ): Promise<PaginatedResult<SubscriptionPlan>> {
    const plans = [...this.store.subscriptionPlans.values()].map(withRemaining);
    return paginate(plans, pagination);
  }

  async findById(id: string): Promise<SubscriptionPlan | null> {
    const plan = this.store.subscriptionPlans.get(id);
    return plan ? withRemaining(plan) : null;
  }

  async create(data: CreateSubscriptionPlanData): Promise<SubscriptionPlan> {
    if (!this.store.customerAgreements.has(data.customerAgreementId)) {
      throw foreignKeyViolation('subscription_plans');
    }
    const now = new Date();
    const plan: StoredPlan = {
      id: uuidv4(),
      title: data.title,
      customerAgreementId: data.customerAgreementId,
      productId: data.productId,
      enterpriseCatalogUuid: data.enterpriseCatalogUuid ?? null,
      salesforceOpportunityId: data.salesforceOpportunityId ?? null,
      startDate: data.startDate,
      expirationDate: data.expirationDate,
      isActive: data.isActive ?? false,
      forInternalUseOnly: data.forInternalUseOnly ?? false,
      isRevocationCapEnabled: data.isRevocationCapEnabled ?? false,
      revokeMaxPercentage: data.revokeMaxPercentage ?? DEFAULT_REVOKE_MAX_PERCENTAGE,
      numRevocationsApplied: 0,
      numLicenses: data.numLicenses,
      shouldAutoApplyLicenses: false,
      createdAt: now,
      updatedAt: now,
    };
    this.store.subscriptionPlans.set(plan.id, plan);
    this.recordHistory(plan, data.changeReason);
    return withRemaining(plan);
  }

  async update(
    id: string,
    data: UpdateSubscriptionPlanData
  ): Promise<SubscriptionPlan | null> {
    const existing = this.store.subscriptionPlans.get(id);
    if (!existing) {
      return null;
    }
    const { changeReason, ...changes } = data;
    const updated: StoredPlan = {
      ...existing,
      ...definedEntries(changes),
      updatedAt: new Date(),
    };
    this.store.subscriptionPlans.set(id, updated);
    this.recordHistory(updated, changeReason);
    return withRemaining(updated);
  }

  async delete(id: string): Promise<boolean> {
    return this.store.subscriptionPlans.delete(id);
  }

  async findActiveForAgreement(
    customerAgreementId: string,
    now: Date
  ): Promise<SubscriptionPlan[]> {
    return [...this.store.subscriptionPlans.values()]
      .filter(
        (plan) =>
          plan.customerAgreementId === customerAgreementId &&
          plan.isActive &&
          plan.startDate.getTime() <= now.getTime() &&
          plan.expirationDate.getTime() >= now.getTime()
      )
      .sort((a, b) => a.startDate.getTime() - b.startDate.getTime())
      .map(withRemaining);
  }

  async setAutoApplicableSubscription(
    customerAgreementId: string,
    subscriptionPlanId: string | null
  ): Promise<void> {
    for (const plan of this.store.subscriptionPlans.values()) {
      if (plan.customerAgreementId !== customerAgreementId) {
        continue;
      }
      plan.shouldAutoApplyLicenses = plan.id === subscriptionPlanId;
    }
  }

  async findHistory(
    subscriptionPlanId: string
  ): Promise<SubscriptionPlanHistoryEntry[]> {
    return this.store.history
      .filter((entry) => entry.subscriptionPlanId === subscriptionPlanId)
      .reverse();
  }

  private recordHistory(
    plan: StoredPlan,
    changeReason: SubscriptionPlanHistoryEntry['changeReason']
  ): void {
    this.store.history.push({
      id: uuidv4(),
      subscriptionPlanId: plan.id,
      changeReason,
      snapshot: { ...plan },
      changedAt: new Date(),
    });
  }
}

function withRemaining(plan: StoredPlan): SubscriptionPlan {
  return { ...plan, numRevocationsRemaining: computeRevocationsRemaining(plan) };
}

export class InMemoryRenewalRepository implements RenewalRepository {
  constructor(private readonly store: InMemoryStore) {}

  async findAll(
    pagination?: PaginationOptions
  ): Promise<PaginatedResult<SubscriptionPlanRenewal>> {
    return paginate([...this.store.renewals.values()], pagination);
  }

  async findById(id: string): Promise<SubscriptionPlanRenewal | null> {
    return this.store.renewals.get(id) ?? null;
  }

  async create(data: CreateRenewalData): Promise<SubscriptionPlanRenewal> {
    if (!this.store.subscriptionPlans.has(data.priorSubscriptionPlanId)) {
      throw foreignKeyViolation('subscription_plan_renewals');
    }
    const now = new Date();
    const renewal: SubscriptionPlanRenewal = {
      id: uuidv4(),
      priorSubscriptionPlanId: data.priorSubscriptionPlanId,
      renewedSubscriptionPlanId: null,
      effectiveDate: data.effectiveDate,
      renewedExpirationDate: data.renewedExpirationDate,
      numberOfLicenses: data.numberOfLicenses,
      salesforceOpportunityId: data.salesforceOpportunityId ?? null,
      renewedPlanTitle: data.renewedPlanTitle ?? null,
      processed: false,
      createdAt: now,
      updatedAt: now,
    };
    this.store.renewals.set(renewal.id, renewal);
    return renewal;
  }

  async update(
    id: string,
    data: UpdateRenewalData
  ): Promise<SubscriptionPlanRenewal | null> {
    const existing = this.store.renewals.get(id);
    if (!existing) {
      return null;
    }
    const updated = { ...existing, ...definedEntries(data), updatedAt: new Date() };
    this.store.renewals.set(id, updated);
    return updated;
  }

  async delete(id: string): Promise<boolean> {
    return this.store.renewals.delete(id);
  }
}

export class InMemoryCustomerAgreementRepository
  implements CustomerAgreementRepository
{
  constructor(private readonly store: InMemoryStore) {}

  async findAll(
    pagination?: PaginationOptions
  ): Promise<PaginatedResult<CustomerAgreement>> {
    const agreements = [...this.store.customerAgreements.values()].map(
      (agreement) => this.hydrate(agreement)
    );
    return paginate(agreements, pagination);
  }

  async findById(id: string): Promise<CustomerAgreement | null> {
    const agreement = this.store.customerAgreements.get(id);
    return agreement ? this.hydrate(agreement) : null;
  }

  async findBySlug(enterpriseCustomerSlug: string): Promise<CustomerAgreement | null> {
    const agreement = [...this.store.customerAgreements.values()].find(
      (candidate) => candidate.enterpriseCustomerSlug === enterpriseCustomerSlug
    );
    return agreement ? this.hydrate(agreement) : null;
  }

  async create(data: CreateCustomerAgreementData): Promise<CustomerAgreement> {
    const duplicate = [...this.store.customerAgreements.values()].some(
      (agreement) =>
        agreement.enterpriseCustomerUuid === data.enterpriseCustomerUuid ||
        agreement.enterpriseCustomerSlug === data.enterpriseCustomerSlug
    );
    if (duplicate) {
      throw new Error(
        'duplicate key value violates unique constraint "customer_agreements_enterprise_customer_uuid_key"'
      );
    }
    const now = new Date();
    const agreement: StoredAgreement = {
      id: uuidv4(),
      enterpriseCustomerUuid: data.enterpriseCustomerUuid,
      enterpriseCustomerSlug: data.enterpriseCustomerSlug,
      enterpriseCustomerName: data.enterpriseCustomerName,
      defaultEnterpriseCatalogUuid: data.defaultEnterpriseCatalogUuid ?? null,
      disableExpirationNotifications: data.disableExpirationNotifications ?? false,
      licenseDurationBeforePurgeDays: data.licenseDurationBeforePurgeDays,
      createdAt: now,
      updatedAt: now,
    };
    this.store.customerAgreements.set(agreement.id, agreement);
    return this.hydrate(agreement);
  }

  async update(
    id: string,
    data: UpdateCustomerAgreementData
  ): Promise<CustomerAgreement | null> {
    const existing = this.store.customerAgreements.get(id);
    if (!existing) {
      return null;
    }
    const updated = { ...existing, ...definedEntries(data), updatedAt: new Date() };
    this.store.customerAgreements.set(id, updated);
    return this.hydrate(updated);
  }

  async delete(id: string): Promise<boolean> {
    const inUse = [...this.store.subscriptionPlans.values()].some(
      (plan) => plan.customerAgreementId === id
    );
    if (inUse) {
      throw foreignKeyViolation('subscription_plans');
    }
    return this.store.customerAgreements.delete(id);
  }

  private hydrate(agreement: StoredAgreement): CustomerAgreement {
    const flagged = [...this.store.subscriptionPlans.values()].find(
      (plan) =>
        plan.customerAgreementId === agreement.id && plan.shouldAutoApplyLicenses
    );
    return {
      ...agreement,
      autoApplicableSubscription: flagged
        ? { id: flagged.id, title: flagged.title }
        : null,
    };
  }
}

export function createInMemoryRepositories(
  store: InMemoryStore = createInMemoryStore()
): AppRepositories {
  return {
    customerAgreements: new InMemoryCustomerAgreementRepository(store),
    planTypes: new InMemoryPlanTypeRepository(store),
    products: new InMemoryProductRepository(store),
    subscriptionPlans: new InMemorySubscriptionPlanRepository(store),
    renewals: new InMemoryRenewalRepository(store),
  };
}
