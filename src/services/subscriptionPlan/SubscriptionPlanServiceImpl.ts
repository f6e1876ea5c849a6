/**
 * Subscription plan service implementation
 */

import { z } from 'zod';
import { BaseCrudServiceImpl } from '../BaseCrudService.js';
import type { SubscriptionPlanService } from './SubscriptionPlanService.js';
import type { SubscriptionPlanRepository } from '../../repositories/subscriptionPlan/SubscriptionPlanRepository.js';
import type { CustomerAgreementRepository } from '../../repositories/customerAgreement/CustomerAgreementRepository.js';
import type { ProductRepository } from '../../repositories/product/ProductRepository.js';
import type { Product } from '../../repositories/product/types.js';
import type {
  SubscriptionPlan,
  SubscriptionPlanHistoryEntry,
  CreateSubscriptionPlanData,
  UpdateSubscriptionPlanData,
  SubscriptionPlanSortColumn,
} from '../../repositories/subscriptionPlan/types.js';
import { DEFAULT_REVOKE_MAX_PERCENTAGE } from '../../repositories/subscriptionPlan/revocations.js';
import type { LicensingConfig } from '../../config/licensing.js';
import type {
  CreateSubscriptionPlanInput,
  SubscriptionPlanSchemas,
  UpdateSubscriptionPlanInput,
} from '../../validation/subscriptionPlan/index.js';
import {
  createSubscriptionPlanSchemas,
  PLAN_DATE_ORDER_MESSAGE,
} from '../../validation/subscriptionPlan/index.js';
import type { PlanValidator } from '../../validation/rules/index.js';
import type { ServiceResult, Clock } from '../types.js';
import {
  ServiceErrorType,
  createErrorResult,
  createServiceError,
  createSuccessResult,
  invalidChoiceError,
  systemClock,
} from '../types.js';
import logger from '../../utils/logger.js';

/**
 * Plan fields the business rules look at, after merging a submission with
 * the stored plan
 */
interface PlanRuleFields {
  customerAgreementId: string;
  productId: string | null;
  enterpriseCatalogUuid: string | null;
  salesforceOpportunityId: string | null;
  numLicenses: number;
  forInternalUseOnly: boolean;
  isRevocationCapEnabled: boolean;
  revokeMaxPercentage: number;
}

// undefined means "not submitted"; null is an explicit clear
function submittedOr<T>(next: T | undefined, current: T): T {
  return next === undefined ? current : next;
}

export class SubscriptionPlanServiceImpl
  extends BaseCrudServiceImpl<
    SubscriptionPlan,
    CreateSubscriptionPlanData,
    UpdateSubscriptionPlanData,
    SubscriptionPlanSortColumn
  >
  implements SubscriptionPlanService
{
  private readonly schemas: SubscriptionPlanSchemas;

  constructor(
    private readonly subscriptionPlanRepository: SubscriptionPlanRepository,
    private readonly customerAgreementRepository: CustomerAgreementRepository,
    private readonly productRepository: ProductRepository,
    private readonly validator: PlanValidator,
    licensing: Pick<LicensingConfig, 'minNumLicenses'>,
    private readonly clock: Clock = systemClock
  ) {
    super(subscriptionPlanRepository, 'Subscription plan');
    this.schemas = createSubscriptionPlanSchemas(licensing);
  }

  async create(
    input: CreateSubscriptionPlanInput
  ): Promise<ServiceResult<SubscriptionPlan>> {
    try {
      const data = this.schemas.CreateSubscriptionPlanSchema.parse(input);

      // A new plan always sets its agreement link
      const rejection = await this.checkPlanRules(
        {
          customerAgreementId: data.customerAgreementId,
          productId: data.productId ?? null,
          enterpriseCatalogUuid: data.enterpriseCatalogUuid ?? null,
          salesforceOpportunityId: data.salesforceOpportunityId ?? null,
          numLicenses: data.numLicenses,
          forInternalUseOnly: data.forInternalUseOnly ?? false,
          isRevocationCapEnabled: data.isRevocationCapEnabled ?? false,
          revokeMaxPercentage:
            data.revokeMaxPercentage ?? DEFAULT_REVOKE_MAX_PERCENTAGE,
        },
        true
      );
      if (rejection) {
        return rejection;
      }

      const result = await this.createEntity({
        ...data,
        productId: data.productId ?? null,
      });
      if (result.success) {
        logger.info('Subscription plan created', {
          subscriptionPlanId: result.data.id,
          customerAgreementId: result.data.customerAgreementId,
          changeReason: data.changeReason,
        });
      }
      return result;
    } catch (error) {
      if (error instanceof z.ZodError) {
        return this.validationError(error);
      }
      return this.handleRepositoryError(error);
    }
  }

  async update(
    id: string,
    input: UpdateSubscriptionPlanInput
  ): Promise<ServiceResult<SubscriptionPlan>> {
    try {
      const data = this.schemas.UpdateSubscriptionPlanSchema.parse(input);

      const existing = await this.subscriptionPlanRepository.findById(id);
      if (!existing) {
        return this.notFound(id);
      }

      const startDate = data.startDate ?? existing.startDate;
      const expirationDate = data.expirationDate ?? existing.expirationDate;
      if (startDate.getTime() > expirationDate.getTime()) {
        return createErrorResult(
          createServiceError(
            ServiceErrorType.VALIDATION_ERROR,
            `expirationDate: ${PLAN_DATE_ORDER_MESSAGE}`,
            {
              issues: [
                { path: 'expirationDate', message: PLAN_DATE_ORDER_MESSAGE },
              ],
            }
          )
        );
      }

      const isNewAgreementLink =
        data.customerAgreementId !== undefined &&
        data.customerAgreementId !== existing.customerAgreementId;

      const rejection = await this.checkPlanRules(
        {
          customerAgreementId: submittedOr(
            data.customerAgreementId,
            existing.customerAgreementId
          ),
          productId: submittedOr(data.productId, existing.productId),
          enterpriseCatalogUuid: submittedOr(
            data.enterpriseCatalogUuid,
            existing.enterpriseCatalogUuid
          ),
          salesforceOpportunityId: submittedOr(
            data.salesforceOpportunityId,
            existing.salesforceOpportunityId
          ),
          numLicenses: data.numLicenses ?? existing.numLicenses,
          forInternalUseOnly:
            data.forInternalUseOnly ?? existing.forInternalUseOnly,
          isRevocationCapEnabled:
            data.isRevocationCapEnabled ?? existing.isRevocationCapEnabled,
          revokeMaxPercentage:
            data.revokeMaxPercentage ?? existing.revokeMaxPercentage,
        },
        isNewAgreementLink
      );
      if (rejection) {
        return rejection;
      }

      const result = await this.updateEntity(id, data);
      if (result.success) {
        logger.info('Subscription plan updated', {
          subscriptionPlanId: id,
          changeReason: data.changeReason,
        });
      }
      return result;
    } catch (error) {
      if (error instanceof z.ZodError) {
        return this.validationError(error);
      }
      return this.handleRepositoryError(error);
    }
  }

  async getHistory(
    id: string
  ): Promise<ServiceResult<SubscriptionPlanHistoryEntry[]>> {
    try {
      const plan = await this.subscriptionPlanRepository.findById(id);
      if (!plan) {
        return this.notFound(id);
      }
      const history = await this.subscriptionPlanRepository.findHistory(id);
      return createSuccessResult(history);
    } catch (error) {
      return this.handleRepositoryError(error);
    }
  }

  /**
   * Hydrate the agreement and product, then run the plan rules
   * @returns A rejection result, or null when the plan may be saved
   */
  private async checkPlanRules(
    fields: PlanRuleFields,
    isNewAgreementLink: boolean
  ): Promise<ServiceResult<SubscriptionPlan> | null> {
    const context = { customerAgreementId: fields.customerAgreementId };

    const customerAgreement = await this.customerAgreementRepository.findById(
      fields.customerAgreementId
    );
    if (!customerAgreement) {
      return this.ruleViolation(
        [invalidChoiceError('customer_agreement')],
        context
      );
    }

    let product: Product | null = null;
    if (fields.productId !== null) {
      product = await this.productRepository.findById(fields.productId);
      if (!product) {
        return this.ruleViolation([invalidChoiceError('product')], context);
      }
    }

    const verdict = this.validator.validateSubscriptionPlan(
      {
        enterpriseCatalogUuid: fields.enterpriseCatalogUuid,
        numLicenses: fields.numLicenses,
        forInternalUseOnly: fields.forInternalUseOnly,
        isRevocationCapEnabled: fields.isRevocationCapEnabled,
        revokeMaxPercentage: fields.revokeMaxPercentage,
        salesforceOpportunityId: fields.salesforceOpportunityId,
        customerAgreement,
        product,
      },
      isNewAgreementLink,
      this.clock()
    );
    if (!verdict.accepted) {
      return this.ruleViolation(verdict.errors, context);
    }
    return null;
  }
}
