/**
 * Customer agreement service implementation
 */

import { z } from 'zod';
import { BaseCrudServiceImpl } from '../BaseCrudService.js';
import type { CustomerAgreementService } from './CustomerAgreementService.js';
import type { CustomerAgreementRepository } from '../../repositories/customerAgreement/CustomerAgreementRepository.js';
import type { SubscriptionPlanRepository } from '../../repositories/subscriptionPlan/SubscriptionPlanRepository.js';
import type {
  CustomerAgreement,
  CreateCustomerAgreementData,
  UpdateCustomerAgreementData,
  CustomerAgreementSortColumn,
} from '../../repositories/customerAgreement/types.js';
import type { LicensingConfig } from '../../config/licensing.js';
import type {
  AutoApplySubscriptionInput,
  CreateCustomerAgreementInput,
  UpdateCustomerAgreementInput,
} from '../../validation/customerAgreement/index.js';
import {
  AutoApplySubscriptionSchema,
  CreateCustomerAgreementSchema,
  UpdateCustomerAgreementSchema,
} from '../../validation/customerAgreement/index.js';
import type { ServiceResult, Clock } from '../types.js';
import {
  ServiceErrorType,
  createErrorResult,
  createServiceError,
  createSuccessResult,
  systemClock,
} from '../types.js';
import { deriveAutoApplyChoices } from './autoApplyChoices.js';
import type { AutoApplyChoices } from './autoApplyChoices.js';
import logger from '../../utils/logger.js';

export const AUTO_APPLY_FIELD = 'subscription_for_auto_applied_licenses';

export class CustomerAgreementServiceImpl
  extends BaseCrudServiceImpl<
    CustomerAgreement,
    CreateCustomerAgreementData,
    UpdateCustomerAgreementData,
    CustomerAgreementSortColumn
  >
  implements CustomerAgreementService
{
  constructor(
    private readonly customerAgreementRepository: CustomerAgreementRepository,
    private readonly subscriptionPlanRepository: SubscriptionPlanRepository,
    private readonly licensing: Pick<
      LicensingConfig,
      'defaultLicenseDurationBeforePurgeDays'
    >,
    private readonly clock: Clock = systemClock
  ) {
    super(customerAgreementRepository, 'Customer agreement');
  }

  async findBySlug(slug: string): Promise<ServiceResult<CustomerAgreement>> {
    try {
      const agreement = await this.customerAgreementRepository.findBySlug(slug);
      if (!agreement) {
        return createErrorResult(
          createServiceError(
            ServiceErrorType.NOT_FOUND,
            `Customer agreement with slug '${slug}' not found`
          )
        );
      }
      return createSuccessResult(agreement);
    } catch (error) {
      return this.handleRepositoryError(error);
    }
  }

  async create(
    input: CreateCustomerAgreementInput
  ): Promise<ServiceResult<CustomerAgreement>> {
    try {
      const data = CreateCustomerAgreementSchema.parse(input);
      return await this.createEntity({
        ...data,
        licenseDurationBeforePurgeDays:
          data.licenseDurationBeforePurgeDays ??
          this.licensing.defaultLicenseDurationBeforePurgeDays,
      });
    } catch (error) {
      if (error instanceof z.ZodError) {
        return this.validationError(error);
      }
      return this.handleRepositoryError(error);
    }
  }

  async update(
    id: string,
    input: UpdateCustomerAgreementInput
  ): Promise<ServiceResult<CustomerAgreement>> {
    try {
      const data = UpdateCustomerAgreementSchema.parse(input);
      return await this.updateEntity(id, data);
    } catch (error) {
      if (error instanceof z.ZodError) {
        return this.validationError(error);
      }
      return this.handleRepositoryError(error);
    }
  }

  async getAutoApplyChoices(
    id: string
  ): Promise<ServiceResult<AutoApplyChoices>> {
    try {
      const agreement = await this.customerAgreementRepository.findById(id);
      if (!agreement) {
        return this.notFound(id);
      }

      const choices = await deriveAutoApplyChoices(
        agreement,
        this.clock(),
        this.subscriptionPlanRepository
      );
      return createSuccessResult(choices);
    } catch (error) {
      return this.handleRepositoryError(error);
    }
  }

  async setAutoApplySubscription(
    id: string,
    input: AutoApplySubscriptionInput
  ): Promise<ServiceResult<CustomerAgreement>> {
    try {
      const { subscriptionPlanId } = AutoApplySubscriptionSchema.parse(input);

      const agreement = await this.customerAgreementRepository.findById(id);
      if (!agreement) {
        return this.notFound(id);
      }

      const { choices } = await deriveAutoApplyChoices(
        agreement,
        this.clock(),
        this.subscriptionPlanRepository
      );
      if (!choices.some((choice) => choice.value === subscriptionPlanId)) {
        return this.ruleViolation(
          [
            {
              field: AUTO_APPLY_FIELD,
              message: `Select a valid choice. ${subscriptionPlanId} is not one of the available choices.`,
            },
          ],
          { customerAgreementId: id }
        );
      }

      await this.subscriptionPlanRepository.setAutoApplicableSubscription(
        id,
        subscriptionPlanId === '' ? null : subscriptionPlanId
      );
      logger.info('Auto-applied subscription changed', {
        customerAgreementId: id,
        subscriptionPlanId: subscriptionPlanId || null,
      });

      const updated = await this.customerAgreementRepository.findById(id);
      if (!updated) {
        return this.notFound(id);
      }
      return createSuccessResult(updated);
    } catch (error) {
      if (error instanceof z.ZodError) {
        return this.validationError(error);
      }
      return this.handleRepositoryError(error);
    }
  }
}
