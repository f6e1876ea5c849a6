/**
 * Subscription plan renewal service implementation
 */

import { z } from 'zod';
import { BaseCrudServiceImpl } from '../BaseCrudService.js';
import type { RenewalService } from './RenewalService.js';
import type { RenewalRepository } from '../../repositories/renewal/RenewalRepository.js';
import type { SubscriptionPlanRepository } from '../../repositories/subscriptionPlan/SubscriptionPlanRepository.js';
import type {
  SubscriptionPlanRenewal,
  CreateRenewalData,
  UpdateRenewalData,
  RenewalSortColumn,
} from '../../repositories/renewal/types.js';
import type {
  CreateRenewalInput,
  UpdateRenewalInput,
} from '../../validation/renewal/index.js';
import {
  CreateRenewalSchema,
  UpdateRenewalSchema,
} from '../../validation/renewal/index.js';
import type {
  PlanValidator,
  RenewalCandidate,
} from '../../validation/rules/index.js';
import type { ServiceResult, Clock } from '../types.js';
import { invalidChoiceError, systemClock } from '../types.js';

export class RenewalServiceImpl
  extends BaseCrudServiceImpl<
    SubscriptionPlanRenewal,
    CreateRenewalData,
    UpdateRenewalData,
    RenewalSortColumn
  >
  implements RenewalService
{
  constructor(
    private readonly renewalRepository: RenewalRepository,
    private readonly subscriptionPlanRepository: SubscriptionPlanRepository,
    private readonly validator: PlanValidator,
    private readonly clock: Clock = systemClock
  ) {
    super(renewalRepository, 'Subscription plan renewal');
  }

  async create(
    input: CreateRenewalInput
  ): Promise<ServiceResult<SubscriptionPlanRenewal>> {
    try {
      const data = CreateRenewalSchema.parse(input);

      const rejection = await this.checkRenewalRules(
        data.priorSubscriptionPlanId,
        data
      );
      if (rejection) {
        return rejection;
      }

      return await this.createEntity(data);
    } catch (error) {
      if (error instanceof z.ZodError) {
        return this.validationError(error);
      }
      return this.handleRepositoryError(error);
    }
  }

  async update(
    id: string,
    input: UpdateRenewalInput
  ): Promise<ServiceResult<SubscriptionPlanRenewal>> {
    try {
      const data = UpdateRenewalSchema.parse(input);

      const existing = await this.renewalRepository.findById(id);
      if (!existing) {
        return this.notFound(id);
      }

      const rejection = await this.checkRenewalRules(
        data.priorSubscriptionPlanId ?? existing.priorSubscriptionPlanId,
        {
          effectiveDate: data.effectiveDate ?? existing.effectiveDate,
          renewedExpirationDate:
            data.renewedExpirationDate ?? existing.renewedExpirationDate,
        }
      );
      if (rejection) {
        return rejection;
      }

      return await this.updateEntity(id, data);
    } catch (error) {
      if (error instanceof z.ZodError) {
        return this.validationError(error);
      }
      return this.handleRepositoryError(error);
    }
  }

  /**
   * Resolve the prior plan and run the renewal rules
   * @returns A rejection result, or null when the renewal may be saved
   */
  private async checkRenewalRules(
    priorSubscriptionPlanId: string,
    candidate: RenewalCandidate
  ): Promise<ServiceResult<SubscriptionPlanRenewal> | null> {
    const priorPlan = await this.subscriptionPlanRepository.findById(
      priorSubscriptionPlanId
    );
    if (!priorPlan) {
      return this.ruleViolation(
        [invalidChoiceError('prior_subscription_plan')],
        { priorSubscriptionPlanId }
      );
    }

    const verdict = this.validator.validateRenewal(
      {
        effectiveDate: candidate.effectiveDate,
        renewedExpirationDate: candidate.renewedExpirationDate,
      },
      priorPlan,
      this.clock()
    );
    if (!verdict.accepted) {
      return this.ruleViolation(verdict.errors, { priorSubscriptionPlanId });
    }
    return null;
  }
}
