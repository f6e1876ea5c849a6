/**
 * Plan type service implementation
 */

import { z } from 'zod';
import { BaseCrudServiceImpl } from '../BaseCrudService.js';
import type { PlanTypeService } from './PlanTypeService.js';
import type { PlanTypeRepository } from '../../repositories/planType/PlanTypeRepository.js';
import type {
  PlanType,
  CreatePlanTypeData,
  UpdatePlanTypeData,
  PlanTypeSortColumn,
} from '../../repositories/planType/types.js';
import type {
  CreatePlanTypeInput,
  UpdatePlanTypeInput,
} from '../../validation/planType/index.js';
import {
  CreatePlanTypeSchema,
  UpdatePlanTypeSchema,
} from '../../validation/planType/index.js';
import type { ServiceResult } from '../types.js';

export class PlanTypeServiceImpl
  extends BaseCrudServiceImpl<
    PlanType,
    CreatePlanTypeData,
    UpdatePlanTypeData,
    PlanTypeSortColumn
  >
  implements PlanTypeService
{
  constructor(planTypeRepository: PlanTypeRepository) {
    super(planTypeRepository, 'Plan type');
  }

  async create(input: CreatePlanTypeInput): Promise<ServiceResult<PlanType>> {
    try {
      const data = CreatePlanTypeSchema.parse(input);
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
    input: UpdatePlanTypeInput
  ): Promise<ServiceResult<PlanType>> {
    try {
      const data = UpdatePlanTypeSchema.parse(input);
      return await this.updateEntity(id, data);
    } catch (error) {
      if (error instanceof z.ZodError) {
        return this.validationError(error);
      }
      return this.handleRepositoryError(error);
    }
  }
}
