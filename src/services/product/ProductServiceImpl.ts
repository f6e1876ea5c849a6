/**
 * Product service implementation
 */

import { z } from 'zod';
import { BaseCrudServiceImpl } from '../BaseCrudService.js';
import type { ProductService } from './ProductService.js';
import type { ProductRepository } from '../../repositories/product/ProductRepository.js';
import type { PlanTypeRepository } from '../../repositories/planType/PlanTypeRepository.js';
import type {
  Product,
  CreateProductData,
  UpdateProductData,
  ProductSortColumn,
} from '../../repositories/product/types.js';
import type {
  CreateProductInput,
  UpdateProductInput,
} from '../../validation/product/index.js';
import {
  CreateProductSchema,
  UpdateProductSchema,
} from '../../validation/product/index.js';
import type { PlanValidator } from '../../validation/rules/index.js';
import type { ServiceResult } from '../types.js';
import { invalidChoiceError } from '../types.js';

export class ProductServiceImpl
  extends BaseCrudServiceImpl<
    Product,
    CreateProductData,
    UpdateProductData,
    ProductSortColumn
  >
  implements ProductService
{
  constructor(
    private readonly productRepository: ProductRepository,
    private readonly planTypeRepository: PlanTypeRepository,
    private readonly validator: PlanValidator
  ) {
    super(productRepository, 'Product');
  }

  async create(input: CreateProductInput): Promise<ServiceResult<Product>> {
    try {
      const data = CreateProductSchema.parse(input);

      const rejection = await this.checkProductRules(
        data.planTypeId,
        data.netsuiteId ?? null
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
    input: UpdateProductInput
  ): Promise<ServiceResult<Product>> {
    try {
      const data = UpdateProductSchema.parse(input);

      const existing = await this.productRepository.findById(id);
      if (!existing) {
        return this.notFound(id);
      }

      const rejection = await this.checkProductRules(
        data.planTypeId ?? existing.planTypeId,
        data.netsuiteId === undefined ? existing.netsuiteId : data.netsuiteId
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
   * Resolve the plan type and run the product rules
   * @returns A rejection result, or null when the product may be saved
   */
  private async checkProductRules(
    planTypeId: string,
    netsuiteId: number | null
  ): Promise<ServiceResult<Product> | null> {
    const planType = await this.planTypeRepository.findById(planTypeId);
    if (!planType) {
      return this.ruleViolation([invalidChoiceError('plan_type')], {
        planTypeId,
      });
    }

    const verdict = this.validator.validateProduct({ netsuiteId, planType });
    if (!verdict.accepted) {
      return this.ruleViolation(verdict.errors, { planTypeId });
    }
    return null;
  }
}
