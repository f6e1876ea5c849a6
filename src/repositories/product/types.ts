/**
 * Domain types for product repository
 */

import type { PlanType } from '../planType/types.js';

/**
 * Product entity, always hydrated with its plan type
 */
export interface Product {
  id: string;
  name: string;
  description: string;
  netsuiteId: number | null;
  salesforceProductId: string | null;
  planTypeId: string;
  planType: PlanType;
  createdAt: Date;
  updatedAt: Date;
}

export interface CreateProductData {
  name: string;
  description?: string;
  netsuiteId?: number | null;
  salesforceProductId?: string | null;
  planTypeId: string;
}

export type UpdateProductData = Partial<CreateProductData>;

export type ProductSortColumn = 'created_at' | 'updated_at' | 'name';
