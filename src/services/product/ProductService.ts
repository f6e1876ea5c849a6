import type { BaseCrudService } from '../types.js';
import type {
  Product,
  ProductSortColumn,
} from '../../repositories/product/types.js';
import type {
  CreateProductInput,
  UpdateProductInput,
} from '../../validation/product/index.js';

/**
 * Service interface for product operations
 * Products are checked against the NetSuite rule of their plan type
 */
export type ProductService = BaseCrudService<
  Product,
  CreateProductInput,
  UpdateProductInput,
  ProductSortColumn
>;
