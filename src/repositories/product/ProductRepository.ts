import type { BaseCrudRepository } from '../types.js';
import type {
  Product,
  CreateProductData,
  UpdateProductData,
  ProductSortColumn,
} from './types.js';

/**
 * Repository interface for product database operations
 */
export type ProductRepository = BaseCrudRepository<
  Product,
  CreateProductData,
  UpdateProductData,
  ProductSortColumn
>;
