import type { BaseCrudRepository } from '../types.js';
import type {
  PlanType,
  CreatePlanTypeData,
  UpdatePlanTypeData,
  PlanTypeSortColumn,
} from './types.js';

/**
 * Repository interface for plan type database operations
 */
export type PlanTypeRepository = BaseCrudRepository<
  PlanType,
  CreatePlanTypeData,
  UpdatePlanTypeData,
  PlanTypeSortColumn
>;
