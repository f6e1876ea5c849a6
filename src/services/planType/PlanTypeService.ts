import type { BaseCrudService } from '../types.js';
import type {
  PlanType,
  PlanTypeSortColumn,
} from '../../repositories/planType/types.js';
import type {
  CreatePlanTypeInput,
  UpdatePlanTypeInput,
} from '../../validation/planType/index.js';

/**
 * Service interface for plan type operations
 */
export type PlanTypeService = BaseCrudService<
  PlanType,
  CreatePlanTypeInput,
  UpdatePlanTypeInput,
  PlanTypeSortColumn
>;
