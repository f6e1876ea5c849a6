export type { PlanTypeRepository } from './PlanTypeRepository.js';
export { PlanTypeRepositoryImpl, mapPlanTypeRow } from './PlanTypeRepositoryImpl.js';
export * from './types.js';
