export type { PlanTypeService } from './PlanTypeService.js';
export { PlanTypeServiceImpl } from './PlanTypeServiceImpl.js';
