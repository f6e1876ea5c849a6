export { PlanValidator } from './PlanValidator.js';
export * from './types.js';
