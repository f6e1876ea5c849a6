export type { RenewalService } from './RenewalService.js';
export { RenewalServiceImpl } from './RenewalServiceImpl.js';
