export type { RenewalRepository } from './RenewalRepository.js';
export { RenewalRepositoryImpl } from './RenewalRepositoryImpl.js';
export * from './types.js';
