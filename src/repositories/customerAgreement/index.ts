export type { CustomerAgreementRepository } from './CustomerAgreementRepository.js';
export { CustomerAgreementRepositoryImpl } from './CustomerAgreementRepositoryImpl.js';
export * from './types.js';
