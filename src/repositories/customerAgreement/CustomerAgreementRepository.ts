import type { BaseCrudRepository } from '../types.js';
import type {
  CustomerAgreement,
  CreateCustomerAgreementData,
  UpdateCustomerAgreementData,
  CustomerAgreementSortColumn,
} from './types.js';

/**
 * Repository interface for customer agreement database operations
 */
export interface CustomerAgreementRepository
  extends BaseCrudRepository<
    CustomerAgreement,
    CreateCustomerAgreementData,
    UpdateCustomerAgreementData,
    CustomerAgreementSortColumn
  > {
  /**
   * Find an agreement by the slug of its enterprise customer
   * @returns The agreement or null if not found
   */
  findBySlug(enterpriseCustomerSlug: string): Promise<CustomerAgreement | null>;
}
