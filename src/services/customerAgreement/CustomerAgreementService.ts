import type { BaseCrudService, ServiceResult } from '../types.js';
import type {
  CustomerAgreement,
  CustomerAgreementSortColumn,
} from '../../repositories/customerAgreement/types.js';
import type {
  AutoApplySubscriptionInput,
  CreateCustomerAgreementInput,
  UpdateCustomerAgreementInput,
} from '../../validation/customerAgreement/index.js';
import type { AutoApplyChoices } from './autoApplyChoices.js';

/**
 * Service interface for customer agreement operations
 */
export interface CustomerAgreementService
  extends BaseCrudService<
    CustomerAgreement,
    CreateCustomerAgreementInput,
    UpdateCustomerAgreementInput,
    CustomerAgreementSortColumn
  > {
  /**
   * Find an agreement by its enterprise customer slug
   */
  findBySlug(slug: string): Promise<ServiceResult<CustomerAgreement>>;

  /**
   * Plans the agreement may auto-apply licenses from, with the current pick
   */
  getAutoApplyChoices(id: string): Promise<ServiceResult<AutoApplyChoices>>;

  /**
   * Select the auto-apply plan among the derived choices; '' clears it
   */
  setAutoApplySubscription(
    id: string,
    input: AutoApplySubscriptionInput
  ): Promise<ServiceResult<CustomerAgreement>>;
}
