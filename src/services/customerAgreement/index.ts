export type { CustomerAgreementService } from './CustomerAgreementService.js';
export {
  CustomerAgreementServiceImpl,
  AUTO_APPLY_FIELD,
} from './CustomerAgreementServiceImpl.js';
export {
  buildAutoApplyChoices,
  deriveAutoApplyChoices,
  EMPTY_AUTO_APPLY_CHOICE,
} from './autoApplyChoices.js';
export type { AutoApplyChoice, AutoApplyChoices } from './autoApplyChoices.js';
