import type { RenewalRuleContext, Rule } from './types.js';

/**
 * Renewal dates must satisfy
 * now <= effective date <= renewed expiration date and
 * prior plan expiration <= effective date
 */
export const renewalRules: readonly Rule<RenewalRuleContext>[] = [
  {
    field: 'effective_date',
    message:
      'A subscription renewal can not be scheduled to become effective in the past.',
    violates: ({ candidate, now }) =>
      candidate.effectiveDate.getTime() < now.getTime(),
  },
  {
    field: 'renewed_expiration_date',
    message: 'A subscription renewal can not expire before it becomes effective.',
    violates: ({ candidate }) =>
      candidate.renewedExpirationDate.getTime() <
      candidate.effectiveDate.getTime(),
  },
  {
    field: 'effective_date',
    message:
      'A subscription renewal can not take effect before a subscription expires.',
    violates: ({ candidate, priorPlan }) =>
      candidate.effectiveDate.getTime() < priorPlan.expirationDate.getTime(),
  },
];
