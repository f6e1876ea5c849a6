import type { ProductRuleContext, Rule } from './types.js';

export const productRules: readonly Rule<ProductRuleContext>[] = [
  {
    field: 'netsuite_id',
    message: 'You must specify Netsuite ID for selected plan type.',
    violates: ({ candidate }) =>
      candidate.planType.nsIdRequired && !candidate.netsuiteId,
  },
];
