import type { Rule, ValidationVerdict } from './types.js';

export const ACCEPTED: ValidationVerdict = { accepted: true };

/**
 * Evaluate rules in order and stop at the first violation
 */
export function evaluateRules<TContext>(
  rules: readonly Rule<TContext>[],
  context: TContext
): ValidationVerdict {
  const violated = rules.find((rule) => rule.violates(context));

  if (!violated) {
    return ACCEPTED;
  }

  return {
    accepted: false,
    errors: [{ field: violated.field, message: violated.message }],
  };
}
