import type { AutoApplicableSubscriptionRef } from '../../repositories/customerAgreement/types.js';
import type { SubscriptionPlanRepository } from '../../repositories/subscriptionPlan/SubscriptionPlanRepository.js';

export interface AutoApplyChoice {
  value: string;
  label: string;
}

/**
 * Options for the plan an agreement auto-applies licenses from
 */
export interface AutoApplyChoices {
  choices: AutoApplyChoice[];
  /** Id of the current selection, '' when nothing eligible is selected */
  selected: string;
}

export const EMPTY_AUTO_APPLY_CHOICE: AutoApplyChoice = {
  value: '',
  label: '------',
};

/**
 * Turn the eligible plans into choices, led by the empty option
 */
export function buildAutoApplyChoices(
  plans: readonly { id: string; title: string }[],
  current: AutoApplicableSubscriptionRef | null
): AutoApplyChoices {
  const choices = [
    EMPTY_AUTO_APPLY_CHOICE,
    ...plans.map((plan) => ({ value: plan.id, label: plan.title })),
  ];

  const selected =
    current && choices.some((choice) => choice.value === current.id)
      ? current.id
      : EMPTY_AUTO_APPLY_CHOICE.value;

  return { choices, selected };
}

/**
 * Choices for an agreement: its plans that are active and running at `now`
 */
export async function deriveAutoApplyChoices(
  agreement: {
    id: string;
    autoApplicableSubscription: AutoApplicableSubscriptionRef | null;
  },
  now: Date,
  plans: Pick<SubscriptionPlanRepository, 'findActiveForAgreement'>
): Promise<AutoApplyChoices> {
  const active = await plans.findActiveForAgreement(agreement.id, now);
  return buildAutoApplyChoices(active, agreement.autoApplicableSubscription);
}
