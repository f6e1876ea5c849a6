import type { LicensingConfig } from '../../config/licensing.js';
import { evaluateRules } from './engine.js';
import { createSubscriptionPlanRules } from './subscriptionPlanRules.js';
import { renewalRules } from './renewalRules.js';
import { productRules } from './productRules.js';
import type {
  PriorPlanSnapshot,
  ProductCandidate,
  RenewalCandidate,
  Rule,
  SubscriptionPlanCandidate,
  SubscriptionPlanRuleContext,
  ValidationVerdict,
} from './types.js';

/**
 * Stateless business-rule evaluator run before plans, renewals and products
 * are committed. Each operation stops at the first failing rule.
 */
export class PlanValidator {
  private readonly subscriptionPlanRules: readonly Rule<SubscriptionPlanRuleContext>[];

  constructor(licensing: Pick<LicensingConfig, 'maxNumLicenses'>) {
    this.subscriptionPlanRules = createSubscriptionPlanRules(licensing);
  }

  validateSubscriptionPlan(
    candidate: SubscriptionPlanCandidate,
    isNewAgreementLink: boolean,
    now: Date
  ): ValidationVerdict {
    return evaluateRules(this.subscriptionPlanRules, {
      candidate,
      isNewAgreementLink,
      now,
    });
  }

  validateRenewal(
    candidate: RenewalCandidate,
    priorPlan: PriorPlanSnapshot,
    now: Date
  ): ValidationVerdict {
    return evaluateRules(renewalRules, { candidate, priorPlan, now });
  }

  validateProduct(candidate: ProductCandidate): ValidationVerdict {
    return evaluateRules(productRules, { candidate });
  }
}
