// Applied when a plan enables the cap without choosing a percentage
export const DEFAULT_REVOKE_MAX_PERCENTAGE = 5;

/**
 * Revocations still available under a plan's revocation cap, or null when
 * the cap is disabled
 */
export function computeRevocationsRemaining(plan: {
  isRevocationCapEnabled: boolean;
  revokeMaxPercentage: number;
  numRevocationsApplied: number;
  numLicenses: number;
}): number | null {
  if (!plan.isRevocationCapEnabled) {
    return null;
  }

  const allowed = Math.ceil((plan.numLicenses * plan.revokeMaxPercentage) / 100);
  return Math.max(0, allowed - plan.numRevocationsApplied);
}
