import { config, type Config } from './env.js';

/**
 * Static licensing limits handed to the plan validator and the
 * field-level schemas
 */
export interface LicensingConfig {
  /** Smallest license count a subscription plan may carry */
  minNumLicenses: number;
  /** Largest license count allowed for plans not flagged for internal use */
  maxNumLicenses: number;
  /** Purge window applied to new customer agreements that do not set one */
  defaultLicenseDurationBeforePurgeDays: number;
}

export function getLicensingConfig(
  source: Pick<
    Config,
    | 'MIN_NUM_LICENSES'
    | 'MAX_NUM_LICENSES'
    | 'DEFAULT_LICENSE_DURATION_BEFORE_PURGE_DAYS'
  > = config
): LicensingConfig {
  return {
    minNumLicenses: source.MIN_NUM_LICENSES,
    maxNumLicenses: source.MAX_NUM_LICENSES,
    defaultLicenseDurationBeforePurgeDays:
      source.DEFAULT_LICENSE_DURATION_BEFORE_PURGE_DAYS,
  };
}
