import { describe, it, expect, beforeEach } from 'vitest';
import { createServices, ServiceErrorType } from '../index.js';
import type { AppRepositories, AppServices } from '../index.js';
import { createInMemoryRepositories } from '../../test/inMemoryRepositories.js';
import {
  TEST_LICENSING,
  UNKNOWN_ID,
  seedBasics,
  seedPlan,
  testClock,
  type SeededRecords,
} from '../../test/fixtures.js';

describe('CustomerAgreementService', () => {
  let repositories: AppRepositories;
  let services: AppServices;

  beforeEach(() => {
    repositories = createInMemoryRepositories();
    services = createServices(repositories, TEST_LICENSING, testClock);
  });

  describe('create', () => {
    it('applies the configured purge window when none is given', async () => {
      const result = await services.customerAgreements.create({
        enterpriseCustomerUuid: 'a1b2c3d4-0000-4000-8000-00000000e009',
        enterpriseCustomerSlug: 'northwind',
        enterpriseCustomerName: 'Northwind',
      });

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.licenseDurationBeforePurgeDays).toBe(90);
        expect(result.data.autoApplicableSubscription).toBeNull();
      }
    });

    it('rejects a malformed slug', async () => {
      const result = await services.customerAgreements.create({
        enterpriseCustomerUuid: 'a1b2c3d4-0000-4000-8000-00000000e009',
        enterpriseCustomerSlug: 'North Wind',
        enterpriseCustomerName: 'Northwind',
      });

      expect(!result.success && result.error.type).toBe(
        ServiceErrorType.VALIDATION_ERROR
      );
    });

    it('reports a second agreement for the same customer as a duplicate', async () => {
      const input = {
        enterpriseCustomerUuid: 'a1b2c3d4-0000-4000-8000-00000000e009',
        enterpriseCustomerSlug: 'northwind',
        enterpriseCustomerName: 'Northwind',
      };
      await services.customerAgreements.create(input);

      const result = await services.customerAgreements.create(input);

      expect(!result.success && result.error.type).toBe(
        ServiceErrorType.DUPLICATE_ENTRY
      );
    });
  });

  it('finds an agreement by slug', async () => {
    const { agreement } = await seedBasics(repositories);

    const found = await services.customerAgreements.findBySlug('test-enterprise');
    const missing = await services.customerAgreements.findBySlug('nobody');

    expect(found.success && found.data.id).toBe(agreement.id);
    expect(!missing.success && missing.error.message).toBe(
      "Customer agreement with slug 'nobody' not found"
    );
  });

  describe('auto-apply subscription', () => {
    let seeded: SeededRecords;

    beforeEach(async () => {
      seeded = await seedBasics(repositories);
    });

    it('offers only active plans running at the current time', async () => {
      const current = await seedPlan(repositories, seeded, { title: 'Current term' });
      await seedPlan(repositories, seeded, { title: 'Paused term', isActive: false });
      await seedPlan(repositories, seeded, {
        title: 'Next term',
        startDate: new Date('2027-01-01T00:00:00Z'),
        expirationDate: new Date('2027-12-31T00:00:00Z'),
      });

      const result = await services.customerAgreements.getAutoApplyChoices(
        seeded.agreement.id
      );

      expect(result).toEqual({
        success: true,
        data: {
          choices: [
            { value: '', label: '------' },
            { value: current.id, label: 'Current term' },
          ],
          selected: '',
        },
      });
    });

    it('moves the flag to the chosen plan', async () => {
      const plan = await seedPlan(repositories, seeded);

      const result = await services.customerAgreements.setAutoApplySubscription(
        seeded.agreement.id,
        { subscriptionPlanId: plan.id }
      );
      const choices = await services.customerAgreements.getAutoApplyChoices(
        seeded.agreement.id
      );

      expect(result.success && result.data.autoApplicableSubscription).toEqual({
        id: plan.id,
        title: 'Current term',
      });
      expect(choices.success && choices.data.selected).toBe(plan.id);
    });

    it('clears the selection with the empty choice', async () => {
      const plan = await seedPlan(repositories, seeded);
      await repositories.subscriptionPlans.setAutoApplicableSubscription(
        seeded.agreement.id,
        plan.id
      );

      const result = await services.customerAgreements.setAutoApplySubscription(
        seeded.agreement.id,
        { subscriptionPlanId: '' }
      );

      expect(result.success && result.data.autoApplicableSubscription).toBeNull();
    });

    it('rejects a plan that is not among the choices', async () => {
      const expired = await seedPlan(repositories, seeded, {
        startDate: new Date('2025-01-01T00:00:00Z'),
        expirationDate: new Date('2025-12-31T00:00:00Z'),
      });

      const result = await services.customerAgreements.setAutoApplySubscription(
        seeded.agreement.id,
        { subscriptionPlanId: expired.id }
      );

      expect(!result.success && result.error.fieldErrors).toEqual([
        {
          field: 'subscription_for_auto_applied_licenses',
          message: `Select a valid choice. ${expired.id} is not one of the available choices.`,
        },
      ]);
      const stored = await repositories.subscriptionPlans.findById(expired.id);
      expect(stored?.shouldAutoApplyLicenses).toBe(false);
    });

    it('reports unknown agreements as not found', async () => {
      const result = await services.customerAgreements.getAutoApplyChoices(UNKNOWN_ID);

      expect(!result.success && result.error.type).toBe(ServiceErrorType.NOT_FOUND);
    });
  });
});
