import { describe, it, expect, beforeEach } from 'vitest';
import request from 'supertest';
import type { Application } from 'express';
import { createApp } from '../../app.js';
import { createServices } from '../../services/index.js';
import type { AppRepositories } from '../../services/index.js';
import { createInMemoryRepositories } from '../../test/inMemoryRepositories.js';
import {
  TEST_LICENSING,
  UNKNOWN_ID,
  seedBasics,
  seedPlan,
  testClock,
  type SeededRecords,
} from '../../test/fixtures.js';

const API_KEY = 'test-api-key-12345';

describe('Subscription plan routes', () => {
  let app: Application;
  let repositories: AppRepositories;
  let seeded: SeededRecords;

  beforeEach(async () => {
    repositories = createInMemoryRepositories();
    app = createApp(createServices(repositories, TEST_LICENSING, testClock));
    seeded = await seedBasics(repositories);
  });

  function planBody(overrides: Record<string, unknown> = {}) {
    return {
      title: 'Spring cohort',
      customerAgreementId: seeded.agreement.id,
      productId: seeded.product.id,
      startDate: '2026-03-01',
      expirationDate: '2027-03-01',
      numLicenses: 25,
      changeReason: 'new',
      ...overrides,
    };
  }

  describe('POST /api/subscription-plans', () => {
    it('creates an accepted plan', async () => {
      const response = await request(app)
        .post('/api/subscription-plans')
        .set('X-API-KEY', API_KEY)
        .send(planBody());

      expect(response.status).toBe(201);
      expect(response.body).toMatchObject({
        title: 'Spring cohort',
        customerAgreementId: seeded.agreement.id,
        numLicenses: 25,
        isActive: false,
        shouldAutoApplyLicenses: false,
        numRevocationsRemaining: null,
      });
    });

    it('answers a rule violation with 422 and the rejected field', async () => {
      const response = await request(app)
        .post('/api/subscription-plans')
        .set('X-API-KEY', API_KEY)
        .send(planBody({ numLicenses: 501 }));

      expect(response.status).toBe(422);
      expect(response.body).toEqual({
        error: 'Unprocessable Entity',
        message: 'Non-test subscriptions may not have more than 500 licenses',
        errors: [
          {
            field: 'num_licenses',
            message: 'Non-test subscriptions may not have more than 500 licenses',
          },
        ],
        timestamp: expect.any(String),
      });
    });

    it('answers malformed input with 400', async () => {
      const response = await request(app)
        .post('/api/subscription-plans')
        .set('X-API-KEY', API_KEY)
        .send(planBody({ customerAgreementId: 'not-a-uuid' }));

      expect(response.status).toBe(400);
      expect(response.body.error).toBe('Validation Error');
      expect(response.body.errors).toBeUndefined();
    });
  });

  describe('PATCH /api/subscription-plans/:id', () => {
    it('requires a change reason', async () => {
      const plan = await seedPlan(repositories, seeded);

      const response = await request(app)
        .patch(`/api/subscription-plans/${plan.id}`)
        .set('X-API-KEY', API_KEY)
        .send({ numLicenses: 30 });

      expect(response.status).toBe(400);
    });

    it('updates the plan and records the change', async () => {
      const plan = await seedPlan(repositories, seeded);

      const response = await request(app)
        .patch(`/api/subscription-plans/${plan.id}`)
        .set('X-API-KEY', API_KEY)
        .send({ numLicenses: 30, changeReason: 'expansion' });
      const history = await request(app)
        .get(`/api/subscription-plans/${plan.id}/history`)
        .set('X-API-KEY', API_KEY);

      expect(response.status).toBe(200);
      expect(response.body.numLicenses).toBe(30);
      expect(history.status).toBe(200);
      expect(
        history.body.map((entry: { changeReason: string }) => entry.changeReason)
      ).toEqual(['expansion', 'new']);
    });
  });

  describe('GET /api/subscription-plans/:id', () => {
    it('answers unknown plans with 404', async () => {
      const response = await request(app)
        .get(`/api/subscription-plans/${UNKNOWN_ID}`)
        .set('X-API-KEY', API_KEY);

      expect(response.status).toBe(404);
      expect(response.body.message).toBe(
        `Subscription plan with ID ${UNKNOWN_ID} not found`
      );
    });

    it('rejects ids that are not UUIDs', async () => {
      const response = await request(app)
        .get('/api/subscription-plans/42')
        .set('X-API-KEY', API_KEY);

      expect(response.status).toBe(400);
      expect(response.body.details.issues[0].message).toBe(
        'Invalid subscription plan ID format'
      );
    });
  });

  it('deletes a plan', async () => {
    const plan = await seedPlan(repositories, seeded);

    const response = await request(app)
      .delete(`/api/subscription-plans/${plan.id}`)
      .set('X-API-KEY', API_KEY);

    expect(response.status).toBe(204);
    await expect(repositories.subscriptionPlans.findById(plan.id)).resolves.toBeNull();
  });
});
