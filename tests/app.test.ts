import { describe, it, expect } from 'vitest';
import request from 'supertest';
import { createApp } from '../src/app.js';
import { createServices } from '../src/services/index.js';
import { createInMemoryRepositories } from '../src/test/inMemoryRepositories.js';
import { TEST_LICENSING, testClock } from '../src/test/fixtures.js';

describe('App', () => {
  const app = createApp(
    createServices(createInMemoryRepositories(), TEST_LICENSING, testClock)
  );

  describe('GET /health', () => {
    it('should return health status', async () => {
      const response = await request(app).get('/health');

      expect(response.status).toBe(200);
      expect(response.body).toHaveProperty('status', 'ok');
      expect(response.body).toHaveProperty('timestamp');
    });
  });

  describe('GET /api', () => {
    it('should return the API banner', async () => {
      const response = await request(app).get('/api');

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        message: 'Subscription administration API',
        version: '1.0.0',
      });
    });
  });

  describe('authentication', () => {
    it('should reject admin routes without an API key', async () => {
      const response = await request(app).get('/api/subscription-plans');

      expect(response.status).toBe(401);
      expect(response.body.message).toBe('X-API-KEY header is required');
    });

    it('should reject a wrong API key', async () => {
      const response = await request(app)
        .get('/api/products')
        .set('X-API-KEY', 'wrong-key');

      expect(response.status).toBe(401);
      expect(response.body.message).toBe('Invalid API key');
    });

    it('should list resources with the configured API key', async () => {
      const response = await request(app)
        .get('/api/plan-types')
        .set('X-API-KEY', 'test-api-key-12345');

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        data: [],
        pagination: { page: 1, limit: 10, total: 0, totalPages: 0 },
      });
    });
  });
});
