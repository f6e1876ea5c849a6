/**
 * Subscription plan API routes
 */

import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { validateApiKey, asyncHandler } from '../middleware/index.js';
import type { SubscriptionPlanService } from '../services/subscriptionPlan/index.js';
import { LimitSchema, PageSchema, SortOrderSchema, uuidParam } from '../validation/common.js';
import { unwrap } from './helpers.js';

const listQuerySchema = z.object({
  page: PageSchema,
  limit: LimitSchema,
  sortBy: z
    .enum(['created_at', 'updated_at', 'title', 'start_date', 'expiration_date'])
    .optional()
    .default('created_at'),
  sortOrder: SortOrderSchema,
});

const subscriptionPlanIdSchema = uuidParam('subscription plan');

/**
 * Create subscription plan router
 * @param subscriptionPlanService - Service running the plan rules before every write
 */
export function createSubscriptionPlanRouter(
  subscriptionPlanService: SubscriptionPlanService
): Router {
  const router = Router();

  router.use(validateApiKey);

  /**
   * GET /api/subscription-plans
   * List plans with pagination
   */
  router.get(
    '/',
    asyncHandler(async (req: Request, res: Response) => {
      const query = listQuerySchema.parse(req.query);
      res.json(unwrap(await subscriptionPlanService.findAll(query)));
    })
  );

  router.get(
    '/:id',
    asyncHandler(async (req: Request, res: Response) => {
      const id = subscriptionPlanIdSchema.parse(req.params.id);
      res.json(unwrap(await subscriptionPlanService.findById(id)));
    })
  );

  /**
   * GET /api/subscription-plans/:id/history
   * Recorded changes with their reasons, newest first
   */
  router.get(
    '/:id/history',
    asyncHandler(async (req: Request, res: Response) => {
      const id = subscriptionPlanIdSchema.parse(req.params.id);
      res.json(unwrap(await subscriptionPlanService.getHistory(id)));
    })
  );

  /**
   * POST /api/subscription-plans
   * Body must carry a changeReason; rule violations answer 422
   */
  router.post(
    '/',
    asyncHandler(async (req: Request, res: Response) => {
      const plan = unwrap(await subscriptionPlanService.create(req.body));
      res.status(201).json(plan);
    })
  );

  /**
   * PATCH /api/subscription-plans/:id
   * Partial update; changeReason is always required
   */
  router.patch(
    '/:id',
    asyncHandler(async (req: Request, res: Response) => {
      const id = subscriptionPlanIdSchema.parse(req.params.id);
      res.json(unwrap(await subscriptionPlanService.update(id, req.body)));
    })
  );

  router.delete(
    '/:id',
    asyncHandler(async (req: Request, res: Response) => {
      const id = subscriptionPlanIdSchema.parse(req.params.id);
      unwrap(await subscriptionPlanService.delete(id));
      res.status(204).send();
    })
  );

  return router;
}
