/**
 * Plan type API routes
 */

import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { validateApiKey, asyncHandler, ApiError } from '../middleware/index.js';
import type { PlanTypeService } from '../services/planType/index.js';
import { LimitSchema, PageSchema, SortOrderSchema, uuidParam } from '../validation/common.js';
import { unwrap } from './helpers.js';

const listQuerySchema = z.object({
  page: PageSchema,
  limit: LimitSchema,
  sortBy: z
    .enum(['created_at', 'updated_at', 'label'])
    .optional()
    .default('label'),
  sortOrder: SortOrderSchema,
});

const planTypeIdSchema = uuidParam('plan type');

/**
 * Create plan type router
 * @param planTypeService - Service handling plan type persistence
 */
export function createPlanTypeRouter(planTypeService: PlanTypeService): Router {
  const router = Router();

  router.use(validateApiKey);

  /**
   * GET /api/plan-types
   * List plan types with pagination
   */
  router.get(
    '/',
    asyncHandler(async (req: Request, res: Response) => {
      const query = listQuerySchema.parse(req.query);
      res.json(unwrap(await planTypeService.findAll(query)));
    })
  );

  /**
   * GET /api/plan-types/:id
   */
  router.get(
    '/:id',
    asyncHandler(async (req: Request, res: Response) => {
      const id = planTypeIdSchema.parse(req.params.id);
      res.json(unwrap(await planTypeService.findById(id)));
    })
  );

  /**
   * POST /api/plan-types
   */
  router.post(
    '/',
    asyncHandler(async (req: Request, res: Response) => {
      const planType = unwrap(await planTypeService.create(req.body));
      res.status(201).json(planType);
    })
  );

  /**
   * PATCH /api/plan-types/:id
   */
  router.patch(
    '/:id',
    asyncHandler(async (req: Request, res: Response) => {
      const id = planTypeIdSchema.parse(req.params.id);
      if (!req.body || Object.keys(req.body).length === 0) {
        throw new ApiError(
          400,
          'Bad Request',
          'No valid fields provided for update'
        );
      }
      res.json(unwrap(await planTypeService.update(id, req.body)));
    })
  );

  /**
   * DELETE /api/plan-types/:id
   * Plan types still referenced by products cannot be deleted
   */
  router.delete(
    '/:id',
    asyncHandler(async (req: Request, res: Response) => {
      const id = planTypeIdSchema.parse(req.params.id);
      unwrap(await planTypeService.delete(id));
      res.status(204).send();
    })
  );

  return router;
}
