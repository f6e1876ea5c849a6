/**
 * Subscription plan renewal API routes
 */

import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { validateApiKey, asyncHandler, ApiError } from '../middleware/index.js';
import type { RenewalService } from '../services/renewal/index.js';
import { LimitSchema, PageSchema, SortOrderSchema, uuidParam } from '../validation/common.js';
import { unwrap } from './helpers.js';

const listQuerySchema = z.object({
  page: PageSchema,
  limit: LimitSchema,
  sortBy: z
    .enum(['created_at', 'updated_at', 'effective_date'])
    .optional()
    .default('effective_date'),
  sortOrder: SortOrderSchema,
});

const renewalIdSchema = uuidParam('renewal');

/**
 * Create renewal router
 * @param renewalService - Service checking renewal dates against the prior plan
 */
export function createRenewalRouter(renewalService: RenewalService): Router {
  const router = Router();

  router.use(validateApiKey);

  router.get(
    '/',
    asyncHandler(async (req: Request, res: Response) => {
      const query = listQuerySchema.parse(req.query);
      res.json(unwrap(await renewalService.findAll(query)));
    })
  );

  router.get(
    '/:id',
    asyncHandler(async (req: Request, res: Response) => {
      const id = renewalIdSchema.parse(req.params.id);
      res.json(unwrap(await renewalService.findById(id)));
    })
  );

  router.post(
    '/',
    asyncHandler(async (req: Request, res: Response) => {
      const renewal = unwrap(await renewalService.create(req.body));
      res.status(201).json(renewal);
    })
  );

  router.patch(
    '/:id',
    asyncHandler(async (req: Request, res: Response) => {
      const id = renewalIdSchema.parse(req.params.id);
      if (!req.body || Object.keys(req.body).length === 0) {
        throw new ApiError(
          400,
          'Bad Request',
          'No valid fields provided for update'
        );
      }
      res.json(unwrap(await renewalService.update(id, req.body)));
    })
  );

  router.delete(
    '/:id',
    asyncHandler(async (req: Request, res: Response) => {
      const id = renewalIdSchema.parse(req.params.id);
      unwrap(await renewalService.delete(id));
      res.status(204).send();
    })
  );

  return router;
}
