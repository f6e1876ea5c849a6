/**
 * Customer agreement API routes
 */

import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { validateApiKey, asyncHandler, ApiError } from '../middleware/index.js';
import type { CustomerAgreementService } from '../services/customerAgreement/index.js';
import { LimitSchema, PageSchema, SortOrderSchema, uuidParam } from '../validation/common.js';
import { unwrap } from './helpers.js';

const listQuerySchema = z.object({
  page: PageSchema,
  limit: LimitSchema,
  sortBy: z
    .enum(['created_at', 'updated_at', 'enterprise_customer_name'])
    .optional()
    .default('created_at'),
  sortOrder: SortOrderSchema,
});

const customerAgreementIdSchema = uuidParam('customer agreement');

/**
 * Create customer agreement router
 * @param customerAgreementService - Service owning agreements and their auto-apply selection
 */
export function createCustomerAgreementRouter(
  customerAgreementService: CustomerAgreementService
): Router {
  const router = Router();

  router.use(validateApiKey);

  router.get(
    '/',
    asyncHandler(async (req: Request, res: Response) => {
      const query = listQuerySchema.parse(req.query);
      res.json(unwrap(await customerAgreementService.findAll(query)));
    })
  );

  /**
   * GET /api/customer-agreements/slug/:slug
   * Look up an agreement by its enterprise customer slug
   */
  router.get(
    '/slug/:slug',
    asyncHandler(async (req: Request, res: Response) => {
      res.json(unwrap(await customerAgreementService.findBySlug(req.params.slug)));
    })
  );

  router.get(
    '/:id',
    asyncHandler(async (req: Request, res: Response) => {
      const id = customerAgreementIdSchema.parse(req.params.id);
      res.json(unwrap(await customerAgreementService.findById(id)));
    })
  );

  /**
   * GET /api/customer-agreements/:id/auto-apply-choices
   * Plans of the agreement that are active today, led by the empty choice
   */
  router.get(
    '/:id/auto-apply-choices',
    asyncHandler(async (req: Request, res: Response) => {
      const id = customerAgreementIdSchema.parse(req.params.id);
      res.json(unwrap(await customerAgreementService.getAutoApplyChoices(id)));
    })
  );

  /**
   * PUT /api/customer-agreements/:id/auto-apply-subscription
   * Body: { subscriptionPlanId } where '' clears the selection
   */
  router.put(
    '/:id/auto-apply-subscription',
    asyncHandler(async (req: Request, res: Response) => {
      const id = customerAgreementIdSchema.parse(req.params.id);
      res.json(
        unwrap(await customerAgreementService.setAutoApplySubscription(id, req.body))
      );
    })
  );

  router.post(
    '/',
    asyncHandler(async (req: Request, res: Response) => {
      const agreement = unwrap(await customerAgreementService.create(req.body));
      res.status(201).json(agreement);
    })
  );

  router.patch(
    '/:id',
    asyncHandler(async (req: Request, res: Response) => {
      const id = customerAgreementIdSchema.parse(req.params.id);
      if (!req.body || Object.keys(req.body).length === 0) {
        throw new ApiError(
          400,
          'Bad Request',
          'No valid fields provided for update'
        );
      }
      res.json(unwrap(await customerAgreementService.update(id, req.body)));
    })
  );

  router.delete(
    '/:id',
    asyncHandler(async (req: Request, res: Response) => {
      const id = customerAgreementIdSchema.parse(req.params.id);
      unwrap(await customerAgreementService.delete(id));
      res.status(204).send();
    })
  );

  return router;
}
