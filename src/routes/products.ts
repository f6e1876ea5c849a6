/**
 * Product API routes
 */

import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { validateApiKey, asyncHandler, ApiError } from '../middleware/index.js';
import type { ProductService } from '../services/product/index.js';
import { LimitSchema, PageSchema, SortOrderSchema, uuidParam } from '../validation/common.js';
import { unwrap } from './helpers.js';

const listQuerySchema = z.object({
  page: PageSchema,
  limit: LimitSchema,
  sortBy: z
    .enum(['created_at', 'updated_at', 'name'])
    .optional()
    .default('name'),
  sortOrder: SortOrderSchema,
});

const productIdSchema = uuidParam('product');

/**
 * Create product router
 * @param productService - Service validating products against their plan type
 */
export function createProductRouter(productService: ProductService): Router {
  const router = Router();

  router.use(validateApiKey);

  router.get(
    '/',
    asyncHandler(async (req: Request, res: Response) => {
      const query = listQuerySchema.parse(req.query);
      res.json(unwrap(await productService.findAll(query)));
    })
  );

  router.get(
    '/:id',
    asyncHandler(async (req: Request, res: Response) => {
      const id = productIdSchema.parse(req.params.id);
      res.json(unwrap(await productService.findById(id)));
    })
  );

  /**
   * POST /api/products
   * Rejected with 422 when the plan type needs a NetSuite id that is missing
   */
  router.post(
    '/',
    asyncHandler(async (req: Request, res: Response) => {
      const product = unwrap(await productService.create(req.body));
      res.status(201).json(product);
    })
  );

  router.patch(
    '/:id',
    asyncHandler(async (req: Request, res: Response) => {
      const id = productIdSchema.parse(req.params.id);
      if (!req.body || Object.keys(req.body).length === 0) {
        throw new ApiError(
          400,
          'Bad Request',
          'No valid fields provided for update'
        );
      }
      res.json(unwrap(await productService.update(id, req.body)));
    })
  );

  router.delete(
    '/:id',
    asyncHandler(async (req: Request, res: Response) => {
      const id = productIdSchema.parse(req.params.id);
      unwrap(await productService.delete(id));
      res.status(204).send();
    })
  );

  return router;
}
