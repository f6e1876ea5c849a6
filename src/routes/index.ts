import { Router, Request, Response } from 'express';
import type { AppServices } from '../services/index.js';
import { createCustomerAgreementRouter } from './customerAgreements.js';
import { createPlanTypeRouter } from './planTypes.js';
import { createProductRouter } from './products.js';
import { createRenewalRouter } from './renewals.js';
import { createSubscriptionPlanRouter } from './subscriptionPlans.js';

export function createRouter(services: AppServices): Router {
  const router = Router();

  router.get('/', (_req: Request, res: Response) => {
    res.json({
      message: 'Subscription administration API',
      version: '1.0.0',
    });
  });

  router.use(
    '/customer-agreements',
    createCustomerAgreementRouter(services.customerAgreements)
  );
  router.use('/plan-types', createPlanTypeRouter(services.planTypes));
  router.use('/products', createProductRouter(services.products));
  router.use(
    '/subscription-plans',
    createSubscriptionPlanRouter(services.subscriptionPlans)
  );
  router.use('/renewals', createRenewalRouter(services.renewals));

  return router;
}
