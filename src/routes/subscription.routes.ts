import { Router } from 'express';
import { SubscriptionController } from '../controllers/subscription.controller';
import { authenticate } from '../middleware/auth.middleware';
import type { RateLimiters } from '../middleware/rate-limit.middleware';

export function createSubscriptionRouter(
  subscriptionController: SubscriptionController,
  limiters: RateLimiters
): Router {
  const router = Router();

  router.use(limiters.admin, authenticate);

  router.get('/pricing', subscriptionController.getPricing.bind(subscriptionController));
  router.post('/create-checkout', subscriptionController.createCheckout.bind(subscriptionController));
  router.get('/current', subscriptionController.getCurrent.bind(subscriptionController));
  router.post('/cancel', subscriptionController.cancel.bind(subscriptionController));
  router.get('/portal', subscriptionController.getPortal.bind(subscriptionController));

  return router;
}
