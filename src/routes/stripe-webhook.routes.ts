import express, { Router } from 'express';
import { StripeWebhookController } from '../controllers/stripe-webhook.controller';
import type { RateLimiters } from '../middleware/rate-limit.middleware';

/**
 * Stripe webhook endpoint. Mounted before express.json() so the raw body is
 * available for signature verification. No authentication (Stripe signs requests).
 */
export function createStripeWebhookRouter(
  webhookController: StripeWebhookController,
  limiters: RateLimiters
): Router {
  const router = Router();

  router.post(
    '/stripe',
    limiters.webhooks,
    express.raw({ type: '*/*' }),
    webhookController.handle.bind(webhookController)
  );

  return router;
}
