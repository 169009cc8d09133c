import { Request, Response } from 'express';
import type { WebhookService } from '../services/webhook.service';
import { logger } from '../utils/logger.util';

/** Stripe webhook endpoint. Handler failures answer 500 so Stripe redelivers. */
export class StripeWebhookController {
  constructor(private readonly webhookService: WebhookService) {}

  async handle(req: Request, res: Response): Promise<void> {
    const rawBody: unknown = req.body;
    if (!(rawBody instanceof Buffer)) {
      logger.warn(
        'Stripe webhook body is not raw Buffer (ensure express.raw() is used for this route)'
      );
      res.status(400).json({ success: false, error: 'Invalid webhook body' });
      return;
    }

    const signature = req.headers['stripe-signature'];
    try {
      const result = await this.webhookService.handle(
        rawBody,
        typeof signature === 'string' ? signature : undefined
      );
      if (!result.ok) {
        res.status(400).json({ success: false, error: 'Webhook signature verification failed' });
        return;
      }
      res.status(200).json({ received: true, outcome: result.value.outcome });
    } catch (error) {
      logger.error('Stripe webhook handler failed', error);
      res.status(500).json({ success: false, error: 'Webhook handler failed' });
    }
  }
}
