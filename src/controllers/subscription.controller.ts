import { Response, NextFunction } from 'express';
import type { AuthRequest } from '../middleware/auth.middleware';
import type { SubscriptionService } from '../services/subscription.service';
import type { AdminPrincipal } from '../types';

type AdminHandler = (admin: AdminPrincipal) => Promise<object> | object;

export class SubscriptionController {
  constructor(private readonly subscriptionService: SubscriptionService) {}

  /** GET /api/v1/admin/subscriptions/pricing */
  async getPricing(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    await this.respond(req, res, next, (admin) => this.subscriptionService.pricing(admin));
  }

  /** POST /api/v1/admin/subscriptions/create-checkout */
  async createCheckout(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    await this.respond(req, res, next, (admin) => this.subscriptionService.createCheckout(admin));
  }

  /** GET /api/v1/admin/subscriptions/current */
  async getCurrent(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    await this.respond(req, res, next, (admin) => this.subscriptionService.current(admin));
  }

  /** POST /api/v1/admin/subscriptions/cancel */
  async cancel(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    await this.respond(req, res, next, (admin) => this.subscriptionService.cancel(admin));
  }

  /** GET /api/v1/admin/subscriptions/portal */
  async getPortal(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    await this.respond(req, res, next, (admin) => this.subscriptionService.portal(admin));
  }

  private async respond(
    req: AuthRequest,
    res: Response,
    next: NextFunction,
    handler: AdminHandler
  ): Promise<void> {
    try {
      if (!req.admin) {
        res.status(401).json({ success: false, error: 'Authentication required' });
        return;
      }
      res.status(200).json(await handler(req.admin));
    } catch (error) {
      next(error);
    }
  }
}
