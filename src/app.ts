import express, { Express } from 'express';
import cors from 'cors';
import morgan from 'morgan';
import { allowedOrigins, env } from './config/env';
import { AuthController } from './controllers/auth.controller';
import { CronController } from './controllers/cron.controller';
import { InvitationController } from './controllers/invitation.controller';
import { StripeWebhookController } from './controllers/stripe-webhook.controller';
import { SubscriptionController } from './controllers/subscription.controller';
import { errorHandler, notFoundHandler } from './middleware/error.middleware';
import {
  createRateLimiters,
  defaultRateLimitSettings,
  type RateLimitSettings,
} from './middleware/rate-limit.middleware';
import { createAuthRouter } from './routes/auth.routes';
import { createCronRouter } from './routes/cron.routes';
import { createStripeWebhookRouter } from './routes/stripe-webhook.routes';
import { createSubscriptionRouter } from './routes/subscription.routes';
import type { AuthService } from './services/auth.service';
import type { InvitationService } from './services/invitation.service';
import type { SubscriptionService } from './services/subscription.service';
import type { WebhookService } from './services/webhook.service';
import { logger } from './utils/logger.util';

export interface AppServices {
  authService: AuthService;
  invitationService: InvitationService;
  subscriptionService: SubscriptionService;
  webhookService: WebhookService;
  checkDatabase: () => Promise<boolean>;
}

export interface AppOptions {
  rateLimit?: RateLimitSettings;
  cronSecret?: string;
}

const API_PREFIX = '/api/v1';

export function createApp(services: AppServices, options: AppOptions = {}): Express {
  const app = express();
  const limiters = createRateLimiters(options.rateLimit ?? defaultRateLimitSettings());

  // One proxy hop (load balancer) in front; req.ip is the first X-Forwarded-For entry it appended
  app.set('trust proxy', 1);

  app.use(
    cors({
      origin: allowedOrigins,
      credentials: true,
    })
  );

  // HTTP request logger
  app.use(
    morgan(env.NODE_ENV === 'production' ? 'combined' : 'dev', {
      stream: { write: (line: string) => logger.http(line.trim()) },
      skip: () => env.NODE_ENV === 'test',
    })
  );

  // Raw body for Stripe signature verification; must come before express.json()
  app.use(
    `${API_PREFIX}/webhooks`,
    createStripeWebhookRouter(new StripeWebhookController(services.webhookService), limiters)
  );

  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  app.get('/', limiters.public, (req, res) => {
    res.status(200).json({ name: 'campus-admin-api', status: 'ok', docs: `${API_PREFIX}` });
  });

  app.get('/health', limiters.public, async (req, res, next) => {
    try {
      const databaseOk = await services.checkDatabase();
      res.status(databaseOk ? 200 : 503).json({
        status: databaseOk ? 'ok' : 'degraded',
        timestamp: new Date().toISOString(),
        uptime: process.uptime(),
        environment: env.NODE_ENV,
        database: databaseOk ? 'connected' : 'disconnected',
      });
    } catch (error) {
      next(error);
    }
  });

  app.use(
    `${API_PREFIX}/admin/auth`,
    createAuthRouter(
      new AuthController(services.authService),
      new InvitationController(services.invitationService),
      limiters
    )
  );
  app.use(
    `${API_PREFIX}/admin/subscriptions`,
    createSubscriptionRouter(new SubscriptionController(services.subscriptionService), limiters)
  );
  app.use(
    `${API_PREFIX}/cron`,
    createCronRouter(
      new CronController(services.invitationService, options.cronSecret ?? env.CRON_SECRET)
    )
  );

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
