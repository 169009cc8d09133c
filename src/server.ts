import { createApp } from './app';
import { checkDatabaseConnection, closeDatabase, isDatabaseConfigured } from './config/database';
import { env } from './config/env';
import { isStripeConfigured } from './config/stripe';
import { DrizzleAdminUserRepository } from './repositories/admin-user.repository';
import { DrizzleEntityRepository } from './repositories/entity.repository';
import { DrizzleInvitationRepository } from './repositories/invitation.repository';
import { DrizzleSubscriptionRepository } from './repositories/subscription.repository';
import { AuthService } from './services/auth.service';
import { InvitationService } from './services/invitation.service';
import { StripeBillingGateway } from './services/stripe-payment.service';
import { SubscriptionService } from './services/subscription.service';
import { WebhookService } from './services/webhook.service';
import { logger } from './utils/logger.util';

const users = new DrizzleAdminUserRepository();
const invitations = new DrizzleInvitationRepository();
const entities = new DrizzleEntityRepository();
const subscriptions = new DrizzleSubscriptionRepository();

const app = createApp({
  authService: new AuthService(users, invitations, entities),
  invitationService: new InvitationService(invitations, entities),
  subscriptionService: new SubscriptionService(subscriptions, entities, new StripeBillingGateway()),
  webhookService: new WebhookService(subscriptions),
  checkDatabase: checkDatabaseConnection,
});

if (!isDatabaseConfigured()) {
  logger.warn('DATABASE_URL is not set; database-backed routes will fail');
} else {
  void checkDatabaseConnection().then((connected) => {
    if (connected) {
      logger.info('Database connection verified');
    }
  });
}

if (!isStripeConfigured()) {
  logger.warn('STRIPE_SECRET_KEY is not set; billing routes and webhooks will fail');
}

const server = app.listen(env.PORT, () => {
  logger.info(`Server running on port ${env.PORT}`, { environment: env.NODE_ENV });
});

function shutdown(signal: string): void {
  logger.info(`${signal} received, shutting down`);
  server.close(() => {
    closeDatabase()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error('Failed to close database pool', error);
        process.exit(1);
      });
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
