/**
 * Subscription service: pricing, checkout and portal sessions, cancellation
 * requests and the cached subscription view for an admin's entity.
 * Local subscription state is written by the webhook only.
 */

import { env } from '../config/env';
import { ForbiddenError, NotFoundError } from '../errors/app.errors';
import type { EntityRepository } from '../repositories/entity.repository';
import type { SubscriptionRepository } from '../repositories/subscription.repository';
import { logger } from '../utils/logger.util';
import type { BillingGateway } from './stripe-payment.service';
import type {
  AdminPrincipal,
  EntityRef,
  EntityType,
  PlanTier,
  Subscription,
  SubscriptionStatus,
} from '../types';

export const TRIAL_DAYS = 30;

const MONTHLY_PRICE_CENTS: Record<EntityType, number> = {
  institution: 3999,
  scholarship: 1999,
};

export interface PricingView {
  entity_type: EntityType;
  price_cents: number;
  price_display: string;
  currency: 'usd';
  interval: 'month';
  trial_days: number;
}

export interface SubscriptionView {
  status: SubscriptionStatus;
  plan_tier: PlanTier;
  trial_ends_at: number | null;
  current_period_start: number | null;
  current_period_end: number | null;
  cancel_at_period_end: boolean;
}

export interface NoSubscriptionView {
  status: 'none';
  plan_tier: 'free';
  message: string;
}

function toUnixSeconds(date: Date | null): number | null {
  return date ? Math.floor(date.getTime() / 1000) : null;
}

export function toSubscriptionView(subscription: Subscription): SubscriptionView {
  return {
    status: subscription.status,
    plan_tier: subscription.planTier,
    trial_ends_at: toUnixSeconds(subscription.trialEndsAt),
    current_period_start: toUnixSeconds(subscription.currentPeriodStart),
    current_period_end: toUnixSeconds(subscription.currentPeriodEnd),
    cancel_at_period_end: subscription.cancelAtPeriodEnd,
  };
}

export function getPricing(entityType: EntityType): PricingView {
  const cents = MONTHLY_PRICE_CENTS[entityType];
  return {
    entity_type: entityType,
    price_cents: cents,
    price_display: `$${(cents / 100).toFixed(2)}`,
    currency: 'usd',
    interval: 'month',
    trial_days: TRIAL_DAYS,
  };
}

/** The entity an admin manages; platform admins without one cannot subscribe. */
function entityOf(admin: AdminPrincipal): EntityRef {
  if (admin.entityType === null || admin.entityId === null) {
    throw new ForbiddenError('This account is not linked to an institution or scholarship');
  }
  return { entityType: admin.entityType, entityId: admin.entityId };
}

export class SubscriptionService {
  constructor(
    private readonly subscriptions: SubscriptionRepository,
    private readonly entities: EntityRepository,
    private readonly billing: BillingGateway,
    private readonly frontendUrl: string = env.FRONTEND_URL
  ) {}

  pricing(admin: AdminPrincipal): PricingView {
    return getPricing(entityOf(admin).entityType);
  }

  async createCheckout(admin: AdminPrincipal): Promise<{ checkout_url: string; session_id: string }> {
    const entity = entityOf(admin);
    const entityName = await this.entities.findName(entity);
    if (entityName === undefined) {
      throw new NotFoundError(`${entity.entityType} with ID ${entity.entityId} not found`);
    }

    const session = await this.billing.createCheckoutSession({
      customerEmail: admin.email,
      entityType: entity.entityType,
      entityId: entity.entityId,
      entityName,
      unitAmountCents: MONTHLY_PRICE_CENTS[entity.entityType],
      trialDays: TRIAL_DAYS,
      successUrl: `${this.frontendUrl}/admin/subscription/success?session_id={CHECKOUT_SESSION_ID}`,
      cancelUrl: `${this.frontendUrl}/admin/subscription/cancel`,
    });

    logger.info('Checkout session created', {
      adminId: admin.id,
      entityType: entity.entityType,
      entityId: entity.entityId,
      sessionId: session.sessionId,
    });
    return { checkout_url: session.url, session_id: session.sessionId };
  }

  async current(admin: AdminPrincipal): Promise<SubscriptionView | NoSubscriptionView> {
    const subscription = await this.subscriptions.findByEntity(entityOf(admin));
    if (!subscription) {
      return { status: 'none', plan_tier: 'free', message: 'No active subscription' };
    }
    return toSubscriptionView(subscription);
  }

  /** Ask Stripe to stop renewing; the resulting webhook updates the local record. */
  async cancel(admin: AdminPrincipal): Promise<{ message: string; current_period_end: number }> {
    const subscription = await this.subscriptions.findByEntity(entityOf(admin));
    if (!subscription?.stripeSubscriptionId) {
      throw new NotFoundError('No active subscription found');
    }

    const { currentPeriodEnd } = await this.billing.cancelAtPeriodEnd(subscription.stripeSubscriptionId);
    logger.info('Subscription cancellation requested', {
      adminId: admin.id,
      subscriptionId: subscription.id,
    });
    return {
      message: 'Subscription will be canceled at the end of the current billing period',
      current_period_end: currentPeriodEnd,
    };
  }

  async portal(admin: AdminPrincipal): Promise<{ portal_url: string }> {
    const subscription = await this.subscriptions.findByEntity(entityOf(admin));
    if (!subscription?.stripeCustomerId) {
      throw new NotFoundError('No billing account found');
    }
    const session = await this.billing.createPortalSession(
      subscription.stripeCustomerId,
      `${this.frontendUrl}/admin/subscription`
    );
    return { portal_url: session.url };
  }
}
