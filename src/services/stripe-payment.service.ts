/**
 * Stripe calls the billing endpoints make. Subscription state itself is only
 * written by the webhook; these calls merely ask Stripe for a change.
 */

import type Stripe from 'stripe';
import { getStripe } from '../config/stripe';
import { AppError } from '../errors/app.errors';
import type { EntityType } from '../types';

export interface CheckoutSessionInput {
  customerEmail: string;
  entityType: EntityType;
  entityId: number;
  entityName: string;
  unitAmountCents: number;
  trialDays: number;
  successUrl: string;
  cancelUrl: string;
}

export interface BillingGateway {
  createCheckoutSession(input: CheckoutSessionInput): Promise<{ sessionId: string; url: string }>;
  createPortalSession(customerId: string, returnUrl: string): Promise<{ url: string }>;
  cancelAtPeriodEnd(subscriptionId: string): Promise<{ currentPeriodEnd: number }>;
}

/** Metadata keys shared by checkout sessions, their subscriptions and the webhook. */
export const BILLING_METADATA = {
  entityType: 'entity_type',
  entityId: 'entity_id',
  entityName: 'entity_name',
  trialDays: 'trial_days',
} as const;

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

export class StripeBillingGateway implements BillingGateway {
  constructor(private readonly stripe: () => Stripe = getStripe) {}

  async createCheckoutSession(input: CheckoutSessionInput): Promise<{ sessionId: string; url: string }> {
    const metadata: Stripe.MetadataParam = {
      [BILLING_METADATA.entityType]: input.entityType,
      [BILLING_METADATA.entityId]: String(input.entityId),
      [BILLING_METADATA.entityName]: input.entityName,
      [BILLING_METADATA.trialDays]: String(input.trialDays),
    };

    const session = await this.stripe().checkout.sessions.create({
      mode: 'subscription',
      payment_method_types: ['card'],
      line_items: [
        {
          price_data: {
            currency: 'usd',
            product_data: {
              name: `Premium listing - ${input.entityName}`,
              description: `Premium directory listing with admin dashboard for ${capitalize(input.entityType)}`,
            },
            unit_amount: input.unitAmountCents,
            recurring: { interval: 'month' },
          },
          quantity: 1,
        },
      ],
      customer_email: input.customerEmail,
      subscription_data: {
        ...(input.trialDays > 0 && { trial_period_days: input.trialDays }),
        metadata,
      },
      metadata,
      success_url: input.successUrl,
      cancel_url: input.cancelUrl,
    });

    if (!session.url) {
      throw new AppError('Stripe did not return a checkout URL', 502);
    }
    return { sessionId: session.id, url: session.url };
  }

  async createPortalSession(customerId: string, returnUrl: string): Promise<{ url: string }> {
    const session = await this.stripe().billingPortal.sessions.create({
      customer: customerId,
      return_url: returnUrl,
    });
    return { url: session.url };
  }

  async cancelAtPeriodEnd(subscriptionId: string): Promise<{ currentPeriodEnd: number }> {
    const subscription = await this.stripe().subscriptions.update(subscriptionId, {
      cancel_at_period_end: true,
    });
    return { currentPeriodEnd: subscription.current_period_end };
  }
}
