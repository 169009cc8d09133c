import Stripe from 'stripe';
import { env } from './env';
import { ConfigurationError } from '../errors/app.errors';

/** Whether Stripe is configured (secret key present). */
export function isStripeConfigured(): boolean {
  return Boolean(env.STRIPE_SECRET_KEY);
}

let stripeInstance: Stripe | null = null;

/**
 * Returns the Stripe client instance. Throws if STRIPE_SECRET_KEY is not set.
 * Use isStripeConfigured() first if Stripe usage is optional.
 */
export function getStripe(): Stripe {
  if (!env.STRIPE_SECRET_KEY) {
    throw new ConfigurationError('Stripe is not configured (STRIPE_SECRET_KEY missing)');
  }
  if (!stripeInstance) {
    // No apiVersion: the SDK pins the version its types describe
    stripeInstance = new Stripe(env.STRIPE_SECRET_KEY);
  }
  return stripeInstance;
}

export type WebhookVerifier = (payload: Buffer | string, signature: string) => Stripe.Event;

/**
 * Verify a webhook body against its Stripe-Signature header and parse it.
 * Throws Stripe's signature error on any mismatch, ConfigurationError without a secret.
 */
export const constructWebhookEvent: WebhookVerifier = (payload, signature) => {
  if (!env.STRIPE_WEBHOOK_SECRET) {
    throw new ConfigurationError('Webhook secret not configured');
  }
  return getStripe().webhooks.constructEvent(payload, signature, env.STRIPE_WEBHOOK_SECRET);
};
