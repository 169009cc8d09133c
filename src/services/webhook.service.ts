import type Stripe from 'stripe';
import { constructWebhookEvent, type WebhookVerifier } from '../config/stripe';
import { ConfigurationError } from '../errors/app.errors';
import type {
  SnapshotWriteOutcome,
  SubscriptionRepository,
  SubscriptionSyncWriter,
} from '../repositories/subscription.repository';
import { logger } from '../utils/logger.util';
import { BILLING_METADATA } from './stripe-payment.service';
import { ENTITY_TYPES, err, ok } from '../types';
import type { EntityRef, Result, SubscriptionSnapshot, SubscriptionStatus } from '../types';

export type WebhookErrorKind = 'bad_signature';

export type WebhookOutcome = 'applied' | 'duplicate' | 'ignored' | SnapshotWriteOutcome;

export interface WebhookAck {
  eventId: string;
  eventType: string;
  outcome: WebhookOutcome;
}

/** What a verified event asks of the local subscription cache. */
export type SubscriptionChange =
  | {
      kind: 'entity';
      entity: EntityRef;
      externalId: string;
      snapshot: SubscriptionSnapshot;
      /** Checkout outcomes stand in until the subscription object itself arrives. */
      provisional: boolean;
    }
  | { kind: 'external'; externalId: string; snapshot: SubscriptionSnapshot }
  | { kind: 'ignored'; reason: string };

function ignored(reason: string): SubscriptionChange {
  return { kind: 'ignored', reason };
}

function fromUnixSeconds(seconds: number): Date {
  return new Date(seconds * 1000);
}

function idOf(value: string | { id: string } | null | undefined): string | undefined {
  if (typeof value === 'string') {
    return value;
  }
  return value?.id;
}

export function entityFromMetadata(metadata: Stripe.Metadata | null | undefined): EntityRef | undefined {
  const entityType = ENTITY_TYPES.find((type) => type === metadata?.[BILLING_METADATA.entityType]);
  const entityId = Number(metadata?.[BILLING_METADATA.entityId]);
  if (!entityType || !Number.isInteger(entityId) || entityId <= 0) {
    return undefined;
  }
  return { entityType, entityId };
}

/** Stripe subscription status onto the local enum; undefined for states that carry no access change. */
export function mapStripeStatus(status: Stripe.Subscription.Status): SubscriptionStatus | undefined {
  switch (status) {
    case 'trialing':
    case 'active':
    case 'past_due':
    case 'canceled':
      return status;
    case 'unpaid':
      return 'past_due';
    case 'incomplete_expired':
      return 'canceled';
    case 'incomplete':
    case 'paused':
      return undefined;
  }
}

function changeFromCheckout(session: Stripe.Checkout.Session): SubscriptionChange {
  if (session.mode !== 'subscription') {
    return ignored(`checkout mode ${session.mode}`);
  }
  const externalId = idOf(session.subscription);
  if (!externalId) {
    return ignored('checkout session without subscription');
  }
  const entity = entityFromMetadata(session.metadata);
  if (!entity) {
    return ignored('checkout session without entity metadata');
  }

  // Trial end and periods come from the subscription events, not from here.
  const trialDays = Number(session.metadata?.[BILLING_METADATA.trialDays] ?? 0);
  const hasTrial = Number.isFinite(trialDays) && trialDays > 0;
  return {
    kind: 'entity',
    entity,
    externalId,
    snapshot: {
      status: hasTrial ? 'trialing' : 'active',
      stripeCustomerId: idOf(session.customer),
    },
    provisional: true,
  };
}

function changeFromSubscription(subscription: Stripe.Subscription): SubscriptionChange {
  const status = mapStripeStatus(subscription.status);
  if (!status) {
    return ignored(`subscription status ${subscription.status}`);
  }

  const snapshot: SubscriptionSnapshot = {
    status,
    stripeCustomerId: idOf(subscription.customer),
    trialEndsAt: subscription.trial_end ? fromUnixSeconds(subscription.trial_end) : null,
    currentPeriodStart: fromUnixSeconds(subscription.current_period_start),
    currentPeriodEnd: fromUnixSeconds(subscription.current_period_end),
    cancelAtPeriodEnd: subscription.cancel_at_period_end,
  };
  const entity = entityFromMetadata(subscription.metadata);
  return entity
    ? { kind: 'entity', entity, externalId: subscription.id, snapshot, provisional: false }
    : { kind: 'external', externalId: subscription.id, snapshot };
}

function changeFromInvoice(invoice: Stripe.Invoice, status: SubscriptionStatus): SubscriptionChange {
  const externalId = idOf(invoice.subscription);
  if (!externalId) {
    return ignored('invoice without subscription');
  }
  // Trial starts bill a $0 invoice; the subscription stays trialing.
  if (status === 'active' && invoice.amount_paid === 0) {
    return ignored('zero-amount invoice');
  }
  return { kind: 'external', externalId, snapshot: { status } };
}

/** Map a verified event onto the change it implies. Pure; writes nothing. */
export function subscriptionChangeFor(event: Stripe.Event): SubscriptionChange {
  switch (event.type) {
    case 'checkout.session.completed':
      return changeFromCheckout(event.data.object);
    case 'customer.subscription.created':
    case 'customer.subscription.updated':
      return changeFromSubscription(event.data.object);
    case 'customer.subscription.deleted':
      return {
        kind: 'external',
        externalId: event.data.object.id,
        snapshot: { status: 'canceled', cancelAtPeriodEnd: false },
      };
    case 'invoice.payment_succeeded':
      return changeFromInvoice(event.data.object, 'active');
    case 'invoice.payment_failed':
      return changeFromInvoice(event.data.object, 'past_due');
    default:
      return ignored('unhandled event type');
  }
}

async function applyChange(
  writer: SubscriptionSyncWriter,
  change: SubscriptionChange,
  eventAt: Date
): Promise<WebhookOutcome> {
  switch (change.kind) {
    case 'entity':
      return writer.upsertForEntity(change.entity, change.externalId, change.snapshot, eventAt, {
        provisional: change.provisional,
      });
    case 'external':
      return writer.updateByExternalId(change.externalId, change.snapshot, eventAt);
    case 'ignored':
      return 'ignored';
  }
}

/**
 * Stripe webhook handling: verify the signature, claim the event id, then
 * apply the change. Claim and write share one transaction.
 */
export class WebhookService {
  constructor(
    private readonly subscriptions: SubscriptionRepository,
    private readonly verify: WebhookVerifier = constructWebhookEvent
  ) {}

  async handle(
    payload: Buffer | string,
    signature: string | undefined
  ): Promise<Result<WebhookAck, WebhookErrorKind>> {
    if (!signature) {
      logger.warn('Stripe webhook received without stripe-signature header');
      return err('bad_signature');
    }

    let event: Stripe.Event;
    try {
      event = this.verify(payload, signature);
    } catch (error) {
      if (error instanceof ConfigurationError) {
        throw error;
      }
      const message = error instanceof Error ? error.message : 'Unknown error';
      logger.warn('Stripe webhook signature verification failed', { error: message });
      return err('bad_signature');
    }

    const change = subscriptionChangeFor(event);
    const eventAt = fromUnixSeconds(event.created);
    const outcome = await this.subscriptions.sync(async (writer): Promise<WebhookOutcome> => {
      const claimed = await writer.claimEvent(event.id, event.type);
      if (!claimed) {
        return 'duplicate';
      }
      return applyChange(writer, change, eventAt);
    });

    const meta = { eventId: event.id, eventType: event.type, outcome };
    switch (outcome) {
      case 'duplicate':
        logger.info('Stripe webhook event already processed (idempotent)', meta);
        break;
      case 'unknown_subscription':
        logger.warn('Stripe webhook references an unknown subscription', meta);
        break;
      case 'ignored':
        logger.debug('Stripe webhook event ignored', {
          ...meta,
          reason: change.kind === 'ignored' ? change.reason : undefined,
        });
        break;
      default:
        logger.info('Stripe webhook processed', meta);
    }

    return ok({ eventId: event.id, eventType: event.type, outcome });
  }
}
