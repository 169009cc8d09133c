import { and, eq, isNull, lte, or } from 'drizzle-orm';
import { getDb, type DbExecutor } from '../config/database';
import { processedWebhookEvents, subscriptions } from '../db/schema';
import type { EntityRef, Subscription, SubscriptionSnapshot } from '../types';

export type SnapshotWriteOutcome = 'applied' | 'stale' | 'unknown_subscription';

export interface UpsertOptions {
  /**
   * Write without moving `lastEventAt`, so subscription events stamped
   * earlier than this one still apply afterwards.
   */
  provisional?: boolean;
}

/** Writes available while syncing one processor event; all run in a single transaction. */
export interface SubscriptionSyncWriter {
  /** Record the event id; false when it was already processed. */
  claimEvent(eventId: string, eventType: string): Promise<boolean>;
  /** Create or refresh the entity's subscription unless a newer event already landed. */
  upsertForEntity(
    entity: EntityRef,
    externalId: string,
    snapshot: SubscriptionSnapshot,
    eventAt: Date,
    options?: UpsertOptions
  ): Promise<SnapshotWriteOutcome>;
  /** Refresh the subscription with this processor id unless a newer event already landed. */
  updateByExternalId(
    externalId: string,
    snapshot: SubscriptionSnapshot,
    eventAt: Date
  ): Promise<SnapshotWriteOutcome>;
}

export interface SubscriptionRepository {
  findByEntity(entity: EntityRef): Promise<Subscription | undefined>;
  sync<T>(work: (writer: SubscriptionSyncWriter) => Promise<T>): Promise<T>;
}

function notNewerThan(eventAt: Date) {
  return or(isNull(subscriptions.lastEventAt), lte(subscriptions.lastEventAt, eventAt));
}

class DrizzleSubscriptionSyncWriter implements SubscriptionSyncWriter {
  constructor(private readonly tx: DbExecutor) {}

  async claimEvent(eventId: string, eventType: string): Promise<boolean> {
    const claimed = await this.tx
      .insert(processedWebhookEvents)
      .values({ eventId, eventType })
      .onConflictDoNothing({ target: processedWebhookEvents.eventId })
      .returning({ eventId: processedWebhookEvents.eventId });
    return claimed.length > 0;
  }

  async upsertForEntity(
    entity: EntityRef,
    externalId: string,
    snapshot: SubscriptionSnapshot,
    eventAt: Date,
    options: UpsertOptions = {}
  ): Promise<SnapshotWriteOutcome> {
    const values = {
      ...snapshot,
      stripeSubscriptionId: externalId,
      planTier: 'premium' as const,
      ...(!options.provisional && { lastEventAt: eventAt }),
    };
    const written = await this.tx
      .insert(subscriptions)
      .values({ ...values, entityType: entity.entityType, entityId: entity.entityId })
      .onConflictDoUpdate({
        target: [subscriptions.entityType, subscriptions.entityId],
        set: { ...values, updatedAt: new Date() },
        setWhere: notNewerThan(eventAt),
      })
      .returning({ id: subscriptions.id });
    return written.length > 0 ? 'applied' : 'stale';
  }

  async updateByExternalId(
    externalId: string,
    snapshot: SubscriptionSnapshot,
    eventAt: Date
  ): Promise<SnapshotWriteOutcome> {
    const written = await this.tx
      .update(subscriptions)
      .set({ ...snapshot, lastEventAt: eventAt, updatedAt: new Date() })
      .where(and(eq(subscriptions.stripeSubscriptionId, externalId), notNewerThan(eventAt)))
      .returning({ id: subscriptions.id });
    if (written.length > 0) {
      return 'applied';
    }

    const [existing] = await this.tx
      .select({ id: subscriptions.id })
      .from(subscriptions)
      .where(eq(subscriptions.stripeSubscriptionId, externalId))
      .limit(1);
    return existing ? 'stale' : 'unknown_subscription';
  }
}

export class DrizzleSubscriptionRepository implements SubscriptionRepository {
  async findByEntity({ entityType, entityId }: EntityRef): Promise<Subscription | undefined> {
    const [subscription] = await getDb()
      .select()
      .from(subscriptions)
      .where(and(eq(subscriptions.entityType, entityType), eq(subscriptions.entityId, entityId)))
      .limit(1);
    return subscription;
  }

  async sync<T>(work: (writer: SubscriptionSyncWriter) => Promise<T>): Promise<T> {
    return getDb().transaction((tx) => work(new DrizzleSubscriptionSyncWriter(tx)));
  }
}
