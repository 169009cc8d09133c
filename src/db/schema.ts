import {
  pgTable,
  uuid,
  serial,
  integer,
  varchar,
  timestamp,
  boolean,
  pgEnum,
  index,
  uniqueIndex,
} from 'drizzle-orm/pg-core';
import { relations } from 'drizzle-orm';
import {
  ADMIN_ROLES,
  ENTITY_TYPES,
  INVITATION_STATUSES,
  SUBSCRIPTION_STATUSES,
} from '../types';

// Enums
export const entityTypeEnum = pgEnum('entity_type', ENTITY_TYPES);
export const adminRoleEnum = pgEnum('admin_role', ADMIN_ROLES);
export const invitationStatusEnum = pgEnum('invitation_status', INVITATION_STATUSES);
export const subscriptionStatusEnum = pgEnum('subscription_status', SUBSCRIPTION_STATUSES);
export const planTierEnum = pgEnum('plan_tier', ['free', 'premium']);

// Directory entities. Only the columns the admin side reads live here.
export const institutions = pgTable('institutions', {
  id: serial('id').primaryKey(),
  name: varchar('name', { length: 255 }).notNull(),
  createdAt: timestamp('created_at').notNull().defaultNow(),
});

export const scholarships = pgTable('scholarships', {
  id: serial('id').primaryKey(),
  title: varchar('title', { length: 255 }).notNull(),
  createdAt: timestamp('created_at').notNull().defaultNow(),
});

// Admin users table
export const adminUsers = pgTable(
  'admin_users',
  {
    id: uuid('id').defaultRandom().primaryKey(),
    email: varchar('email', { length: 255 }).notNull().unique(),
    passwordHash: varchar('password_hash', { length: 255 }).notNull(),
    entityType: entityTypeEnum('entity_type'),
    entityId: integer('entity_id'),
    role: adminRoleEnum('role').notNull().default('admin'),
    isActive: boolean('is_active').notNull().default(true),
    lastLoginAt: timestamp('last_login_at'),
    createdAt: timestamp('created_at').notNull().defaultNow(),
    updatedAt: timestamp('updated_at').notNull().defaultNow(),
  },
  (table) => {
    return {
      emailIdx: index('admin_users_email_idx').on(table.email),
      entityIdx: index('admin_users_entity_idx').on(table.entityType, table.entityId),
    };
  }
);

// Invitation codes table
export const invitationCodes = pgTable(
  'invitation_codes',
  {
    id: uuid('id').defaultRandom().primaryKey(),
    code: varchar('code', { length: 20 }).notNull().unique(),
    entityType: entityTypeEnum('entity_type').notNull(),
    entityId: integer('entity_id').notNull(),
    assignedEmail: varchar('assigned_email', { length: 255 }),
    status: invitationStatusEnum('status').notNull().default('pending'),
    claimedBy: uuid('claimed_by').references(() => adminUsers.id, { onDelete: 'set null' }),
    claimedAt: timestamp('claimed_at'),
    expiresAt: timestamp('expires_at').notNull(),
    createdBy: varchar('created_by', { length: 255 }),
    createdAt: timestamp('created_at').notNull().defaultNow(),
  },
  (table) => ({
    entityIdIdx: index('invitation_codes_entity_id_idx').on(table.entityId),
    statusExpiryIdx: index('invitation_codes_status_expires_idx').on(table.status, table.expiresAt),
  })
);

// Subscriptions table (local cache of the processor's view, one row per entity)
export const subscriptions = pgTable(
  'subscriptions',
  {
    id: uuid('id').defaultRandom().primaryKey(),
    entityType: entityTypeEnum('entity_type').notNull(),
    entityId: integer('entity_id').notNull(),
    stripeCustomerId: varchar('stripe_customer_id', { length: 255 }),
    stripeSubscriptionId: varchar('stripe_subscription_id', { length: 255 }).unique(),
    status: subscriptionStatusEnum('status').notNull(),
    planTier: planTierEnum('plan_tier').notNull().default('free'),
    trialEndsAt: timestamp('trial_ends_at'),
    currentPeriodStart: timestamp('current_period_start'),
    currentPeriodEnd: timestamp('current_period_end'),
    cancelAtPeriodEnd: boolean('cancel_at_period_end').notNull().default(false),
    lastEventAt: timestamp('last_event_at'),
    createdAt: timestamp('created_at').notNull().defaultNow(),
    updatedAt: timestamp('updated_at').notNull().defaultNow(),
  },
  (table) => ({
    entityIdx: uniqueIndex('subscriptions_entity_idx').on(table.entityType, table.entityId),
  })
);

// Webhook events already applied; the primary key is the idempotency guard
export const processedWebhookEvents = pgTable('processed_webhook_events', {
  eventId: varchar('event_id', { length: 255 }).primaryKey(),
  eventType: varchar('event_type', { length: 255 }).notNull(),
  processedAt: timestamp('processed_at').notNull().defaultNow(),
});

// Relations
export const adminUsersRelations = relations(adminUsers, ({ many }) => ({
  claimedInvitations: many(invitationCodes),
}));

export const invitationCodesRelations = relations(invitationCodes, ({ one }) => ({
  claimedByUser: one(adminUsers, {
    fields: [invitationCodes.claimedBy],
    references: [adminUsers.id],
  }),
}));
