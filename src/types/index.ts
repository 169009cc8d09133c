// Entity types
export const ENTITY_TYPES = ['institution', 'scholarship'] as const;
export type EntityType = (typeof ENTITY_TYPES)[number];

export interface EntityRef {
  entityType: EntityType;
  entityId: number;
}

// Admin user types
export const ADMIN_ROLES = ['admin', 'super_admin'] as const;
export type AdminRole = (typeof ADMIN_ROLES)[number];

export interface AdminUser {
  id: string;
  email: string;
  passwordHash: string;
  entityType: EntityType | null;
  entityId: number | null;
  role: AdminRole;
  isActive: boolean;
  createdAt: Date;
  lastLoginAt: Date | null;
}

export interface NewAdminUser {
  email: string;
  passwordHash: string;
  entityType: EntityType | null;
  entityId: number | null;
  role: AdminRole;
}

/** Identity carried by a verified access token. */
export interface AdminPrincipal {
  id: string;
  email: string;
  role: AdminRole;
  entityType: EntityType | null;
  entityId: number | null;
}

// Invitation types
export const INVITATION_STATUSES = ['pending', 'claimed', 'expired', 'revoked'] as const;
export type InvitationStatus = (typeof INVITATION_STATUSES)[number];

export interface InvitationCode {
  id: string;
  code: string;
  entityType: EntityType;
  entityId: number;
  assignedEmail: string | null;
  status: InvitationStatus;
  claimedBy: string | null;
  claimedAt: Date | null;
  expiresAt: Date;
  createdBy: string | null;
  createdAt: Date;
}

export interface NewInvitationCode {
  code: string;
  entityType: EntityType;
  entityId: number;
  assignedEmail: string | null;
  expiresAt: Date;
  createdBy: string;
}

// Subscription types
export const SUBSCRIPTION_STATUSES = ['trialing', 'active', 'past_due', 'canceled'] as const;
export type SubscriptionStatus = (typeof SUBSCRIPTION_STATUSES)[number];
export type PlanTier = 'free' | 'premium';

export interface Subscription {
  id: string;
  entityType: EntityType;
  entityId: number;
  stripeCustomerId: string | null;
  stripeSubscriptionId: string | null;
  status: SubscriptionStatus;
  planTier: PlanTier;
  trialEndsAt: Date | null;
  currentPeriodStart: Date | null;
  currentPeriodEnd: Date | null;
  cancelAtPeriodEnd: boolean;
  lastEventAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

/** Fields a processor event may carry; undefined means "leave unchanged". */
export interface SubscriptionSnapshot {
  status: SubscriptionStatus;
  stripeCustomerId?: string;
  trialEndsAt?: Date | null;
  currentPeriodStart?: Date;
  currentPeriodEnd?: Date;
  cancelAtPeriodEnd?: boolean;
}

// Result types
export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}
