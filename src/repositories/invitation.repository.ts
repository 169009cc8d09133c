import { and, desc, eq, lt } from 'drizzle-orm';
import { getDb } from '../config/database';
import { invitationCodes } from '../db/schema';
import { isUniqueViolation } from '../errors/app.errors';
import { insertAdminUser } from './admin-user.repository';
import type {
  AdminUser,
  InvitationCode,
  InvitationStatus,
  NewAdminUser,
  NewInvitationCode,
} from '../types';

export type ClaimOutcome =
  | { status: 'claimed'; user: AdminUser }
  | { status: 'unavailable' }
  | { status: 'email_taken' };

export interface InvitationListFilter {
  status?: InvitationStatus;
  limit: number;
}

export interface InvitationRepository {
  findByCode(code: string): Promise<InvitationCode | undefined>;
  /** Returns undefined when the code collides with an existing one. */
  create(invitation: NewInvitationCode): Promise<InvitationCode | undefined>;
  list(filter: InvitationListFilter): Promise<InvitationCode[]>;
  markExpired(id: string): Promise<void>;
  /** Revokes a pending code; undefined when the code is not pending. */
  revoke(code: string): Promise<InvitationCode | undefined>;
  /** Expires every pending code past its expiry; returns how many changed. */
  expireOverdue(now: Date): Promise<number>;
  /**
   * Atomically claim a pending code and create the admin it invites.
   * Either both happen or neither does.
   */
  claim(invitationId: string, user: NewAdminUser, now: Date): Promise<ClaimOutcome>;
}

export class DrizzleInvitationRepository implements InvitationRepository {
  async findByCode(code: string): Promise<InvitationCode | undefined> {
    const [invitation] = await getDb()
      .select()
      .from(invitationCodes)
      .where(eq(invitationCodes.code, code))
      .limit(1);
    return invitation;
  }

  async create(invitation: NewInvitationCode): Promise<InvitationCode | undefined> {
    const [created] = await getDb()
      .insert(invitationCodes)
      .values(invitation)
      .onConflictDoNothing({ target: invitationCodes.code })
      .returning();
    return created;
  }

  async list({ status, limit }: InvitationListFilter): Promise<InvitationCode[]> {
    return await getDb()
      .select()
      .from(invitationCodes)
      .where(status ? eq(invitationCodes.status, status) : undefined)
      .orderBy(desc(invitationCodes.createdAt))
      .limit(limit);
  }

  async markExpired(id: string): Promise<void> {
    await getDb()
      .update(invitationCodes)
      .set({ status: 'expired' })
      .where(and(eq(invitationCodes.id, id), eq(invitationCodes.status, 'pending')));
  }

  async revoke(code: string): Promise<InvitationCode | undefined> {
    const [revoked] = await getDb()
      .update(invitationCodes)
      .set({ status: 'revoked' })
      .where(and(eq(invitationCodes.code, code), eq(invitationCodes.status, 'pending')))
      .returning();
    return revoked;
  }

  async expireOverdue(now: Date): Promise<number> {
    const expired = await getDb()
      .update(invitationCodes)
      .set({ status: 'expired' })
      .where(and(eq(invitationCodes.status, 'pending'), lt(invitationCodes.expiresAt, now)))
      .returning({ id: invitationCodes.id });
    return expired.length;
  }

  async claim(invitationId: string, user: NewAdminUser, now: Date): Promise<ClaimOutcome> {
    try {
      return await getDb().transaction(async (tx): Promise<ClaimOutcome> => {
        // Conditional update doubles as a row lock: a concurrent claim sees no pending row
        const [reserved] = await tx
          .update(invitationCodes)
          .set({ status: 'claimed', claimedAt: now })
          .where(and(eq(invitationCodes.id, invitationId), eq(invitationCodes.status, 'pending')))
          .returning({ id: invitationCodes.id });
        if (!reserved) {
          return { status: 'unavailable' };
        }

        const created = await insertAdminUser(tx, user);
        await tx
          .update(invitationCodes)
          .set({ claimedBy: created.id })
          .where(eq(invitationCodes.id, invitationId));
        return { status: 'claimed', user: created };
      });
    } catch (error) {
      if (isUniqueViolation(error)) {
        return { status: 'email_taken' };
      }
      throw error;
    }
  }
}
