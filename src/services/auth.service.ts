import { NotFoundError, ValidationError } from '../errors/app.errors';
import type { AdminUserRepository } from '../repositories/admin-user.repository';
import type { EntityRepository } from '../repositories/entity.repository';
import type { InvitationRepository } from '../repositories/invitation.repository';
import {
  hashPassword,
  comparePassword,
  comparePlaceholderPassword,
  normalizeEmail,
} from '../utils/password.util';
import { issueAccessToken } from '../utils/jwt.util';
import { normalizeInvitationCode } from '../utils/invitation-code.util';
import { logger } from '../utils/logger.util';
import { err, ok } from '../types';
import type { AdminPrincipal, AdminUser, EntityType, InvitationCode, Result } from '../types';

export type LoginErrorKind = 'invalid_credentials' | 'inactive';

export type InvitationErrorKind = 'invalid_invitation' | 'invitation_expired';

export type RegistrationErrorKind = InvitationErrorKind | 'email_mismatch' | 'email_taken';

export interface AccessTokenResponse {
  accessToken: string;
  tokenType: 'bearer';
}

export interface InvitationPreview {
  entityType: EntityType;
  entityId: number;
  entityName: string;
}

export interface RegisterRequest {
  email: string;
  password: string;
  invitationCode: string;
}

/** Public view of an admin account; never includes the hash. */
export interface AdminView {
  id: string;
  email: string;
  entity_type: EntityType | null;
  entity_id: number | null;
  role: AdminUser['role'];
  is_active: boolean;
  created_at: string;
  last_login_at: string | null;
}

export function toAdminView(user: AdminUser): AdminView {
  return {
    id: user.id,
    email: user.email,
    entity_type: user.entityType,
    entity_id: user.entityId,
    role: user.role,
    is_active: user.isActive,
    created_at: user.createdAt.toISOString(),
    last_login_at: user.lastLoginAt ? user.lastLoginAt.toISOString() : null,
  };
}

export type Clock = () => Date;

export class AuthService {
  constructor(
    private readonly users: AdminUserRepository,
    private readonly invitations: InvitationRepository,
    private readonly entities: EntityRepository,
    private readonly clock: Clock = () => new Date()
  ) {}

  /**
   * Unknown email and wrong password produce the same error after the same
   * amount of hashing work. Only a correct password reveals `inactive`.
   */
  async login(email: string, password: string): Promise<Result<AccessTokenResponse, LoginErrorKind>> {
    const user = await this.users.findByEmail(normalizeEmail(email));

    if (!user) {
      await comparePlaceholderPassword(password);
      return err('invalid_credentials');
    }

    const isPasswordValid = await comparePassword(password, user.passwordHash);
    if (!isPasswordValid) {
      return err('invalid_credentials');
    }

    if (!user.isActive) {
      return err('inactive');
    }

    const now = this.clock();
    await this.users.recordLogin(user.id, now);
    logger.info('Admin logged in', { adminId: user.id, role: user.role });

    return ok({
      accessToken: issueAccessToken(user, { now: now.getTime() }),
      tokenType: 'bearer',
    });
  }

  async validateInvitation(code: string): Promise<Result<InvitationPreview, InvitationErrorKind>> {
    const checked = await this.findUsableInvitation(code);
    if (!checked.ok) {
      return checked;
    }
    const invitation = checked.value;
    const entityName = await this.entities.findName(invitation);
    return ok({
      entityType: invitation.entityType,
      entityId: invitation.entityId,
      entityName: entityName ?? 'Unknown',
    });
  }

  async register(data: RegisterRequest): Promise<Result<AdminView, RegistrationErrorKind>> {
    const checked = await this.findUsableInvitation(data.invitationCode);
    if (!checked.ok) {
      return checked;
    }
    const invitation = checked.value;
    const email = normalizeEmail(data.email);

    if (invitation.assignedEmail && normalizeEmail(invitation.assignedEmail) !== email) {
      return err('email_mismatch');
    }

    const existingUser = await this.users.findByEmail(email);
    if (existingUser) {
      return err('email_taken');
    }

    const passwordHash = await hashPassword(data.password);
    const outcome = await this.invitations.claim(
      invitation.id,
      {
        email,
        passwordHash,
        entityType: invitation.entityType,
        entityId: invitation.entityId,
        role: 'admin',
      },
      this.clock()
    );

    switch (outcome.status) {
      case 'claimed':
        logger.info('Admin registered from invitation', {
          adminId: outcome.user.id,
          entityType: invitation.entityType,
          entityId: invitation.entityId,
        });
        return ok(toAdminView(outcome.user));
      case 'email_taken':
        return err('email_taken');
      case 'unavailable':
        return err('invalid_invitation');
    }
  }

  async getCurrentAdmin(principal: AdminPrincipal): Promise<AdminView> {
    const user = await this.users.findById(principal.id);
    if (!user) {
      throw new NotFoundError('User not found');
    }
    return toAdminView(user);
  }

  async changePassword(
    principal: AdminPrincipal,
    currentPassword: string,
    newPassword: string
  ): Promise<Result<void, 'invalid_current_password'>> {
    const user = await this.users.findById(principal.id);
    if (!user) {
      throw new NotFoundError('User not found');
    }

    const isPasswordValid = await comparePassword(currentPassword, user.passwordHash);
    if (!isPasswordValid) {
      return err('invalid_current_password');
    }

    await this.users.updatePassword(user.id, await hashPassword(newPassword));
    logger.info('Admin password changed', { adminId: user.id });
    return ok(undefined);
  }

  /** Soft-deactivate an account. Tokens already issued stay valid until they expire. */
  async deactivate(adminId: string, actor: AdminPrincipal): Promise<AdminView> {
    if (adminId === actor.id) {
      throw new ValidationError('You cannot deactivate your own account');
    }
    const user = await this.users.setActive(adminId, false);
    if (!user) {
      throw new NotFoundError('User not found');
    }
    logger.info('Admin deactivated', { adminId, actorId: actor.id });
    return toAdminView(user);
  }

  private async findUsableInvitation(
    rawCode: string
  ): Promise<Result<InvitationCode, InvitationErrorKind>> {
    const invitation = await this.invitations.findByCode(normalizeInvitationCode(rawCode));
    if (!invitation || invitation.status !== 'pending') {
      return err('invalid_invitation');
    }
    if (invitation.expiresAt.getTime() <= this.clock().getTime()) {
      await this.invitations.markExpired(invitation.id);
      return err('invitation_expired');
    }
    return ok(invitation);
  }
}
