import { AppError, NotFoundError } from '../errors/app.errors';
import type { EntityRepository } from '../repositories/entity.repository';
import type { InvitationRepository } from '../repositories/invitation.repository';
import { generateInvitationCode, normalizeInvitationCode } from '../utils/invitation-code.util';
import { normalizeEmail } from '../utils/password.util';
import { logger } from '../utils/logger.util';
import type { AdminPrincipal, EntityType, InvitationCode, InvitationStatus } from '../types';

const DAY_MS = 24 * 60 * 60 * 1000;
const MAX_CODE_ATTEMPTS = 5;

export interface CreateInvitationRequest {
  entityType: EntityType;
  entityId: number;
  assignedEmail?: string;
  expiresInDays: number;
}

export interface InvitationView {
  id: string;
  code: string;
  entity_type: EntityType;
  entity_id: number;
  assigned_email: string | null;
  status: InvitationStatus;
  expires_at: string;
  created_at: string;
  claimed_at: string | null;
}

export function toInvitationView(invitation: InvitationCode): InvitationView {
  return {
    id: invitation.id,
    code: invitation.code,
    entity_type: invitation.entityType,
    entity_id: invitation.entityId,
    assigned_email: invitation.assignedEmail,
    status: invitation.status,
    expires_at: invitation.expiresAt.toISOString(),
    created_at: invitation.createdAt.toISOString(),
    claimed_at: invitation.claimedAt ? invitation.claimedAt.toISOString() : null,
  };
}

export class InvitationService {
  constructor(
    private readonly invitations: InvitationRepository,
    private readonly entities: EntityRepository,
    private readonly clock: () => Date = () => new Date()
  ) {}

  async create(data: CreateInvitationRequest, actor: AdminPrincipal): Promise<InvitationView> {
    const entityName = await this.entities.findName(data);
    if (entityName === undefined) {
      throw new NotFoundError(`${data.entityType} with ID ${data.entityId} not found`);
    }

    const expiresAt = new Date(this.clock().getTime() + data.expiresInDays * DAY_MS);
    for (let attempt = 0; attempt < MAX_CODE_ATTEMPTS; attempt++) {
      const created = await this.invitations.create({
        code: generateInvitationCode(),
        entityType: data.entityType,
        entityId: data.entityId,
        assignedEmail: data.assignedEmail ? normalizeEmail(data.assignedEmail) : null,
        expiresAt,
        createdBy: actor.email,
      });
      if (created) {
        logger.info('Invitation created', {
          invitationId: created.id,
          entityType: created.entityType,
          entityId: created.entityId,
          createdBy: actor.email,
        });
        return toInvitationView(created);
      }
    }
    throw new AppError('Could not generate a unique invitation code', 500);
  }

  async list(status: InvitationStatus | undefined, limit: number): Promise<InvitationView[]> {
    const invitations = await this.invitations.list({ status, limit });
    return invitations.map(toInvitationView);
  }

  async revoke(code: string, actor: AdminPrincipal): Promise<InvitationView> {
    const revoked = await this.invitations.revoke(normalizeInvitationCode(code));
    if (!revoked) {
      throw new NotFoundError('No pending invitation with this code');
    }
    logger.info('Invitation revoked', { invitationId: revoked.id, revokedBy: actor.email });
    return toInvitationView(revoked);
  }

  async expireOverdue(): Promise<number> {
    const expired = await this.invitations.expireOverdue(this.clock());
    logger.info(`Expired ${expired} old invitation(s)`);
    return expired;
  }
}
