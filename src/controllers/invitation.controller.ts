import { Response, NextFunction } from 'express';
import { z } from 'zod';
import type { AuthRequest } from '../middleware/auth.middleware';
import type { InvitationService } from '../services/invitation.service';
import { ENTITY_TYPES, INVITATION_STATUSES } from '../types';

export const createInvitationSchema = z.object({
  entity_type: z.enum(ENTITY_TYPES),
  entity_id: z.number().int().positive(),
  assigned_email: z.string().email().optional(),
  expires_in_days: z.number().int().min(1).max(365).default(30),
});

const listInvitationsQuerySchema = z.object({
  status: z.enum(INVITATION_STATUSES).optional(),
  limit: z.coerce.number().int().min(1).max(200).default(100),
});

export class InvitationController {
  constructor(private readonly invitationService: InvitationService) {}

  /** POST /api/v1/admin/auth/invitations (super admin) */
  async create(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      if (!req.admin) {
        res.status(401).json({ success: false, error: 'Authentication required' });
        return;
      }
      const data = createInvitationSchema.parse(req.body);
      const invitation = await this.invitationService.create(
        {
          entityType: data.entity_type,
          entityId: data.entity_id,
          assignedEmail: data.assigned_email,
          expiresInDays: data.expires_in_days,
        },
        req.admin
      );
      res.status(201).json(invitation);
    } catch (error) {
      next(error);
    }
  }

  async list(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const query = listInvitationsQuerySchema.parse(req.query);
      res.status(200).json(await this.invitationService.list(query.status, query.limit));
    } catch (error) {
      next(error);
    }
  }

  async revoke(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      if (!req.admin) {
        res.status(401).json({ success: false, error: 'Authentication required' });
        return;
      }
      res.status(200).json(await this.invitationService.revoke(req.params.code, req.admin));
    } catch (error) {
      next(error);
    }
  }
}
