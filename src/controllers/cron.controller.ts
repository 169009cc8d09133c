import { timingSafeEqual } from 'crypto';
import { Request, Response } from 'express';
import type { InvitationService } from '../services/invitation.service';
import { logger } from '../utils/logger.util';

function secretsMatch(provided: string, expected: string): boolean {
  const a = Buffer.from(provided);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Scheduled maintenance, called by an external scheduler with
 * `Authorization: Bearer ${CRON_SECRET}`.
 */
export class CronController {
  constructor(
    private readonly invitationService: InvitationService,
    private readonly cronSecret: string
  ) {}

  async expireInvitations(req: Request, res: Response): Promise<void> {
    const authorizationHeader = req.headers.authorization ?? '';
    if (!this.cronSecret || !secretsMatch(authorizationHeader, `Bearer ${this.cronSecret}`)) {
      logger.warn('Unauthorized cron request attempt', {
        method: req.method,
        url: req.originalUrl,
        ip: req.ip,
      });
      res.status(401).json({ success: false, error: 'Unauthorized' });
      return;
    }

    try {
      const expired = await this.invitationService.expireOverdue();
      res.status(200).json({ success: true, expired });
    } catch (error) {
      logger.error('Failed to expire invitations', error, {
        method: req.method,
        url: req.originalUrl,
      });
      res.status(500).json({ success: false, error: 'Internal server error' });
    }
  }
}
