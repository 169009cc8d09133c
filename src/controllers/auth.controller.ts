import { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { AuthRequest } from '../middleware/auth.middleware';
import type { AuthService, RegistrationErrorKind } from '../services/auth.service';
import { MIN_PASSWORD_LENGTH } from '../utils/password.util';

// Login arrives as an OAuth2 password form: `username` carries the email.
export const loginSchema = z
  .object({
    username: z.string().trim().min(1).optional(),
    email: z.string().trim().min(1).optional(),
    password: z.string().min(1),
  })
  .refine((data) => Boolean(data.username ?? data.email), {
    message: 'username or email is required',
    path: ['username'],
  });

export const validateInvitationSchema = z.object({
  code: z.string().trim().min(1),
});

export const registerSchema = z.object({
  email: z.string().email(),
  password: z.string().min(MIN_PASSWORD_LENGTH),
  invitation_code: z.string().trim().min(1),
});

export const changePasswordSchema = z.object({
  current_password: z.string().min(1),
  new_password: z.string().min(MIN_PASSWORD_LENGTH),
});

const INVITATION_MESSAGES: Record<RegistrationErrorKind, string> = {
  invalid_invitation: 'Invalid or already used invitation code',
  invitation_expired: 'Invitation code has expired',
  email_mismatch: 'This invitation code is assigned to a different email',
  email_taken: 'Email already registered',
};

export class AuthController {
  constructor(private readonly authService: AuthService) {}

  /**
   * POST /api/v1/admin/auth/login
   * Unknown email and wrong password share one response.
   */
  async login(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const data = loginSchema.parse(req.body);
      const result = await this.authService.login(data.username ?? data.email ?? '', data.password);
      if (!result.ok) {
        if (result.error === 'inactive') {
          res.status(403).json({ success: false, error: 'Account is deactivated' });
          return;
        }
        res.setHeader('WWW-Authenticate', 'Bearer');
        res.status(401).json({ success: false, error: 'Incorrect email or password' });
        return;
      }
      res.status(200).json({
        access_token: result.value.accessToken,
        token_type: result.value.tokenType,
      });
    } catch (error) {
      next(error);
    }
  }

  async validateInvitation(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { code } = validateInvitationSchema.parse(req.body);
      const result = await this.authService.validateInvitation(code);
      if (!result.ok) {
        res.status(200).json({ valid: false, message: INVITATION_MESSAGES[result.error] });
        return;
      }
      res.status(200).json({
        valid: true,
        entity_type: result.value.entityType,
        entity_id: result.value.entityId,
        entity_name: result.value.entityName,
        message: 'Invitation code is valid',
      });
    } catch (error) {
      next(error);
    }
  }

  async register(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const data = registerSchema.parse(req.body);
      const result = await this.authService.register({
        email: data.email,
        password: data.password,
        invitationCode: data.invitation_code,
      });
      if (!result.ok) {
        res.status(400).json({ success: false, error: INVITATION_MESSAGES[result.error] });
        return;
      }
      res.status(201).json(result.value);
    } catch (error) {
      next(error);
    }
  }

  async getCurrentAdmin(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      if (!req.admin) {
        res.status(401).json({ success: false, error: 'Authentication required' });
        return;
      }
      res.status(200).json(await this.authService.getCurrentAdmin(req.admin));
    } catch (error) {
      next(error);
    }
  }

  async changePassword(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      if (!req.admin) {
        res.status(401).json({ success: false, error: 'Authentication required' });
        return;
      }
      const data = changePasswordSchema.parse(req.body);
      const result = await this.authService.changePassword(
        req.admin,
        data.current_password,
        data.new_password
      );
      if (!result.ok) {
        res.status(400).json({ success: false, error: 'Incorrect current password' });
        return;
      }
      res.status(200).json({ message: 'Password changed successfully' });
    } catch (error) {
      next(error);
    }
  }

  /** POST /api/v1/admin/auth/users/:id/deactivate (super admin) */
  async deactivate(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      if (!req.admin) {
        res.status(401).json({ success: false, error: 'Authentication required' });
        return;
      }
      const adminId = z.string().uuid().parse(req.params.id);
      res.status(200).json(await this.authService.deactivate(adminId, req.admin));
    } catch (error) {
      next(error);
    }
  }
}
