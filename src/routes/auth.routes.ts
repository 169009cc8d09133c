import { RequestHandler, Router } from 'express';
import {
  AuthController,
  changePasswordSchema,
  loginSchema,
  registerSchema,
  validateInvitationSchema,
} from '../controllers/auth.controller';
import { InvitationController, createInvitationSchema } from '../controllers/invitation.controller';
import { authenticate } from '../middleware/auth.middleware';
import { requireRole } from '../middleware/rbac.middleware';
import { validate } from '../middleware/validation.middleware';
import type { RateLimiters } from '../middleware/rate-limit.middleware';

export function createAuthRouter(
  authController: AuthController,
  invitationController: InvitationController,
  limiters: RateLimiters
): Router {
  const router = Router();
  const superAdminOnly: RequestHandler[] = [limiters.admin, authenticate, requireRole('super_admin')];

  // Public
  router.post('/login', limiters.auth, validate(loginSchema), authController.login.bind(authController));
  router.post(
    '/validate-invitation',
    limiters.auth,
    validate(validateInvitationSchema),
    authController.validateInvitation.bind(authController)
  );
  router.post('/register', limiters.auth, validate(registerSchema), authController.register.bind(authController));

  // Authenticated
  router.get('/me', limiters.admin, authenticate, authController.getCurrentAdmin.bind(authController));
  router.post(
    '/change-password',
    limiters.admin,
    authenticate,
    validate(changePasswordSchema),
    authController.changePassword.bind(authController)
  );

  // Super admin
  router.post(
    '/invitations',
    ...superAdminOnly,
    validate(createInvitationSchema),
    invitationController.create.bind(invitationController)
  );
  router.get('/invitations', ...superAdminOnly, invitationController.list.bind(invitationController));
  router.post('/invitations/:code/revoke', ...superAdminOnly, invitationController.revoke.bind(invitationController));
  router.post('/users/:id/deactivate', ...superAdminOnly, authController.deactivate.bind(authController));

  return router;
}
