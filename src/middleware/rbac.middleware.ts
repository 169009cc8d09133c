import { Response, NextFunction } from 'express';
import type { AuthRequest } from './auth.middleware';
import type { AdminRole } from '../types';

export function requireRole(...allowedRoles: AdminRole[]) {
  return (req: AuthRequest, res: Response, next: NextFunction): void => {
    if (!req.admin) {
      res.setHeader('WWW-Authenticate', 'Bearer');
      res.status(401).json({ success: false, error: 'Authentication required' });
      return;
    }

    if (!allowedRoles.includes(req.admin.role)) {
      res.status(403).json({ success: false, error: 'Insufficient permissions' });
      return;
    }

    next();
  };
}
