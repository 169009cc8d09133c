import { Request, Response, NextFunction } from 'express';
import { verifyAccessToken, principalFromClaims } from '../utils/jwt.util';
import type { AdminPrincipal } from '../types';

export interface AuthRequest extends Request {
  admin?: AdminPrincipal;
}

const BEARER_PREFIX = 'Bearer ';

function rejectUnauthorized(res: Response, error: string): void {
  res.setHeader('WWW-Authenticate', 'Bearer');
  res.status(401).json({ success: false, error });
}

/**
 * Require a valid access token. The principal comes from the token alone;
 * no database lookup happens here.
 */
export function authenticate(req: AuthRequest, res: Response, next: NextFunction): void {
  const authHeader = req.headers.authorization;
  if (!authHeader || !authHeader.startsWith(BEARER_PREFIX)) {
    rejectUnauthorized(res, 'Not authenticated');
    return;
  }

  const verified = verifyAccessToken(authHeader.substring(BEARER_PREFIX.length).trim());
  if (!verified.ok) {
    rejectUnauthorized(
      res,
      verified.error === 'expired' ? 'Token expired' : 'Could not validate credentials'
    );
    return;
  }

  req.admin = principalFromClaims(verified.value);
  next();
}
