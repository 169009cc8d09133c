import jwt, { TokenExpiredError } from 'jsonwebtoken';
import { z } from 'zod';
import { env } from '../config/env';
import { ADMIN_ROLES, ENTITY_TYPES, err, ok } from '../types';
import type { AdminPrincipal, Result } from '../types';

const ALGORITHM = 'HS256';

export type TokenErrorKind = 'expired' | 'invalid_token';

export interface TokenOptions {
  /** Signing secret; defaults to JWT_SECRET. */
  secret?: string;
  /** Current time in milliseconds; defaults to Date.now(). */
  now?: number;
  expiresInMinutes?: number;
}

const claimsSchema = z.object({
  sub: z.string().min(1),
  email: z.string().min(1),
  role: z.enum(ADMIN_ROLES),
  entityType: z.enum(ENTITY_TYPES).nullable(),
  entityId: z.number().int().nullable(),
  iat: z.number(),
  exp: z.number(),
});

export type AccessTokenClaims = z.infer<typeof claimsSchema>;

export function issueAccessToken(subject: AdminPrincipal, options: TokenOptions = {}): string {
  const nowSeconds = Math.floor((options.now ?? Date.now()) / 1000);
  const expiresInMinutes = options.expiresInMinutes ?? env.ACCESS_TOKEN_EXPIRE_MINUTES;
  return jwt.sign(
    {
      email: subject.email,
      role: subject.role,
      entityType: subject.entityType,
      entityId: subject.entityId,
      iat: nowSeconds,
    },
    options.secret ?? env.JWT_SECRET,
    {
      algorithm: ALGORITHM,
      subject: subject.id,
      expiresIn: expiresInMinutes * 60,
    }
  );
}

/**
 * Verify signature, expiry and claim shape. Stateless: a deactivated admin's
 * token stays valid until it expires.
 */
export function verifyAccessToken(
  token: string,
  options: TokenOptions = {}
): Result<AccessTokenClaims, TokenErrorKind> {
  let decoded: unknown;
  try {
    decoded = jwt.verify(token, options.secret ?? env.JWT_SECRET, {
      algorithms: [ALGORITHM],
      clockTimestamp: Math.floor((options.now ?? Date.now()) / 1000),
    });
  } catch (error) {
    return err(error instanceof TokenExpiredError ? 'expired' : 'invalid_token');
  }

  const claims = claimsSchema.safeParse(decoded);
  if (!claims.success) {
    return err('invalid_token');
  }
  return ok(claims.data);
}

export function principalFromClaims(claims: AccessTokenClaims): AdminPrincipal {
  return {
    id: claims.sub,
    email: claims.email,
    role: claims.role,
    entityType: claims.entityType,
    entityId: claims.entityId,
  };
}
