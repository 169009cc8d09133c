/**
 * Create the platform super admin (no entity binding) from
 * SUPER_ADMIN_EMAIL and SUPER_ADMIN_PASSWORD. Safe to re-run.
 */

import { z } from 'zod';
import { closeDatabase } from '../config/database';
import { DrizzleAdminUserRepository } from '../repositories/admin-user.repository';
import { hashPassword, MIN_PASSWORD_LENGTH, normalizeEmail } from '../utils/password.util';
import { logger } from '../utils/logger.util';

const seedEnvSchema = z.object({
  SUPER_ADMIN_EMAIL: z.string().email(),
  SUPER_ADMIN_PASSWORD: z.string().min(MIN_PASSWORD_LENGTH),
});

async function seedSuperAdmin(): Promise<void> {
  const { SUPER_ADMIN_EMAIL, SUPER_ADMIN_PASSWORD } = seedEnvSchema.parse(process.env);
  const email = normalizeEmail(SUPER_ADMIN_EMAIL);
  const users = new DrizzleAdminUserRepository();

  const existing = await users.findByEmail(email);
  if (existing) {
    if (existing.role !== 'super_admin') {
      throw new Error(`${email} already exists as a regular admin`);
    }
    logger.info('Super admin already exists, skipping', { adminId: existing.id });
    return;
  }

  const created = await users.create({
    email,
    passwordHash: await hashPassword(SUPER_ADMIN_PASSWORD),
    entityType: null,
    entityId: null,
    role: 'super_admin',
  });
  logger.info('Super admin created', { adminId: created.id, email });
}

seedSuperAdmin()
  .then(() => closeDatabase())
  .then(() => process.exit(0))
  .catch((error: unknown) => {
    logger.error('Super admin seed failed', error);
    process.exit(1);
  });
