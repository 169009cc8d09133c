import { eq } from 'drizzle-orm';
import { getDb, type DbExecutor } from '../config/database';
import { adminUsers } from '../db/schema';
import type { AdminUser, NewAdminUser } from '../types';

/** Credential store for admin accounts. Accounts are deactivated, never deleted. */
export interface AdminUserRepository {
  findByEmail(email: string): Promise<AdminUser | undefined>;
  findById(id: string): Promise<AdminUser | undefined>;
  create(user: NewAdminUser): Promise<AdminUser>;
  updatePassword(id: string, passwordHash: string): Promise<void>;
  setActive(id: string, isActive: boolean): Promise<AdminUser | undefined>;
  recordLogin(id: string, at: Date): Promise<void>;
}

const adminUserColumns = {
  id: adminUsers.id,
  email: adminUsers.email,
  passwordHash: adminUsers.passwordHash,
  entityType: adminUsers.entityType,
  entityId: adminUsers.entityId,
  role: adminUsers.role,
  isActive: adminUsers.isActive,
  createdAt: adminUsers.createdAt,
  lastLoginAt: adminUsers.lastLoginAt,
};

export async function insertAdminUser(executor: DbExecutor, user: NewAdminUser): Promise<AdminUser> {
  const [created] = await executor.insert(adminUsers).values(user).returning(adminUserColumns);
  return created;
}

export class DrizzleAdminUserRepository implements AdminUserRepository {
  async findByEmail(email: string): Promise<AdminUser | undefined> {
    const [user] = await getDb()
      .select(adminUserColumns)
      .from(adminUsers)
      .where(eq(adminUsers.email, email))
      .limit(1);
    return user;
  }

  async findById(id: string): Promise<AdminUser | undefined> {
    const [user] = await getDb()
      .select(adminUserColumns)
      .from(adminUsers)
      .where(eq(adminUsers.id, id))
      .limit(1);
    return user;
  }

  async create(user: NewAdminUser): Promise<AdminUser> {
    return insertAdminUser(getDb(), user);
  }

  async updatePassword(id: string, passwordHash: string): Promise<void> {
    await getDb()
      .update(adminUsers)
      .set({ passwordHash, updatedAt: new Date() })
      .where(eq(adminUsers.id, id));
  }

  async setActive(id: string, isActive: boolean): Promise<AdminUser | undefined> {
    const [user] = await getDb()
      .update(adminUsers)
      .set({ isActive, updatedAt: new Date() })
      .where(eq(adminUsers.id, id))
      .returning(adminUserColumns);
    return user;
  }

  async recordLogin(id: string, at: Date): Promise<void> {
    await getDb().update(adminUsers).set({ lastLoginAt: at }).where(eq(adminUsers.id, id));
  }
}
