import bcrypt from 'bcryptjs';
import { env } from '../config/env';

export const MIN_PASSWORD_LENGTH = 8;

export async function hashPassword(password: string): Promise<string> {
  return bcrypt.hash(password, env.BCRYPT_ROUNDS);
}

export async function comparePassword(password: string, passwordHash: string): Promise<boolean> {
  return bcrypt.compare(password, passwordHash);
}

let placeholderHash: Promise<string> | null = null;

/**
 * Run a comparison against a throwaway hash so a lookup miss costs the same
 * as a wrong password.
 */
export async function comparePlaceholderPassword(password: string): Promise<void> {
  if (!placeholderHash) {
    placeholderHash = bcrypt.hash('placeholder-password-never-matches', env.BCRYPT_ROUNDS);
  }
  await bcrypt.compare(password, await placeholderHash);
}

export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}
