import dotenv from 'dotenv';
import { z } from 'zod';

// Load environment variables first
dotenv.config();

export const DEV_JWT_SECRET = 'dev-secret-key-change-in-production';

const booleanFlag = z
  .enum(['true', 'false'])
  .transform((value) => value === 'true');

const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    PORT: z.coerce.number().int().positive().default(8000),
    DATABASE_URL: z.string().optional(),

    JWT_SECRET: z.string().min(1).default(DEV_JWT_SECRET),
    ACCESS_TOKEN_EXPIRE_MINUTES: z.coerce.number().int().positive().default(30),
    BCRYPT_ROUNDS: z.coerce.number().int().min(4).max(15).default(12),

    STRIPE_SECRET_KEY: z.string().default(''),
    STRIPE_WEBHOOK_SECRET: z.string().default(''),

    FRONTEND_URL: z.string().url().default('http://localhost:3000'),
    ALLOWED_ORIGINS: z.string().default('http://localhost:3000,http://localhost:8000'),

    RATE_LIMIT_ENABLED: booleanFlag.default('true'),
    RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(60_000),
    RATE_LIMIT_MAX_AUTH: z.coerce.number().int().positive().default(5),
    RATE_LIMIT_MAX_PUBLIC: z.coerce.number().int().positive().default(100),
    RATE_LIMIT_MAX_ADMIN: z.coerce.number().int().positive().default(200),
    RATE_LIMIT_MAX_WEBHOOKS: z.coerce.number().int().positive().default(1000),

    CRON_SECRET: z.string().default(''),
    LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'debug']).default('info'),
  })
  .superRefine((value, ctx) => {
    if (value.NODE_ENV === 'production' && value.JWT_SECRET === DEV_JWT_SECRET) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['JWT_SECRET'],
        message: 'JWT_SECRET must be set in production',
      });
    }
  });

export type Env = z.infer<typeof envSchema>;

/**
 * Parse and default the process environment. Throws with every offending
 * variable listed so a misconfigured deploy fails at boot.
 */
export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${problems}`);
  }
  return parsed.data;
}

export const env = parseEnv(process.env);

export const allowedOrigins = env.ALLOWED_ORIGINS.split(',')
  .map((origin) => origin.trim())
  .filter(Boolean);
