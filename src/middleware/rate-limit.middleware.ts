import { Request, Response, RequestHandler } from 'express';
import rateLimit, { type IncrementResponse, type Store } from 'express-rate-limit';
import { env } from '../config/env';
import {
  MemoryCounterStore,
  RateLimiter,
  type CounterStore,
  type RateLimitFamily,
} from '../services/rate-limit.service';
import { logger } from '../utils/logger.util';

/** Adapts a RateLimiter to express-rate-limit's store contract. */
export class CounterStoreAdapter implements Store {
  constructor(private readonly limiter: RateLimiter) {}

  async increment(key: string): Promise<IncrementResponse> {
    const decision = await this.limiter.consume(key);
    return { totalHits: decision.count, resetTime: decision.resetAt };
  }

  async decrement(key: string): Promise<void> {
    await this.limiter.refund(key);
  }

  async resetKey(key: string): Promise<void> {
    await this.limiter.reset(key);
  }
}

export interface RateLimitSettings {
  enabled: boolean;
  windowMs: number;
  limits: Record<RateLimitFamily, number>;
  store: CounterStore;
}

export type RateLimiters = Record<RateLimitFamily, RequestHandler>;

export function defaultRateLimitSettings(): RateLimitSettings {
  return {
    enabled: env.RATE_LIMIT_ENABLED,
    windowMs: env.RATE_LIMIT_WINDOW_MS,
    limits: {
      auth: env.RATE_LIMIT_MAX_AUTH,
      public: env.RATE_LIMIT_MAX_PUBLIC,
      admin: env.RATE_LIMIT_MAX_ADMIN,
      webhooks: env.RATE_LIMIT_MAX_WEBHOOKS,
    },
    store: new MemoryCounterStore(),
  };
}

/** Client key: req.ip, which honours `trust proxy` for the first X-Forwarded-For hop. */
function clientKey(req: Request): string {
  return req.ip || req.socket.remoteAddress || 'unknown';
}

function createLimiter(family: RateLimitFamily, settings: RateLimitSettings): RequestHandler {
  const limiter = new RateLimiter(settings.store, {
    family,
    limit: settings.limits[family],
    windowMs: settings.windowMs,
  });

  return rateLimit({
    windowMs: settings.windowMs,
    limit: settings.limits[family],
    standardHeaders: true,
    legacyHeaders: false,
    store: new CounterStoreAdapter(limiter),
    skip: (req: Request) => !settings.enabled || req.method === 'OPTIONS',
    keyGenerator: clientKey,
    handler: (req: Request, res: Response) => {
      logger.warn('Rate limit exceeded', { family, key: clientKey(req), url: req.originalUrl });
      res.status(429).json({ success: false, error: 'Too many requests, please try again later.' });
    },
  });
}

export function createRateLimiters(settings: RateLimitSettings = defaultRateLimitSettings()): RateLimiters {
  return {
    auth: createLimiter('auth', settings),
    public: createLimiter('public', settings),
    admin: createLimiter('admin', settings),
    webhooks: createLimiter('webhooks', settings),
  };
}
