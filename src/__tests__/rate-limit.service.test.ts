import { MemoryCounterStore, RateLimiter, SWEEP_INTERVAL_MS } from '../services/rate-limit.service';

describe('RateLimiter', () => {
  let now: number;
  let store: MemoryCounterStore;

  beforeEach(() => {
    now = 1_700_000_000_000;
    store = new MemoryCounterStore(() => now);
  });

  it('rejects request N+1 within a window and allows the key again after it', async () => {
    const limiter = new RateLimiter(store, { family: 'auth', limit: 5, windowMs: 60_000 });

    for (let i = 0; i < 5; i++) {
      expect(await limiter.allow('203.0.113.9')).toBe(true);
    }
    expect(await limiter.allow('203.0.113.9')).toBe(false);

    now += 60_000;
    expect(await limiter.allow('203.0.113.9')).toBe(true);
  });

  it('reports remaining requests and the window reset time', async () => {
    const limiter = new RateLimiter(store, { family: 'public', limit: 3, windowMs: 1_000 });

    const first = await limiter.consume('client');
    now += 400;
    const second = await limiter.consume('client');

    expect(first).toEqual({ count: 1, resetAt: new Date(1_700_000_001_000), allowed: true, remaining: 2 });
    expect(second).toEqual({ count: 2, resetAt: new Date(1_700_000_001_000), allowed: true, remaining: 1 });
  });

  it('counts clients and route families separately', async () => {
    const auth = new RateLimiter(store, { family: 'auth', limit: 1, windowMs: 60_000 });
    const admin = new RateLimiter(store, { family: 'admin', limit: 1, windowMs: 60_000 });

    expect(await auth.allow('a')).toBe(true);
    expect(await auth.allow('a')).toBe(false);
    expect(await auth.allow('b')).toBe(true);
    expect(await admin.allow('a')).toBe(true);
  });

  it('gives back a refunded request', async () => {
    const limiter = new RateLimiter(store, { family: 'auth', limit: 1, windowMs: 60_000 });

    await limiter.consume('client');
    await limiter.refund('client');

    expect(await limiter.allow('client')).toBe(true);
  });

  it('forgets a key on reset', async () => {
    const limiter = new RateLimiter(store, { family: 'auth', limit: 1, windowMs: 60_000 });

    await limiter.consume('client');
    await limiter.reset('client');

    expect(store.size).toBe(0);
    expect(await limiter.allow('client')).toBe(true);
  });

  it('drops expired counters at most once per sweep interval', async () => {
    const limiter = new RateLimiter(store, { family: 'public', limit: 10, windowMs: 1_000 });
    const start = now;

    await limiter.consume('a');
    await limiter.consume('b');
    now += 2_000;
    await limiter.consume('c');

    expect(store.size).toBe(3);

    now = start + SWEEP_INTERVAL_MS;
    await limiter.consume('d');

    expect(store.size).toBe(1);
  });
});
