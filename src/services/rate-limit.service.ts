/**
 * Fixed-window request counting. Counters live behind CounterStore so a
 * shared store can back several server instances; the in-process map is the default.
 */

export interface CounterHit {
  count: number;
  resetAt: Date;
}

export interface CounterStore {
  /** Atomically add one hit to `key`, opening a new window of `windowMs` when the last one has ended. */
  increment(key: string, windowMs: number): Promise<CounterHit>;
  decrement(key: string): Promise<void>;
  reset(key: string): Promise<void>;
}

export type Clock = () => number;

interface WindowCounter {
  count: number;
  resetAt: number;
}

export const SWEEP_INTERVAL_MS = 60_000;

/** Keyed TTL map of counters for a single process. */
export class MemoryCounterStore implements CounterStore {
  private readonly counters = new Map<string, WindowCounter>();
  private nextSweepAt: number;

  constructor(private readonly clock: Clock = Date.now) {
    this.nextSweepAt = clock() + SWEEP_INTERVAL_MS;
  }

  async increment(key: string, windowMs: number): Promise<CounterHit> {
    const now = this.clock();
    if (now >= this.nextSweepAt) {
      this.sweep(now);
      this.nextSweepAt = now + SWEEP_INTERVAL_MS;
    }

    let counter = this.counters.get(key);
    if (!counter || counter.resetAt <= now) {
      counter = { count: 0, resetAt: now + windowMs };
      this.counters.set(key, counter);
    }
    counter.count += 1;
    return { count: counter.count, resetAt: new Date(counter.resetAt) };
  }

  async decrement(key: string): Promise<void> {
    const counter = this.counters.get(key);
    if (counter && counter.count > 0) {
      counter.count -= 1;
    }
  }

  async reset(key: string): Promise<void> {
    this.counters.delete(key);
  }

  get size(): number {
    return this.counters.size;
  }

  private sweep(now: number): void {
    for (const [key, counter] of this.counters.entries()) {
      if (counter.resetAt <= now) {
        this.counters.delete(key);
      }
    }
  }
}

export type RateLimitFamily = 'auth' | 'public' | 'admin' | 'webhooks';

export interface RateLimitPolicy {
  family: RateLimitFamily;
  limit: number;
  windowMs: number;
}

export interface RateLimitDecision extends CounterHit {
  allowed: boolean;
  remaining: number;
}

export class RateLimiter {
  constructor(
    private readonly store: CounterStore,
    readonly policy: RateLimitPolicy
  ) {}

  storeKey(clientKey: string): string {
    return `${this.policy.family}:${clientKey}`;
  }

  /** Count one request and report whether it fits in the current window. */
  async consume(clientKey: string): Promise<RateLimitDecision> {
    const hit = await this.store.increment(this.storeKey(clientKey), this.policy.windowMs);
    return {
      ...hit,
      allowed: hit.count <= this.policy.limit,
      remaining: Math.max(0, this.policy.limit - hit.count),
    };
  }

  async allow(clientKey: string): Promise<boolean> {
    const decision = await this.consume(clientKey);
    return decision.allowed;
  }

  async refund(clientKey: string): Promise<void> {
    await this.store.decrement(this.storeKey(clientKey));
  }

  async reset(clientKey: string): Promise<void> {
    await this.store.reset(this.storeKey(clientKey));
  }
}
