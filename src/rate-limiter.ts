import { Clock, monotonicClock, Sleep, sleep } from './clock.js';

export interface RateLimiter {
  /** Waits until `key` may dispatch again and reserves the slot. Returns early once `signal` aborts. */
  acquire(key: string, signal?: AbortSignal): Promise<void>;
  /** Moves the last-dispatch timestamp of `key` forward to `at`. */
  record(key: string, at: number): void;
}

export interface IntervalRateLimiterOptions {
  clock?: Clock;
  sleep?: Sleep;
}

export function intervalFromRate(ratePerSecond: number): number {
  return ratePerSecond > 0 ? 1000 / ratePerSecond : 0;
}

/**
 * Fixed-interval gate. Each key keeps its last grant; a caller arriving earlier
 * than `last + interval` sleeps until that deadline. The slot is reserved
 * before sleeping, so callers that overlap queue up one interval apart.
 */
export class IntervalRateLimiter implements RateLimiter {
  private intervals: Map<string, number> = new Map();
  private lastGrant: Map<string, number> = new Map();
  private clock: Clock;
  private sleep: Sleep;

  constructor(private defaultIntervalMs: number, options: IntervalRateLimiterOptions = {}) {
    this.clock = options.clock ?? monotonicClock;
    this.sleep = options.sleep ?? sleep;
  }

  setInterval(key: string, intervalMs: number): void {
    this.intervals.set(key, intervalMs);
  }

  intervalFor(key: string): number {
    return this.intervals.get(key) ?? this.defaultIntervalMs;
  }

  async acquire(key: string, signal?: AbortSignal): Promise<void> {
    const interval = this.intervalFor(key);
    if (interval <= 0) {
      return;
    }

    const now = this.clock.now();
    const last = this.lastGrant.get(key);
    const grant = last === undefined ? now : Math.max(now, last + interval);
    this.lastGrant.set(key, grant);

    if (grant > now) {
      await this.sleep(grant - now, signal);
    }
  }

  record(key: string, at: number): void {
    if (this.intervalFor(key) <= 0) {
      return;
    }
    const last = this.lastGrant.get(key);
    if (last === undefined || at > last) {
      this.lastGrant.set(key, at);
    }
  }
}

/** Runs every limiter in order: a global one first, then per-target ones. */
export class CompositeRateLimiter implements RateLimiter {
  constructor(private limiters: { limiter: RateLimiter; keyOf: (key: string) => string }[]) {}

  async acquire(key: string, signal?: AbortSignal): Promise<void> {
    for (const { limiter, keyOf } of this.limiters) {
      if (signal?.aborted) return;
      await limiter.acquire(keyOf(key), signal);
    }
  }

  record(key: string, at: number): void {
    for (const { limiter, keyOf } of this.limiters) {
      limiter.record(keyOf(key), at);
    }
  }
}

export const GLOBAL_RATE_KEY = '*';

export interface RateLimitConfig {
  ratePerSecond: number;
  perTarget?: Map<string, number>;
  clock?: Clock;
  sleep?: Sleep;
}

/** Builds the limiter for a run, or undefined when nothing is throttled. */
export function createRateLimiter(config: RateLimitConfig): RateLimiter | undefined {
  const limiters: { limiter: RateLimiter; keyOf: (key: string) => string }[] = [];
  const options = { clock: config.clock, sleep: config.sleep };

  if (config.ratePerSecond > 0) {
    limiters.push({
      limiter: new IntervalRateLimiter(intervalFromRate(config.ratePerSecond), options),
      keyOf: () => GLOBAL_RATE_KEY,
    });
  }

  const perTarget = [...(config.perTarget ?? new Map<string, number>())].filter(([, rate]) => rate > 0);
  if (perTarget.length > 0) {
    const limiter = new IntervalRateLimiter(0, options);
    for (const [targetId, rate] of perTarget) {
      limiter.setInterval(targetId, intervalFromRate(rate));
    }
    limiters.push({ limiter, keyOf: key => key });
  }

  if (limiters.length === 0) {
    return undefined;
  }
  return new CompositeRateLimiter(limiters);
}
