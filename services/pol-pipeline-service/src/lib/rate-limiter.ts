import type { Sleep } from "./retry";
import { sleep as defaultSleep } from "./retry";

export type RateLimiter = {
  isLimited: (key: string) => boolean;
  acquire: (key: string) => Promise<void>;
};

export type RateLimit = {
  windowMs: number;
  max: number;
};

/**
 * Sliding-window limiter shared by every worker of a run. `acquire` waits
 * until the key has a free slot in the window, then takes it.
 */
export class SlidingWindowRateLimiter implements RateLimiter {
  private readonly entries = new Map<string, number[]>();

  constructor(
    private readonly limit: RateLimit,
    private readonly now: () => number = () => Date.now(),
    private readonly sleep: Sleep = defaultSleep
  ) {
    if (limit.max < 1 || limit.windowMs <= 0) {
      throw new Error("Rate limit needs max >= 1 and a positive window");
    }
  }

  isLimited(key: string): boolean {
    const cutoff = this.now() - this.limit.windowMs;
    const existing = this.entries.get(key) ?? [];
    const filtered = existing.filter((timestamp) => timestamp > cutoff);
    if (filtered.length >= this.limit.max) {
      this.entries.set(key, filtered);
      return true;
    }
    filtered.push(this.now());
    this.entries.set(key, filtered);
    return false;
  }

  async acquire(key: string): Promise<void> {
    while (this.isLimited(key)) {
      const oldest = this.entries.get(key)?.[0] ?? this.now();
      const waitMs = Math.max(1, oldest + this.limit.windowMs - this.now());
      await this.sleep(waitMs);
    }
  }
}

export function perSecond(max: number): RateLimit {
  return { windowMs: 1000, max: Math.max(1, Math.floor(max)) };
}

export const unlimited: RateLimiter = {
  isLimited: () => false,
  acquire: async () => undefined
};
