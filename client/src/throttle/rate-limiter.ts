import type { RateWindow } from "@brokerstream/shared";
import { createLogger } from "../utils/logger.js";

export type RateLimiterOptions = {
  now?: () => number;
};

export type BucketSnapshot = {
  windowMs: number;
  capacity: number;
  count: number;
  windowStart: number;
};

type Bucket = BucketSnapshot;

type Waiter = {
  resolve: () => void;
  reject: (err: Error) => void;
};

type TierState = {
  name: string;
  buckets: Bucket[];
  waiters: Waiter[];
  timer: ReturnType<typeof setTimeout> | null;
};

/**
 * Multi-window fixed-bucket throttle. Each tier owns its buckets and a FIFO of
 * waiting callers; the refill, the check and the decrement all happen inside
 * `drain`, so a reset can never interleave with a half-finished take.
 */
export class RateLimiter {
  private log = createLogger("rate-limiter");
  private tiers = new Map<string, TierState>();
  private readonly now: () => number;
  private stopped = false;

  constructor(limits: Record<string, RateWindow[]>, options: RateLimiterOptions = {}) {
    this.now = options.now ?? Date.now;
    const start = this.now();
    for (const [name, windows] of Object.entries(limits)) {
      this.tiers.set(name, {
        name,
        buckets: windows.map((w) => ({
          windowMs: w.windowMs,
          capacity: w.capacity,
          count: 0,
          windowStart: start,
        })),
        waiters: [],
        timer: null,
      });
    }
  }

  get tierNames(): string[] {
    return [...this.tiers.keys()];
  }

  /** Resolves once a token has been taken from every bucket of `tier`. */
  throttle(tier: string): Promise<void> {
    if (this.stopped) {
      return Promise.reject(new Error("Rate limiter stopped"));
    }
    const state = this.tiers.get(tier);
    if (!state) {
      return Promise.reject(new Error(`Unknown rate limit tier: ${tier}`));
    }

    return new Promise<void>((resolve, reject) => {
      state.waiters.push({ resolve, reject });
      if (state.timer === null) {
        this.drain(state);
      }
    });
  }

  snapshot(tier: string): BucketSnapshot[] {
    const state = this.tiers.get(tier);
    if (!state) return [];
    this.refill(state, this.now());
    return state.buckets.map((b) => ({ ...b }));
  }

  pending(tier: string): number {
    return this.tiers.get(tier)?.waiters.length ?? 0;
  }

  stop(): void {
    if (this.stopped) return;
    this.stopped = true;
    for (const state of this.tiers.values()) {
      if (state.timer !== null) {
        clearTimeout(state.timer);
        state.timer = null;
      }
      const waiters = state.waiters.splice(0);
      for (const waiter of waiters) {
        waiter.reject(new Error("Rate limiter stopped"));
      }
    }
  }

  private refill(state: TierState, now: number): void {
    for (const bucket of state.buckets) {
      const elapsed = now - bucket.windowStart;
      if (elapsed >= bucket.windowMs) {
        bucket.windowStart += Math.floor(elapsed / bucket.windowMs) * bucket.windowMs;
        bucket.count = 0;
      }
    }
  }

  private drain(state: TierState): void {
    state.timer = null;
    if (this.stopped) return;

    while (state.waiters.length > 0) {
      const now = this.now();
      this.refill(state, now);

      const full = state.buckets.filter((b) => b.count >= b.capacity);
      if (full.length === 0) {
        for (const bucket of state.buckets) {
          bucket.count++;
        }
        const waiter = state.waiters.shift();
        waiter?.resolve();
        continue;
      }

      // Every exhausted bucket has to roll over before the next caller can go.
      const waitMs = Math.max(...full.map((b) => b.windowStart + b.windowMs - now));
      this.log.debug("Throttling", { tier: state.name, waitMs, queued: state.waiters.length });
      // Left ref'd: a caller blocked here must hold the process open until it is served.
      state.timer = setTimeout(() => this.drain(state), Math.max(waitMs, 0));
      return;
    }
  }
}
