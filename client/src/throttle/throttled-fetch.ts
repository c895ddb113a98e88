import type { RateLimiter } from "./rate-limiter.js";

export type FetchLike = (input: string | URL, init?: RequestInit) => Promise<Response>;

/** Wraps a fetch implementation so each request first waits on the tier's quota. */
export function createThrottledFetch(
  limiter: RateLimiter,
  tier: string,
  fetchImpl: FetchLike = globalThis.fetch,
): FetchLike {
  return async (input, init) => {
    await limiter.throttle(tier);
    return fetchImpl(input, init);
  };
}
