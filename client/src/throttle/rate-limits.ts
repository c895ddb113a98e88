import type { RateWindow } from "@brokerstream/shared";

export const SECOND_MS = 1000;
export const MINUTE_MS = 60 * SECOND_MS;
export const HOUR_MS = 60 * MINUTE_MS;
export const DAY_MS = 24 * HOUR_MS;

export type RateLimitTier = "order" | "data" | "quote" | "optionChain" | "nonTrading";

// Unlimited windows are left out rather than given an infinite capacity.
export const DEFAULT_RATE_LIMITS: Record<RateLimitTier, RateWindow[]> = {
  order: [
    { windowMs: SECOND_MS, capacity: 25 },
    { windowMs: MINUTE_MS, capacity: 250 },
    { windowMs: HOUR_MS, capacity: 1000 },
    { windowMs: DAY_MS, capacity: 7000 },
  ],
  data: [
    { windowMs: SECOND_MS, capacity: 5 },
    { windowMs: DAY_MS, capacity: 100000 },
  ],
  quote: [{ windowMs: SECOND_MS, capacity: 1 }],
  optionChain: [
    { windowMs: 3 * SECOND_MS, capacity: 1 },
    { windowMs: MINUTE_MS, capacity: 20 },
    { windowMs: HOUR_MS, capacity: 600 },
    { windowMs: DAY_MS, capacity: 4800 },
  ],
  nonTrading: [{ windowMs: SECOND_MS, capacity: 20 }],
};

export function mergeRateLimits(
  overrides: Record<string, RateWindow[]> = {},
): Record<string, RateWindow[]> {
  return { ...DEFAULT_RATE_LIMITS, ...overrides };
}
