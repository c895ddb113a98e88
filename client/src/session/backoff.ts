export type BackoffOptions = {
  baseDelayMs?: number;
  maxDelayMs?: number;
  jitterRatio?: number;
  random?: () => number;
};

export const DEFAULT_BASE_DELAY_MS = 2000;
export const DEFAULT_MAX_DELAY_MS = 90000;
export const DEFAULT_JITTER_RATIO = 0.2;

/** Delay before reconnect attempt after `failures` consecutive abnormal closes, jitter excluded. */
export function backoffBaseDelay(failures: number, baseDelayMs: number, maxDelayMs: number): number {
  if (failures <= 0) return 0;
  return Math.min(baseDelayMs * Math.pow(2, failures - 1), maxDelayMs);
}

export class ReconnectPolicy {
  private failures = 0;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
  readonly jitterRatio: number;
  private readonly random: () => number;

  constructor(options: BackoffOptions = {}) {
    this.baseDelayMs = options.baseDelayMs ?? DEFAULT_BASE_DELAY_MS;
    this.maxDelayMs = options.maxDelayMs ?? DEFAULT_MAX_DELAY_MS;
    this.jitterRatio = options.jitterRatio ?? DEFAULT_JITTER_RATIO;
    this.random = options.random ?? Math.random;
  }

  get consecutiveFailures(): number {
    return this.failures;
  }

  /** Counts one more abnormal close and returns the delay to wait before reconnecting. */
  recordFailure(): number {
    this.failures++;
    const delay = backoffBaseDelay(this.failures, this.baseDelayMs, this.maxDelayMs);
    return delay + this.random() * this.jitterRatio * delay;
  }

  reset(): void {
    this.failures = 0;
  }
}
