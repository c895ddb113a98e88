import type { OrderState, TrackedOrder } from "@brokerstream/shared";
import { createLogger } from "../utils/logger.js";

export const MAX_TRACKED_ORDERS = 10000;
export const MAX_ORDER_AGE_MS = 60 * 60 * 1000;
export const SWEEP_INTERVAL_MS = 5 * 60 * 1000;

export type OrderStateTrackerOptions = {
  maxTrackedOrders?: number;
  maxOrderAgeMs?: number;
  sweepIntervalMs?: number;
  now?: () => number;
};

export type SweepResult = {
  expired: number;
  evicted: number;
  remaining: number;
};

/**
 * Last known state per order id. Entries are replaced wholesale on every
 * record; a periodic sweep drops aged entries and trims to the size cap,
 * oldest `lastSeenAt` first.
 */
export class OrderStateTracker {
  private log = createLogger("order-tracker");
  // Map iteration order doubles as the tie-breaker for equal timestamps.
  private orders = new Map<string, TrackedOrder>();
  private sweepHandle: ReturnType<typeof setInterval> | null = null;
  private readonly maxTrackedOrders: number;
  private readonly maxOrderAgeMs: number;
  private readonly sweepIntervalMs: number;
  private readonly now: () => number;

  constructor(options: OrderStateTrackerOptions = {}) {
    this.maxTrackedOrders = options.maxTrackedOrders ?? MAX_TRACKED_ORDERS;
    this.maxOrderAgeMs = options.maxOrderAgeMs ?? MAX_ORDER_AGE_MS;
    this.sweepIntervalMs = options.sweepIntervalMs ?? SWEEP_INTERVAL_MS;
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.orders.size;
  }

  get running(): boolean {
    return this.sweepHandle !== null;
  }

  start(): void {
    if (this.sweepHandle !== null) return;
    this.sweepHandle = setInterval(() => {
      this.sweep();
    }, this.sweepIntervalMs);

    if (typeof this.sweepHandle === "object" && "unref" in this.sweepHandle) {
      this.sweepHandle.unref();
    }
  }

  stop(): void {
    if (this.sweepHandle === null) return;
    clearInterval(this.sweepHandle);
    this.sweepHandle = null;
  }

  record(orderId: string, state: OrderState): TrackedOrder {
    const entry: TrackedOrder = { ...state, orderId, lastSeenAt: this.now() };
    // delete first so the re-recorded id moves to the back of the iteration order
    this.orders.delete(orderId);
    this.orders.set(orderId, entry);

    if (this.orders.size > this.maxTrackedOrders) {
      this.sweep();
    }
    return entry;
  }

  get(orderId: string): TrackedOrder | undefined {
    return this.orders.get(orderId);
  }

  has(orderId: string): boolean {
    return this.orders.has(orderId);
  }

  list(): TrackedOrder[] {
    return [...this.orders.values()];
  }

  clear(): void {
    this.orders.clear();
  }

  sweep(at: number = this.now()): SweepResult {
    let expired = 0;
    for (const [orderId, entry] of this.orders) {
      if (at - entry.lastSeenAt >= this.maxOrderAgeMs) {
        this.orders.delete(orderId);
        expired++;
      }
    }

    let evicted = 0;
    const excess = this.orders.size - this.maxTrackedOrders;
    if (excess > 0) {
      const oldest = [...this.orders.values()]
        .sort((a, b) => a.lastSeenAt - b.lastSeenAt)
        .slice(0, excess);
      for (const entry of oldest) {
        this.orders.delete(entry.orderId);
        evicted++;
      }
    }

    if (expired > 0 || evicted > 0) {
      this.log.debug("Swept tracked orders", { expired, evicted, remaining: this.orders.size });
    }
    return { expired, evicted, remaining: this.orders.size };
  }
}
