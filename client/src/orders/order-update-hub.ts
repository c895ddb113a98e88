import { EventEmitter } from "node:events";
import { parseOrderAlert, type DecodedEvent, type OrderState } from "@brokerstream/shared";
import type { SessionManager } from "../session/session-manager.js";
import { createLogger } from "../utils/logger.js";
import type { OrderStateTracker } from "./order-state-tracker.js";

/**
 * Feeds `order_alert` messages from an order session into a tracker and
 * re-emits them as typed `update` events. Stopping is terminal, like the
 * session underneath.
 */
export class OrderUpdateHub extends EventEmitter {
  private log = createLogger("order-hub");
  private session: SessionManager;
  private tracker: OrderStateTracker;
  private detach: (() => void) | null = null;
  private started = false;
  private stopped = false;

  constructor(session: SessionManager, tracker: OrderStateTracker) {
    super();
    this.session = session;
    this.tracker = tracker;
  }

  get running(): boolean {
    return this.started;
  }

  start(): void {
    if (this.started || this.stopped) return;
    this.started = true;
    this.detach = this.session.on("event", (event) => this.handleEvent(event));
    this.tracker.start();
    this.session.start();
  }

  stop(): void {
    if (this.stopped) return;
    this.stopped = true;
    this.started = false;
    this.detach?.();
    this.detach = null;
    this.session.stop();
    this.tracker.stop();
  }

  state(orderId: string): OrderState | undefined {
    return this.tracker.get(orderId);
  }

  private handleEvent(event: DecodedEvent): void {
    if (event.kind !== "order-alert") return;

    const update = parseOrderAlert({ Type: "order_alert", Data: event.data });
    if (!update || !update.orderNo) {
      this.log.warn("Dropped order alert without a usable order number");
      return;
    }

    this.tracker.record(update.orderNo, {
      status: update.status,
      tradedQty: update.tradedQty,
      symbol: update.symbol,
      update,
    });
    this.log.debug("Order update", { orderNo: update.orderNo, status: update.status });
    this.emit("update", update);
  }
}
