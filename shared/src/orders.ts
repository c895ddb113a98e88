import { z } from "zod";

// ---------------------------------------------------------------------------
// Order update types
// ---------------------------------------------------------------------------

export type TransactionType = "B" | "S";

export type OrderStatus =
  | "TRANSIT"
  | "PENDING"
  | "REJECTED"
  | "CANCELLED"
  | "TRADED"
  | "EXPIRED"
  | "PART_TRADED"
  | (string & {});

export type OrderUpdate = {
  orderNo: string;
  exchOrderNo?: string;
  status: OrderStatus;
  symbol: string;
  displayName?: string;
  exchange?: string;
  segment?: string;
  securityId?: string;
  txnType?: string;
  orderType?: string;
  product?: string;
  quantity: number;
  tradedQty: number;
  remainingQuantity?: number;
  price?: number;
  triggerPrice?: number;
  tradedPrice?: number;
  avgTradedPrice?: number;
  legNo?: number;
  remarks?: string;
  lastUpdatedTime?: string;
  correlationId?: string;
};

export type OrderState = {
  status: OrderStatus;
  tradedQty: number;
  symbol: string;
  update?: OrderUpdate;
};

export type TrackedOrder = OrderState & {
  orderId: string;
  lastSeenAt: number;
};

// ---------------------------------------------------------------------------
// Zod schemas
// ---------------------------------------------------------------------------

const numeric = z.preprocess(
  (value) => (value === undefined || value === null || value === "" ? undefined : Number(value)),
  z.number().finite().optional(),
);

const text = z.preprocess(
  (value) => (value === undefined || value === null ? undefined : String(value)),
  z.string().optional(),
);

export const OrderAlertDataSchema = z
  .object({
    OrderNo: z.union([z.string().min(1), z.number()]).transform(String),
    ExchOrderNo: text,
    Status: z.string().min(1),
    Symbol: text,
    DisplayName: text,
    Exchange: text,
    Segment: text,
    SecurityId: text,
    TxnType: text,
    OrderType: text,
    Product: text,
    ProductName: text,
    Quantity: numeric,
    TradedQty: numeric,
    RemainingQuantity: numeric,
    Price: numeric,
    TriggerPrice: numeric,
    TradedPrice: numeric,
    AvgTradedPrice: numeric,
    LegNo: numeric,
    Remarks: text,
    LastUpdatedTime: text,
    CorrelationId: text,
  })
  .passthrough();

export const OrderAlertEnvelopeSchema = z.object({
  Type: z.literal("order_alert"),
  Data: OrderAlertDataSchema,
});

export type OrderAlertEnvelope = z.infer<typeof OrderAlertEnvelopeSchema>;

export function toOrderUpdate(data: z.infer<typeof OrderAlertDataSchema>): OrderUpdate {
  return {
    orderNo: data.OrderNo,
    exchOrderNo: data.ExchOrderNo,
    status: data.Status.toUpperCase(),
    symbol: data.Symbol ?? data.DisplayName ?? "",
    displayName: data.DisplayName,
    exchange: data.Exchange,
    segment: data.Segment,
    securityId: data.SecurityId,
    txnType: data.TxnType,
    orderType: data.OrderType,
    product: data.ProductName ?? data.Product,
    quantity: data.Quantity ?? 0,
    tradedQty: data.TradedQty ?? 0,
    remainingQuantity: data.RemainingQuantity,
    price: data.Price,
    triggerPrice: data.TriggerPrice,
    tradedPrice: data.TradedPrice,
    avgTradedPrice: data.AvgTradedPrice,
    legNo: data.LegNo,
    remarks: data.Remarks,
    lastUpdatedTime: data.LastUpdatedTime,
    correlationId: data.CorrelationId,
  };
}

/** Returns null for anything that is not a well-formed `order_alert` envelope. */
export function parseOrderAlert(message: unknown): OrderUpdate | null {
  const result = OrderAlertEnvelopeSchema.safeParse(message);
  if (!result.success) return null;
  return toOrderUpdate(result.data.Data);
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const TERMINAL_STATUSES = new Set(["TRADED", "REJECTED", "CANCELLED", "EXPIRED"]);

export function isTerminalStatus(status: OrderStatus): boolean {
  return TERMINAL_STATUSES.has(status.toUpperCase());
}

export function executionPercentage(update: OrderUpdate): number {
  if (update.quantity <= 0) return 0;
  return Math.round((update.tradedQty / update.quantity) * 10000) / 100;
}

export function pendingQuantity(update: OrderUpdate): number {
  return Math.max(update.quantity - update.tradedQty, 0);
}
