import { z } from "zod";
import type { BookEntry, DepthBookEvent } from "@brokerstream/shared";
import { DecodeError } from "../errors.js";
import type { DecodeResult } from "./frame-decoder.js";

const numberOr = (fallback: number) =>
  z.preprocess((value) => {
    const n = typeof value === "string" ? Number(value) : value;
    return typeof n === "number" && Number.isFinite(n) ? n : fallback;
  }, z.number());

const BookEntrySchema = z.object({
  Price: numberOr(0),
  Quantity: numberOr(0),
  Orders: numberOr(1),
});

const DepthDataSchema = z
  .object({
    Symbol: z.string().optional(),
    ExchangeSegment: z.union([z.string(), z.number()]).optional(),
    SecurityId: z.union([z.string(), z.number()]).optional(),
    Timestamp: z.union([z.string(), z.number()]).optional(),
    Bids: z.array(BookEntrySchema).catch([]),
    Asks: z.array(BookEntrySchema).catch([]),
    BestBid: z.unknown().optional(),
    BestAsk: z.unknown().optional(),
    TotalBidQty: numberOr(0),
    TotalAskQty: numberOr(0),
  })
  .passthrough();

export type JsonEnvelope = {
  Type: string;
  [key: string]: unknown;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Parses a JSON channel message and checks it carries a string `Type`. */
export function parseEnvelope(text: string): { ok: true; envelope: JsonEnvelope } | { ok: false; error: DecodeError } {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    return { ok: false, error: new DecodeError(`Invalid JSON message: ${reason}`, text.length) };
  }
  const type = isRecord(parsed) ? parsed.Type : undefined;
  if (!isRecord(parsed) || typeof type !== "string") {
    return { ok: false, error: new DecodeError("JSON message has no Type discriminator", text.length) };
  }
  return { ok: true, envelope: { ...parsed, Type: type } };
}

function toPrice(value: unknown, fallback: number): number {
  if (value === undefined || value === null || value === "") return fallback;
  const n = Number(value);
  return Number.isFinite(n) ? n : 0;
}

function toBook(entries: z.infer<typeof BookEntrySchema>[]): BookEntry[] {
  return entries.map((entry) => ({
    price: entry.Price,
    quantity: entry.Quantity,
    orders: entry.Orders,
  }));
}

export function spreadOf(bestBid: number, bestAsk: number): number {
  if (bestBid === 0 || bestAsk === 0) return 0;
  return bestAsk - bestBid;
}

/** Decodes a `depth_update` / `depth_snapshot` envelope from the depth channel. */
export function decodeDepthEnvelope(envelope: JsonEnvelope, byteLength: number): DecodeResult {
  const type = envelope.Type;
  if (type !== "depth_update" && type !== "depth_snapshot") {
    return { ok: true, event: { kind: "unrecognized", raw: JSON.stringify(envelope) } };
  }

  const data = DepthDataSchema.safeParse(envelope.Data);
  if (!data.success) {
    return {
      ok: false,
      error: new DecodeError(`Malformed ${type} payload: ${data.error.issues[0]?.message ?? "invalid"}`, byteLength),
    };
  }

  const bids = toBook(data.data.Bids);
  const asks = toBook(data.data.Asks);
  const bestBid = toPrice(data.data.BestBid, bids[0]?.price ?? 0);
  const bestAsk = toPrice(data.data.BestAsk, asks[0]?.price ?? 0);

  const event: DepthBookEvent = {
    kind: "depth-book",
    type,
    symbol: data.data.Symbol,
    segment: data.data.ExchangeSegment === undefined ? undefined : String(data.data.ExchangeSegment),
    securityId: data.data.SecurityId === undefined ? undefined : String(data.data.SecurityId),
    timestamp: data.data.Timestamp,
    bids,
    asks,
    bestBid,
    bestAsk,
    spread: spreadOf(bestBid, bestAsk),
    totalBidQty: data.data.TotalBidQty,
    totalAskQty: data.data.TotalAskQty,
  };
  return { ok: true, event };
}

export function decodeDepthMessage(text: string): DecodeResult {
  const parsed = parseEnvelope(text);
  if (!parsed.ok) return parsed;
  return decodeDepthEnvelope(parsed.envelope, text.length);
}

/** Decodes an order channel message; anything other than `order_alert` is unrecognized. */
export function decodeOrderMessage(text: string): DecodeResult {
  const parsed = parseEnvelope(text);
  if (!parsed.ok) return parsed;
  const { envelope } = parsed;
  if (envelope.Type !== "order_alert") {
    return { ok: true, event: { kind: "unrecognized", raw: text } };
  }
  if (!isRecord(envelope.Data)) {
    return { ok: false, error: new DecodeError("order_alert message has no Data object", text.length) };
  }
  return { ok: true, event: { kind: "order-alert", data: envelope.Data } };
}
