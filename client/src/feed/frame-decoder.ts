import type { DecodedEvent, DepthLevel, QuoteFields } from "@brokerstream/shared";
import { DecodeError } from "../errors.js";
import { segmentFromCode } from "./segments.js";

export const RESPONSE_CODES = {
  index: 1,
  ticker: 2,
  quote: 4,
  openInterest: 5,
  prevClose: 6,
  marketStatus: 7,
  full: 8,
  depthBid: 41,
  disconnect: 50,
  depthAsk: 51,
} as const;

export const HEADER_SIZE = 8;
export const DEPTH_LEVEL_SIZE = 20;
export const DEPTH_LEVELS = 5;

const QUOTE_CORE_SIZE = 26;
const OHLC_SIZE = 16;

/** Payload bytes each binary kind needs after the header. */
export const PAYLOAD_SIZES = {
  ticker: 8,
  quote: QUOTE_CORE_SIZE + OHLC_SIZE,
  full: QUOTE_CORE_SIZE + 12 + OHLC_SIZE + DEPTH_LEVELS * DEPTH_LEVEL_SIZE,
  openInterest: 4,
  prevClose: 8,
  disconnect: 2,
  depthLevel: DEPTH_LEVEL_SIZE,
} as const;

export type WireHeader = {
  responseCode: number;
  declaredLength: number;
  exchangeSegment: number;
  securityId: number;
};

export type DecodeResult =
  | { ok: true; event: DecodedEvent }
  | { ok: false; error: DecodeError };

export type FrameInput = Uint8Array | ArrayBuffer;

class ByteReader {
  private offset: number;
  private readonly view: DataView;

  constructor(bytes: Uint8Array, offset: number) {
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    this.offset = offset;
  }

  float32(): number {
    const value = this.view.getFloat32(this.offset, true);
    this.offset += 4;
    return value;
  }

  int32(): number {
    const value = this.view.getInt32(this.offset, true);
    this.offset += 4;
    return value;
  }

  uint32(): number {
    const value = this.view.getUint32(this.offset, true);
    this.offset += 4;
    return value;
  }

  uint16(): number {
    const value = this.view.getUint16(this.offset, true);
    this.offset += 2;
    return value;
  }

  uint16BE(): number {
    const value = this.view.getUint16(this.offset, false);
    this.offset += 2;
    return value;
  }
}

function toBytes(input: FrameInput): Uint8Array {
  return input instanceof Uint8Array ? input : new Uint8Array(input);
}

export function decodeHeader(bytes: Uint8Array): WireHeader | null {
  if (bytes.byteLength < HEADER_SIZE) return null;
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  return {
    responseCode: view.getUint8(0),
    declaredLength: view.getUint16(1, false),
    exchangeSegment: view.getUint8(3),
    securityId: view.getInt32(4, true),
  };
}

function readDepthLevel(reader: ByteReader): DepthLevel {
  return {
    bidQuantity: reader.uint32(),
    askQuantity: reader.uint32(),
    bidOrders: reader.uint16(),
    askOrders: reader.uint16(),
    bidPrice: reader.float32(),
    askPrice: reader.float32(),
  };
}

function readQuoteCore(reader: ByteReader) {
  return {
    ltp: reader.float32(),
    lastTradeQty: reader.uint16(),
    ltt: reader.uint32(),
    atp: reader.float32(),
    volume: reader.uint32(),
    totalSellQty: reader.int32(),
    totalBuyQty: reader.int32(),
  };
}

function readOhlc(reader: ByteReader): Pick<QuoteFields, "dayOpen" | "dayClose" | "dayHigh" | "dayLow"> {
  return {
    dayOpen: reader.float32(),
    dayClose: reader.float32(),
    dayHigh: reader.float32(),
    dayLow: reader.float32(),
  };
}

function requiredPayload(code: number): number | null {
  switch (code) {
    case RESPONSE_CODES.ticker:
      return PAYLOAD_SIZES.ticker;
    case RESPONSE_CODES.quote:
      return PAYLOAD_SIZES.quote;
    case RESPONSE_CODES.full:
      return PAYLOAD_SIZES.full;
    case RESPONSE_CODES.openInterest:
      return PAYLOAD_SIZES.openInterest;
    case RESPONSE_CODES.prevClose:
      return PAYLOAD_SIZES.prevClose;
    case RESPONSE_CODES.disconnect:
      return PAYLOAD_SIZES.disconnect;
    case RESPONSE_CODES.depthBid:
    case RESPONSE_CODES.depthAsk:
      return PAYLOAD_SIZES.depthLevel;
    default:
      return null;
  }
}

/**
 * Decodes one binary feed frame. Never throws: short or malformed input
 * yields `{ ok: false }`, unknown response codes yield an `unrecognized` event.
 */
export function decodeFrame(input: FrameInput): DecodeResult {
  const bytes = toBytes(input);
  const header = decodeHeader(bytes);
  if (!header) {
    return {
      ok: false,
      error: new DecodeError(
        `Frame of ${bytes.byteLength} bytes is shorter than the ${HEADER_SIZE}-byte header`,
        bytes.byteLength,
      ),
    };
  }

  const payloadLength = bytes.byteLength - HEADER_SIZE;
  const required = requiredPayload(header.responseCode);

  if (required === null) {
    return {
      ok: true,
      event: {
        kind: "unrecognized",
        responseCode: header.responseCode,
        raw: bytes.slice(HEADER_SIZE),
      },
    };
  }

  if (payloadLength < required) {
    return {
      ok: false,
      error: new DecodeError(
        `Response code ${header.responseCode} needs ${required} payload bytes, got ${payloadLength}`,
        bytes.byteLength,
        header.responseCode,
      ),
    };
  }

  const meta = {
    segment: segmentFromCode(header.exchangeSegment),
    securityId: String(header.securityId),
  };
  const reader = new ByteReader(bytes, HEADER_SIZE);

  switch (header.responseCode) {
    case RESPONSE_CODES.ticker:
      return {
        ok: true,
        event: { kind: "ticker", ...meta, ltp: reader.float32(), ltt: reader.int32() },
      };

    case RESPONSE_CODES.quote: {
      const core = readQuoteCore(reader);
      return { ok: true, event: { kind: "quote", ...meta, ...core, ...readOhlc(reader) } };
    }

    case RESPONSE_CODES.full: {
      const core = readQuoteCore(reader);
      const openInterest = reader.int32();
      const highestOpenInterest = reader.int32();
      const lowestOpenInterest = reader.int32();
      const ohlc = readOhlc(reader);
      const depth: DepthLevel[] = [];
      for (let i = 0; i < DEPTH_LEVELS; i++) {
        depth.push(readDepthLevel(reader));
      }
      return {
        ok: true,
        event: {
          kind: "full",
          ...meta,
          ...core,
          ...ohlc,
          openInterest,
          highestOpenInterest,
          lowestOpenInterest,
          depth,
        },
      };
    }

    case RESPONSE_CODES.openInterest:
      return { ok: true, event: { kind: "open-interest", ...meta, openInterest: reader.int32() } };

    case RESPONSE_CODES.prevClose:
      return {
        ok: true,
        event: { kind: "prev-close", ...meta, prevClose: reader.float32(), oiPrev: reader.int32() },
      };

    case RESPONSE_CODES.disconnect:
      return { ok: true, event: { kind: "disconnect", ...meta, reasonCode: reader.uint16BE() } };

    default:
      return {
        ok: true,
        event: {
          kind: "depth-level",
          ...meta,
          side: header.responseCode === RESPONSE_CODES.depthBid ? "bid" : "ask",
          ...readDepthLevel(reader),
        },
      };
  }
}
