export { StreamingClient, createStreamingClient, type StreamingClientOptions } from "./streaming-client.js";
export { loadConfigFromEnv, parseFeedSymbols } from "./config/env.js";
export { TransportError, DecodeError, ResolutionError, AuthError } from "./errors.js";

export {
  decodeFrame,
  decodeHeader,
  RESPONSE_CODES,
  PAYLOAD_SIZES,
  HEADER_SIZE,
  type DecodeResult,
  type WireHeader,
} from "./feed/frame-decoder.js";
export { decodeDepthMessage, decodeOrderMessage } from "./feed/json-decoder.js";
export { SEGMENT_CODES, EXCHANGE_SEGMENTS, segmentFromCode, toRequestSegment } from "./feed/segments.js";

export { SubscriptionResolver, type ResolveResult } from "./resolver/subscription-resolver.js";
export { InstrumentCache } from "./resolver/instrument-cache.js";
export type { InstrumentDirectory } from "./resolver/instrument-directory.js";
export { HttpInstrumentDirectory, StaticInstrumentDirectory } from "./resolver/http-instrument-directory.js";

export { OrderStateTracker, type SweepResult } from "./orders/order-state-tracker.js";
export { OrderUpdateHub } from "./orders/order-update-hub.js";

export { RateLimiter, type BucketSnapshot } from "./throttle/rate-limiter.js";
export { DEFAULT_RATE_LIMITS, mergeRateLimits, type RateLimitTier } from "./throttle/rate-limits.js";
export { createThrottledFetch, type FetchLike } from "./throttle/throttled-fetch.js";

export {
  SessionManager,
  type ChannelProtocol,
  type SessionOptions,
  type SessionEventMap,
  type SubscribeResult,
  type CloseInfo,
} from "./session/session-manager.js";
export { MarketFeedSession } from "./session/market-feed-session.js";
export { DepthSession } from "./session/depth-session.js";
export { OrderUpdateSession } from "./session/order-update-session.js";
export { SessionRegistry } from "./session/session-registry.js";
export { ReconnectPolicy, backoffBaseDelay } from "./session/backoff.js";
export { createWebSocket, sanitizeUrl, type WsFactory, type WsLike } from "./session/transport.js";

export { createLogger, setLogHandler, resetLogHandler, type LogEntry, type LogHandler } from "./utils/logger.js";
