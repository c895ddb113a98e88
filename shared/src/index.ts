export type {
  ExchangeSegment,
  FeedMode,
  InstrumentRef,
  InstrumentDescriptor,
  SymbolRef,
  Instrument,
  DepthLevel,
  QuoteFields,
  TickerEvent,
  QuoteEvent,
  FullEvent,
  DepthLevelEvent,
  OpenInterestEvent,
  PrevCloseEvent,
  DisconnectEvent,
  BookEntry,
  DepthBookEvent,
  OrderAlertEvent,
  UnrecognizedEvent,
  DecodedEvent,
  DecodedEventKind,
  SessionState,
  SessionHealth,
} from "./feed.js";

export type {
  TransactionType,
  OrderStatus,
  OrderUpdate,
  OrderState,
  TrackedOrder,
  OrderAlertEnvelope,
} from "./orders.js";

export {
  OrderAlertDataSchema,
  OrderAlertEnvelopeSchema,
  toOrderUpdate,
  parseOrderAlert,
  isTerminalStatus,
  executionPercentage,
  pendingQuantity,
} from "./orders.js";

export {
  type ClientConfig,
  type ClientConfigInput,
  type Credentials,
  type ReconnectConfig,
  type OrderTrackingConfig,
  type EndpointsConfig,
  type FeedConfig,
  type RateWindow,
  ClientConfigSchema,
  RateWindowSchema,
  parseConfig,
} from "./config.js";
