export type ExchangeSegment =
  | "IDX_I"
  | "NSE_EQ"
  | "NSE_FNO"
  | "NSE_CURRENCY"
  | "BSE_EQ"
  | "MCX_COMM"
  | "BSE_CURRENCY"
  | "BSE_FNO";

export type FeedMode = "ticker" | "quote" | "full";

export type InstrumentRef = {
  readonly exchangeSegment: string;
  readonly securityId: string;
  readonly displayLabel: string;
  readonly originalInput: SymbolRef;
};

export type InstrumentDescriptor = {
  exchangeSegment?: string;
  securityId?: string | number;
  symbol?: string;
  displayName?: string;
};

export type SymbolRef = string | InstrumentDescriptor;

export type Instrument = {
  symbolName: string;
  displayName?: string;
  securityId: string;
  exchangeSegment: string;
  series?: string;
};

type FrameMeta = {
  segment: string;
  securityId: string;
};

export type DepthLevel = {
  bidQuantity: number;
  askQuantity: number;
  bidOrders: number;
  askOrders: number;
  bidPrice: number;
  askPrice: number;
};

export type TickerEvent = FrameMeta & {
  kind: "ticker";
  ltp: number;
  ltt: number;
};

export type QuoteFields = {
  ltp: number;
  lastTradeQty: number;
  ltt: number;
  atp: number;
  volume: number;
  totalSellQty: number;
  totalBuyQty: number;
  dayOpen: number;
  dayClose: number;
  dayHigh: number;
  dayLow: number;
};

export type QuoteEvent = FrameMeta & QuoteFields & { kind: "quote" };

export type FullEvent = FrameMeta &
  QuoteFields & {
    kind: "full";
    openInterest: number;
    highestOpenInterest: number;
    lowestOpenInterest: number;
    depth: DepthLevel[];
  };

export type DepthLevelEvent = FrameMeta &
  DepthLevel & {
    kind: "depth-level";
    side: "bid" | "ask";
  };

export type OpenInterestEvent = FrameMeta & {
  kind: "open-interest";
  openInterest: number;
};

export type PrevCloseEvent = FrameMeta & {
  kind: "prev-close";
  prevClose: number;
  oiPrev: number;
};

export type DisconnectEvent = FrameMeta & {
  kind: "disconnect";
  reasonCode: number;
};

export type BookEntry = {
  price: number;
  quantity: number;
  orders: number;
};

export type DepthBookEvent = {
  kind: "depth-book";
  type: "depth_update" | "depth_snapshot";
  symbol?: string;
  segment?: string;
  securityId?: string;
  timestamp?: string | number;
  bids: BookEntry[];
  asks: BookEntry[];
  bestBid: number;
  bestAsk: number;
  spread: number;
  totalBidQty: number;
  totalAskQty: number;
};

export type OrderAlertEvent = {
  kind: "order-alert";
  data: Record<string, unknown>;
};

export type UnrecognizedEvent = {
  kind: "unrecognized";
  responseCode?: number;
  raw: Uint8Array | string;
};

export type DecodedEvent =
  | TickerEvent
  | QuoteEvent
  | FullEvent
  | DepthLevelEvent
  | OpenInterestEvent
  | PrevCloseEvent
  | DisconnectEvent
  | DepthBookEvent
  | OrderAlertEvent
  | UnrecognizedEvent;

export type DecodedEventKind = DecodedEvent["kind"];

export type SessionState = "idle" | "connecting" | "open" | "cooling-off" | "stopped";

export type SessionHealth = {
  channel: string;
  state: SessionState;
  failCount: number;
  consecutiveFailures: number;
  lastMessageAt: number;
  lastFailureAt?: number;
  cooloffUntil?: number;
  subscriptions: number;
};
