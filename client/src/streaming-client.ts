import type { ClientConfig, SessionHealth } from "@brokerstream/shared";
import { OrderStateTracker } from "./orders/order-state-tracker.js";
import { OrderUpdateHub } from "./orders/order-update-hub.js";
import { HttpInstrumentDirectory } from "./resolver/http-instrument-directory.js";
import { InstrumentCache } from "./resolver/instrument-cache.js";
import type { InstrumentDirectory } from "./resolver/instrument-directory.js";
import { SubscriptionResolver } from "./resolver/subscription-resolver.js";
import { DepthSession } from "./session/depth-session.js";
import { MarketFeedSession } from "./session/market-feed-session.js";
import { OrderUpdateSession } from "./session/order-update-session.js";
import { SessionRegistry } from "./session/session-registry.js";
import { createWebSocket, type WsFactory } from "./session/transport.js";
import { RateLimiter } from "./throttle/rate-limiter.js";
import { mergeRateLimits } from "./throttle/rate-limits.js";
import { createThrottledFetch, type FetchLike } from "./throttle/throttled-fetch.js";
import { createLogger } from "./utils/logger.js";

export type StreamingClientOptions = {
  wsFactory?: WsFactory;
  directory?: InstrumentDirectory;
  fetch?: FetchLike;
  random?: () => number;
  now?: () => number;
};

/**
 * Wires the channels to one config: a shared instrument cache and rate
 * limiter, one session per channel created on first use, and a registry
 * that tears everything down in `stop()`.
 */
export class StreamingClient {
  private log = createLogger("streaming-client");
  readonly config: ClientConfig;
  readonly limiter: RateLimiter;
  readonly instruments: InstrumentCache;
  readonly registry = new SessionRegistry();
  readonly tracker: OrderStateTracker;
  private wsFactory: WsFactory;
  private random: (() => number) | undefined;
  private now: (() => number) | undefined;
  private feedSession: MarketFeedSession | null = null;
  private depthSession: DepthSession | null = null;
  private orderHub: OrderUpdateHub | null = null;

  constructor(config: ClientConfig, options: StreamingClientOptions = {}) {
    this.config = config;
    this.wsFactory = options.wsFactory ?? createWebSocket;
    this.random = options.random;
    this.now = options.now;
    this.limiter = new RateLimiter(mergeRateLimits(config.rateLimits), { now: options.now });
    const directory =
      options.directory ??
      new HttpInstrumentDirectory({
        baseUrl: config.endpoints.instrumentUrl,
        accessToken: config.credentials.accessToken,
        fetch: createThrottledFetch(this.limiter, "data", options.fetch),
      });
    this.instruments = new InstrumentCache(directory);
    this.tracker = new OrderStateTracker({ ...config.orders, now: options.now });
  }

  feed(): MarketFeedSession {
    if (!this.feedSession) {
      this.feedSession = new MarketFeedSession({
        credentials: this.config.credentials,
        mode: this.config.feed.mode,
        feedUrl: this.config.endpoints.feedUrl,
        feedVersion: this.config.endpoints.feedVersion,
        ...this.sessionOptions(),
        resolver: this.newResolver(),
      });
      this.registry.register(this.feedSession);
    }
    return this.feedSession;
  }

  depth(): DepthSession {
    if (!this.depthSession) {
      this.depthSession = new DepthSession({
        credentials: this.config.credentials,
        depthLevel: this.config.endpoints.depthLevel,
        depthUrl: this.config.endpoints.depthUrl,
        fullDepthUrl: this.config.endpoints.fullDepthUrl,
        ...this.sessionOptions(),
        resolver: this.newResolver(),
      });
      this.registry.register(this.depthSession);
    }
    return this.depthSession;
  }

  orders(): OrderUpdateHub {
    if (!this.orderHub) {
      const session = new OrderUpdateSession({
        credentials: this.config.credentials,
        orderUrl: this.config.endpoints.orderUrl,
        ...this.sessionOptions(),
      });
      this.registry.register(session);
      this.orderHub = new OrderUpdateHub(session, this.tracker);
    }
    return this.orderHub;
  }

  healthCheck(): SessionHealth[] {
    return this.registry.healthCheck();
  }

  stop(): void {
    this.log.info("Stopping all sessions", { sessions: this.registry.list().length });
    this.orderHub?.stop();
    this.registry.stopAll();
    this.tracker.stop();
    this.limiter.stop();
  }

  private sessionOptions() {
    return {
      wsFactory: this.wsFactory,
      reconnect: this.config.reconnect,
      random: this.random,
      now: this.now,
    };
  }

  private newResolver(): SubscriptionResolver {
    return new SubscriptionResolver(this.instruments);
  }
}

export function createStreamingClient(config: ClientConfig, options: StreamingClientOptions = {}): StreamingClient {
  return new StreamingClient(config, options);
}
