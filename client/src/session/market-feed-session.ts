import type { Credentials, FeedMode, InstrumentRef } from "@brokerstream/shared";
import { decodeFrame } from "../feed/frame-decoder.js";
import { buildInstrumentCommands, buildSocketUrl, DISCONNECT_REQUEST_CODE } from "./commands.js";
import { SessionManager, type ChannelProtocol, type SessionOptions } from "./session-manager.js";

export const FEED_SUBSCRIBE_CODES: Record<FeedMode, number> = { ticker: 15, quote: 17, full: 21 };
export const FEED_UNSUBSCRIBE_CODES: Record<FeedMode, number> = { ticker: 16, quote: 18, full: 22 };

export const DEFAULT_FEED_URL = "wss://api-feed.dhan.co";
export const DEFAULT_FEED_VERSION = 2;

export type MarketFeedSessionOptions = Omit<SessionOptions, "protocol"> & {
  credentials: Credentials;
  mode?: FeedMode;
  feedUrl?: string;
  feedVersion?: number;
};

export function marketFeedProtocol(
  credentials: Credentials,
  mode: FeedMode,
  feedUrl = DEFAULT_FEED_URL,
  feedVersion = DEFAULT_FEED_VERSION,
): ChannelProtocol {
  return {
    channel: "market-feed",
    payload: "binary",
    url: () => buildSocketUrl(feedUrl, credentials, { version: feedVersion }),
    handshake: () => [],
    decode: (data) => decodeFrame(typeof data === "string" ? Buffer.from(data, "utf8") : data),
    subscribeCommands: (refs: InstrumentRef[]) => buildInstrumentCommands(FEED_SUBSCRIBE_CODES[mode], refs),
    unsubscribeCommands: (refs: InstrumentRef[]) => buildInstrumentCommands(FEED_UNSUBSCRIBE_CODES[mode], refs),
  };
}

/** Binary ticker/quote/full feed. The mode is fixed for the lifetime of the session. */
export class MarketFeedSession extends SessionManager {
  readonly mode: FeedMode;

  constructor(options: MarketFeedSessionOptions) {
    const mode = options.mode ?? "ticker";
    super({
      ...options,
      protocol: marketFeedProtocol(options.credentials, mode, options.feedUrl, options.feedVersion),
    });
    this.mode = mode;
  }

  /** Asks the server to drop the feed, then stops without reconnecting. */
  disconnect(): void {
    if (!this.send({ RequestCode: DISCONNECT_REQUEST_CODE })) {
      this.log.debug("Disconnect request not sent: socket not open");
    }
    this.stop();
  }
}
