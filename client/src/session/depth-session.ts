import type { Credentials, InstrumentRef } from "@brokerstream/shared";
import { decodeDepthMessage } from "../feed/json-decoder.js";
import { buildInstrumentCommands, buildSocketUrl } from "./commands.js";
import { SessionManager, type ChannelProtocol, type SessionOptions } from "./session-manager.js";

export const DEPTH_SUBSCRIBE_CODE = 23;
export const DEPTH_UNSUBSCRIBE_CODE = 12;

export const DEFAULT_DEPTH_URL = "wss://depth-api-feed.dhan.co/twentydepth";
export const DEFAULT_FULL_DEPTH_URL = "wss://full-depth-api.dhan.co/twohundreddepth";

export type DepthLevelCount = 20 | 200;

export type DepthSessionOptions = Omit<SessionOptions, "protocol"> & {
  credentials: Credentials;
  depthLevel?: DepthLevelCount;
  depthUrl?: string;
  fullDepthUrl?: string;
};

export function depthProtocol(credentials: Credentials, base: string): ChannelProtocol {
  return {
    channel: "market-depth",
    payload: "json",
    url: () => buildSocketUrl(base, credentials),
    handshake: () => [],
    decode: (data) => decodeDepthMessage(typeof data === "string" ? data : Buffer.from(data).toString("utf8")),
    subscribeCommands: (refs: InstrumentRef[]) => buildInstrumentCommands(DEPTH_SUBSCRIBE_CODE, refs),
    unsubscribeCommands: (refs: InstrumentRef[]) => buildInstrumentCommands(DEPTH_UNSUBSCRIBE_CODE, refs),
  };
}

export class DepthSession extends SessionManager {
  readonly depthLevel: DepthLevelCount;

  constructor(options: DepthSessionOptions) {
    const depthLevel = options.depthLevel ?? 20;
    const base =
      depthLevel === 200
        ? (options.fullDepthUrl ?? DEFAULT_FULL_DEPTH_URL)
        : (options.depthUrl ?? DEFAULT_DEPTH_URL);
    super({ ...options, protocol: depthProtocol(options.credentials, base) });
    this.depthLevel = depthLevel;
  }
}
