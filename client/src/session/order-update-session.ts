import type { Credentials } from "@brokerstream/shared";
import { decodeOrderMessage } from "../feed/json-decoder.js";
import { buildLoginPayload } from "./commands.js";
import { SessionManager, type ChannelProtocol, type SessionOptions } from "./session-manager.js";

export const DEFAULT_ORDER_URL = "wss://api-order-update.dhan.co";

export type OrderUpdateSessionOptions = Omit<SessionOptions, "protocol" | "resolver"> & {
  credentials: Credentials;
  orderUrl?: string;
};

/** The order channel carries no subscriptions: login is its only outbound message. */
export function orderUpdateProtocol(credentials: Credentials, orderUrl = DEFAULT_ORDER_URL): ChannelProtocol {
  return {
    channel: "order-update",
    payload: "json",
    url: () => orderUrl,
    handshake: () => [buildLoginPayload(credentials)],
    decode: (data) => decodeOrderMessage(typeof data === "string" ? data : Buffer.from(data).toString("utf8")),
  };
}

export class OrderUpdateSession extends SessionManager {
  constructor(options: OrderUpdateSessionOptions) {
    super({ ...options, protocol: orderUpdateProtocol(options.credentials, options.orderUrl) });
  }
}
