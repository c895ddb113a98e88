import type {
  DecodedEvent,
  InstrumentRef,
  ReconnectConfig,
  SessionHealth,
  SessionState,
  SymbolRef,
} from "@brokerstream/shared";
import { AuthError, ResolutionError, TransportError } from "../errors.js";
import type { DecodeResult } from "../feed/frame-decoder.js";
import type { SubscriptionResolver } from "../resolver/subscription-resolver.js";
import { createLogger, errorMessage, type Logger } from "../utils/logger.js";
import { ReconnectPolicy } from "./backoff.js";
import { instrumentKey } from "./commands.js";
import {
  ABNORMAL_CLOSE,
  NORMAL_CLOSE,
  WS_OPEN,
  messageBytes,
  messageText,
  sanitizeUrl,
  type WsFactory,
  type WsLike,
} from "./transport.js";

export const DEFAULT_COOLOFF_MS = 60000;
export const DEFAULT_CONNECT_TIMEOUT_MS = 10000;
const RATE_LIMIT_MARKER = "429";
const AUTH_REJECTION = /\b401\b|unauthori[sz]ed|invalid (token|credentials)|authentication failed/i;

/** What differs between channels: endpoint, handshake, payload decoding and command codes. */
export type ChannelProtocol = {
  readonly channel: string;
  readonly payload: "binary" | "json";
  url(): string;
  handshake(): unknown[];
  decode(data: Uint8Array | string): DecodeResult;
  subscribeCommands?(refs: InstrumentRef[]): unknown[];
  unsubscribeCommands?(refs: InstrumentRef[]): unknown[];
};

export type SessionOptions = {
  protocol: ChannelProtocol;
  wsFactory: WsFactory;
  resolver?: SubscriptionResolver;
  reconnect?: Partial<ReconnectConfig>;
  random?: () => number;
  now?: () => number;
};

export type CloseInfo = {
  code: number;
  reason: string;
};

export type SessionEventMap = {
  event: DecodedEvent;
  open: undefined;
  close: CloseInfo;
  state: SessionState;
  error: Error;
};

export type SessionEventName = keyof SessionEventMap;

type Handler<T> = (payload: T) => void;

type ListenerTable = { [K in SessionEventName]: Array<Handler<SessionEventMap[K]>> };

export type SubscribeResult = {
  subscribed: InstrumentRef[];
  failed: ResolutionError[];
};

function toSymbolRefs(refs: SymbolRef | SymbolRef[]): SymbolRef[] {
  return Array.isArray(refs) ? refs : [refs];
}

function parseClose(args: unknown[]): CloseInfo {
  const [code, reason] = args;
  let text = "";
  if (typeof reason === "string") text = reason;
  else if (reason instanceof Uint8Array) text = Buffer.from(reason).toString("utf8");
  return { code: typeof code === "number" ? code : ABNORMAL_CLOSE, reason: text };
}

/**
 * One streaming channel: owns the socket, the reconnect state machine and
 * the channel's subscription set. Listener callbacks run synchronously on
 * message delivery; a throwing listener is logged and skipped.
 */
export class SessionManager {
  protected log: Logger;
  protected ws: WsLike | null = null;
  readonly protocol: ChannelProtocol;
  private wsFactory: WsFactory;
  private resolver: SubscriptionResolver | null;
  private policy: ReconnectPolicy;
  private readonly cooloffMs: number;
  private readonly connectTimeoutMs: number;
  private readonly maxAuthFailures: number | undefined;
  private readonly now: () => number;

  private _state: SessionState = "idle";
  private listeners: ListenerTable = { event: [], open: [], close: [], state: [], error: [] };
  private pendingLabels = new Set<string>();
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
  private connectTimer: ReturnType<typeof setTimeout> | null = null;
  private socketFailed = false;
  private lastSocketError: string | null = null;
  private receivedSinceOpen = false;
  private authFailures = 0;
  private failCount = 0;
  private lastMessageAt = 0;
  private lastFailureAt: number | undefined;
  private cooloffUntil: number | null = null;

  constructor(options: SessionOptions) {
    this.protocol = options.protocol;
    this.wsFactory = options.wsFactory;
    this.resolver = options.resolver ?? null;
    this.log = createLogger(`session:${options.protocol.channel}`);
    const reconnect = options.reconnect ?? {};
    this.policy = new ReconnectPolicy({
      baseDelayMs: reconnect.baseDelayMs,
      maxDelayMs: reconnect.maxDelayMs,
      jitterRatio: reconnect.jitterRatio,
      random: options.random,
    });
    this.cooloffMs = reconnect.cooloffMs ?? DEFAULT_COOLOFF_MS;
    this.connectTimeoutMs = reconnect.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
    this.maxAuthFailures = reconnect.maxAuthFailures;
    this.now = options.now ?? Date.now;
  }

  get channel(): string {
    return this.protocol.channel;
  }

  get state(): SessionState {
    return this._state;
  }

  get consecutiveFailures(): number {
    return this.policy.consecutiveFailures;
  }

  get connected(): boolean {
    return this._state === "open" && this.ws?.readyState === WS_OPEN;
  }

  start(): void {
    if (this._state === "stopped") {
      this.log.warn("start() ignored: session already stopped");
      return;
    }
    if (this._state !== "idle" || this.reconnectTimer !== null) return;
    this.log.info("Starting session", { url: sanitizeUrl(this.protocol.url()) });
    this.connect();
  }

  /** Terminal: closes the socket, cancels every timer and suppresses reconnects. */
  stop(): void {
    if (this._state === "stopped") return;
    this.log.info("Stopping session");
    this.clearTimers();
    this.setState("stopped");
    this.pendingLabels.clear();
    const ws = this.ws;
    this.ws = null;
    if (ws) {
      try {
        ws.close(NORMAL_CLOSE, "client stop");
      } catch (err) {
        this.log.warn("Error closing socket", { error: errorMessage(err) });
      }
    }
  }

  on<K extends SessionEventName>(event: K, handler: Handler<SessionEventMap[K]>): () => void {
    const list: Array<Handler<SessionEventMap[K]>> = this.listeners[event];
    list.push(handler);
    return () => {
      const index = list.indexOf(handler);
      if (index >= 0) list.splice(index, 1);
    };
  }

  async subscribe(refs: SymbolRef | SymbolRef[]): Promise<SubscribeResult> {
    const resolver = this.requireResolver();
    const batch: Array<{ label: string; ref: SymbolRef }> = [];
    for (const ref of toSymbolRefs(refs)) {
      const label = resolver.labelFor(ref);
      if (resolver.lookup(label) || this.pendingLabels.has(label)) continue;
      this.pendingLabels.add(label);
      batch.push({ label, ref });
    }

    const results = await Promise.all(batch.map(({ ref }) => resolver.resolve(ref)));

    const subscribed: InstrumentRef[] = [];
    const failed: ResolutionError[] = [];
    results.forEach((result, i) => {
      const entry = batch[i];
      if (!entry) return;
      this.pendingLabels.delete(entry.label);
      if (!result.ok) {
        failed.push(result.error);
        return;
      }
      if (this._state === "stopped") return;
      const alreadyOnWire = this.hasInstrument(result.ref);
      resolver.track(entry.label, result.ref);
      if (!alreadyOnWire) subscribed.push(result.ref);
    });

    if (subscribed.length > 0 && this._state === "open") {
      this.sendAll(this.protocol.subscribeCommands?.(subscribed) ?? []);
    }
    if (subscribed.length > 0) {
      this.log.info("Subscribed", { count: subscribed.length, sent: this._state === "open" });
    }
    return { subscribed, failed };
  }

  /** Labels with no active entry are ignored. */
  unsubscribe(refs: SymbolRef | SymbolRef[]): InstrumentRef[] {
    const resolver = this.requireResolver();
    const removed: InstrumentRef[] = [];
    for (const ref of toSymbolRefs(refs)) {
      const released = resolver.release(resolver.labelFor(ref));
      if (released && !this.hasInstrument(released)) removed.push(released);
    }
    if (removed.length > 0 && this._state === "open") {
      this.sendAll(this.protocol.unsubscribeCommands?.(removed) ?? []);
    }
    if (removed.length > 0) {
      this.log.info("Unsubscribed", { count: removed.length });
    }
    return removed;
  }

  subscriptions(): Array<[string, InstrumentRef]> {
    return this.resolver?.activeEntries() ?? [];
  }

  healthCheck(): SessionHealth {
    return {
      channel: this.channel,
      state: this._state,
      failCount: this.failCount,
      consecutiveFailures: this.policy.consecutiveFailures,
      lastMessageAt: this.lastMessageAt,
      lastFailureAt: this.lastFailureAt,
      cooloffUntil: this.cooloffUntil ?? undefined,
      subscriptions: this.resolver?.activeEntries().length ?? 0,
    };
  }

  /** Sends one JSON command if the socket is open; returns whether it went out. */
  protected send(message: unknown): boolean {
    const ws = this.ws;
    if (!ws || ws.readyState !== WS_OPEN) return false;
    try {
      ws.send(JSON.stringify(message));
      return true;
    } catch (err) {
      this.failCount++;
      this.lastFailureAt = this.now();
      this.log.warn("Failed to send message", { error: errorMessage(err) });
      return false;
    }
  }

  private sendAll(messages: unknown[]): void {
    for (const message of messages) {
      this.send(message);
    }
  }

  private requireResolver(): SubscriptionResolver {
    if (!this.resolver) {
      throw new Error(`Channel ${this.channel} does not accept subscriptions`);
    }
    return this.resolver;
  }

  private hasInstrument(ref: InstrumentRef): boolean {
    const key = instrumentKey(ref);
    return this.subscriptions().some(([, active]) => instrumentKey(active) === key);
  }

  private emit<K extends SessionEventName>(event: K, payload: SessionEventMap[K]): void {
    const list: Array<Handler<SessionEventMap[K]>> = [...this.listeners[event]];
    for (const handler of list) {
      try {
        handler(payload);
      } catch (err) {
        this.log.error("Error in event handler", { event, error: errorMessage(err) });
      }
    }
  }

  private setState(state: SessionState): void {
    if (this._state === state) return;
    this._state = state;
    this.emit("state", state);
  }

  private clearTimers(): void {
    if (this.reconnectTimer !== null) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
    if (this.connectTimer !== null) {
      clearTimeout(this.connectTimer);
      this.connectTimer = null;
    }
  }

  private connect(): void {
    this.reconnectTimer = null;
    if (this._state === "stopped") return;

    this.cooloffUntil = null;
    this.socketFailed = false;
    this.lastSocketError = null;
    this.receivedSinceOpen = false;
    this.setState("connecting");

    const url = this.protocol.url();
    this.log.info("Connecting", { url: sanitizeUrl(url), attempt: this.policy.consecutiveFailures + 1 });

    let ws: WsLike;
    try {
      ws = this.wsFactory(url);
    } catch (err) {
      this.recordFailure(err);
      this.handleClose({ code: ABNORMAL_CLOSE, reason: `connect failed: ${errorMessage(err)}` });
      return;
    }
    this.ws = ws;

    this.connectTimer = setTimeout(() => {
      this.connectTimer = null;
      if (this.ws !== ws || this._state !== "connecting") return;
      this.log.warn("Connect timed out", { timeoutMs: this.connectTimeoutMs });
      this.ws = null;
      this.abandon(ws);
      this.recordFailure(new TransportError("connect timeout"));
      this.handleClose({ code: ABNORMAL_CLOSE, reason: "connect timeout" });
    }, this.connectTimeoutMs);

    ws.on("open", () => {
      if (this.ws === ws) this.handleOpen();
    });
    ws.on("message", (...args: unknown[]) => {
      if (this.ws === ws) this.handleMessage(args[0]);
    });
    ws.on("error", (err: unknown) => {
      if (this.ws !== ws) return;
      this.socketFailed = true;
      this.lastSocketError = errorMessage(err);
      this.recordFailure(err);
      this.log.error("WebSocket error", { error: errorMessage(err), failCount: this.failCount });
    });
    ws.on("close", (...args: unknown[]) => {
      if (this.ws !== ws) return;
      this.ws = null;
      const info = parseClose(args);
      // A rejected upgrade closes with 1006 and no reason; the status is only in the error.
      if (info.reason === "" && this.lastSocketError !== null) {
        info.reason = this.lastSocketError;
      }
      this.handleClose(info);
    });
  }

  private abandon(ws: WsLike): void {
    try {
      if (ws.terminate) ws.terminate();
      else ws.close();
    } catch (err) {
      this.log.debug("Error abandoning socket", { error: errorMessage(err) });
    }
  }

  private recordFailure(err: unknown): void {
    this.failCount++;
    this.lastFailureAt = this.now();
    this.emit("error", err instanceof Error ? err : new TransportError(errorMessage(err)));
  }

  private handleOpen(): void {
    if (this.connectTimer !== null) {
      clearTimeout(this.connectTimer);
      this.connectTimer = null;
    }
    this.setState("open");
    this.log.info("Connected");

    this.sendAll(this.protocol.handshake());

    // Replay a snapshot of the subscription set before anything else goes out.
    const snapshot = this.subscriptions().map(([, ref]) => ref);
    if (snapshot.length > 0) {
      this.sendAll(this.protocol.subscribeCommands?.(snapshot) ?? []);
      this.log.info("Replayed subscriptions", { count: snapshot.length });
    }
    this.emit("open", undefined);
  }

  private handleMessage(raw: unknown): void {
    const data = this.protocol.payload === "binary" ? messageBytes(raw) : messageText(raw);
    if (data === null) {
      this.log.warn("Dropped message with unsupported payload type");
      return;
    }

    const result = this.protocol.decode(data);
    if (!result.ok) {
      this.failCount++;
      this.log.warn("Dropped malformed frame", { error: result.error.message, failCount: this.failCount });
      return;
    }

    this.lastMessageAt = this.now();
    this.receivedSinceOpen = true;
    this.authFailures = 0;
    if (result.event.kind === "disconnect") {
      this.log.warn("Server sent disconnect", { reasonCode: result.event.reasonCode });
    }
    this.emit("event", result.event);
  }

  private handleClose(info: CloseInfo): void {
    if (this.connectTimer !== null) {
      clearTimeout(this.connectTimer);
      this.connectTimer = null;
    }
    this.log.warn("Connection closed", { code: info.code, reason: info.reason });
    this.emit("close", info);
    if (this._state === "stopped") return;

    if (this.isAuthRejection(info)) {
      this.authFailures++;
      if (this.maxAuthFailures !== undefined && this.authFailures >= this.maxAuthFailures) {
        const err = new AuthError(`Login rejected ${this.authFailures} times in a row`, this.authFailures);
        this.log.error("Giving up after repeated login rejection", { attempts: this.authFailures });
        this.emit("error", err);
        this.stop();
        return;
      }
    }

    if (info.reason.includes(RATE_LIMIT_MARKER)) {
      this.cooloffUntil = this.now() + this.cooloffMs;
      this.setState("cooling-off");
      this.log.warn("Cooling off after rate-limit rejection", { cooloffMs: this.cooloffMs });
      this.scheduleConnect(this.cooloffMs);
      return;
    }

    const clean = info.code === NORMAL_CLOSE && !this.socketFailed;
    let delay = 0;
    if (clean) {
      this.policy.reset();
    } else {
      delay = this.policy.recordFailure();
    }
    this.setState("idle");
    this.log.info("Reconnecting", { delayMs: Math.round(delay), consecutiveFailures: this.policy.consecutiveFailures });
    this.scheduleConnect(delay);
  }

  private isAuthRejection(info: CloseInfo): boolean {
    if (this.protocol.handshake().length === 0) return false;
    if (this.receivedSinceOpen) return false;
    return info.code === 1008 || info.code === 4001 || AUTH_REJECTION.test(info.reason);
  }

  private scheduleConnect(delayMs: number): void {
    this.reconnectTimer = setTimeout(() => this.connect(), delayMs);
  }
}
