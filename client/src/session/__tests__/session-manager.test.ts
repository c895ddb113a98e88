import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { DecodedEvent, Instrument, SessionState } from "@brokerstream/shared";
import { MarketFeedSession } from "../market-feed-session.js";
import { OrderUpdateSession } from "../order-update-session.js";
import { DepthSession } from "../depth-session.js";
import { SubscriptionResolver } from "../../resolver/subscription-resolver.js";
import { StaticInstrumentDirectory } from "../../resolver/http-instrument-directory.js";
import { AuthError, TransportError } from "../../errors.js";
import { resetLogHandler, setLogHandler, type LogEntry } from "../../utils/logger.js";
import { createMockFactory, type MockWebSocket } from "../../__tests__/helpers/mock-ws.js";
import { frame, tickerPayload } from "../../__tests__/helpers/frames.js";

const credentials = { clientId: "1000000001", accessToken: "test-token", userType: "SELF" as const };

const instruments: Instrument[] = [
  { symbolName: "RELIANCE", securityId: "2885", exchangeSegment: "NSE_EQ" },
  { symbolName: "TCS", securityId: "11536", exchangeSegment: "NSE_EQ" },
];

let mock: ReturnType<typeof createMockFactory>;
let logs: LogEntry[];

function createFeed(mode: "ticker" | "quote" | "full" = "ticker") {
  return new MarketFeedSession({
    credentials,
    mode,
    wsFactory: mock.factory,
    resolver: new SubscriptionResolver(new StaticInstrumentDirectory(instruments)),
    random: () => 0,
  });
}

function socket(index: number): MockWebSocket {
  const ws = mock.instances[index];
  if (!ws) throw new Error(`no socket #${index}`);
  return ws;
}

const relianceCommand = (code: number) => ({
  RequestCode: code,
  InstrumentCount: 1,
  InstrumentList: [{ ExchangeSegment: "NSE_EQ", SecurityId: "2885" }],
});

describe("SessionManager", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(0);
    mock = createMockFactory();
    logs = [];
    setLogHandler((entry) => logs.push(entry));
  });

  afterEach(() => {
    resetLogHandler();
    vi.useRealTimers();
  });

  describe("connection lifecycle", () => {
    it("connects to the feed URL with version and credentials", () => {
      const feed = createFeed();
      feed.start();

      expect(mock.instances).toHaveLength(1);
      expect(socket(0).url).toBe(
        "wss://api-feed.dhan.co/?version=2&token=test-token&clientId=1000000001&authType=2",
      );
      expect(feed.state).toBe("connecting");

      socket(0).simulateOpen();
      expect(feed.state).toBe("open");
      expect(feed.connected).toBe(true);
      feed.stop();
    });

    it("does not log credentials", () => {
      const feed = createFeed();
      feed.start();
      const logged = JSON.stringify(logs);
      expect(logged).not.toContain("test-token");
      expect(logged).not.toContain("1000000001");
      feed.stop();
    });

    it("emits state transitions", () => {
      const feed = createFeed();
      const states: SessionState[] = [];
      feed.on("state", (s) => states.push(s));

      feed.start();
      socket(0).simulateOpen();
      feed.stop();
      expect(states).toEqual(["connecting", "open", "stopped"]);
    });

    it("stop is idempotent and terminal", async () => {
      const feed = createFeed();
      const states: SessionState[] = [];
      feed.on("state", (s) => states.push(s));
      feed.start();
      socket(0).simulateOpen();

      feed.stop();
      feed.stop();
      feed.start();
      await vi.advanceTimersByTimeAsync(120000);

      expect(states.filter((s) => s === "stopped")).toHaveLength(1);
      expect(mock.instances).toHaveLength(1);
      expect(socket(0).closedWith).toEqual({ code: 1000, reason: "client stop" });
    });

    it("cancels a pending reconnect on stop", async () => {
      const feed = createFeed();
      feed.start();
      socket(0).simulateClose(1006);
      feed.stop();

      await vi.advanceTimersByTimeAsync(10000);
      expect(mock.instances).toHaveLength(1);
    });
  });

  describe("reconnect", () => {
    it("backs off exponentially across abnormal closes", async () => {
      const feed = createFeed();
      feed.start();

      socket(0).simulateClose(1006);
      expect(feed.consecutiveFailures).toBe(1);
      await vi.advanceTimersByTimeAsync(1999);
      expect(mock.instances).toHaveLength(1);
      await vi.advanceTimersByTimeAsync(1);
      expect(mock.instances).toHaveLength(2);

      socket(1).simulateClose(1006);
      await vi.advanceTimersByTimeAsync(3999);
      expect(mock.instances).toHaveLength(2);
      await vi.advanceTimersByTimeAsync(1);
      expect(mock.instances).toHaveLength(3);

      socket(2).simulateClose(1006);
      await vi.advanceTimersByTimeAsync(8000);
      expect(mock.instances).toHaveLength(4);
      expect(feed.consecutiveFailures).toBe(3);
      feed.stop();
    });

    it("resets backoff after a clean close and reconnects immediately", async () => {
      const feed = createFeed();
      feed.start();
      socket(0).simulateClose(1006);
      await vi.advanceTimersByTimeAsync(2000);

      socket(1).simulateOpen();
      socket(1).simulateClose(1000);
      expect(feed.consecutiveFailures).toBe(0);
      await vi.advanceTimersByTimeAsync(0);
      expect(mock.instances).toHaveLength(3);
      feed.stop();
    });

    it("treats a close after a socket error as abnormal", async () => {
      const feed = createFeed();
      const errors: Error[] = [];
      feed.on("error", (err) => errors.push(err));
      feed.start();
      socket(0).simulateOpen();
      socket(0).simulateError(new Error("ECONNRESET"));
      socket(0).simulateClose(1000);

      expect(errors.map((e) => e.message)).toEqual(["ECONNRESET"]);
      expect(feed.consecutiveFailures).toBe(1);
      expect(feed.healthCheck().failCount).toBe(1);
      feed.stop();
    });

    it("cools off for 60s after a 429 without touching the backoff counter", async () => {
      const feed = createFeed();
      feed.start();
      socket(0).simulateOpen();
      socket(0).simulateClose(1006, "HTTP 429 Too Many Requests");

      expect(feed.state).toBe("cooling-off");
      expect(feed.consecutiveFailures).toBe(0);
      expect(feed.healthCheck().cooloffUntil).toBe(60000);

      await vi.advanceTimersByTimeAsync(59999);
      expect(mock.instances).toHaveLength(1);
      await vi.advanceTimersByTimeAsync(1);
      expect(mock.instances).toHaveLength(2);
      expect(feed.state).toBe("connecting");
      expect(feed.healthCheck().cooloffUntil).toBeUndefined();
      feed.stop();
    });

    it("cools off when the upgrade is refused with 429 and the close carries no reason", async () => {
      const feed = createFeed();
      const errors: Error[] = [];
      const closes: Array<{ code: number; reason: string }> = [];
      feed.on("error", (err) => errors.push(err));
      feed.on("close", (info) => closes.push(info));
      feed.start();
      socket(0).simulateError(new Error("Unexpected server response: 429"));
      socket(0).simulateClose(1006);

      expect(errors.map((e) => e.message)).toEqual(["Unexpected server response: 429"]);
      expect(closes).toEqual([{ code: 1006, reason: "Unexpected server response: 429" }]);
      expect(feed.state).toBe("cooling-off");
      expect(feed.consecutiveFailures).toBe(0);
      expect(feed.healthCheck().cooloffUntil).toBe(60000);

      await vi.advanceTimersByTimeAsync(2000);
      expect(mock.instances).toHaveLength(1);
      await vi.advanceTimersByTimeAsync(58000);
      expect(mock.instances).toHaveLength(2);
      feed.stop();
    });

    it("keeps earlier failures counted across a 429 cool-off", async () => {
      const feed = createFeed();
      feed.start();
      socket(0).simulateClose(1006);
      await vi.advanceTimersByTimeAsync(2000);
      socket(1).simulateClose(1006);
      await vi.advanceTimersByTimeAsync(4000);
      expect(mock.instances).toHaveLength(3);
      expect(feed.consecutiveFailures).toBe(2);

      socket(2).simulateClose(1006, "HTTP 429 Too Many Requests");
      expect(feed.state).toBe("cooling-off");
      expect(feed.consecutiveFailures).toBe(2);

      await vi.advanceTimersByTimeAsync(60000);
      expect(mock.instances).toHaveLength(4);
      expect(feed.consecutiveFailures).toBe(2);

      // third abnormal close in a row: 2000 * 2^2
      socket(3).simulateClose(1006);
      expect(feed.consecutiveFailures).toBe(3);
      await vi.advanceTimersByTimeAsync(7999);
      expect(mock.instances).toHaveLength(4);
      await vi.advanceTimersByTimeAsync(1);
      expect(mock.instances).toHaveLength(5);
      feed.stop();
    });

    it("abandons a handshake that does not finish in time", async () => {
      const feed = createFeed();
      const errors: Error[] = [];
      feed.on("error", (err) => errors.push(err));
      feed.start();

      await vi.advanceTimersByTimeAsync(10000);
      expect(socket(0).terminated).toBe(true);
      expect(errors[0]).toBeInstanceOf(TransportError);
      expect(errors[0]?.message).toBe("connect timeout");
      expect(feed.consecutiveFailures).toBe(1);

      await vi.advanceTimersByTimeAsync(2000);
      expect(mock.instances).toHaveLength(2);
      feed.stop();
    });
  });

  describe("subscriptions", () => {
    it("sends one subscribe command per new instrument set", async () => {
      const feed = createFeed();
      feed.start();
      socket(0).simulateOpen();

      const first = await feed.subscribe("RELIANCE");
      const second = await feed.subscribe("reliance");

      expect(first.subscribed).toHaveLength(1);
      expect(second.subscribed).toEqual([]);
      expect(socket(0).sent()).toEqual([relianceCommand(15)]);
      feed.stop();
    });

    it("dedupes concurrent subscribes of the same label", async () => {
      const feed = createFeed();
      feed.start();
      socket(0).simulateOpen();

      await Promise.all([feed.subscribe("RELIANCE"), feed.subscribe(" reliance ")]);
      expect(socket(0).sent()).toEqual([relianceCommand(15)]);
      feed.stop();
    });

    it("uses the request codes of the configured mode", async () => {
      const feed = createFeed("full");
      feed.start();
      socket(0).simulateOpen();
      await feed.subscribe("RELIANCE");
      feed.unsubscribe("RELIANCE");

      expect(socket(0).sent()).toEqual([relianceCommand(21), relianceCommand(22)]);
      feed.stop();
    });

    it("keeps going past refs that do not resolve", async () => {
      const feed = createFeed();
      const result = await feed.subscribe(["NOPE", "TCS"]);

      expect(result.subscribed.map((r) => r.securityId)).toEqual(["11536"]);
      expect(result.failed.map((e) => e.label)).toEqual(["NOPE"]);
      expect(feed.subscriptions().map(([label]) => label)).toEqual(["TCS"]);
    });

    it("replays the subscription set on every open", async () => {
      const feed = createFeed("quote");
      await feed.subscribe(["RELIANCE", "TCS"]);
      feed.start();
      socket(0).simulateOpen();

      const replay = {
        RequestCode: 17,
        InstrumentCount: 2,
        InstrumentList: [
          { ExchangeSegment: "NSE_EQ", SecurityId: "2885" },
          { ExchangeSegment: "NSE_EQ", SecurityId: "11536" },
        ],
      };
      expect(socket(0).sent()).toEqual([replay]);

      socket(0).simulateClose(1006);
      await vi.advanceTimersByTimeAsync(2000);
      socket(1).simulateOpen();
      expect(socket(1).sent()).toEqual([replay]);
      feed.stop();
    });

    it("ignores unsubscribe of labels that are not active", async () => {
      const feed = createFeed();
      feed.start();
      socket(0).simulateOpen();

      expect(feed.unsubscribe("TCS")).toEqual([]);
      expect(socket(0).sent()).toEqual([]);
      feed.stop();
    });

    it("sends the disconnect request before stopping", async () => {
      const feed = createFeed();
      feed.start();
      socket(0).simulateOpen();
      feed.disconnect();

      expect(socket(0).sent()).toEqual([{ RequestCode: 12 }]);
      expect(feed.state).toBe("stopped");
    });
  });

  describe("inbound messages", () => {
    it("emits decoded events and records the message time", async () => {
      const feed = createFeed();
      const events: DecodedEvent[] = [];
      feed.on("event", (e) => events.push(e));
      feed.start();
      socket(0).simulateOpen();

      vi.setSystemTime(5000);
      socket(0).simulateMessage(frame(2, 1, 2885, tickerPayload(2450.5, 1700000000)));

      expect(events).toEqual([
        { kind: "ticker", segment: "NSE_EQ", securityId: "2885", ltp: 2450.5, ltt: 1700000000 },
      ]);
      expect(feed.healthCheck().lastMessageAt).toBe(5000);
      feed.stop();
    });

    it("drops malformed frames without closing the session", () => {
      const feed = createFeed();
      const events: DecodedEvent[] = [];
      feed.on("event", (e) => events.push(e));
      feed.start();
      socket(0).simulateOpen();

      socket(0).simulateMessage(Buffer.alloc(3));
      socket(0).simulateMessage(frame(2, 1, 2885, tickerPayload(1, 1)));

      expect(events).toHaveLength(1);
      expect(feed.state).toBe("open");
      expect(feed.healthCheck().failCount).toBe(1);
      expect(logs.some((l) => l.level === "warn" && l.message === "Dropped malformed frame")).toBe(true);
      feed.stop();
    });

    it("isolates listeners that throw", () => {
      const feed = createFeed();
      const received: DecodedEvent[] = [];
      feed.on("event", () => {
        throw new Error("listener bug");
      });
      feed.on("event", (e) => received.push(e));
      feed.start();
      socket(0).simulateOpen();

      socket(0).simulateMessage(frame(2, 1, 2885, tickerPayload(1, 1)));

      expect(received).toHaveLength(1);
      expect(feed.state).toBe("open");
      const logged = logs.find((l) => l.message === "Error in event handler");
      expect(logged?.data).toEqual({ event: "event", error: "listener bug" });
      feed.stop();
    });

    it("stops delivering to a removed listener", () => {
      const feed = createFeed();
      const handler = vi.fn();
      const off = feed.on("event", handler);
      feed.start();
      socket(0).simulateOpen();
      off();

      socket(0).simulateMessage(frame(2, 1, 2885, tickerPayload(1, 1)));
      expect(handler).not.toHaveBeenCalled();
      feed.stop();
    });
  });

  describe("order channel", () => {
    it("sends the login payload on every open", async () => {
      const session = new OrderUpdateSession({ credentials, wsFactory: mock.factory, random: () => 0 });
      session.start();
      expect(socket(0).url).toBe("wss://api-order-update.dhan.co");
      socket(0).simulateOpen();

      const login = { LoginReq: { MsgCode: 42, ClientId: "1000000001", Token: "test-token" }, UserType: "SELF" };
      expect(socket(0).sent()).toEqual([login]);

      socket(0).simulateClose(1006);
      await vi.advanceTimersByTimeAsync(2000);
      socket(1).simulateOpen();
      expect(socket(1).sent()).toEqual([login]);
      session.stop();
    });

    it("sends the partner login", () => {
      const session = new OrderUpdateSession({
        credentials: { clientId: "1000000001", userType: "PARTNER", partnerId: "partner-1", partnerSecret: "test-secret" },
        wsFactory: mock.factory,
      });
      session.start();
      socket(0).simulateOpen();
      expect(socket(0).sent()).toEqual([
        { LoginReq: { MsgCode: 42, ClientId: "partner-1" }, UserType: "PARTNER", Secret: "test-secret" },
      ]);
      session.stop();
    });

    it("gives up after repeated login rejections when a limit is set", async () => {
      const session = new OrderUpdateSession({
        credentials,
        wsFactory: mock.factory,
        random: () => 0,
        reconnect: { maxAuthFailures: 2 },
      });
      const errors: Error[] = [];
      session.on("error", (err) => errors.push(err));
      session.start();

      socket(0).simulateOpen();
      socket(0).simulateClose(1008, "Unauthorized");
      expect(session.state).toBe("idle");
      await vi.advanceTimersByTimeAsync(2000);

      socket(1).simulateOpen();
      socket(1).simulateClose(1008, "Unauthorized");

      expect(session.state).toBe("stopped");
      expect(errors).toHaveLength(1);
      expect(errors[0]).toBeInstanceOf(AuthError);
      await vi.advanceTimersByTimeAsync(120000);
      expect(mock.instances).toHaveLength(2);
    });

    it("rejects subscriptions", async () => {
      const session = new OrderUpdateSession({ credentials, wsFactory: mock.factory });
      await expect(session.subscribe("RELIANCE")).rejects.toThrow("Channel order-update does not accept subscriptions");
    });
  });

  describe("depth channel", () => {
    it("picks the endpoint by depth level and uses code 23", async () => {
      const depth = new DepthSession({
        credentials,
        depthLevel: 200,
        wsFactory: mock.factory,
        resolver: new SubscriptionResolver(new StaticInstrumentDirectory(instruments)),
      });
      depth.start();
      expect(socket(0).url).toBe(
        "wss://full-depth-api.dhan.co/twohundreddepth?token=test-token&clientId=1000000001&authType=2",
      );
      socket(0).simulateOpen();
      await depth.subscribe("RELIANCE");
      depth.unsubscribe("RELIANCE");
      expect(socket(0).sent()).toEqual([relianceCommand(23), relianceCommand(12)]);
      depth.stop();
    });

    it("emits depth books from JSON messages", () => {
      const depth = new DepthSession({ credentials, wsFactory: mock.factory });
      const events: DecodedEvent[] = [];
      depth.on("event", (e) => events.push(e));
      depth.start();
      socket(0).simulateOpen();

      socket(0).simulateMessage(
        JSON.stringify({ Type: "depth_update", Data: { Bids: [{ Price: 10, Quantity: 5 }], Asks: [{ Price: 11, Quantity: 2 }] } }),
      );
      expect(events[0]).toMatchObject({ kind: "depth-book", bestBid: 10, bestAsk: 11, spread: 1 });
      depth.stop();
    });
  });
});
