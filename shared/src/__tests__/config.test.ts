import { describe, it, expect } from "vitest";
import { ClientConfigSchema, parseConfig } from "../config.js";

const selfCredentials = { clientId: "1000000001", accessToken: "test-token" };

describe("ClientConfigSchema", () => {
  it("fills every section with defaults", () => {
    const config = parseConfig({ credentials: selfCredentials });

    expect(config.credentials.userType).toBe("SELF");
    expect(config.endpoints).toEqual({
      feedUrl: "wss://api-feed.dhan.co",
      feedVersion: 2,
      orderUrl: "wss://api-order-update.dhan.co",
      depthUrl: "wss://depth-api-feed.dhan.co/twentydepth",
      fullDepthUrl: "wss://full-depth-api.dhan.co/twohundreddepth",
      instrumentUrl: "https://api.dhan.co/v2/instrument",
      depthLevel: 20,
    });
    expect(config.feed.mode).toBe("ticker");
    expect(config.reconnect).toEqual({
      baseDelayMs: 2000,
      maxDelayMs: 90000,
      jitterRatio: 0.2,
      cooloffMs: 60000,
      connectTimeoutMs: 10000,
    });
    expect(config.orders).toEqual({ maxTrackedOrders: 10000, maxOrderAgeMs: 3600000, sweepIntervalMs: 300000 });
    expect(config.rateLimits).toEqual({});
  });

  it("requires an access token for self logins", () => {
    const result = ClientConfigSchema.safeParse({ credentials: { clientId: "1000000001" } });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.path).toEqual(["credentials", "accessToken"]);
    }
  });

  it("requires partner id and secret for partner logins", () => {
    const missing = ClientConfigSchema.safeParse({
      credentials: { clientId: "1000000001", userType: "PARTNER", partnerId: "partner-1" },
    });
    expect(missing.success).toBe(false);

    const ok = ClientConfigSchema.safeParse({
      credentials: { clientId: "1000000001", userType: "PARTNER", partnerId: "partner-1", partnerSecret: "test-secret" },
    });
    expect(ok.success).toBe(true);
  });

  it("only accepts depth levels 20 and 200", () => {
    expect(() => parseConfig({ credentials: selfCredentials, endpoints: { depthLevel: 50 } })).toThrow();
    expect(parseConfig({ credentials: selfCredentials, endpoints: { depthLevel: 200 } }).endpoints.depthLevel).toBe(200);
  });

  it("validates rate limit overrides", () => {
    expect(() => parseConfig({ credentials: selfCredentials, rateLimits: { quote: [] } })).toThrow();
    const config = parseConfig({
      credentials: selfCredentials,
      rateLimits: { quote: [{ windowMs: 1000, capacity: 2 }] },
    });
    expect(config.rateLimits.quote).toEqual([{ windowMs: 1000, capacity: 2 }]);
  });

  it("rejects a jitter ratio above 1", () => {
    expect(() => parseConfig({ credentials: selfCredentials, reconnect: { jitterRatio: 1.5 } })).toThrow();
  });
});
