import { parseConfig, type ClientConfig, type InstrumentDescriptor, type SymbolRef } from "@brokerstream/shared";

type Env = Record<string, string | undefined>;

function optional(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function optionalInt(value: string | undefined): number | undefined {
  const text = optional(value);
  if (text === undefined) return undefined;
  const parsed = Number(text);
  return Number.isInteger(parsed) ? parsed : undefined;
}

/**
 * Builds a validated client config from `BROKER_*` variables. Unset values
 * fall back to schema defaults; invalid combinations throw a ZodError.
 */
export function loadConfigFromEnv(env: Env = process.env): ClientConfig {
  const depthLevel = optionalInt(env.BROKER_DEPTH_LEVEL);
  return parseConfig({
    credentials: {
      clientId: optional(env.BROKER_CLIENT_ID) ?? "",
      accessToken: optional(env.BROKER_ACCESS_TOKEN),
      userType: optional(env.BROKER_WS_USER_TYPE)?.toUpperCase(),
      partnerId: optional(env.BROKER_PARTNER_ID),
      partnerSecret: optional(env.BROKER_PARTNER_SECRET),
    },
    endpoints: {
      feedUrl: optional(env.BROKER_FEED_URL),
      orderUrl: optional(env.BROKER_ORDER_URL),
      depthLevel,
    },
    feed: {
      mode: optional(env.BROKER_FEED_MODE)?.toLowerCase(),
    },
  });
}

/** `NSE_EQ:1333` becomes a segment/security-id descriptor; anything else is resolved by symbol. */
export function parseFeedSymbols(value: string | undefined): SymbolRef[] {
  if (!value) return [];
  return value
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0)
    .map((s): SymbolRef => {
      const match = /^([A-Za-z_]+):(\d+)$/.exec(s);
      if (!match) return s;
      const descriptor: InstrumentDescriptor = { exchangeSegment: match[1], securityId: match[2] };
      return descriptor;
    });
}
