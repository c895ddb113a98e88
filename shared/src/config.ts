import { z } from "zod";

const CredentialsSchema = z
  .object({
    clientId: z.string().min(1),
    accessToken: z.string().min(1).optional(),
    userType: z.enum(["SELF", "PARTNER"]).default("SELF"),
    partnerId: z.string().min(1).optional(),
    partnerSecret: z.string().min(1).optional(),
  })
  .superRefine((value, ctx) => {
    if (value.userType === "SELF" && !value.accessToken) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["accessToken"],
        message: "accessToken is required when userType is SELF",
      });
    }
    if (value.userType === "PARTNER" && (!value.partnerId || !value.partnerSecret)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["partnerSecret"],
        message: "partnerId and partnerSecret are required when userType is PARTNER",
      });
    }
  });

const EndpointsSchema = z.object({
  feedUrl: z.string().url().default("wss://api-feed.dhan.co"),
  feedVersion: z.number().int().positive().default(2),
  orderUrl: z.string().url().default("wss://api-order-update.dhan.co"),
  depthUrl: z.string().url().default("wss://depth-api-feed.dhan.co/twentydepth"),
  fullDepthUrl: z.string().url().default("wss://full-depth-api.dhan.co/twohundreddepth"),
  instrumentUrl: z.string().url().default("https://api.dhan.co/v2/instrument"),
  depthLevel: z.union([z.literal(20), z.literal(200)]).default(20),
});

const FeedConfigSchema = z.object({
  mode: z.enum(["ticker", "quote", "full"]).default("ticker"),
});

const ReconnectConfigSchema = z.object({
  baseDelayMs: z.number().int().positive().default(2000),
  maxDelayMs: z.number().int().positive().default(90000),
  jitterRatio: z.number().min(0).max(1).default(0.2),
  cooloffMs: z.number().int().positive().default(60000),
  connectTimeoutMs: z.number().int().positive().default(10000),
  maxAuthFailures: z.number().int().positive().optional(),
});

const OrderTrackingConfigSchema = z.object({
  maxTrackedOrders: z.number().int().positive().default(10000),
  maxOrderAgeMs: z.number().int().positive().default(3600000),
  sweepIntervalMs: z.number().int().positive().default(300000),
});

export const RateWindowSchema = z.object({
  windowMs: z.number().int().positive(),
  capacity: z.number().int().positive(),
});

export type RateWindow = z.infer<typeof RateWindowSchema>;

export const ClientConfigSchema = z.object({
  credentials: CredentialsSchema,
  endpoints: EndpointsSchema.default({}),
  feed: FeedConfigSchema.default({}),
  reconnect: ReconnectConfigSchema.default({}),
  orders: OrderTrackingConfigSchema.default({}),
  rateLimits: z.record(z.array(RateWindowSchema).min(1)).default({}),
});

export type ClientConfig = z.infer<typeof ClientConfigSchema>;
export type ClientConfigInput = z.input<typeof ClientConfigSchema>;
export type Credentials = ClientConfig["credentials"];
export type ReconnectConfig = ClientConfig["reconnect"];
export type OrderTrackingConfig = ClientConfig["orders"];
export type EndpointsConfig = ClientConfig["endpoints"];
export type FeedConfig = ClientConfig["feed"];

export function parseConfig(raw: unknown): ClientConfig {
  return ClientConfigSchema.parse(raw);
}
