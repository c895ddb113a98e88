import type { Credentials, InstrumentRef } from "@brokerstream/shared";

export const MAX_INSTRUMENTS_PER_COMMAND = 100;
export const LOGIN_MSG_CODE = 42;
export const DISCONNECT_REQUEST_CODE = 12;

export type InstrumentCommand = {
  RequestCode: number;
  InstrumentCount: number;
  InstrumentList: Array<{ ExchangeSegment: string; SecurityId: string }>;
};

export function instrumentKey(ref: Pick<InstrumentRef, "exchangeSegment" | "securityId">): string {
  return `${ref.exchangeSegment}:${ref.securityId}`;
}

/** Drops repeated segment:securityId pairs, keeping the first. */
export function uniqueInstruments(refs: InstrumentRef[]): InstrumentRef[] {
  const seen = new Set<string>();
  return refs.filter((ref) => {
    const key = instrumentKey(ref);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

/** One command per chunk of at most `chunkSize` instruments. */
export function buildInstrumentCommands(
  requestCode: number,
  refs: InstrumentRef[],
  chunkSize = MAX_INSTRUMENTS_PER_COMMAND,
): InstrumentCommand[] {
  const list = uniqueInstruments(refs);
  const commands: InstrumentCommand[] = [];
  for (let i = 0; i < list.length; i += chunkSize) {
    const chunk = list.slice(i, i + chunkSize);
    commands.push({
      RequestCode: requestCode,
      InstrumentCount: chunk.length,
      InstrumentList: chunk.map((ref) => ({
        ExchangeSegment: ref.exchangeSegment,
        SecurityId: ref.securityId,
      })),
    });
  }
  return commands;
}

export type LoginPayload =
  | {
      LoginReq: { MsgCode: number; ClientId: string; Token: string };
      UserType: "SELF";
    }
  | {
      LoginReq: { MsgCode: number; ClientId: string };
      UserType: "PARTNER";
      Secret: string;
    };

export function buildLoginPayload(credentials: Credentials): LoginPayload {
  if (credentials.userType === "PARTNER") {
    return {
      LoginReq: { MsgCode: LOGIN_MSG_CODE, ClientId: credentials.partnerId ?? "" },
      UserType: "PARTNER",
      Secret: credentials.partnerSecret ?? "",
    };
  }
  return {
    LoginReq: { MsgCode: LOGIN_MSG_CODE, ClientId: credentials.clientId, Token: credentials.accessToken ?? "" },
    UserType: "SELF",
  };
}

/** Appends the query parameters every authenticated socket endpoint expects. */
export function buildSocketUrl(
  base: string,
  credentials: Pick<Credentials, "clientId" | "accessToken">,
  extra: Record<string, string | number> = {},
): string {
  const url = new URL(base);
  for (const [key, value] of Object.entries(extra)) {
    url.searchParams.set(key, String(value));
  }
  url.searchParams.set("token", credentials.accessToken ?? "");
  url.searchParams.set("clientId", credentials.clientId);
  url.searchParams.set("authType", "2");
  return url.toString();
}
