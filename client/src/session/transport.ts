import WebSocket from "ws";

export type WsLike = {
  readyState: number;
  send(data: string): void;
  close(code?: number, reason?: string): void;
  terminate?(): void;
  on(event: string, handler: (...args: unknown[]) => void): void;
};

export type WsFactory = (url: string) => WsLike;

export const WS_OPEN = 1;
export const NORMAL_CLOSE = 1000;
export const ABNORMAL_CLOSE = 1006;

const USER_AGENT = "brokerstream/0.1.0";

export function createWebSocket(url: string): WsLike {
  const ws = new WebSocket(url, { headers: { "User-Agent": USER_AGENT } });
  return {
    get readyState() {
      return ws.readyState;
    },
    send: (data) => ws.send(data),
    close: (code, reason) => ws.close(code, reason),
    terminate: () => ws.terminate(),
    on: (event, handler) => {
      ws.on(event, handler);
    },
  };
}

const SENSITIVE_PARAMS = new Set(["token", "clientid", "client_id", "access_token"]);

/** Drops credential query parameters so a URL can be logged. */
export function sanitizeUrl(url: string): string {
  if (!url) return url;
  try {
    const parsed = new URL(url);
    for (const key of [...parsed.searchParams.keys()]) {
      if (SENSITIVE_PARAMS.has(key.toLowerCase())) parsed.searchParams.delete(key);
    }
    return parsed.toString();
  } catch {
    return "wss://[sanitized-url]";
  }
}

function isByteChunk(value: unknown): value is Uint8Array {
  return value instanceof Uint8Array;
}

/** Normalizes a `message` payload from ws (Buffer, ArrayBuffer, Buffer[]) or a `{data}` event. */
export function messageBytes(raw: unknown): Uint8Array | null {
  if (typeof raw === "object" && raw !== null && "data" in raw && !isByteChunk(raw)) {
    return messageBytes(raw.data);
  }
  if (isByteChunk(raw)) return raw;
  if (raw instanceof ArrayBuffer) return new Uint8Array(raw);
  if (Array.isArray(raw) && raw.every(isByteChunk)) return Buffer.concat(raw);
  if (typeof raw === "string") return Buffer.from(raw, "utf8");
  return null;
}

export function messageText(raw: unknown): string | null {
  if (typeof raw === "string") return raw;
  if (typeof raw === "object" && raw !== null && "data" in raw && typeof raw.data === "string") {
    return raw.data;
  }
  const bytes = messageBytes(raw);
  return bytes ? Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString("utf8") : null;
}
