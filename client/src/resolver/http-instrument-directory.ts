import type { Instrument } from "@brokerstream/shared";
import type { FetchLike } from "../throttle/throttled-fetch.js";
import { createLogger } from "../utils/logger.js";
import type { InstrumentDirectory } from "./instrument-directory.js";

export const DEFAULT_INSTRUMENT_URL = "https://api.dhan.co/v2/instrument";

export type HttpInstrumentDirectoryOptions = {
  accessToken?: string;
  baseUrl?: string;
  fetch?: FetchLike;
};

/** Splits one CSV line, honouring double-quoted fields with `""` escapes. */
export function splitCsvLine(line: string): string[] {
  const fields: string[] = [];
  let current = "";
  let quoted = false;

  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (quoted) {
      if (ch === '"' && line[i + 1] === '"') {
        current += '"';
        i++;
      } else if (ch === '"') {
        quoted = false;
      } else {
        current += ch;
      }
    } else if (ch === '"') {
      quoted = true;
    } else if (ch === ",") {
      fields.push(current.trim());
      current = "";
    } else {
      current += ch;
    }
  }
  fields.push(current.trim());
  return fields;
}

/**
 * Parses the instrument master CSV for one segment. Rows without a security
 * id or a symbol name are skipped; the requested segment is used when the
 * row carries no segment of its own.
 */
export function parseInstrumentCsv(text: string, segment: string): Instrument[] {
  const lines = text.split(/\r?\n/).filter((l) => l.trim().length > 0);
  const [headerLine, ...rows] = lines;
  if (!headerLine) return [];

  const headers = splitCsvLine(headerLine).map((h) => h.toUpperCase());
  const instruments: Instrument[] = [];

  for (const line of rows) {
    const values = splitCsvLine(line);
    const row = new Map<string, string>();
    headers.forEach((header, i) => row.set(header, values[i] ?? ""));

    const securityId = row.get("SECURITY_ID") ?? row.get("SEM_SMST_SECURITY_ID") ?? "";
    const symbolName = row.get("SYMBOL_NAME") ?? row.get("SEM_TRADING_SYMBOL") ?? "";
    if (!securityId || !symbolName) continue;

    const displayName = row.get("DISPLAY_NAME") ?? row.get("SEM_CUSTOM_SYMBOL");
    const series = row.get("SERIES") ?? row.get("SEM_SERIES");
    instruments.push({
      symbolName,
      displayName: displayName ? displayName : undefined,
      securityId,
      exchangeSegment: row.get("EXCHANGE_SEGMENT") || segment,
      series: series ? series : undefined,
    });
  }
  return instruments;
}

/** Downloads `GET {baseUrl}/{segment}` and parses the CSV body. */
export class HttpInstrumentDirectory implements InstrumentDirectory {
  private log = createLogger("instrument-directory");
  private baseUrl: string;
  private accessToken: string | undefined;
  private fetchImpl: FetchLike;

  constructor(options: HttpInstrumentDirectoryOptions = {}) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_INSTRUMENT_URL).replace(/\/+$/, "");
    this.accessToken = options.accessToken;
    this.fetchImpl = options.fetch ?? globalThis.fetch;
  }

  async bySegment(segment: string): Promise<Instrument[]> {
    const url = `${this.baseUrl}/${encodeURIComponent(segment)}`;
    const headers: Record<string, string> = { Accept: "text/csv" };
    if (this.accessToken) headers["access-token"] = this.accessToken;

    const res = await this.fetchImpl(url, { headers });
    if (!res.ok) {
      throw new Error(`Instrument download for ${segment} failed: HTTP ${res.status}`);
    }
    const instruments = parseInstrumentCsv(await res.text(), segment);
    this.log.info("Downloaded instruments", { segment, count: instruments.length });
    return instruments;
  }
}

/** In-memory directory, keyed by exchange segment. */
export class StaticInstrumentDirectory implements InstrumentDirectory {
  private bySegmentMap = new Map<string, Instrument[]>();

  constructor(instruments: Instrument[]) {
    for (const instrument of instruments) {
      const key = instrument.exchangeSegment.toUpperCase();
      const list = this.bySegmentMap.get(key) ?? [];
      list.push(instrument);
      this.bySegmentMap.set(key, list);
    }
  }

  async bySegment(segment: string): Promise<Instrument[]> {
    return this.bySegmentMap.get(segment.toUpperCase()) ?? [];
  }
}
