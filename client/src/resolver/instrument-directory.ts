import type { Instrument } from "@brokerstream/shared";

/** Source of the per-segment instrument universe (the broker's instrument master). */
export interface InstrumentDirectory {
  bySegment(segment: string): Promise<Instrument[]>;
}

export type InstrumentIndex = Map<string, Instrument>;

export function normalizeCode(code: string): string {
  return code.trim().toUpperCase();
}

export function keysFor(instrument: Instrument): string[] {
  const keys: string[] = [];
  const symbolName = normalizeCode(instrument.symbolName);
  const displayName = normalizeCode(instrument.displayName ?? "");
  const securityId = normalizeCode(instrument.securityId);

  if (symbolName) keys.push(symbolName);
  if (displayName && displayName !== symbolName) keys.push(displayName);
  if (securityId) keys.push(securityId);
  if (instrument.series) {
    keys.push(normalizeCode(`${instrument.symbolName}:${instrument.series}`));
  }
  return keys;
}

export function buildInstrumentIndex(records: Instrument[]): InstrumentIndex {
  const index: InstrumentIndex = new Map();
  for (const instrument of records) {
    for (const key of keysFor(instrument)) {
      if (!index.has(key)) index.set(key, instrument);
    }
  }
  return index;
}
