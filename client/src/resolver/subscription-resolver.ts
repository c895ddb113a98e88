import type { Instrument, InstrumentDescriptor, InstrumentRef, SymbolRef } from "@brokerstream/shared";
import { ResolutionError } from "../errors.js";
import { EXCHANGE_SEGMENTS, toRequestSegment } from "../feed/segments.js";
import { createLogger } from "../utils/logger.js";
import { InstrumentCache } from "./instrument-cache.js";
import { normalizeCode, type InstrumentDirectory } from "./instrument-directory.js";

export type ResolveResult =
  | { ok: true; ref: InstrumentRef }
  | { ok: false; error: ResolutionError };

export type SubscriptionResolverOptions = {
  segments?: string[];
};

const PREFERRED_SEGMENTS = ["NSE_EQ", "BSE_EQ", "NSE_FNO", "BSE_FNO", "IDX_I"];

export class SubscriptionResolver {
  private log = createLogger("subscription-resolver");
  private cache: InstrumentCache;
  private active = new Map<string, InstrumentRef>();
  readonly segmentPriority: string[];

  constructor(source: InstrumentDirectory | InstrumentCache, options: SubscriptionResolverOptions = {}) {
    this.cache = source instanceof InstrumentCache ? source : new InstrumentCache(source);
    const configured = options.segments ?? EXCHANGE_SEGMENTS;
    this.segmentPriority = [...new Set([...PREFERRED_SEGMENTS, ...configured].map(normalizeCode))];
  }

  /** Idempotency key for a caller reference. */
  labelFor(ref: SymbolRef): string {
    if (typeof ref === "string") return normalizeCode(ref);
    const base = ref.symbol ?? ref.displayName ?? (ref.securityId === undefined ? "" : String(ref.securityId));
    const label = ref.exchangeSegment ? `${ref.exchangeSegment}:${base}` : base;
    return normalizeCode(label);
  }

  async resolve(ref: SymbolRef): Promise<ResolveResult> {
    const label = this.labelFor(ref);
    const existing = this.active.get(label);
    if (existing) return { ok: true, ref: existing };

    const resolved = typeof ref === "string" ? await this.resolveString(ref) : await this.resolveDescriptor(ref);
    if (!resolved) {
      this.log.warn("Unable to locate instrument", { label });
      return { ok: false, error: new ResolutionError(label) };
    }
    return { ok: true, ref: resolved };
  }

  track(label: string, ref: InstrumentRef): void {
    this.active.set(label, ref);
  }

  release(label: string): InstrumentRef | undefined {
    const ref = this.active.get(label);
    this.active.delete(label);
    return ref;
  }

  lookup(label: string): InstrumentRef | undefined {
    return this.active.get(label);
  }

  isSubscribed(ref: SymbolRef): boolean {
    return this.active.has(this.labelFor(ref));
  }

  activeEntries(): Array<[string, InstrumentRef]> {
    return [...this.active.entries()];
  }

  private async resolveString(ref: string): Promise<InstrumentRef | null> {
    const trimmed = ref.trim();
    const sep = trimmed.indexOf(":");
    const hint = sep >= 0 ? trimmed.slice(0, sep).trim() : undefined;
    const code = sep >= 0 ? trimmed.slice(sep + 1).trim() : trimmed;
    if (!code) return null;

    const instrument = await this.findInstrument(code, hint);
    return instrument ? this.toRef(instrument, trimmed, ref) : null;
  }

  private async resolveDescriptor(ref: InstrumentDescriptor): Promise<InstrumentRef | null> {
    const segment = ref.exchangeSegment ? toRequestSegment(ref.exchangeSegment) : undefined;
    const securityId = ref.securityId === undefined ? undefined : String(ref.securityId).trim();
    const symbol = ref.symbol ?? ref.displayName;

    if (segment && securityId) {
      return {
        exchangeSegment: segment,
        securityId,
        displayLabel: symbol ?? securityId,
        originalInput: ref,
      };
    }

    if (securityId) {
      const instrument = await this.findInstrument(securityId, segment);
      if (instrument) return this.toRef(instrument, symbol ?? securityId, ref);
    }

    if (!symbol) return null;
    const instrument = await this.findInstrument(symbol, segment);
    return instrument ? this.toRef(instrument, symbol, ref) : null;
  }

  private async findInstrument(code: string, hint?: string): Promise<Instrument | undefined> {
    const candidates = hint ? [normalizeCode(hint)] : this.segmentPriority;
    const normalized = normalizeCode(code);
    const collapsed = normalized.replace(/\s+/g, " ");

    for (const segment of candidates) {
      if (!segment) continue;
      const index = await this.cache.load(segment);
      const found = index.get(normalized) ?? index.get(collapsed);
      if (found) return found;
    }
    return undefined;
  }

  private toRef(instrument: Instrument, label: string, original: SymbolRef): InstrumentRef {
    return {
      exchangeSegment: normalizeCode(instrument.exchangeSegment),
      securityId: String(instrument.securityId),
      displayLabel: label.trim() ? label.trim() : instrument.symbolName,
      originalInput: original,
    };
  }
}
