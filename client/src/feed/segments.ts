import type { ExchangeSegment } from "@brokerstream/shared";

export const SEGMENT_CODES: Record<ExchangeSegment, number> = {
  IDX_I: 0,
  NSE_EQ: 1,
  NSE_FNO: 2,
  NSE_CURRENCY: 3,
  BSE_EQ: 4,
  MCX_COMM: 5,
  BSE_CURRENCY: 7,
  BSE_FNO: 8,
};

export const EXCHANGE_SEGMENTS: ExchangeSegment[] = [
  "NSE_EQ",
  "NSE_FNO",
  "NSE_CURRENCY",
  "BSE_EQ",
  "BSE_FNO",
  "BSE_CURRENCY",
  "MCX_COMM",
  "IDX_I",
];

const CODE_TO_SEGMENT = new Map<number, ExchangeSegment>(
  EXCHANGE_SEGMENTS.map((segment) => [SEGMENT_CODES[segment], segment]),
);

/** Header byte -> segment name; unknown codes come back as their decimal string. */
export function segmentFromCode(code: number): string {
  return CODE_TO_SEGMENT.get(code) ?? String(code);
}

/** Accepts "NSE_FNO", "nse_fno", "2" or 2 and returns the name the feed expects. */
export function toRequestSegment(segment: string | number): string {
  if (typeof segment === "number") return segmentFromCode(segment);
  const trimmed = segment.trim();
  if (/^\d+$/.test(trimmed)) return segmentFromCode(Number(trimmed));
  return trimmed.toUpperCase();
}
