import { z } from "zod";

/**
 * Screen parameters: one immutable set per run.
 *
 * Ranges mirror the parameter form: every field has a floor, and the integral
 * ones (window lengths, counts, the liquidity floor) reject fractions.
 */

export interface ThresholdRange {
  min: number;
  /** null = unbounded above */
  max: number | null;
  integer: boolean;
}

export const THRESHOLD_RANGES = {
  lookbackDays: { min: 60, max: 260, integer: true },
  recentDays: { min: 3, max: 10, integer: true },
  baseDays: { min: 10, max: 60, integer: true },
  minRecentRatio: { min: 1, max: 5, integer: false },
  spikeDays: { min: 10, max: 60, integer: true },
  minSpikeRatio: { min: 1, max: 10, integer: false },
  maxDayChangePct: { min: 1, max: 15, integer: false },
  minBaseAvgVolume: { min: 0, max: null, integer: true },
  topN: { min: 10, max: 200, integer: true },
} as const satisfies Record<string, ThresholdRange>;

/** Numeric strings become numbers; everything else is left for z.number() to reject. */
function numericString(value: unknown): unknown {
  return typeof value === "string" && value.trim() !== "" ? Number(value) : value;
}

function field(name: string, range: ThresholdRange) {
  const bounds = range.max === null ? `>= ${range.min}` : `between ${range.min} and ${range.max}`;
  let schema = z.number({ invalid_type_error: `${name} must be a number` });
  if (range.integer) schema = schema.int({ message: `${name} must be an integer` });
  schema = schema.min(range.min, { message: `${name} must be ${bounds}` });
  if (range.max !== null) schema = schema.max(range.max, { message: `${name} must be ${bounds}` });
  return z.preprocess(numericString, schema);
}

export const thresholdsSchema = z.object({
  lookbackDays: field("lookbackDays", THRESHOLD_RANGES.lookbackDays),
  recentDays: field("recentDays", THRESHOLD_RANGES.recentDays),
  baseDays: field("baseDays", THRESHOLD_RANGES.baseDays),
  minRecentRatio: field("minRecentRatio", THRESHOLD_RANGES.minRecentRatio),
  spikeDays: field("spikeDays", THRESHOLD_RANGES.spikeDays),
  minSpikeRatio: field("minSpikeRatio", THRESHOLD_RANGES.minSpikeRatio),
  maxDayChangePct: field("maxDayChangePct", THRESHOLD_RANGES.maxDayChangePct),
  minBaseAvgVolume: field("minBaseAvgVolume", THRESHOLD_RANGES.minBaseAvgVolume),
  topN: field("topN", THRESHOLD_RANGES.topN),
});

export type Thresholds = z.infer<typeof thresholdsSchema>;

export const DEFAULT_THRESHOLDS: Readonly<Thresholds> = Object.freeze({
  lookbackDays: 160,
  recentDays: 5,
  baseDays: 20,
  minRecentRatio: 1.5,
  spikeDays: 20,
  minSpikeRatio: 3.0,
  maxDayChangePct: 5,
  minBaseAvgVolume: 100_000,
  topN: 50,
});

export type ThresholdsResult =
  | { ok: true; thresholds: Thresholds }
  | { ok: false; error: string };

/** JSON clients send null for "use the default"; drop those keys before parsing. */
function withoutNulls(overrides: unknown): unknown {
  if (overrides === null || overrides === undefined) return {};
  if (typeof overrides !== "object" || Array.isArray(overrides)) return overrides;
  return Object.fromEntries(Object.entries(overrides).filter(([, value]) => value !== null));
}

/**
 * Overlay caller-supplied overrides on `defaults` and validate the merged set.
 * Unknown keys and null values are ignored; numeric strings are accepted (form/CLI input).
 */
export function resolveThresholds(overrides: unknown, defaults: Thresholds = DEFAULT_THRESHOLDS): ThresholdsResult {
  const partial = thresholdsSchema.partial().safeParse(withoutNulls(overrides));
  if (!partial.success) {
    return { ok: false, error: partial.error.issues[0]?.message ?? "Invalid thresholds" };
  }

  const merged: Record<string, number> = { ...defaults };
  for (const [key, value] of Object.entries(partial.data)) {
    if (value !== undefined) merged[key] = value;
  }

  const full = thresholdsSchema.safeParse(merged);
  if (!full.success) {
    return { ok: false, error: full.error.issues[0]?.message ?? "Invalid thresholds" };
  }
  return { ok: true, thresholds: full.data };
}
