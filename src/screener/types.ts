import type { Thresholds } from "./thresholds.js";

export type { Thresholds };

/** One trading day for one symbol. Date is the exchange-local trading day, YYYY-MM-DD. */
export interface Bar {
  date: string;
  open: number;
  close: number;
  volume: number;
}

/** Chronological, oldest first. */
export type BarSeries = readonly Bar[];

export interface ScreenResultRow {
  symbol: string;
  lastDate: string;
  close: number;
  dayChangePct: number;
  dayVolume: number;
  /** Today's volume / spike-window average */
  dayVolumeRatio: number;
  recentAvgVolume: number;
  baseAvgVolume: number;
  /** Recent-window average / base-window average */
  recentBaseRatio: number;
}

export type SkipReason =
  | "no_data"
  | "insufficient_history"
  | "invalid_price"
  | "price_already_moved"
  | "no_base_volume"
  | "illiquid"
  | "no_buildup"
  | "no_spike_base"
  | "no_spike"
  | "no_continuity";

export type Evaluation =
  | { passed: true; row: ScreenResultRow }
  | { passed: false; reason: SkipReason };

/** Daily bars for (symbol, lookback). Empty = no usable data; never rejects. */
export type HistoryFetcher = (symbol: string, lookbackDays: number) => Promise<BarSeries>;

export interface ScreenProgress {
  processed: number;
  total: number;
  /** processed / total */
  fraction: number;
  symbol: string;
}

export type SkipCounts = Partial<Record<SkipReason, number>>;

export type ScreenOutcome =
  | { status: "input_error"; message: string }
  | { status: "no_matches"; total: number; skipped: SkipCounts }
  | { status: "ok"; total: number; matched: number; rows: ScreenResultRow[]; skipped: SkipCounts };
