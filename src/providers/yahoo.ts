import YahooFinance from "yahoo-finance2";
import { config } from "../config.js";
import { logYahoo } from "../logging.js";
import type { Bar } from "../screener/types.js";

const yf = new YahooFinance({ suppressNotices: ["yahooSurvey"] });

const DAY_MS = 86_400_000;

// ─── Timeout ──────────────────────────────────────────────────
// No retries: a failed fetch is the same as "no data" for this run.

async function withTimeout<T>(promise: Promise<T>, ms: number = config.yahoo.timeoutMs): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`Yahoo request timed out after ${ms}ms`)), ms);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}

// ─── Normalization ────────────────────────────────────────────

/** The subset of a Yahoo chart quote the screener reads. */
export interface ChartQuote {
  date: Date | string;
  open?: number | null;
  close?: number | null;
  volume?: number | null;
}

// Built on first use so a bad EXCHANGE_TIMEZONE surfaces through config validation, not at import.
let dayFormatter: Intl.DateTimeFormat | undefined;

/** Exchange-local trading day as YYYY-MM-DD. */
export function formatTradingDay(date: Date | string): string {
  if (typeof date === "string") return date.slice(0, 10);
  dayFormatter ??= new Intl.DateTimeFormat("en-CA", {
    timeZone: config.screen.timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
  });
  return dayFormatter.format(date);
}

function isNum(v: number | null | undefined): v is number {
  return typeof v === "number" && Number.isFinite(v);
}

/** Null when any required column is missing. The row is dropped, not zero-filled. */
export function toBar(quote: ChartQuote): Bar | null {
  if (!isNum(quote.open) || !isNum(quote.close) || !isNum(quote.volume)) return null;
  return {
    date: formatTradingDay(quote.date),
    open: quote.open,
    close: quote.close,
    volume: quote.volume,
  };
}

export function lookbackRange(lookbackDays: number, now: Date = new Date()): { period1: Date; period2: Date } {
  return {
    period1: new Date(now.getTime() - lookbackDays * DAY_MS),
    period2: now,
  };
}

// ─── Fetch ────────────────────────────────────────────────────

/**
 * Daily unadjusted bars for `symbol` over the last `lookbackDays` calendar days.
 *
 * Never rejects. Unknown symbols, network failures and timeouts are logged and come
 * back as an empty array, which callers treat as "skip this symbol".
 */
export async function fetchDailyBars(symbol: string, lookbackDays: number, now: Date = new Date()): Promise<Bar[]> {
  const { period1, period2 } = lookbackRange(lookbackDays, now);
  try {
    const chart = await withTimeout(
      yf.chart(symbol, { period1, period2, interval: "1d" }),
    );
    const bars: Bar[] = [];
    for (const quote of chart.quotes) {
      const bar = toBar(quote);
      if (bar) bars.push(bar);
    }
    logYahoo.debug({ symbol, lookbackDays, raw: chart.quotes.length, kept: bars.length }, "Daily bars fetched");
    return bars;
  } catch (e) {
    const err = e instanceof Error ? e.message : String(e);
    logYahoo.warn({ symbol, lookbackDays, err }, "Daily bar fetch failed — treating as no data");
    return [];
  }
}
