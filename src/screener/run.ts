import { logScreen } from "../logging.js";
import { DEFAULT_EXCHANGE_SUFFIX, parseCodes } from "./codes.js";
import { evaluateSeries } from "./evaluator.js";
import { rankRows } from "./rank.js";
import type {
  BarSeries,
  HistoryFetcher,
  ScreenOutcome,
  ScreenProgress,
  ScreenResultRow,
  SkipCounts,
  Thresholds,
} from "./types.js";

export interface ScreenInput {
  codesText: string;
  thresholds: Thresholds;
  suffix?: string;
}

export interface ScreenDeps {
  fetchHistory: HistoryFetcher;
  onProgress?: (progress: ScreenProgress) => void;
}

export const NO_CODES_MESSAGE = "Enter at least one ticker code";

// Fetchers report missing data as an empty series; a rejection is treated the same way.
async function fetchOrEmpty(fetchHistory: HistoryFetcher, symbol: string, lookbackDays: number): Promise<BarSeries> {
  try {
    return await fetchHistory(symbol, lookbackDays);
  } catch (e) {
    logScreen.warn({ symbol, err: e instanceof Error ? e.message : String(e) }, "History fetch rejected — skipping symbol");
    return [];
  }
}

/**
 * One screening run: parse → fetch → evaluate each symbol in order → rank.
 *
 * Strictly sequential. A symbol with no data or failing any gate is skipped and
 * tallied; only an empty code list or an empty result reach the caller as outcomes.
 */
export async function runScreen(input: ScreenInput, deps: ScreenDeps): Promise<ScreenOutcome> {
  const symbols = parseCodes(input.codesText, input.suffix ?? DEFAULT_EXCHANGE_SUFFIX);
  if (symbols.length === 0) {
    return { status: "input_error", message: NO_CODES_MESSAGE };
  }

  const t = input.thresholds;
  const total = symbols.length;
  const collected: ScreenResultRow[] = [];
  const skipped: SkipCounts = {};

  logScreen.info({ total, thresholds: t }, "Screen started");

  for (const [i, symbol] of symbols.entries()) {
    const bars = await fetchOrEmpty(deps.fetchHistory, symbol, t.lookbackDays);

    if (bars.length === 0) {
      skipped.no_data = (skipped.no_data ?? 0) + 1;
      logScreen.debug({ symbol, reason: "no_data" }, "Symbol skipped");
    } else {
      const result = evaluateSeries(symbol, bars, t);
      if (result.passed) {
        collected.push(result.row);
        logScreen.debug({ symbol, ratio: result.row.dayVolumeRatio }, "Symbol matched");
      } else {
        skipped[result.reason] = (skipped[result.reason] ?? 0) + 1;
        logScreen.debug({ symbol, reason: result.reason }, "Symbol skipped");
      }
    }

    const processed = i + 1;
    deps.onProgress?.({ processed, total, fraction: processed / total, symbol });
  }

  if (collected.length === 0) {
    logScreen.info({ total, skipped }, "Screen finished — no matches");
    return { status: "no_matches", total, skipped };
  }

  const rows = rankRows(collected, t.topN);
  logScreen.info({ total, matched: collected.length, returned: rows.length, skipped }, "Screen finished");
  return { status: "ok", total, matched: collected.length, rows, skipped };
}
