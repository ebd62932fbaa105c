import { describe, it, expect, vi } from "vitest";

vi.mock("../../logging.js", () => {
  const stub = () => ({ debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() });
  return { logger: stub(), logScreen: stub(), logCache: stub(), logYahoo: stub(), logRest: stub() };
});

import { NO_CODES_MESSAGE, runScreen } from "../run.js";
import { DEFAULT_THRESHOLDS } from "../thresholds.js";
import type { Bar, BarSeries, HistoryFetcher, ScreenProgress } from "../types.js";
import { breakoutBars } from "./helpers.js";

function fakeFetcher(series: Record<string, Bar[]>) {
  return vi.fn<HistoryFetcher>(async (symbol: string): Promise<BarSeries> => series[symbol] ?? []);
}

const thresholds = { ...DEFAULT_THRESHOLDS };

describe("runScreen", () => {
  it("returns an input error for an empty list without fetching", async () => {
    const fetchHistory = fakeFetcher({});
    const outcome = await runScreen({ codesText: " ,\n ", thresholds }, { fetchHistory });

    expect(outcome).toEqual({ status: "input_error", message: NO_CODES_MESSAGE });
    expect(fetchHistory).not.toHaveBeenCalled();
  });

  it("fetches each parsed symbol once, in sorted order, with the lookback", async () => {
    const fetchHistory = fakeFetcher({});
    await runScreen({ codesText: "7203\n6758,7203", thresholds }, { fetchHistory });

    expect(fetchHistory.mock.calls).toEqual([
      ["6758.T", 160],
      ["7203.T", 160],
    ]);
  });

  it("reports progress after every symbol", async () => {
    const progress: ScreenProgress[] = [];
    await runScreen(
      { codesText: "7203,6758", thresholds },
      { fetchHistory: fakeFetcher({}), onProgress: (p) => progress.push(p) },
    );

    expect(progress).toEqual([
      { processed: 1, total: 2, fraction: 0.5, symbol: "6758.T" },
      { processed: 2, total: 2, fraction: 1, symbol: "7203.T" },
    ]);
  });

  it("collects passing symbols and tallies the skipped ones", async () => {
    const fetchHistory = fakeFetcher({
      "7203.T": breakoutBars(),
      "6758.T": breakoutBars().slice(-10),
      "9984.T": breakoutBars({ lastClose: 107 }),
    });
    const outcome = await runScreen({ codesText: "7203,6758,9984,8035", thresholds }, { fetchHistory });

    expect(outcome.status).toBe("ok");
    if (outcome.status !== "ok") return;
    expect(outcome.total).toBe(4);
    expect(outcome.matched).toBe(1);
    expect(outcome.rows.map((r) => r.symbol)).toEqual(["7203.T"]);
    expect(outcome.rows[0]?.dayVolumeRatio).toBe(4);
    expect(outcome.rows[0]?.recentBaseRatio).toBe(2.8);
    expect(outcome.skipped).toEqual({
      insufficient_history: 1,
      price_already_moved: 1,
      no_data: 1,
    });
  });

  it("ranks the stronger spike first", async () => {
    const fetchHistory = fakeFetcher({
      "7203.T": breakoutBars(),
      // today 600k → 4.8× the 125k spike base
      "6758.T": breakoutBars({ today: 600_000 }),
    });
    const outcome = await runScreen({ codesText: "7203,6758", thresholds }, { fetchHistory });

    expect(outcome.status).toBe("ok");
    if (outcome.status !== "ok") return;
    expect(outcome.rows.map((r) => r.symbol)).toEqual(["6758.T", "7203.T"]);
    expect(outcome.rows[0]?.dayVolumeRatio).toBe(4.8);
  });

  it("reports no matches when nothing passes", async () => {
    const fetchHistory = fakeFetcher({
      "7203.T": breakoutBars({ prev: 100_000 }),
      "6758.T": breakoutBars({ lastClose: 107 }),
    });
    const outcome = await runScreen({ codesText: "7203,6758", thresholds }, { fetchHistory });

    expect(outcome).toEqual({
      status: "no_matches",
      total: 2,
      skipped: { no_continuity: 1, price_already_moved: 1 },
    });
  });

  it("treats a rejected fetch as no data and keeps going", async () => {
    const fetchHistory = vi.fn<HistoryFetcher>(async (symbol: string): Promise<BarSeries> => {
      if (symbol === "6758.T") throw new Error("socket hang up");
      return breakoutBars();
    });
    const outcome = await runScreen({ codesText: "7203,6758", thresholds }, { fetchHistory });

    expect(outcome.status).toBe("ok");
    if (outcome.status !== "ok") return;
    expect(outcome.rows.map((r) => r.symbol)).toEqual(["7203.T"]);
    expect(outcome.skipped).toEqual({ no_data: 1 });
  });

  it("passes already-qualified symbols through to the fetcher", async () => {
    const fetchHistory = fakeFetcher({});
    await runScreen({ codesText: "AAPL", thresholds }, { fetchHistory });
    expect(fetchHistory).toHaveBeenCalledWith("AAPL", 160);
  });
});
