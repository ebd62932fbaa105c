import type { BarSeries, Evaluation, SkipReason, Thresholds } from "./types.js";

type WindowThresholds = Pick<Thresholds, "recentDays" | "baseDays" | "spikeDays">;

/**
 * Minimum number of bars a series needs before it is worth evaluating.
 * Padded beyond the strict window sums so holidays near the edges don't starve a window.
 */
export function minBarsRequired(t: WindowThresholds): number {
  return Math.max(t.recentDays + t.baseDays + 5, t.spikeDays + 5, t.baseDays + 10);
}

/** NaN when the previous close is not a positive number. */
export function pctChange(todayClose: number, prevClose: number): number {
  if (!(prevClose > 0)) return NaN;
  return ((todayClose - prevClose) / prevClose) * 100;
}

function mean(values: readonly number[]): number {
  if (values.length === 0) return NaN;
  let sum = 0;
  for (const v of values) sum += v;
  return sum / values.length;
}

export interface VolumeWindows {
  /** Mean of the last `recentDays` volumes (today included) */
  recentAvg: number;
  /** Mean of the `baseDays` volumes immediately before the recent window */
  baseAvg: number;
  /** Mean of the `spikeDays` volumes ending yesterday (today excluded) */
  spikeBase: number;
}

/**
 * Trailing-window volume averages, counted back from the last element.
 * A window that falls off the front of the series is truncated; an empty one is NaN.
 */
export function volumeWindows(volumes: readonly number[], t: WindowThresholds): VolumeWindows {
  const n = volumes.length;
  const recentStart = Math.max(0, n - t.recentDays);
  const baseStart = Math.max(0, recentStart - t.baseDays);
  const spikeEnd = Math.max(0, n - 1);
  const spikeStart = Math.max(0, spikeEnd - t.spikeDays);

  return {
    recentAvg: mean(volumes.slice(recentStart)),
    baseAvg: mean(volumes.slice(baseStart, recentStart)),
    spikeBase: mean(volumes.slice(spikeStart, spikeEnd)),
  };
}

function skip(reason: SkipReason): Evaluation {
  return { passed: false, reason };
}

/**
 * Decide whether one symbol's daily series is an early-breakout candidate:
 * volume building over the recent window, a spike today that yesterday already
 * hinted at, and a price that hasn't run yet.
 *
 * Never throws. Every failed gate (including NaN arithmetic) comes back as a skip reason.
 */
export function evaluateSeries(symbol: string, bars: BarSeries, t: Thresholds): Evaluation {
  if (bars.length < minBarsRequired(t)) return skip("insufficient_history");

  const today = bars.at(-1);
  const prev = bars.at(-2);
  if (!today || !prev) return skip("insufficient_history");

  const dayChangePct = pctChange(today.close, prev.close);
  if (!Number.isFinite(dayChangePct)) return skip("invalid_price");

  // Upper bound only: sharp drops still qualify.
  if (dayChangePct > t.maxDayChangePct) return skip("price_already_moved");

  const { recentAvg, baseAvg, spikeBase } = volumeWindows(bars.map((b) => b.volume), t);

  if (!Number.isFinite(recentAvg) || !Number.isFinite(baseAvg) || baseAvg <= 0) {
    return skip("no_base_volume");
  }
  if (baseAvg < t.minBaseAvgVolume) return skip("illiquid");

  const recentBaseRatio = recentAvg / baseAvg;
  if (!(recentBaseRatio >= t.minRecentRatio)) return skip("no_buildup");

  if (!Number.isFinite(spikeBase) || spikeBase <= 0) return skip("no_spike_base");

  const dayVolumeRatio = today.volume / spikeBase;
  if (!(dayVolumeRatio >= t.minSpikeRatio)) return skip("no_spike");

  // Continuity: yesterday must already be above the spike baseline.
  if (!(prev.volume >= spikeBase)) return skip("no_continuity");

  return {
    passed: true,
    row: {
      symbol,
      lastDate: today.date,
      close: today.close,
      dayChangePct,
      dayVolume: Math.trunc(today.volume),
      dayVolumeRatio,
      recentAvgVolume: Math.trunc(recentAvg),
      baseAvgVolume: Math.trunc(baseAvg),
      recentBaseRatio,
    },
  };
}
