import type { Bar, ScreenResultRow } from "../types.js";

/** Consecutive calendar days from 2024-01-01 (weekends are not skipped; the evaluator only counts bars). */
export function makeBars(volumes: number[], closes?: number[]): Bar[] {
  const start = Date.UTC(2024, 0, 1);
  return volumes.map((volume, i) => {
    const close = closes?.[i] ?? 100;
    return {
      date: new Date(start + i * 86_400_000).toISOString().slice(0, 10),
      open: close,
      close,
      volume,
    };
  });
}

/**
 * 40 bars that pass the default thresholds:
 * base window avg 100k, recent avg 280k (ratio 2.8), spike base 125k,
 * today 500k (ratio 4.0), yesterday 300k (above the spike base).
 */
export function breakoutVolumes(overrides: { prev?: number; today?: number } = {}): number[] {
  return [
    ...Array<number>(35).fill(100_000),
    200_000,
    200_000,
    200_000,
    overrides.prev ?? 300_000,
    overrides.today ?? 500_000,
  ];
}

/** Closes flat at 100, last close set to `lastClose`. */
export function closesEndingAt(lastClose: number, length = 40): number[] {
  const closes = Array<number>(length).fill(100);
  closes[length - 1] = lastClose;
  return closes;
}

export function breakoutBars(opts: { prev?: number; today?: number; lastClose?: number } = {}): Bar[] {
  return makeBars(breakoutVolumes(opts), closesEndingAt(opts.lastClose ?? 103));
}

export function makeRow(overrides: Partial<ScreenResultRow> = {}): ScreenResultRow {
  return {
    symbol: "7203.T",
    lastDate: "2024-02-09",
    close: 103,
    dayChangePct: 3,
    dayVolume: 500_000,
    dayVolumeRatio: 4,
    recentAvgVolume: 280_000,
    baseAvgVolume: 100_000,
    recentBaseRatio: 2.8,
    ...overrides,
  };
}
