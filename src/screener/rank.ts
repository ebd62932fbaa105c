import type { ScreenResultRow } from "./types.js";

/** Strongest first: today's spike ratio, then the recent/base build-up ratio. */
export function compareRows(a: ScreenResultRow, b: ScreenResultRow): number {
  return b.dayVolumeRatio - a.dayVolumeRatio || b.recentBaseRatio - a.recentBaseRatio;
}

export function rankRows(rows: readonly ScreenResultRow[], topN: number): ScreenResultRow[] {
  return [...rows].sort(compareRows).slice(0, Math.max(0, topN));
}
