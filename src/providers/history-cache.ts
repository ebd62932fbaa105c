import { logCache } from "../logging.js";
import type { Bar, BarSeries, HistoryFetcher } from "../screener/types.js";

/**
 * Key-value store for fetched daily series, keyed by (symbol, lookback).
 * Injected into the history fetcher so its scope and lifetime stay with the owner:
 * one per CLI run, one per REST server process.
 */
export interface BarCache {
  get(key: string): BarSeries | undefined;
  set(key: string, bars: BarSeries): void;
  clear(): number;
  readonly size: number;
}

export class MemoryBarCache implements BarCache {
  private readonly entries = new Map<string, BarSeries>();

  get(key: string): BarSeries | undefined {
    return this.entries.get(key);
  }

  set(key: string, bars: BarSeries): void {
    this.entries.set(key, bars);
  }

  /** Returns the number of entries dropped. */
  clear(): number {
    const dropped = this.entries.size;
    this.entries.clear();
    return dropped;
  }

  get size(): number {
    return this.entries.size;
  }
}

export function historyCacheKey(symbol: string, lookbackDays: number): string {
  return `${symbol}|${lookbackDays}`;
}

export type BarProvider = (symbol: string, lookbackDays: number) => Promise<Bar[]>;

export interface HistoryFetcherDeps {
  provider: BarProvider;
  cache: BarCache;
}

/**
 * Memoized history lookups. Only non-empty results are stored, so a symbol that
 * had no data earlier in the session is asked for again next time.
 */
export function createHistoryFetcher({ provider, cache }: HistoryFetcherDeps): HistoryFetcher {
  return async (symbol, lookbackDays) => {
    const key = historyCacheKey(symbol, lookbackDays);
    const hit = cache.get(key);
    if (hit) {
      logCache.debug({ key, bars: hit.length }, "History cache hit");
      return hit;
    }

    const bars: BarSeries = Object.freeze(await provider(symbol, lookbackDays));
    if (bars.length > 0) {
      cache.set(key, bars);
      logCache.debug({ key, bars: bars.length, size: cache.size }, "History cached");
    }
    return bars;
  };
}
