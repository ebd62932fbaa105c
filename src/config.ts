import dotenv from "dotenv";
import { DEFAULT_EXCHANGE_SUFFIX } from "./screener/codes.js";
import { DEFAULT_EXPORT_FILENAME } from "./screener/export.js";
import type { Thresholds } from "./screener/thresholds.js";

dotenv.config();

export const config = {
  rest: {
    port: parseInt(process.env.REST_PORT ?? "3000", 10),
    apiKey: process.env.REST_API_KEY ?? "",
  },
  yahoo: {
    timeoutMs: parseInt(process.env.YAHOO_TIMEOUT_MS ?? "8000", 10),
  },
  screen: {
    /** Appended to bare 4-digit local codes */
    exchangeSuffix: process.env.EXCHANGE_SUFFIX ?? DEFAULT_EXCHANGE_SUFFIX,
    /** Exchange-local zone used for bar dates and the session clock */
    timeZone: process.env.EXCHANGE_TIMEZONE ?? "Asia/Tokyo",
    exportFilename: process.env.EXPORT_FILENAME ?? DEFAULT_EXPORT_FILENAME,
    defaultCodes: process.env.DEFAULT_CODES ?? "7203,6758,9984,8035,4063,9432",
    defaults: {
      lookbackDays: parseInt(process.env.SCREEN_LOOKBACK_DAYS ?? "160", 10),
      recentDays: parseInt(process.env.SCREEN_RECENT_DAYS ?? "5", 10),
      baseDays: parseInt(process.env.SCREEN_BASE_DAYS ?? "20", 10),
      minRecentRatio: parseFloat(process.env.SCREEN_MIN_RECENT_RATIO ?? "1.5"),
      spikeDays: parseInt(process.env.SCREEN_SPIKE_DAYS ?? "20", 10),
      minSpikeRatio: parseFloat(process.env.SCREEN_MIN_SPIKE_RATIO ?? "3.0"),
      maxDayChangePct: parseFloat(process.env.SCREEN_MAX_DAY_CHANGE_PCT ?? "5"),
      minBaseAvgVolume: parseInt(process.env.SCREEN_MIN_BASE_AVG_VOLUME ?? "100000", 10),
      topN: parseInt(process.env.SCREEN_TOP_N ?? "50", 10),
    } satisfies Thresholds,
  },
};

export type AppConfig = typeof config;
