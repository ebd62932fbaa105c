import { config } from "../config.js";

export type MarketSession = "pre-open" | "morning" | "lunch" | "afternoon" | "closed";

interface LocalClock {
  /** 0=Sun, 6=Sat */
  day: number;
  minutes: number;
  display: string;
}

const WEEKDAYS = ["Sun", "Mon", "Tue", "Wed", "Thu", "Fri", "Sat"];

function localClock(now: Date, timeZone: string): LocalClock {
  const parts = new Intl.DateTimeFormat("en-US", {
    timeZone,
    weekday: "short",
    hour: "2-digit",
    minute: "2-digit",
    hourCycle: "h23",
  }).formatToParts(now);
  const get = (type: string) => parts.find((p) => p.type === type)?.value ?? "";
  const hour = parseInt(get("hour"), 10);
  const minute = parseInt(get("minute"), 10);
  const display = now.toLocaleString("en-US", {
    timeZone,
    weekday: "short", year: "numeric", month: "short", day: "numeric",
    hour: "2-digit", minute: "2-digit", hour12: false,
  });
  return { day: WEEKDAYS.indexOf(get("weekday")), minutes: hour * 60 + minute, display };
}

/**
 * Tokyo cash session by exchange-local clock. Holidays are not modelled.
 * pre-open 08:00–09:00, morning 09:00–11:30, lunch 11:30–12:30, afternoon 12:30–15:30.
 */
export function getMarketSession(now: Date = new Date(), timeZone: string = config.screen.timeZone): { localTime: string; session: MarketSession } {
  const { day, minutes, display: localTime } = localClock(now, timeZone);

  if (day === 0 || day === 6) return { localTime, session: "closed" };
  if (minutes >= 480 && minutes < 540) return { localTime, session: "pre-open" };
  if (minutes >= 540 && minutes < 690) return { localTime, session: "morning" };
  if (minutes >= 690 && minutes < 750) return { localTime, session: "lunch" };
  if (minutes >= 750 && minutes < 930) return { localTime, session: "afternoon" };
  return { localTime, session: "closed" };
}

export function getStatus(cacheSize: number, now: Date = new Date()) {
  const { localTime, session } = getMarketSession(now);
  return {
    status: "ready",
    exchangeTime: localTime,
    marketSession: session,
    marketData: "yahoo-finance (daily bars, unadjusted)",
    historyCacheEntries: cacheSize,
    note: session === "closed" || session === "pre-open"
      ? "Outside trading hours — the latest bar is final"
      : "Market open — today's bar is partial; results are more stable after the close",
    timestamp: now.toISOString(),
  };
}
