import { Router, type Request } from "express";
import { z } from "zod";
import { getStatus } from "../providers/status.js";
import type { BarCache } from "../providers/history-cache.js";
import { runScreen } from "../screener/run.js";
import { resolveThresholds, THRESHOLD_RANGES } from "../screener/thresholds.js";
import { formatRow, toCsv } from "../screener/export.js";
import type { HistoryFetcher, ScreenOutcome, Thresholds } from "../screener/types.js";
import { logRest } from "../logging.js";

export interface RouterDeps {
  fetchHistory: HistoryFetcher;
  cache: BarCache;
  defaults: Thresholds;
  exchangeSuffix: string;
  exportFilename: string;
}

/** Validate a stock symbol: alphanumeric, dots, hyphens, carets, max 20 chars */
const SYMBOL_RE = /^[A-Za-z0-9.\-^=]{1,20}$/;
export function validateSymbol(symbol: string): string | null {
  if (!symbol || !SYMBOL_RE.test(symbol)) {
    return "Invalid symbol: must be 1-20 alphanumeric characters";
  }
  return null;
}

const codesSchema = z.union([z.string(), z.array(z.string())], {
  errorMap: () => ({ message: "codes must be a string or an array of strings" }),
});

const screenBodySchema = z.object({ codes: codesSchema.optional() }).passthrough();

const LOOKBACK = THRESHOLD_RANGES.lookbackDays;

// Clamped to the screen's lookback range so each symbol has a bounded number of cache keys.
const historyQuerySchema = z.object({
  days: z.coerce
    .number({ invalid_type_error: "days must be a number" })
    .int({ message: "days must be an integer" })
    .transform((d) => Math.min(LOOKBACK.max, Math.max(LOOKBACK.min, d)))
    .optional(),
});

type ScreenRequest =
  | { ok: true; codesText: string; thresholds: Thresholds }
  | { ok: false; error: string };

function parseScreenRequest(req: Request, defaults: Thresholds): ScreenRequest {
  const body = screenBodySchema.safeParse(req.body ?? {});
  if (!body.success) {
    return { ok: false, error: body.error.issues[0]?.message ?? "Invalid request body" };
  }
  const { codes, ...overrides } = body.data;
  const thresholds = resolveThresholds(overrides, defaults);
  if (!thresholds.ok) return thresholds;
  const codesText = Array.isArray(codes) ? codes.join("\n") : (codes ?? "");
  return { ok: true, codesText, thresholds: thresholds.thresholds };
}

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

export function createRouter(deps: RouterDeps): Router {
  const router = Router();

  const screen = (codesText: string, thresholds: Thresholds): Promise<ScreenOutcome> =>
    runScreen(
      { codesText, thresholds, suffix: deps.exchangeSuffix },
      {
        fetchHistory: deps.fetchHistory,
        onProgress: (p) => logRest.debug(p, "Screen progress"),
      },
    );

  // GET /api/status
  router.get("/status", (_req, res) => {
    res.json(getStatus(deps.cache.size));
  });

  // GET /api/screen/defaults: form defaults and allowed ranges
  router.get("/screen/defaults", (_req, res) => {
    res.json({ defaults: deps.defaults, ranges: THRESHOLD_RANGES, exchangeSuffix: deps.exchangeSuffix });
  });

  // POST /api/screen: run and return ranked rows as JSON
  router.post("/screen", async (req, res) => {
    const parsed = parseScreenRequest(req, deps.defaults);
    if (!parsed.ok) { res.status(400).json({ error: parsed.error }); return; }
    try {
      const outcome = await screen(parsed.codesText, parsed.thresholds);
      switch (outcome.status) {
        case "input_error":
          res.status(400).json({ error: outcome.message });
          return;
        case "no_matches":
          res.json({
            status: "no_matches",
            message: "No symbols matched the conditions (or no data could be fetched)",
            total: outcome.total,
            matched: 0,
            skipped: outcome.skipped,
            thresholds: parsed.thresholds,
            rows: [],
            table: [],
          });
          return;
        case "ok":
          res.json({
            status: "ok",
            total: outcome.total,
            matched: outcome.matched,
            skipped: outcome.skipped,
            thresholds: parsed.thresholds,
            rows: outcome.rows,
            table: outcome.rows.map((r) => formatRow(r, deps.exchangeSuffix)),
          });
          return;
      }
    } catch (e) {
      logRest.error({ err: errorMessage(e) }, "Screen run failed");
      res.status(500).json({ error: errorMessage(e) });
    }
  });

  // POST /api/screen/csv: same run, as a downloadable BOM-prefixed CSV
  router.post("/screen/csv", async (req, res) => {
    const parsed = parseScreenRequest(req, deps.defaults);
    if (!parsed.ok) { res.status(400).json({ error: parsed.error }); return; }
    try {
      const outcome = await screen(parsed.codesText, parsed.thresholds);
      if (outcome.status === "input_error") {
        res.status(400).json({ error: outcome.message });
        return;
      }
      if (outcome.status === "no_matches") {
        res.status(404).json({ status: "no_matches", total: outcome.total, skipped: outcome.skipped });
        return;
      }
      res.setHeader("Content-Type", "text/csv; charset=utf-8");
      res.setHeader("Content-Disposition", `attachment; filename="${deps.exportFilename}"`);
      res.send(toCsv(outcome.rows, deps.exchangeSuffix));
    } catch (e) {
      logRest.error({ err: errorMessage(e) }, "Screen export failed");
      res.status(500).json({ error: errorMessage(e) });
    }
  });

  // GET /api/history/:symbol?days=160
  router.get("/history/:symbol", async (req, res) => {
    const { symbol } = req.params;
    const symErr = validateSymbol(symbol);
    if (symErr) { res.status(400).json({ error: symErr }); return; }

    const query = historyQuerySchema.safeParse(req.query);
    if (!query.success) {
      res.status(400).json({ error: query.error.issues[0]?.message ?? "Invalid query params" });
      return;
    }
    const lookbackDays = query.data.days ?? deps.defaults.lookbackDays;
    try {
      const bars = await deps.fetchHistory(symbol, lookbackDays);
      res.json({ symbol, lookbackDays, count: bars.length, bars });
    } catch (e) {
      res.status(500).json({ error: errorMessage(e) });
    }
  });

  // DELETE /api/cache: drop memoized history
  router.delete("/cache", (_req, res) => {
    const cleared = deps.cache.clear();
    logRest.info({ cleared }, "History cache cleared");
    res.json({ cleared });
  });

  return router;
}
