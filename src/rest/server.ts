import express, { type Request, type Response, type NextFunction } from "express";
import cors from "cors";
import rateLimit from "express-rate-limit";
import { timingSafeEqual } from "node:crypto";
import type { Server } from "node:http";
import { createRouter } from "./routes.js";
import { config } from "../config.js";
import { requestLogger, logRest } from "../logging.js";
import { fetchDailyBars } from "../providers/yahoo.js";
import { createHistoryFetcher, MemoryBarCache, type BarCache, type BarProvider } from "../providers/history-cache.js";
import type { Thresholds } from "../screener/types.js";

export interface AppOptions {
  apiKey: string;
  provider: BarProvider;
  cache: BarCache;
  defaults: Thresholds;
  exchangeSuffix: string;
  exportFilename: string;
}

function apiKeyAuth(key: string) {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!key) {
      next();
      return;
    }
    const header = req.headers["x-api-key"];
    const provided =
      (typeof header === "string" ? header : undefined) ??
      req.headers.authorization?.replace(/^Bearer\s+/i, "");
    const providedBuffer = Buffer.from(provided ?? "");
    const keyBuffer = Buffer.from(key);

    if (
      providedBuffer.length === keyBuffer.length &&
      timingSafeEqual(providedBuffer, keyBuffer)
    ) {
      next();
    } else {
      res.status(401).json({ error: "Unauthorized: invalid or missing API key" });
    }
  };
}

const startTime = Date.now();

export function createApp(overrides: Partial<AppOptions> = {}): express.Express {
  const opts: AppOptions = {
    apiKey: config.rest.apiKey,
    provider: fetchDailyBars,
    cache: new MemoryBarCache(),
    defaults: config.screen.defaults,
    exchangeSuffix: config.screen.exchangeSuffix,
    exportFilename: config.screen.exportFilename,
    ...overrides,
  };
  const fetchHistory = createHistoryFetcher({ provider: opts.provider, cache: opts.cache });

  // Each screen run fans out to one Yahoo call per symbol; keep the request rate modest.
  const apiLimiter = rateLimit({
    windowMs: 60_000,
    max: 30,
    standardHeaders: true,
    legacyHeaders: false,
    message: { error: "Rate limit exceeded — 30 requests/minute" },
  });

  const app = express();
  app.use(cors());
  app.use(express.json({ limit: "256kb" }));
  app.use(requestLogger);

  // Health check (unauthenticated)
  app.get("/", (_req, res) => {
    res.json({
      name: "volume-breakout-screener",
      version: "1.0.0",
      api: "/api/status",
      screen: "POST /api/screen",
      export: "POST /api/screen/csv",
    });
  });

  // GET /health: liveness plus cache size (unauthenticated)
  app.get("/health", (_req, res) => {
    res.json({
      status: "ok",
      uptime_seconds: Math.floor((Date.now() - startTime) / 1000),
      history_cache_entries: opts.cache.size,
      timestamp: new Date().toISOString(),
    });
  });

  app.use(
    "/api",
    apiKeyAuth(opts.apiKey),
    apiLimiter,
    createRouter({
      fetchHistory,
      cache: opts.cache,
      defaults: opts.defaults,
      exchangeSuffix: opts.exchangeSuffix,
      exportFilename: opts.exportFilename,
    }),
  );

  return app;
}

export function startRestServer(overrides: Partial<AppOptions> = {}): Promise<Server> {
  return new Promise((resolve) => {
    const app = createApp(overrides);
    const httpServer = app.listen(config.rest.port, () => {
      logRest.info({ port: config.rest.port }, "REST server listening");
      if (config.rest.apiKey) {
        logRest.info("API key authentication enabled");
      } else {
        logRest.warn("No REST_API_KEY set — endpoints are unauthenticated");
      }
      resolve(httpServer);
    });
  });
}
