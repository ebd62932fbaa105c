import pino from "pino";
import path from "node:path";
import { fileURLToPath } from "node:url";
import fs from "node:fs";
import type { Request, Response, NextFunction } from "express";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const logsDir = path.join(__dirname, "../data/logs");
if (!fs.existsSync(logsDir)) fs.mkdirSync(logsDir, { recursive: true });

// Rotate log file daily, filename screener-YYYY-MM-DD.log
function logFilePath(): string {
  const date = new Date().toISOString().slice(0, 10);
  return path.join(logsDir, `screener-${date}.log`);
}

// Multi-destination: stderr (human-readable) + file (JSON for parsing).
// stdout stays clean for CLI tables and CSV piping.
const transport = pino.transport({
  targets: [
    {
      target: "pino-pretty",
      options: {
        destination: 2,
        colorize: true,
        translateTime: "HH:MM:ss.l",
        ignore: "pid,hostname",
      },
      level: process.env.LOG_LEVEL ?? "info",
    },
    {
      target: "pino/file",
      options: {
        destination: logFilePath(),
        mkdir: true,
      },
      level: "debug",
    },
  ],
});

export const logger = pino(
  {
    level: "debug", // base level; targets filter individually
    base: { service: "volume-screener" },
  },
  transport,
);

export const logYahoo = logger.child({ subsystem: "yahoo" });
export const logScreen = logger.child({ subsystem: "screen" });
export const logCache = logger.child({ subsystem: "cache" });
export const logRest = logger.child({ subsystem: "rest" });

export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const start = Date.now();
  res.on("finish", () => {
    const duration = Date.now() - start;
    logRest.info(
      {
        method: req.method,
        path: req.path,
        status: res.statusCode,
        duration_ms: duration,
      },
      `${req.method} ${req.path} → ${res.statusCode} (${duration}ms)`,
    );
  });
  next();
}

// Clean up old log files (keep last N days)
export function pruneOldLogs(keepDays: number = 30): void {
  try {
    const files = fs.readdirSync(logsDir).filter((f) => f.startsWith("screener-") && f.endsWith(".log"));
    const cutoff = new Date();
    cutoff.setDate(cutoff.getDate() - keepDays);
    const cutoffStr = cutoff.toISOString().slice(0, 10);

    for (const file of files) {
      const dateMatch = file.match(/screener-(\d{4}-\d{2}-\d{2})\.log/);
      if (dateMatch && dateMatch[1] < cutoffStr) {
        fs.unlinkSync(path.join(logsDir, file));
        logger.info({ file }, "Pruned old log file");
      }
    }
  } catch (e) {
    logger.warn({ err: e }, "Failed to prune old logs");
  }
}
