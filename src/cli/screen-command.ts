import fs from "node:fs";
import path from "node:path";
import { Command } from "commander";
import { config } from "../config.js";
import { validateConfig, type ValidationResult } from "../config-validator.js";
import { fetchDailyBars } from "../providers/yahoo.js";
import { createHistoryFetcher, MemoryBarCache } from "../providers/history-cache.js";
import { runScreen } from "../screener/run.js";
import { resolveThresholds } from "../screener/thresholds.js";
import { renderTable, toCsv } from "../screener/export.js";
import type { HistoryFetcher, ScreenProgress, Thresholds } from "../screener/types.js";

export interface ScreenCliOptions {
  codes?: string;
  file?: string;
  lookbackDays?: string;
  recentDays?: string;
  baseDays?: string;
  minRecentRatio?: string;
  spikeDays?: string;
  minSpikeRatio?: string;
  maxDayChange?: string;
  minBaseVolume?: string;
  top?: string;
  /** true = default filename, string = explicit path */
  csv?: string | boolean;
  json?: boolean;
}

export interface ScreenCliDeps {
  /** Checked before anything is read or fetched */
  validateConfig: () => ValidationResult;
  fetchHistory: HistoryFetcher;
  defaults: Thresholds;
  exchangeSuffix: string;
  exportFilename: string;
  defaultCodes: string;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  readFile: (file: string) => string;
  writeFile: (file: string, data: string) => void;
}

export const EXIT_OK = 0;
export const EXIT_INPUT_ERROR = 2;

/** Map CLI flag names onto threshold keys. Absent flags stay absent. */
export function thresholdOverrides(opts: ScreenCliOptions): Record<string, string> {
  const pairs: Array<[string, string | undefined]> = [
    ["lookbackDays", opts.lookbackDays],
    ["recentDays", opts.recentDays],
    ["baseDays", opts.baseDays],
    ["minRecentRatio", opts.minRecentRatio],
    ["spikeDays", opts.spikeDays],
    ["minSpikeRatio", opts.minSpikeRatio],
    ["maxDayChangePct", opts.maxDayChange],
    ["minBaseAvgVolume", opts.minBaseVolume],
    ["topN", opts.top],
  ];
  const out: Record<string, string> = {};
  for (const [key, value] of pairs) {
    if (value !== undefined) out[key] = value;
  }
  return out;
}

function progressLine({ processed, total, fraction, symbol }: ScreenProgress): string {
  return `[${processed}/${total}] ${Math.round(fraction * 100)}% ${symbol}\n`;
}

/**
 * Run one screen from parsed CLI options. Returns the process exit code.
 * Progress and notices go to stderr; the table (or JSON) goes to stdout.
 */
export async function runScreenCli(opts: ScreenCliOptions, deps: ScreenCliDeps): Promise<number> {
  const validation = deps.validateConfig();
  for (const warning of validation.warnings) deps.stderr(`Warning: ${warning}\n`);
  if (validation.errors.length > 0) {
    for (const error of validation.errors) deps.stderr(`Error: ${error}\n`);
    return EXIT_INPUT_ERROR;
  }

  const resolved = resolveThresholds(thresholdOverrides(opts), deps.defaults);
  if (!resolved.ok) {
    deps.stderr(`Error: ${resolved.error}\n`);
    return EXIT_INPUT_ERROR;
  }

  let codesText = opts.codes ?? "";
  if (opts.file) {
    try {
      codesText += "\n" + deps.readFile(opts.file);
    } catch (e) {
      deps.stderr(`Error: cannot read ${opts.file}: ${e instanceof Error ? e.message : String(e)}\n`);
      return EXIT_INPUT_ERROR;
    }
  }
  if (opts.codes === undefined && opts.file === undefined) codesText = deps.defaultCodes;

  const outcome = await runScreen(
    { codesText, thresholds: resolved.thresholds, suffix: deps.exchangeSuffix },
    {
      fetchHistory: deps.fetchHistory,
      onProgress: (p) => deps.stderr(progressLine(p)),
    },
  );

  if (outcome.status === "input_error") {
    deps.stderr(`Error: ${outcome.message}\n`);
    return EXIT_INPUT_ERROR;
  }

  if (outcome.status === "no_matches") {
    deps.stderr(`No symbols matched the conditions (or no data could be fetched) — ${outcome.total} checked\n`);
    if (opts.json) deps.stdout(JSON.stringify({ status: "no_matches", total: outcome.total, skipped: outcome.skipped, rows: [] }, null, 2) + "\n");
    return EXIT_OK;
  }

  if (opts.json) {
    deps.stdout(JSON.stringify(outcome, null, 2) + "\n");
  } else {
    deps.stderr(`${outcome.matched} of ${outcome.total} matched — showing top ${outcome.rows.length}\n`);
    deps.stdout(renderTable(outcome.rows, deps.exchangeSuffix) + "\n");
  }

  if (opts.csv) {
    const file = typeof opts.csv === "string" ? opts.csv : deps.exportFilename;
    deps.writeFile(file, toCsv(outcome.rows, deps.exchangeSuffix));
    deps.stderr(`CSV written to ${file}\n`);
  }

  return EXIT_OK;
}

export function defaultCliDeps(): ScreenCliDeps {
  return {
    validateConfig: () => validateConfig(config),
    fetchHistory: createHistoryFetcher({ provider: fetchDailyBars, cache: new MemoryBarCache() }),
    defaults: config.screen.defaults,
    exchangeSuffix: config.screen.exchangeSuffix,
    exportFilename: config.screen.exportFilename,
    defaultCodes: config.screen.defaultCodes,
    stdout: (text) => process.stdout.write(text),
    stderr: (text) => process.stderr.write(text),
    readFile: (file) => fs.readFileSync(path.resolve(file), "utf-8"),
    writeFile: (file, data) => fs.writeFileSync(path.resolve(file), data, "utf-8"),
  };
}

export function createScreenCommand(deps: () => ScreenCliDeps = defaultCliDeps): Command {
  const d = config.screen.defaults;
  return new Command("screen")
    .description("Screen tickers for early volume breakouts (build-up + spike, price not yet run)")
    .option("-c, --codes <list>", "Ticker codes, comma or newline separated (4-digit codes get the exchange suffix)")
    .option("-f, --file <path>", "Read ticker codes from a text file")
    .option("--lookback-days <n>", `Calendar days of history to fetch (default ${d.lookbackDays})`)
    .option("--recent-days <n>", `Recent volume window, trading days (default ${d.recentDays})`)
    .option("--base-days <n>", `Base volume window before the recent one (default ${d.baseDays})`)
    .option("--min-recent-ratio <x>", `Minimum recent/base volume ratio (default ${d.minRecentRatio})`)
    .option("--spike-days <n>", `Days averaged for today's spike ratio (default ${d.spikeDays})`)
    .option("--min-spike-ratio <x>", `Minimum today/average volume ratio (default ${d.minSpikeRatio})`)
    .option("--max-day-change <pct>", `Maximum day change % (default ${d.maxDayChangePct})`)
    .option("--min-base-volume <n>", `Minimum base-window average volume (default ${d.minBaseAvgVolume})`)
    .option("-n, --top <n>", `Rows to show (default ${d.topN})`)
    .option("--csv [path]", `Also write a CSV export (default ${config.screen.exportFilename})`)
    .option("--json", "Print the outcome as JSON instead of a table", false)
    .action(async (opts: ScreenCliOptions) => {
      process.exitCode = await runScreenCli(opts, deps());
    });
}
