import { stringify } from "csv-stringify/sync";
import Table from "cli-table3";
import { DEFAULT_EXCHANGE_SUFFIX, stripSuffix } from "./codes.js";
import type { ScreenResultRow } from "./types.js";

export const DEFAULT_EXPORT_FILENAME = "tse_volume_initial_move.csv";

/** Spreadsheet apps need the BOM to detect UTF-8. */
const UTF8_BOM = "\uFEFF";

export const RESULT_COLUMNS = [
  "Ticker",
  "Code",
  "Last Date",
  "Close",
  "Day Chg %",
  "Day Volume",
  "Day Vol Ratio",
  "Recent Avg Vol",
  "Base Avg Vol",
  "Recent/Base",
] as const;

export type ResultColumn = (typeof RESULT_COLUMNS)[number];
export type FormattedRow = Record<ResultColumn, string>;

function fixed2(n: number): string {
  return n.toFixed(2);
}

function count(n: number): string {
  return String(Math.trunc(n));
}

/** Display form shared by the table, the CSV and the REST payload. */
export function formatRow(row: ScreenResultRow, suffix: string = DEFAULT_EXCHANGE_SUFFIX): FormattedRow {
  return {
    "Ticker": row.symbol,
    "Code": stripSuffix(row.symbol, suffix),
    "Last Date": row.lastDate,
    "Close": fixed2(row.close),
    "Day Chg %": fixed2(row.dayChangePct),
    "Day Volume": count(row.dayVolume),
    "Day Vol Ratio": fixed2(row.dayVolumeRatio),
    "Recent Avg Vol": count(row.recentAvgVolume),
    "Base Avg Vol": count(row.baseAvgVolume),
    "Recent/Base": fixed2(row.recentBaseRatio),
  };
}

function toCells(row: ScreenResultRow, suffix: string): string[] {
  const formatted = formatRow(row, suffix);
  return RESULT_COLUMNS.map((col) => formatted[col]);
}

/** BOM-prefixed UTF-8 CSV with a header row, one line per result row. */
export function toCsv(rows: readonly ScreenResultRow[], suffix: string = DEFAULT_EXCHANGE_SUFFIX): string {
  const records = [[...RESULT_COLUMNS], ...rows.map((r) => toCells(r, suffix))];
  return UTF8_BOM + stringify(records);
}

/** Plain-text table for terminals. */
export function renderTable(rows: readonly ScreenResultRow[], suffix: string = DEFAULT_EXCHANGE_SUFFIX): string {
  const table = new Table({
    head: [...RESULT_COLUMNS],
    style: { head: [], border: [] },
    colAligns: ["left", "left", "left", "right", "right", "right", "right", "right", "right", "right"],
  });
  for (const row of rows) table.push(toCells(row, suffix));
  return table.toString();
}
