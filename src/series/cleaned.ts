// ─── Cleaned Table CSV ──────────────────────────────────────────────────────
//
// The intermediate file between `clean` and `compose`:
//
//   date,time,hour,cycle,solar_sine,sunrise_event,sunset_event,<original columns>
//   2024-06-01,05:00,5,night,-1.85,true,false,12
// ─────────────────────────────────────────────────────────────────────────────

import type { CleanedTable, Row, TableEntry } from "../types.js";
import type { ConversionConfig } from "../config/schema.js";
import { CsvFormatError, MalformedRowError } from "../errors.js";
import { parseTimestamp } from "../time.js";
import { splitCsvLine, splitLines, DEFAULT_CLOUD_COLUMN } from "./csv.js";
import { parseCoverage, emptyStats, tallyEntry, type NormalizeStats } from "./normalizer.js";

export const CLEANED_COLUMNS = [
  "date",
  "time",
  "hour",
  "cycle",
  "solar_sine",
  "sunrise_event",
  "sunset_event",
] as const;

// ─── Writer ─────────────────────────────────────────────────────────────────

function quoteField(value: string): string {
  if (/[",\n\r]/.test(value)) return `"${value.replace(/"/g, '""')}"`;
  return value;
}

/** Two decimals, with no "-0.00". */
export function formatSine(sine: number): string {
  const rounded = Math.round(sine * 100) / 100;
  return (rounded === 0 ? 0 : rounded).toFixed(2);
}

/**
 * Serialize a cleaned table. Original columns follow the derived ones,
 * minus any that would clash with a derived name.
 */
export function formatCleanedCsv(table: CleanedTable): string {
  const extra = table.columns.filter(c => !(CLEANED_COLUMNS as readonly string[]).includes(c));
  const lines: string[] = [[...CLEANED_COLUMNS, ...extra].map(quoteField).join(",")];

  for (const { row, solar } of table.entries) {
    const cells = [
      row.timestamp.date,
      row.timestamp.time,
      String(row.timestamp.hour),
      solar.cycle,
      formatSine(solar.sine),
      String(solar.isSunriseEvent),
      String(solar.isSunsetEvent),
      ...extra.map(c => row.fields[c] ?? ""),
    ];
    lines.push(cells.map(quoteField).join(","));
  }

  return lines.join("\n") + "\n";
}

// ─── Reader ─────────────────────────────────────────────────────────────────

export interface CleanedReadResult {
  table: CleanedTable;
  rejected: MalformedRowError[];
  stats: NormalizeStats;
  /**
   * Rows whose |solar_sine| exceeds the configured sine range. Non-zero means
   * the file was cleaned with a larger range and channel 2 is clipped.
   */
  clippedSineRows: number;
}

function parseFlag(text: string): boolean {
  const t = text.trim().toLowerCase();
  return t === "true" || t === "1" || t === "yes";
}

/**
 * Rebuild a CleanedTable from a file written by formatCleanedCsv.
 * The unit phase is recovered as solar_sine / sineRange, so sineRange must be
 * the one the file was cleaned with; larger values are clipped and counted.
 *
 * @throws CsvFormatError when a derived column or the cloud column is missing.
 */
export function readCleanedCsv(
  text: string,
  config: Pick<ConversionConfig, "sineRange" | "dayStart" | "dayEnd" | "cloudColumn">,
): CleanedReadResult {
  const lines = splitLines(text);
  const headerIdx = lines.findIndex(l => l.trim() !== "");
  if (headerIdx === -1) throw new CsvFormatError("Cleaned file is empty");

  const headers = splitCsvLine(lines[headerIdx]);
  const missing = CLEANED_COLUMNS.filter(c => !headers.includes(c));
  if (missing.length > 0) {
    throw new CsvFormatError(`Missing required columns: ${missing.join(", ")}`);
  }

  const columns = headers.filter(h => !(CLEANED_COLUMNS as readonly string[]).includes(h));
  const cloudColumn = config.cloudColumn
    ? columns.find(c => c === config.cloudColumn)
    : columns.find(c => c === DEFAULT_CLOUD_COLUMN) ?? columns.find(c => /cloud/i.test(c));
  if (!cloudColumn) {
    throw new CsvFormatError(`Could not find a cloud coverage column in: ${columns.join(", ")}`);
  }

  const col = (cells: string[], name: string): string => cells[headers.indexOf(name)] ?? "";
  const entries: TableEntry[] = [];
  const rejected: MalformedRowError[] = [];
  const stats = emptyStats(0);
  let clippedSineRows = 0;
  let lastMinutes = -Infinity;

  for (let i = headerIdx + 1; i < lines.length; i++) {
    if (lines[i].trim() === "") continue;
    stats.rowsRead++;
    const cells = splitCsvLine(lines[i]);
    const line = i + 1;

    const stamp = `${col(cells, "date")}T${col(cells, "time")}`;
    const timestamp = parseTimestamp(stamp);
    if (!timestamp) {
      rejected.push(new MalformedRowError(line, "timestamp", stamp));
      continue;
    }

    const coverage = parseCoverage(col(cells, cloudColumn));
    if (coverage === undefined) {
      rejected.push(new MalformedRowError(line, "cloud-coverage", col(cells, cloudColumn)));
      continue;
    }

    const sineText = col(cells, "solar_sine");
    const sine = Number(sineText);
    if (sineText.trim() === "" || !Number.isFinite(sine)) {
      rejected.push(new MalformedRowError(line, "solar-sine", sineText));
      continue;
    }

    if (timestamp.epochMinutes <= lastMinutes) {
      rejected.push(new MalformedRowError(line, "timestamp-order", stamp));
      continue;
    }
    lastMinutes = timestamp.epochMinutes;

    const fields: Record<string, string> = {};
    for (const c of columns) fields[c] = col(cells, c);

    const row: Row = { line, timestamp, cloudCoverage: coverage, fields };
    if (Math.abs(sine) > config.sineRange) clippedSineRows++;
    const phase = Math.max(-1, Math.min(1, sine / config.sineRange));
    const entry: TableEntry = {
      row,
      solar: {
        phase,
        sine,
        isSunriseEvent: parseFlag(col(cells, "sunrise_event")),
        isSunsetEvent: parseFlag(col(cells, "sunset_event")),
        cycle: col(cells, "cycle") === "day" ? "day" : "night",
        window: { dayStart: config.dayStart, dayEnd: config.dayEnd, source: "configured" },
      },
    };
    entries.push(entry);
    tallyEntry(stats, entry);
  }

  stats.rowsSkipped = rejected.length;
  return { table: { columns, cloudColumn, entries }, rejected, stats, clippedSineRows };
}
