// ─── Series Normalizer ───────────────────────────────────────────────────────
//
// Validates raw CSV rows, attaches a solar sample to each survivor and counts
// what happened along the way. Bad rows become MalformedRowError records; they
// never stop the run.
// ─────────────────────────────────────────────────────────────────────────────

import type { CleanedTable, RawRow, Row, SolarTimes, TableEntry } from "../types.js";
import type { ConversionConfig } from "../config/schema.js";
import { MalformedRowError } from "../errors.js";
import { parseTimestamp } from "../time.js";
import { deriveSolarSample } from "../solar/model.js";
import { DEFAULT_CLOUD_COLUMN } from "./csv.js";

// ─── Types ──────────────────────────────────────────────────────────────────

export interface NormalizeStats {
  rowsRead: number;
  rowsAccepted: number;
  rowsSkipped: number;
  missingCloud: number;
  sunriseEvents: number;
  sunsetEvents: number;
  dayRows: number;
  nightRows: number;
  /** Rows whose day window came from embedded sunrise/sunset. */
  embeddedSolarRows: number;
}

export interface NormalizeResult {
  table: CleanedTable;
  rejected: MalformedRowError[];
  stats: NormalizeStats;
}

/** Column layout carried into the cleaned table. */
export interface TableLayout {
  columns: string[];
  cloudColumn: string;
}

export type NormalizeConfig = Pick<
  ConversionConfig,
  "dayStart" | "dayEnd" | "sineRange" | "toleranceMinutes" | "useRealisticTiming"
>;

// ─── Cell Parsing ───────────────────────────────────────────────────────────

const MISSING_TOKENS = new Set(["", "nan", "null", "na", "n/a", "-"]);
const NUMBER_RE = /^[-+]?(\d+(\.\d*)?|\.\d+)([eE][-+]?\d+)?$/;

/**
 * Parse a cloud coverage cell.
 * Returns null for an explicit missing marker, undefined when not a number.
 */
export function parseCoverage(text: string): number | null | undefined {
  const trimmed = text.trim();
  if (MISSING_TOKENS.has(trimmed.toLowerCase())) return null;
  if (!NUMBER_RE.test(trimmed)) return undefined;
  return Number(trimmed);
}

// ─── Stats ──────────────────────────────────────────────────────────────────

export function emptyStats(rowsRead: number): NormalizeStats {
  return {
    rowsRead,
    rowsAccepted: 0,
    rowsSkipped: 0,
    missingCloud: 0,
    sunriseEvents: 0,
    sunsetEvents: 0,
    dayRows: 0,
    nightRows: 0,
    embeddedSolarRows: 0,
  };
}

/** Count one accepted entry. */
export function tallyEntry(stats: NormalizeStats, { row, solar }: TableEntry): void {
  stats.rowsAccepted++;
  if (row.cloudCoverage === null) stats.missingCloud++;
  if (solar.isSunriseEvent) stats.sunriseEvents++;
  if (solar.isSunsetEvent) stats.sunsetEvents++;
  if (solar.cycle === "day") stats.dayRows++;
  else stats.nightRows++;
  if (solar.window.source === "embedded") stats.embeddedSolarRows++;
}

function parseSolarTimes(raw: RawRow): SolarTimes | undefined {
  if (raw.sunrise === undefined || raw.sunset === undefined) return undefined;
  const sunrise = parseTimestamp(raw.sunrise);
  const sunset = parseTimestamp(raw.sunset);
  if (!sunrise || !sunset) return undefined;
  return { sunrise, sunset };
}

// ─── Public API ─────────────────────────────────────────────────────────────

/**
 * Turn raw rows into a CleanedTable, in input order.
 *
 * A row is rejected when its timestamp is unparsable, its cloud value is
 * neither numeric nor a missing marker, or its timestamp does not move past
 * the last accepted row.
 */
export function normalize(
  rawRows: readonly RawRow[],
  config: NormalizeConfig,
  layout?: TableLayout,
): NormalizeResult {
  const entries: TableEntry[] = [];
  const rejected: MalformedRowError[] = [];
  const stats = emptyStats(rawRows.length);

  let lastMinutes = -Infinity;

  for (const raw of rawRows) {
    const timestamp = parseTimestamp(raw.timestamp);
    if (!timestamp) {
      rejected.push(new MalformedRowError(raw.line, "timestamp", raw.timestamp));
      continue;
    }

    const coverage = parseCoverage(raw.cloudCoverage);
    if (coverage === undefined) {
      rejected.push(new MalformedRowError(raw.line, "cloud-coverage", raw.cloudCoverage));
      continue;
    }

    if (timestamp.epochMinutes <= lastMinutes) {
      rejected.push(new MalformedRowError(raw.line, "timestamp-order", raw.timestamp));
      continue;
    }
    lastMinutes = timestamp.epochMinutes;

    const solarTimes = parseSolarTimes(raw);
    const row: Row = {
      line: raw.line,
      timestamp,
      cloudCoverage: coverage,
      fields: { ...raw.fields },
    };
    if (solarTimes) row.solar = solarTimes;

    const entry: TableEntry = { row, solar: deriveSolarSample(timestamp, config, solarTimes) };
    entries.push(entry);
    tallyEntry(stats, entry);
  }

  stats.rowsSkipped = rejected.length;

  const first = rawRows[0];
  const resolvedLayout: TableLayout = layout ?? {
    columns: first ? Object.keys(first.fields) : [],
    cloudColumn: DEFAULT_CLOUD_COLUMN,
  };

  return {
    table: { ...resolvedLayout, entries },
    rejected,
    stats,
  };
}
