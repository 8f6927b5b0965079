// ─── Weather CSV Reader ──────────────────────────────────────────────────────
//
// Reads a weather export laid out as:
//
//   <metadata lines>              ← skipped (skipLines)
//   time,cloud_cover_low (%),...  ← hourly header
//   2024-06-01T00:00,12,...
//   ...
//   <blank line>
//   time,sunrise (iso8601),sunset (iso8601)   ← optional daily solar section
//   2024-06-01,2024-06-01T05:48,2024-06-01T20:22
//
// and hands back raw string rows. Nothing is validated here beyond finding
// the columns; see normalizer.ts.
// ─────────────────────────────────────────────────────────────────────────────

import type { RawRow } from "../types.js";
import { CsvFormatError } from "../errors.js";

// ─── Types ──────────────────────────────────────────────────────────────────

export const DEFAULT_CLOUD_COLUMN = "cloud_cover_low (%)";

export interface ReadCsvOptions {
  /** Leading lines to drop before the hourly header. Default: 3 */
  skipLines?: number;
  /** Attach sunrise/sunset from the daily section. Default: false */
  useSolar?: boolean;
  /** Cloud coverage header. Default: "cloud_cover_low (%)", else the first header containing "cloud". */
  cloudColumn?: string;
}

export interface WeatherSheet {
  /** Hourly headers, in order. */
  columns: string[];
  timeColumn: string;
  cloudColumn: string;
  rows: RawRow[];
  headerLinesSkipped: number;
  /** Days found in the solar section (0 when absent or not requested). */
  solarDays: number;
}

interface SolarDayText {
  sunrise: string;
  sunset: string;
}

// ─── Line Splitting ─────────────────────────────────────────────────────────

/**
 * Split one CSV line into fields. Handles double-quoted fields with
 * embedded commas and "" escapes.
 */
export function splitCsvLine(line: string): string[] {
  const fields: string[] = [];
  let current = "";
  let quoted = false;

  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (quoted) {
      if (ch === '"' && line[i + 1] === '"') {
        current += '"';
        i++;
      } else if (ch === '"') {
        quoted = false;
      } else {
        current += ch;
      }
    } else if (ch === '"') {
      quoted = true;
    } else if (ch === ",") {
      fields.push(current);
      current = "";
    } else {
      current += ch;
    }
  }
  fields.push(current);

  return fields.map(f => f.trim());
}

/** Split text into lines, tolerating CRLF. */
export function splitLines(text: string): string[] {
  const lines = text.split(/\r?\n/);
  if (lines.length > 0 && lines[lines.length - 1] === "") lines.pop();
  return lines;
}

function isSolarHeader(line: string): boolean {
  const lower = line.toLowerCase();
  return lower.includes("sunrise") && lower.includes("sunset");
}

function isBlank(line: string): boolean {
  return line.trim() === "";
}

/** First header containing time, date or timestamp. */
export function findTimeColumn(headers: string[]): string | undefined {
  return headers.find(h => /time|date|timestamp/i.test(h));
}

function findCloudColumn(headers: string[], requested?: string): string | undefined {
  if (requested) return headers.find(h => h === requested);
  return headers.find(h => h === DEFAULT_CLOUD_COLUMN) ?? headers.find(h => /cloud/i.test(h));
}

// ─── Solar Section ──────────────────────────────────────────────────────────

function readSolarSection(lines: string[], from: number): Map<string, SolarDayText> {
  const days = new Map<string, SolarDayText>();
  const start = lines.findIndex((line, i) => i >= from && isSolarHeader(line));
  if (start === -1) return days;

  const headers = splitCsvLine(lines[start]);
  const dateIdx = headers.findIndex(h => /time|date/i.test(h) && !/sunrise|sunset/i.test(h));
  const sunriseIdx = headers.findIndex(h => /sunrise/i.test(h));
  const sunsetIdx = headers.findIndex(h => /sunset/i.test(h));
  if (dateIdx === -1) return days;

  for (let i = start + 1; i < lines.length; i++) {
    if (isBlank(lines[i])) break;
    const cells = splitCsvLine(lines[i]);
    const date = (cells[dateIdx] ?? "").slice(0, 10);
    if (date.length !== 10) continue;
    days.set(date, {
      sunrise: cells[sunriseIdx] ?? "",
      sunset: cells[sunsetIdx] ?? "",
    });
  }

  return days;
}

// ─── Public API ─────────────────────────────────────────────────────────────

/**
 * Read a weather CSV export into raw rows.
 *
 * @throws CsvFormatError when there is no header or no time/cloud column.
 */
export function readWeatherCsv(text: string, options: ReadCsvOptions = {}): WeatherSheet {
  const skipLines = options.skipLines ?? 3;
  const lines = splitLines(text);

  let headerIdx = skipLines;
  while (headerIdx < lines.length && isBlank(lines[headerIdx])) headerIdx++;
  if (headerIdx >= lines.length) {
    throw new CsvFormatError(`No data section found after skipping ${skipLines} line(s)`);
  }

  const columns = splitCsvLine(lines[headerIdx]);
  const timeColumn = findTimeColumn(columns);
  if (!timeColumn) {
    throw new CsvFormatError(`Could not find a time column in header: ${columns.join(", ")}`);
  }
  const cloudColumn = findCloudColumn(columns, options.cloudColumn);
  if (!cloudColumn) {
    const wanted = options.cloudColumn ? `"${options.cloudColumn}"` : "a cloud coverage column";
    throw new CsvFormatError(`Could not find ${wanted} in header: ${columns.join(", ")}`);
  }

  const timeIdx = columns.indexOf(timeColumn);
  const cloudIdx = columns.indexOf(cloudColumn);

  let dataEnd = headerIdx + 1;
  while (dataEnd < lines.length && !isBlank(lines[dataEnd]) && !isSolarHeader(lines[dataEnd])) {
    dataEnd++;
  }

  const solarDays = options.useSolar ? readSolarSection(lines, dataEnd) : new Map<string, SolarDayText>();

  const rows: RawRow[] = [];
  for (let i = headerIdx + 1; i < dataEnd; i++) {
    const cells = splitCsvLine(lines[i]);
    const fields: Record<string, string> = {};
    columns.forEach((header, c) => {
      if (c !== timeIdx) fields[header] = cells[c] ?? "";
    });

    const timestamp = cells[timeIdx] ?? "";
    const row: RawRow = {
      line: i + 1,
      timestamp,
      cloudCoverage: cells[cloudIdx] ?? "",
      fields,
    };

    const day = solarDays.get(timestamp.slice(0, 10));
    if (day) {
      row.sunrise = day.sunrise;
      row.sunset = day.sunset;
    }
    rows.push(row);
  }

  return {
    columns,
    timeColumn,
    cloudColumn,
    rows,
    headerLinesSkipped: Math.min(skipLines, lines.length),
    solarDays: solarDays.size,
  };
}
