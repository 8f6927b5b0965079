// ─── Conversion Pipeline ────────────────────────────────────────────────────
//
// Wires the stages together without touching the file system:
//
//   CSV text → readWeatherCsv → normalize → CleanedTable
//            → computeTimeline + compose → NoteEvents
//            → writeNoteSequence (MIDI bytes) + renderChannelChart (SVG)
// ─────────────────────────────────────────────────────────────────────────────

import type { CleanedTable } from "./types.js";
import type { ConversionConfig } from "./config/schema.js";
import { EmptyInputError, type MalformedRowError } from "./errors.js";
import { readWeatherCsv, type WeatherSheet } from "./series/csv.js";
import { normalize, type NormalizeStats } from "./series/normalizer.js";
import { formatCleanedCsv, readCleanedCsv } from "./series/cleaned.js";
import { computeTimeline } from "./timeline/duration.js";
import { compose, type Composition } from "./music/composer.js";
import { writeNoteSequence } from "./midi/writer.js";
import { renderChannelChart } from "./chart.js";
import { buildReport, type RunReport } from "./report.js";

// ─── Types ──────────────────────────────────────────────────────────────────

export interface CleanResult {
  sheet: WeatherSheet;
  table: CleanedTable;
  rejected: MalformedRowError[];
  stats: NormalizeStats;
  /** The cleaned table as CSV text. */
  cleanedCsv: string;
  report: RunReport;
}

export interface ComposeResult {
  composition: Composition;
  /** Standard MIDI file bytes. */
  midi: Uint8Array;
  /** SVG document. */
  chartSvg: string;
  report: RunReport;
}

export interface ComposeContext {
  /** Counts from building the table. */
  stats: NormalizeStats;
  headerLinesSkipped?: number;
  solarDays?: number;
}

export type CleanedComposeResult = ComposeResult & {
  table: CleanedTable;
  rejected: MalformedRowError[];
  /** See CleanedReadResult.clippedSineRows. */
  clippedSineRows: number;
};

export type ConvertResult = CleanResult & ComposeResult;

// ─── Stages ─────────────────────────────────────────────────────────────────

/**
 * Read and normalize a weather export.
 *
 * @throws EmptyInputError when no row survives.
 */
export function cleanWeatherCsv(text: string, config: ConversionConfig): CleanResult {
  const sheet = readWeatherCsv(text, {
    skipLines: config.skipLines,
    useSolar: config.useSolar,
    cloudColumn: config.cloudColumn,
  });

  const { table, rejected, stats } = normalize(sheet.rows, config, {
    columns: sheet.columns.filter(c => c !== sheet.timeColumn),
    cloudColumn: sheet.cloudColumn,
  });
  if (table.entries.length === 0) {
    throw new EmptyInputError(rejected.length);
  }

  return {
    sheet,
    table,
    rejected,
    stats,
    cleanedCsv: formatCleanedCsv(table),
    report: buildReport({
      stats,
      headerLinesSkipped: sheet.headerLinesSkipped,
      solarDays: sheet.solarDays,
      config,
    }),
  };
}

/**
 * Compose a cleaned table into MIDI and a chart.
 *
 * @throws EmptyInputError when the table has no rows.
 */
export function composeTable(
  table: CleanedTable,
  config: ConversionConfig,
  context: ComposeContext,
): ComposeResult {
  if (table.entries.length === 0) {
    throw new EmptyInputError(context.stats.rowsSkipped);
  }

  const timeline = computeTimeline(
    table.entries.length,
    config.durationSeconds,
    config.autoDuration ? "auto" : "fixed",
  );
  const composition = compose(table, timeline);

  return {
    composition,
    midi: writeNoteSequence(composition.events, { bpm: config.bpm }),
    chartSvg: renderChannelChart(table, timeline, { bpm: config.bpm, sineRange: config.sineRange }),
    report: buildReport({
      stats: context.stats,
      headerLinesSkipped: context.headerLinesSkipped,
      solarDays: context.solarDays,
      composition,
      config,
    }),
  };
}

/** Compose from the text of a cleaned CSV (second half of the two-step flow). */
export function composeCleanedCsv(text: string, config: ConversionConfig): CleanedComposeResult {
  const { table, rejected, stats, clippedSineRows } = readCleanedCsv(text, config);
  const result = composeTable(table, config, { stats });
  return { ...result, table, rejected, clippedSineRows };
}

/** Whole run: weather CSV text in, cleaned CSV, MIDI and chart out. */
export function convertWeatherCsv(text: string, config: ConversionConfig): ConvertResult {
  const cleaned = cleanWeatherCsv(text, config);
  const composed = composeTable(cleaned.table, config, {
    stats: cleaned.stats,
    headerLinesSkipped: cleaned.sheet.headerLinesSkipped,
    solarDays: cleaned.sheet.solarDays,
  });
  return { ...cleaned, ...composed };
}
