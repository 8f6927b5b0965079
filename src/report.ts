// ─── Run Report ─────────────────────────────────────────────────────────────
//
// The normalizer's counts plus timing, for the CLI's verbose summary.
// Building the report never prints; formatReport returns lines for the
// caller to log.
// ─────────────────────────────────────────────────────────────────────────────

import type { ChannelId } from "./types.js";
import type { ConversionConfig } from "./config/schema.js";
import type { NormalizeStats } from "./series/normalizer.js";
import { countByChannel, type Composition } from "./music/composer.js";
import { secondsToBeats } from "./timeline/duration.js";

export interface RunReport extends NormalizeStats {
  headerLinesSkipped: number;
  /** Days in the file's sunrise/sunset section. */
  solarDays: number;
  /** Present once the table has been composed. */
  timing?: {
    bpm: number;
    autoDuration: boolean;
    durationSeconds: number;
    notesPerSecond: number;
    beatsPerNote: number;
    notes: Record<ChannelId, number>;
  };
}

export interface ReportInput {
  /** Counts gathered while the table was built. */
  stats: NormalizeStats;
  headerLinesSkipped?: number;
  solarDays?: number;
  composition?: Composition;
  config: Pick<ConversionConfig, "bpm" | "autoDuration">;
}

export function buildReport(input: ReportInput): RunReport {
  const { composition, config } = input;
  const report: RunReport = {
    ...input.stats,
    headerLinesSkipped: input.headerLinesSkipped ?? 0,
    solarDays: input.solarDays ?? 0,
  };

  if (composition) {
    const { timeline } = composition;
    report.timing = {
      bpm: config.bpm,
      autoDuration: config.autoDuration,
      durationSeconds: timeline.durationSeconds,
      notesPerSecond: timeline.notesPerSecond,
      beatsPerNote: secondsToBeats(timeline.spacingSeconds, config.bpm),
      notes: countByChannel(composition),
    };
  }

  return report;
}

function percent(part: number, whole: number): string {
  return whole > 0 ? `${((part / whole) * 100).toFixed(1)}%` : "0.0%";
}

/** Human-readable summary, one entry per line. */
export function formatReport(report: RunReport): string[] {
  const lines = [
    `Rows: ${report.rowsAccepted} accepted / ${report.rowsRead} read (${report.rowsSkipped} skipped, ${report.headerLinesSkipped} header line(s))`,
    `Missing cloud values: ${report.missingCloud}`,
    `Day cycle: ${report.dayRows} (${percent(report.dayRows, report.rowsAccepted)}) | Night cycle: ${report.nightRows} (${percent(report.nightRows, report.rowsAccepted)})`,
    `Sunrise events: ${report.sunriseEvents} | Sunset events: ${report.sunsetEvents}`,
    `Embedded solar times: ${report.embeddedSolarRows} row(s) from ${report.solarDays} day(s)`,
  ];

  const t = report.timing;
  if (t) {
    const mode = t.autoDuration ? " (auto)" : "";
    lines.push(`Duration: ${t.durationSeconds.toFixed(1)}s${mode} at ${t.bpm} BPM`);
    lines.push(`Density: ${t.notesPerSecond.toFixed(2)} rows/s | ${t.beatsPerNote.toFixed(3)} beats per row`);
    lines.push(`Notes: cloud ${t.notes[1]} | solar ${t.notes[2]} | events ${t.notes[3]}`);
  }

  return lines;
}
