import { describe, it, expect } from "vitest";
import { buildReport, formatReport } from "./report.js";
import { compose } from "./music/composer.js";
import { computeTimeline } from "./timeline/duration.js";
import { normalize, emptyStats } from "./series/normalizer.js";
import { resolveConfig } from "./config/schema.js";
import type { RawRow } from "./types.js";

const CLOUD = "cloud_cover_low (%)";

function raw(line: number, timestamp: string, cloud: string): RawRow {
  return { line, timestamp, cloudCoverage: cloud, fields: { [CLOUD]: cloud } };
}

const CONFIG = resolveConfig({ useRealisticTiming: false });

const { table, stats } = normalize(
  [
    raw(2, "2024-06-01T05:00", "0"),
    raw(3, "not a date", "10"),
    raw(4, "2024-06-01T06:00", "100"),
    raw(5, "2024-06-01T12:00", "50"),
    raw(6, "2024-06-01T20:00", ""),
  ],
  CONFIG,
);

describe("buildReport", () => {
  it("carries the normalizer's counts", () => {
    const report = buildReport({ stats, headerLinesSkipped: 3, config: CONFIG });
    expect(report).toEqual({
      rowsRead: 5,
      rowsAccepted: 4,
      rowsSkipped: 1,
      headerLinesSkipped: 3,
      solarDays: 0,
      missingCloud: 1,
      sunriseEvents: 1,
      sunsetEvents: 1,
      dayRows: 2,
      nightRows: 2,
      embeddedSolarRows: 0,
    });
  });

  it("reports counts as given rather than recounting", () => {
    const given = { ...emptyStats(24), rowsAccepted: 24, dayRows: 14, nightRows: 10, embeddedSolarRows: 24 };
    const report = buildReport({ stats: given, solarDays: 1, config: CONFIG });
    expect(report.embeddedSolarRows).toBe(24);
    expect(report.solarDays).toBe(1);
    expect(formatReport(report)[4]).toBe("Embedded solar times: 24 row(s) from 1 day(s)");
  });

  it("adds timing once composed", () => {
    const composition = compose(table, computeTimeline(4, 300));
    const report = buildReport({ stats, composition, config: CONFIG });
    expect(report.timing).toEqual({
      bpm: 120,
      autoDuration: false,
      durationSeconds: 300,
      notesPerSecond: 4 / 300,
      beatsPerNote: 150,
      notes: { 1: 4, 2: 4, 3: 2 },
    });
  });
});

describe("formatReport", () => {
  it("summarizes a fixed-length run", () => {
    const composition = compose(table, computeTimeline(4, 300));
    const report = buildReport({ stats, composition, config: CONFIG });
    expect(formatReport(report)).toEqual([
      "Rows: 4 accepted / 5 read (1 skipped, 0 header line(s))",
      "Missing cloud values: 1",
      "Day cycle: 2 (50.0%) | Night cycle: 2 (50.0%)",
      "Sunrise events: 1 | Sunset events: 1",
      "Embedded solar times: 0 row(s) from 0 day(s)",
      "Duration: 300.0s at 120 BPM",
      "Density: 0.01 rows/s | 150.000 beats per row",
      "Notes: cloud 4 | solar 4 | events 2",
    ]);
  });

  it("marks auto duration", () => {
    const config = resolveConfig({ useRealisticTiming: false, autoDuration: true });
    const composition = compose(table, computeTimeline(4, 300, "auto"));
    const lines = formatReport(buildReport({ stats, composition, config }));
    expect(lines[5]).toBe("Duration: 3.0s (auto) at 120 BPM");
    expect(lines[6]).toBe("Density: 1.33 rows/s | 1.500 beats per row");
  });

  it("stops at the table counts before composing", () => {
    const lines = formatReport(buildReport({ stats, config: CONFIG }));
    expect(lines).toHaveLength(5);
  });

  it("handles a run with nothing accepted", () => {
    const lines = formatReport(buildReport({ stats: { ...emptyStats(2), rowsSkipped: 2 }, config: CONFIG }));
    expect(lines[0]).toBe("Rows: 0 accepted / 2 read (2 skipped, 0 header line(s))");
    expect(lines[2]).toBe("Day cycle: 0 (0.0%) | Night cycle: 0 (0.0%)");
  });
});
