import { describe, it, expect } from "vitest";
import { parseMidi } from "midi-file";
import { cleanWeatherCsv, composeCleanedCsv, composeTable, convertWeatherCsv } from "./pipeline.js";
import { resolveConfig } from "./config/schema.js";
import { emptyStats } from "./series/normalizer.js";
import { EmptyInputError } from "./errors.js";

// ─── Test Helpers ───────────────────────────────────────────────────────────

function hourlyExport(cloud: (hour: number) => string): string {
  const rows = Array.from({ length: 24 }, (_, h) => `2024-06-01T${String(h).padStart(2, "0")}:00,${cloud(h)},${(10 + h / 2).toFixed(1)}`);
  return [
    "latitude,longitude,elevation",
    "36.97,-122.03,10.0",
    "",
    "time,cloud_cover_low (%),temperature_2m (°C)",
    ...rows,
    "",
    "time,sunrise (iso8601),sunset (iso8601)",
    "2024-06-01,2024-06-01T05:48,2024-06-01T20:22",
    "",
  ].join("\n");
}

const EXPORT = hourlyExport(h => String((h * 5) % 100));
const CONFIG = resolveConfig({ useSolar: true, autoDuration: true });

// ─── Tests ──────────────────────────────────────────────────────────────────

describe("cleanWeatherCsv", () => {
  const result = cleanWeatherCsv(EXPORT, CONFIG);

  it("accepts every hourly row", () => {
    expect(result.stats.rowsRead).toBe(24);
    expect(result.stats.rowsAccepted).toBe(24);
    expect(result.rejected).toEqual([]);
    expect(result.stats.embeddedSolarRows).toBe(24);
  });

  it("flags the rows nearest the embedded sunrise and sunset", () => {
    const sunrise = result.table.entries.filter(e => e.solar.isSunriseEvent).map(e => e.row.timestamp.time);
    const sunset = result.table.entries.filter(e => e.solar.isSunsetEvent).map(e => e.row.timestamp.time);
    expect(sunrise).toEqual(["06:00"]);
    expect(sunset).toEqual(["20:00"]);
  });

  it("writes a header plus one line per row", () => {
    const lines = result.cleanedCsv.trimEnd().split("\n");
    expect(lines).toHaveLength(25);
    expect(lines[0]).toBe("date,time,hour,cycle,solar_sine,sunrise_event,sunset_event,cloud_cover_low (%),temperature_2m (°C)");
    expect(lines[7]).toMatch(/^2024-06-01,06:00,6,day,[0-9.]+,true,false,30,13\.0$/);
  });

  it("reports the normalizer's counts without timing", () => {
    expect(result.report.headerLinesSkipped).toBe(3);
    expect(result.report.dayRows).toBe(14);
    expect(result.report.nightRows).toBe(10);
    expect(result.report.embeddedSolarRows).toBe(24);
    expect(result.report.solarDays).toBe(1);
    expect(result.report.timing).toBeUndefined();
  });

  it("fails when no row survives", () => {
    const broken = hourlyExport(() => "heavy");
    expect(() => cleanWeatherCsv(broken, CONFIG)).toThrow(EmptyInputError);
    expect(() => cleanWeatherCsv(broken, CONFIG)).toThrow("No valid rows to compose (24 malformed row(s) skipped)");
  });
});

describe("convertWeatherCsv", () => {
  const result = convertWeatherCsv(EXPORT, CONFIG);

  it("sizes an auto-length piece by row count", () => {
    expect(result.composition.timeline.durationSeconds).toBeCloseTo(18, 9);
    expect(result.report.timing?.autoDuration).toBe(true);
  });

  it("plays every row on channels 1 and 2 and the events on channel 3", () => {
    expect(result.report.timing?.notes).toEqual({ 1: 24, 2: 24, 3: 2 });
  });

  it("writes a three-track MIDI file", () => {
    const midi = parseMidi(result.midi);
    expect(midi.header.format).toBe(1);
    expect(midi.tracks).toHaveLength(3);
  });

  it("renders the chart", () => {
    expect(result.chartSvg).toContain(">3-Channel MIDI Data: 120 BPM, 18s duration</text>");
  });

  it("uses the fixed duration unless auto is on", () => {
    const fixed = convertWeatherCsv(EXPORT, resolveConfig({ durationSeconds: 120 }));
    expect(fixed.composition.timeline.durationSeconds).toBe(120);
    expect(fixed.chartSvg).toContain(">3-Channel MIDI Data: 120 BPM, 120s duration</text>");
  });

  it("fails when no row survives", () => {
    const broken = hourlyExport(() => "heavy");
    expect(() => convertWeatherCsv(broken, CONFIG)).toThrow(EmptyInputError);
    expect(() => convertWeatherCsv(broken, CONFIG)).toThrow("No valid rows to compose (24 malformed row(s) skipped)");
  });
});

describe("composeTable", () => {
  it("refuses an empty table", () => {
    const empty = { columns: [], cloudColumn: "cloud_cover_low (%)", entries: [] };
    expect(() => composeTable(empty, CONFIG, { stats: emptyStats(0) })).toThrow("No valid rows to compose");
  });
});

describe("composeCleanedCsv", () => {
  it("composes the same notes from the cleaned file", () => {
    const direct = convertWeatherCsv(EXPORT, CONFIG);
    const twoStep = composeCleanedCsv(direct.cleanedCsv, CONFIG);

    expect(twoStep.rejected).toEqual([]);
    expect(twoStep.clippedSineRows).toBe(0);
    expect(twoStep.composition.byChannel[1]).toEqual(direct.composition.byChannel[1]);
    expect(twoStep.composition.byChannel[2]).toEqual(direct.composition.byChannel[2]);
    expect(twoStep.composition.byChannel[3]).toEqual(direct.composition.byChannel[3]);
  });

  it("reports counts read back from the cleaned file", () => {
    const cleaned = cleanWeatherCsv(EXPORT, CONFIG).cleanedCsv;
    const { report } = composeCleanedCsv(cleaned, CONFIG);
    expect(report.rowsRead).toBe(24);
    expect(report.rowsAccepted).toBe(24);
    expect(report.sunriseEvents).toBe(1);
    expect(report.sunsetEvents).toBe(1);
    expect(report.dayRows).toBe(14);
    expect(report.timing?.notes).toEqual({ 1: 24, 2: 24, 3: 2 });
  });

  it("counts rows clipped by a smaller sine range than the file was cleaned with", () => {
    const cleaned = cleanWeatherCsv(EXPORT, resolveConfig({ useSolar: true, sineRange: 10 })).cleanedCsv;
    const { clippedSineRows, table } = composeCleanedCsv(cleaned, CONFIG);
    const pinned = table.entries.filter(e => Math.abs(e.solar.sine) > 6);
    expect(clippedSineRows).toBe(pinned.length);
    expect(clippedSineRows).toBeGreaterThan(0);
    expect(pinned.every(e => Math.abs(e.solar.phase) === 1)).toBe(true);
  });
});
