import { describe, it, expect } from "vitest";
import { formatCleanedCsv, readCleanedCsv, formatSine } from "./cleaned.js";
import { readWeatherCsv } from "./csv.js";
import { normalize } from "./normalizer.js";
import { resolveConfig } from "../config/schema.js";
import { CsvFormatError } from "../errors.js";

// ─── Test Helpers ───────────────────────────────────────────────────────────

const CONFIG = resolveConfig({});

const SOURCE = [
  "time,cloud_cover_low (%),temperature_2m (°C)",
  "2024-06-01T05:00,80,12.1",
  '2024-06-01T13:00,,"20,5"',
].join("\n");

function cleanedFrom(text: string): string {
  const sheet = readWeatherCsv(text, { skipLines: 0 });
  const { table } = normalize(sheet.rows, CONFIG, {
    columns: sheet.columns.filter(c => c !== sheet.timeColumn),
    cloudColumn: sheet.cloudColumn,
  });
  return formatCleanedCsv(table);
}

const CLEANED = [
  "date,time,hour,cycle,solar_sine,sunrise_event,sunset_event,cloud_cover_low (%),temperature_2m (°C)",
  "2024-06-01,05:00,5,night,-1.85,false,false,80,12.1",
  '2024-06-01,13:00,13,day,6.00,false,false,,"20,5"',
  "",
].join("\n");

// ─── Tests ──────────────────────────────────────────────────────────────────

describe("formatSine", () => {
  it("rounds to two decimals", () => {
    expect(formatSine(2.5)).toBe("2.50");
    expect(formatSine(-1.854)).toBe("-1.85");
    expect(formatSine(6)).toBe("6.00");
  });

  it("never writes negative zero", () => {
    expect(formatSine(-0.001)).toBe("0.00");
    expect(formatSine(-0)).toBe("0.00");
  });
});

describe("formatCleanedCsv", () => {
  it("writes derived columns followed by the original ones", () => {
    expect(cleanedFrom(SOURCE)).toBe(CLEANED);
  });

  it("writes only the header for an empty table", () => {
    expect(formatCleanedCsv({ columns: ["cloud_cover_low (%)"], cloudColumn: "cloud_cover_low (%)", entries: [] })).toBe(
      "date,time,hour,cycle,solar_sine,sunrise_event,sunset_event,cloud_cover_low (%)\n",
    );
  });
});

describe("readCleanedCsv", () => {
  it("rebuilds the table", () => {
    const { table, rejected } = readCleanedCsv(CLEANED, CONFIG);
    expect(rejected).toEqual([]);
    expect(table.columns).toEqual(["cloud_cover_low (%)", "temperature_2m (°C)"]);
    expect(table.cloudColumn).toBe("cloud_cover_low (%)");
    expect(table.entries).toHaveLength(2);

    const [night, day] = table.entries;
    expect(night.row.cloudCoverage).toBe(80);
    expect(night.solar.sine).toBe(-1.85);
    expect(night.solar.phase).toBeCloseTo(-1.85 / 6, 9);
    expect(night.solar.cycle).toBe("night");
    expect(day.row.cloudCoverage).toBeNull();
    expect(day.row.fields["temperature_2m (°C)"]).toBe("20,5");
    expect(day.solar.phase).toBe(1);
    expect(day.solar.cycle).toBe("day");
  });

  it("counts what it read", () => {
    const { stats, clippedSineRows } = readCleanedCsv(CLEANED, CONFIG);
    expect(stats).toEqual({
      rowsRead: 2,
      rowsAccepted: 2,
      rowsSkipped: 0,
      missingCloud: 1,
      sunriseEvents: 0,
      sunsetEvents: 0,
      dayRows: 1,
      nightRows: 1,
      embeddedSolarRows: 0,
    });
    expect(clippedSineRows).toBe(0);
  });

  it("counts rows beyond a smaller sine range", () => {
    const { table, clippedSineRows } = readCleanedCsv(CLEANED, resolveConfig({ sineRange: 3 }));
    expect(clippedSineRows).toBe(1);
    expect(table.entries[1].solar.phase).toBe(1);
    expect(table.entries[0].solar.phase).toBeCloseTo(-1.85 / 3, 9);
  });

  it("writes back the same text", () => {
    expect(formatCleanedCsv(readCleanedCsv(CLEANED, CONFIG).table)).toBe(CLEANED);
  });

  it("reads event flags", () => {
    const text = [
      "date,time,hour,cycle,solar_sine,sunrise_event,sunset_event,cloud_cover_low (%)",
      "2024-06-01,06:00,6,day,0.00,true,false,40",
      "2024-06-01,20:00,20,night,0.00,False,TRUE,40",
    ].join("\n");
    const { table } = readCleanedCsv(text, CONFIG);
    expect(table.entries.map(e => [e.solar.isSunriseEvent, e.solar.isSunsetEvent])).toEqual([
      [true, false],
      [false, true],
    ]);
  });

  it("skips rows it cannot use", () => {
    const text = [
      "date,time,hour,cycle,solar_sine,sunrise_event,sunset_event,cloud_cover_low (%)",
      "2024-06-01,05:00,5,night,-1.85,false,false,10",
      "2024-06-01,06:00,6,day,oops,false,false,10",
      "2024-06-01,05:00,5,night,-1.85,false,false,10",
      "2024-06-01,07:00,7,day,1.30,false,false,heavy",
      "2024-06-01,08:00,8,day,2.60,false,false,10",
    ].join("\n");
    const { table, rejected, stats } = readCleanedCsv(text, CONFIG);
    expect(table.entries.map(e => e.row.timestamp.time)).toEqual(["05:00", "08:00"]);
    expect([stats.rowsRead, stats.rowsAccepted, stats.rowsSkipped]).toEqual([5, 2, 3]);
    expect(rejected.map(r => [r.line, r.reason])).toEqual([
      [3, "solar-sine"],
      [4, "timestamp-order"],
      [5, "cloud-coverage"],
    ]);
  });

  it("requires the derived columns", () => {
    const text = "date,time,hour,cycle,solar_sine,sunrise_event,cloud_cover_low (%)\n";
    expect(() => readCleanedCsv(text, CONFIG)).toThrow(CsvFormatError);
    expect(() => readCleanedCsv(text, CONFIG)).toThrow("Missing required columns: sunset_event");
  });

  it("requires a cloud column", () => {
    const text = "date,time,hour,cycle,solar_sine,sunrise_event,sunset_event,temperature\n";
    expect(() => readCleanedCsv(text, CONFIG)).toThrow("Could not find a cloud coverage column in: temperature");
  });
});
