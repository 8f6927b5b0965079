#!/usr/bin/env node
// ─── solar-score: CLI Entry Point ────────────────────────────────────────────
//
// Usage:
//   solar-score clean <weather.csv>              # Write <weather>_cleaned.csv
//   solar-score compose <weather_cleaned.csv>    # Cleaned CSV → .mid + .svg
//   solar-score convert <weather.csv>            # Both steps in one go
//   solar-score help                             # Show help
// ─────────────────────────────────────────────────────────────────────────────

import { readFileSync, writeFileSync, existsSync } from "node:fs";
import { parse, join } from "node:path";
import { resolveConfig, type ConversionConfig, type ConversionConfigInput } from "./config/schema.js";
import type { MalformedRowError } from "./errors.js";
import { cleanWeatherCsv, composeCleanedCsv, convertWeatherCsv, type ComposeResult } from "./pipeline.js";
import { formatReport, type RunReport } from "./report.js";

// ─── Helpers ────────────────────────────────────────────────────────────────

/** Check for boolean flag (no value). */
function hasFlag(args: string[], flag: string): boolean {
  return args.includes(flag);
}

function getFlag(args: string[], flag: string): string | null {
  const idx = args.indexOf(flag);
  if (idx === -1 || idx + 1 >= args.length) return null;
  return args[idx + 1];
}

/** First of several spellings of the same flag. */
function getAnyFlag(args: string[], ...flags: string[]): string | null {
  for (const flag of flags) {
    const value = getFlag(args, flag);
    if (value !== null) return value;
  }
  return null;
}

/** Input path: -i/--input, else the first positional argument. */
function getInputPath(args: string[]): string | null {
  const flagged = getAnyFlag(args, "-i", "--input");
  if (flagged) return flagged;
  const first = args[0];
  return first && !first.startsWith("-") ? first : null;
}

/** Path beside `file` with its extension replaced by `suffix`. */
function siblingPath(file: string, suffix: string): string {
  const { dir, name } = parse(file);
  return join(dir, `${name}${suffix}`);
}

function midiOutputPath(base: string, config: ConversionConfig): string {
  const timing = config.autoDuration ? "auto" : `${config.durationSeconds}s`;
  return siblingPath(base, `_3ch_events_${config.bpm}bpm_${timing}.mid`);
}

/** Build a validated config from CLI flags. Throws ConfigurationRangeError. */
function configFromArgs(args: string[]): ConversionConfig {
  const input: ConversionConfigInput = {};
  const num = (flag: string): number | undefined => {
    const value = getFlag(args, flag);
    return value === null ? undefined : Number(value);
  };

  input.skipLines = num("--skip-lines");
  input.dayStart = num("--day-start");
  input.dayEnd = num("--day-end");
  input.sineRange = num("--sine-range");
  input.toleranceMinutes = num("--tolerance");
  input.bpm = num("--bpm");
  input.durationSeconds = num("--duration");
  if (hasFlag(args, "--use-solar")) input.useSolar = true;
  if (hasFlag(args, "--no-realistic-timing")) input.useRealisticTiming = false;
  if (hasFlag(args, "--auto-duration")) input.autoDuration = true;
  input.cloudColumn = getFlag(args, "--cloud-column") ?? undefined;

  return resolveConfig(input);
}

function printRejected(rejected: readonly MalformedRowError[]): void {
  if (rejected.length === 0) return;
  console.log(`\n⚠ ${rejected.length} malformed row(s) skipped:`);
  for (const r of rejected.slice(0, 5)) {
    console.log(`  • ${r.message}`);
  }
  if (rejected.length > 5) {
    console.log(`  … and ${rejected.length - 5} more`);
  }
}

function printReport(report: RunReport): void {
  console.log("\nSummary:");
  for (const line of formatReport(report)) {
    console.log(`  ${line}`);
  }
}

function readInput(path: string): string {
  if (!existsSync(path)) {
    throw new Error(`Input file not found: ${path}`);
  }
  return readFileSync(path, "utf8");
}

function writeComposeOutputs(result: ComposeResult, midiPath: string, withChart: boolean): void {
  writeFileSync(midiPath, result.midi);
  console.log(`MIDI file: ${midiPath} (${result.midi.length.toLocaleString("en-US")} bytes)`);
  if (withChart) {
    const chartPath = siblingPath(midiPath, "_visualization.svg");
    writeFileSync(chartPath, result.chartSvg);
    console.log(`Visualization: ${chartPath}`);
  }
}

/** Run a command body, turning any thrown error into exit code 1. */
function run(body: () => void): void {
  try {
    body();
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    console.error(`\nError: ${msg}`);
    process.exit(1);
  }
}

// ─── Commands ───────────────────────────────────────────────────────────────

function cmdClean(args: string[]): void {
  const input = getInputPath(args);
  if (!input) {
    console.error("Usage: solar-score clean <weather.csv> [-o out.csv] [--skip-lines N] [--day-start H] [--day-end H] [--sine-range N] [--tolerance M] [--use-solar] [--no-realistic-timing] [--cloud-column NAME] [-v]");
    process.exit(1);
  }
  const verbose = hasFlag(args, "-v") || hasFlag(args, "--verbose");

  run(() => {
    const config = configFromArgs(args);
    const output = getAnyFlag(args, "-o", "--output") ?? siblingPath(input, "_cleaned.csv");
    const result = cleanWeatherCsv(readInput(input), config);

    writeFileSync(output, result.cleanedCsv);
    console.log(`\nCleanup complete!`);
    console.log(`Output file: ${output}`);

    const dates = result.table.entries.map(e => e.row.timestamp.date);
    if (dates.length > 0) {
      console.log(`Date range: ${dates[0]} to ${dates[dates.length - 1]}`);
    }
    if (verbose) {
      printRejected(result.rejected);
      printReport(result.report);
    }
  });
}

function cmdCompose(args: string[]): void {
  const input = getInputPath(args);
  if (!input) {
    console.error("Usage: solar-score compose <cleaned.csv> [-o out.mid] [--bpm N] [--duration S] [--auto-duration] [--sine-range N] [--cloud-column NAME] [--no-chart] [-v]");
    process.exit(1);
  }
  const verbose = hasFlag(args, "-v") || hasFlag(args, "--verbose");

  run(() => {
    const config = configFromArgs(args);
    const result = composeCleanedCsv(readInput(input), config);
    const midiPath = getAnyFlag(args, "-o", "--output") ?? midiOutputPath(input, config);

    if (result.clippedSineRows > 0) {
      console.warn(`\n⚠ ${result.clippedSineRows} row(s) have |solar_sine| above --sine-range ${config.sineRange}; channel 2 is clipped.`);
      console.warn(`  Pass the --sine-range the file was cleaned with.`);
    }

    console.log(`\nMIDI conversion complete!`);
    writeComposeOutputs(result, midiPath, !hasFlag(args, "--no-chart"));
    if (verbose) {
      printRejected(result.rejected);
      printReport(result.report);
    }
  });
}

function cmdConvert(args: string[]): void {
  const input = getInputPath(args);
  if (!input) {
    console.error("Usage: solar-score convert <weather.csv> [-o out.mid] [--cleaned out.csv] [clean flags] [--bpm N] [--duration S] [--auto-duration] [--no-chart] [-v]");
    process.exit(1);
  }
  const verbose = hasFlag(args, "-v") || hasFlag(args, "--verbose");

  run(() => {
    const config = configFromArgs(args);
    const result = convertWeatherCsv(readInput(input), config);

    const cleanedPath = getFlag(args, "--cleaned");
    if (cleanedPath) {
      writeFileSync(cleanedPath, result.cleanedCsv);
      console.log(`Cleaned table: ${cleanedPath}`);
    }

    const midiPath = getAnyFlag(args, "-o", "--output") ?? midiOutputPath(input, config);
    console.log(`\nConversion complete!`);
    writeComposeOutputs(result, midiPath, !hasFlag(args, "--no-chart"));
    if (verbose) {
      printRejected(result.rejected);
      printReport(result.report);
    }
  });
}

function cmdHelp(): void {
  console.log(`
solar-score: weather series → three-channel MIDI

Commands:
  clean <weather.csv>      Normalize a weather export and add solar columns
  compose <cleaned.csv>    Turn a cleaned table into MIDI + an SVG chart
  convert <weather.csv>    clean + compose in one run
  help                     Show this help

Cleaning options:
  -o, --output FILE        Output path (default: <input>_cleaned.csv / auto-named .mid)
  --skip-lines N           Leading lines to skip (default: 3)
  --day-start H            Hour the day starts, 0-23 (default: 6)
  --day-end H              Hour the day ends, 0-23 (default: 20)
  --sine-range N           Solar sine amplitude, >= 1 (default: 6). compose reads
                           solar_sine back with it, so pass the value used for clean
  --tolerance M            Minutes around sunrise/sunset to flag (default: 30)
  --use-solar              Use the file's sunrise/sunset section
  --no-realistic-timing    Ignore per-day sunrise/sunset for the sine window
  --cloud-column NAME      Cloud coverage header (default: "cloud_cover_low (%)")

Composing options:
  --bpm N                  Tempo, 60-240 (default: 120)
  --duration S             Length in seconds, 60-600 (default: 300)
  --auto-duration          Derive length from row count (constant density)
  --cleaned FILE           (convert) also write the cleaned table
  --no-chart               Skip the SVG visualization
  -v, --verbose            Print a run summary
`);
}

// ─── CLI Router ─────────────────────────────────────────────────────────────

function main(): void {
  const args = process.argv.slice(2);
  const command = args[0] ?? "help";

  switch (command) {
    case "clean":
      cmdClean(args.slice(1));
      break;
    case "compose":
      cmdCompose(args.slice(1));
      break;
    case "convert":
      cmdConvert(args.slice(1));
      break;
    case "help":
    case "--help":
    case "-h":
      cmdHelp();
      break;
    default:
      console.error(`Unknown command: "${command}". Run 'solar-score help' for usage.`);
      process.exit(1);
  }
}

main();
