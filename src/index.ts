// ─── solar-score ─────────────────────────────────────────────────────────────
//
// Weather series → three-channel note sequence that follows the sun.
//
// Usage:
//   import { resolveConfig, convertWeatherCsv } from "solar-score";
//   const result = convertWeatherCsv(csvText, resolveConfig({ autoDuration: true }));
//   // result.midi, result.chartSvg, result.cleanedCsv
// ─────────────────────────────────────────────────────────────────────────────

// Types
export type {
  Timestamp,
  SolarTimes,
  RawRow,
  Row,
  DayCycle,
  DayWindow,
  DayWindowSource,
  SolarSample,
  TableEntry,
  CleanedTable,
  ChannelId,
  NoteEvent,
} from "./types.js";

export { CHANNEL_IDS } from "./types.js";

// Errors
export {
  MalformedRowError,
  ConfigurationRangeError,
  EmptyInputError,
  CsvFormatError,
} from "./errors.js";
export type { MalformedRowReason, ConfigIssue } from "./errors.js";

// Config
export { ConversionConfigSchema, validateConfig, resolveConfig } from "./config/schema.js";
export type { ConversionConfig, ConversionConfigInput } from "./config/schema.js";

// Time
export { parseTimestamp, epochMinutesAtHour } from "./time.js";

// Solar model
export {
  deriveSolarSample,
  resolveDayWindow,
  solarPhase,
  dayCycle,
  detectSolarEvents,
} from "./solar/model.js";
export type { SolarConfig } from "./solar/model.js";

// Series
export { readWeatherCsv, splitCsvLine, splitLines, findTimeColumn, DEFAULT_CLOUD_COLUMN } from "./series/csv.js";
export type { ReadCsvOptions, WeatherSheet } from "./series/csv.js";
export { normalize, parseCoverage, emptyStats, tallyEntry } from "./series/normalizer.js";
export type { NormalizeResult, NormalizeStats, NormalizeConfig, TableLayout } from "./series/normalizer.js";
export { formatCleanedCsv, readCleanedCsv, formatSine, CLEANED_COLUMNS } from "./series/cleaned.js";
export type { CleanedReadResult } from "./series/cleaned.js";

// Timeline
export {
  computeTimeline,
  resolveDuration,
  secondsToBeats,
  AUTO_ROWS_PER_SECOND,
  MIN_NOTE_SECONDS,
} from "./timeline/duration.js";
export type { Timeline, TimelineOptions, DurationMode } from "./timeline/duration.js";

// Music
export {
  quantize,
  scaleLadder,
  isScaleMember,
  cloudValue,
  phaseValue,
  eventValue,
  MAJOR_PENTATONIC,
  MINOR_PENTATONIC,
  HARMONIC_MINOR,
  SUNRISE_VALUE,
  SUNSET_VALUE,
} from "./music/scales.js";
export type { ScaleDefinition, OctaveRange, SolarEventKind } from "./music/scales.js";
export { compose, countByChannel, solarEventKind, CHANNELS } from "./music/composer.js";
export type { ChannelSpec, Composition } from "./music/composer.js";

// Output
export { writeNoteSequence, buildMidiData, secondsToTicks, DEFAULT_TICKS_PER_BEAT } from "./midi/writer.js";
export type { MidiWriteOptions } from "./midi/writer.js";
export { renderChannelChart } from "./chart.js";
export type { ChartOptions } from "./chart.js";
export { buildReport, formatReport } from "./report.js";
export type { RunReport, ReportInput } from "./report.js";

// Pipeline
export { cleanWeatherCsv, composeTable, composeCleanedCsv, convertWeatherCsv } from "./pipeline.js";
export type { CleanResult, ComposeResult, ComposeContext, CleanedComposeResult, ConvertResult } from "./pipeline.js";
