// ─── solar-score: Core Types ─────────────────────────────────────────────────
//
// Shared data model for the weather → notation pipeline: timestamps, input
// rows, derived solar samples, the cleaned table and note events.
// ─────────────────────────────────────────────────────────────────────────────

// ─── Time ───────────────────────────────────────────────────────────────────

/** Wall-clock timestamp with no time zone attached. */
export interface Timestamp {
  /** Calendar date, "YYYY-MM-DD". */
  date: string;
  /** Clock time, "HH:MM". */
  time: string;
  /** Whole hour (0–23). */
  hour: number;
  /** Fractional hour, e.g. 6.5 for 06:30. */
  hourOfDay: number;
  /** Minutes since 1970-01-01T00:00 on the same wall clock. Only differences are meaningful. */
  epochMinutes: number;
}

/** Sunrise and sunset for the calendar day a row falls on. */
export interface SolarTimes {
  sunrise: Timestamp;
  sunset: Timestamp;
}

// ─── Input ──────────────────────────────────────────────────────────────────

/** One row as read from the CSV, before any validation. */
export interface RawRow {
  /** 1-based line number in the source file. */
  line: number;
  /** Text of the time column. */
  timestamp: string;
  /** Text of the cloud coverage column. */
  cloudCoverage: string;
  /** Embedded sunrise/sunset text for the row's date, when the file carries a solar section. */
  sunrise?: string;
  sunset?: string;
  /** Every column except the time column, keyed by header. */
  fields: Record<string, string>;
}

/** A validated observation. */
export interface Row {
  line: number;
  timestamp: Timestamp;
  /** Cloud coverage in percent, or null when the source marks it missing. */
  cloudCoverage: number | null;
  solar?: SolarTimes;
  fields: Readonly<Record<string, string>>;
}

// ─── Solar ──────────────────────────────────────────────────────────────────

export type DayCycle = "day" | "night";

/** Where a row's day window came from. */
export type DayWindowSource = "configured" | "embedded";

/** Effective day start/end in fractional hours. */
export interface DayWindow {
  dayStart: number;
  dayEnd: number;
  source: DayWindowSource;
}

/** Per-row solar signal. */
export interface SolarSample {
  /** Unit sine, positive by day and negative by night, in [-1, 1]. */
  phase: number;
  /** phase × sine range. */
  sine: number;
  isSunriseEvent: boolean;
  isSunsetEvent: boolean;
  /** Day/night label using the configured hours. */
  cycle: DayCycle;
  window: DayWindow;
}

export interface TableEntry {
  readonly row: Row;
  readonly solar: SolarSample;
}

/** Rows in input order, each paired with its solar sample. */
export interface CleanedTable {
  /** Original column headers other than the time column, in source order. */
  columns: string[];
  /** Header of the cloud coverage column. */
  cloudColumn: string;
  entries: readonly TableEntry[];
}

// ─── Notes ──────────────────────────────────────────────────────────────────

export type ChannelId = 1 | 2 | 3;

export const CHANNEL_IDS: readonly ChannelId[] = [1, 2, 3];

/** A single note in the output sequence. */
export interface NoteEvent {
  readonly channel: ChannelId;
  /** MIDI note number (0–127). */
  readonly pitch: number;
  /** Seconds from the start of the piece. */
  readonly startTime: number;
  readonly durationSeconds: number;
  /** MIDI velocity (1–127). */
  readonly velocity: number;
}
