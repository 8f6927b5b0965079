// ─── Duration Mapper ────────────────────────────────────────────────────────
//
// Places N input rows on a fixed output timeline. Either the length is given
// ("fixed") or it follows from a constant note density ("auto").
// ─────────────────────────────────────────────────────────────────────────────

export type DurationMode = "fixed" | "auto";

/**
 * Auto mode density in rows per second: four notes a second spread over
 * three channels. 744 hourly rows (one month) → 558 s.
 */
export const AUTO_ROWS_PER_SECOND = 4 / 3;

/** Shortest note the mapper will hand out, in seconds. */
export const MIN_NOTE_SECONDS = 0.05;

export interface Timeline {
  rowCount: number;
  durationSeconds: number;
  /** durationSeconds / rowCount (0 for an empty timeline). */
  spacingSeconds: number;
  /** rowCount / durationSeconds (0 for an empty timeline). */
  notesPerSecond: number;
  /** Start of row i, in seconds. */
  startTime(i: number): number;
  /** A fraction of the row spacing, never below MIN_NOTE_SECONDS. */
  noteDuration(fraction: number): number;
}

export interface TimelineOptions {
  /** Rows per second in auto mode. Default: AUTO_ROWS_PER_SECOND */
  density?: number;
  /** Default: MIN_NOTE_SECONDS */
  minNoteSeconds?: number;
}

/** Total duration for a mode; auto ignores the target. */
export function resolveDuration(
  rowCount: number,
  targetDurationSeconds: number,
  mode: DurationMode,
  density: number = AUTO_ROWS_PER_SECOND,
): number {
  if (mode === "auto") {
    if (density <= 0) throw new Error(`Density must be positive: got ${density}`);
    return rowCount / density;
  }
  return targetDurationSeconds;
}

/**
 * Build the timeline for `rowCount` rows.
 *
 * startTime(i) = i / (rowCount − 1) · duration, so the first row starts at 0
 * and the last at exactly `duration`. A single row sits at 0; zero rows give
 * an empty timeline.
 */
export function computeTimeline(
  rowCount: number,
  targetDurationSeconds: number,
  mode: DurationMode = "fixed",
  options: TimelineOptions = {},
): Timeline {
  const minNote = options.minNoteSeconds ?? MIN_NOTE_SECONDS;

  if (rowCount <= 0) {
    return {
      rowCount: 0,
      durationSeconds: 0,
      spacingSeconds: 0,
      notesPerSecond: 0,
      startTime: () => 0,
      noteDuration: () => minNote,
    };
  }

  const duration = resolveDuration(rowCount, targetDurationSeconds, mode, options.density);
  const spacing = duration / rowCount;

  return {
    rowCount,
    durationSeconds: duration,
    spacingSeconds: spacing,
    notesPerSecond: duration > 0 ? rowCount / duration : 0,
    startTime: (i: number) => (rowCount > 1 ? (i / (rowCount - 1)) * duration : 0),
    noteDuration: (fraction: number) => Math.max(minNote, fraction * spacing),
  };
}

/** Seconds → quarter-note beats at a tempo. */
export function secondsToBeats(seconds: number, bpm: number): number {
  return seconds * (bpm / 60);
}
