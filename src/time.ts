// ─── Timestamp Parsing ──────────────────────────────────────────────────────
//
// Weather exports give local wall-clock times ("2024-06-01T05:00"). They are
// kept zone-free: epochMinutes is computed as if the clock were UTC, which
// makes differences and day boundaries exact regardless of the host zone.
// ─────────────────────────────────────────────────────────────────────────────

import type { Timestamp } from "./types.js";

const TIMESTAMP_RE = /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?(?:Z)?$/;

const MS_PER_MINUTE = 60_000;

/**
 * Parse "YYYY-MM-DDTHH:MM[:SS]" (or with a space separator).
 * Returns null for anything else, including impossible dates like 02-30.
 */
export function parseTimestamp(text: string): Timestamp | null {
  const match = text.trim().match(TIMESTAMP_RE);
  if (!match) return null;

  const [, y, mo, d, h, mi, s] = match;
  const year = parseInt(y, 10);
  const month = parseInt(mo, 10);
  const day = parseInt(d, 10);
  const hour = parseInt(h, 10);
  const minute = parseInt(mi, 10);
  const second = s ? parseInt(s, 10) : 0;

  if (hour > 23 || minute > 59 || second > 59) return null;

  const ms = Date.UTC(year, month - 1, day, hour, minute, second);
  const check = new Date(ms);
  if (check.getUTCFullYear() !== year || check.getUTCMonth() !== month - 1 || check.getUTCDate() !== day) {
    return null;
  }

  return {
    date: `${y}-${mo}-${d}`,
    time: `${h}:${mi}`,
    hour,
    hourOfDay: hour + minute / 60 + second / 3600,
    epochMinutes: ms / MS_PER_MINUTE,
  };
}

/** Epoch minutes of a fractional hour on the same calendar day as `ts`. */
export function epochMinutesAtHour(ts: Timestamp, hourOfDay: number): number {
  return ts.epochMinutes - ts.hourOfDay * 60 + hourOfDay * 60;
}
